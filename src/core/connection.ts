/**
 * src/core/connection.ts
 * One request/response exchange per accepted connection.
 */
import { Duplex } from 'stream';
import { readRequestHead } from './requestReader';
import { parseHeaders, parseRequestLine, DEFAULT_DOCUMENT } from './httpParser';
import { HttpError } from '../entities/errors';
import { HttpResponse, ParsedHeaders, ResolvedRequest } from '../entities/http';
import { errorResponseFor, sendResponse } from '../entities/sendResponse';
import { staticFilesController } from '../modules/static-files';
import logger from '../utils/logger';

export type ClientConnection = Duplex & { readonly remoteAddress?: string };

export interface ConnectionOptions {
  rootDir: string;
  defaultDocument?: string;
  maxHeaderBytes?: number;
  headerTimeoutMs?: number;
}

function statusOf(response: HttpResponse): number {
  switch (response.kind) {
    case 'ok':
      return 200;
    case 'not-found':
      return 404;
    case 'error':
      return response.status;
  }
}

/**
 * Reads one request from `socket`, answers it and destroys the socket once
 * the response is flushed.
 *
 * Never rejects: parse, validation and filesystem failures are logged and
 * answered with an error response so the listener keeps accepting.
 */
export async function handleConnection(
  socket: ClientConnection,
  options: ConnectionOptions,
): Promise<void> {
  const log = logger.child({ remoteAddress: socket.remoteAddress });
  let headers: ParsedHeaders | undefined;
  let request: ResolvedRequest | undefined;
  let response: HttpResponse;

  try {
    const raw = await readRequestHead(socket, {
      capacity: options.maxHeaderBytes,
      timeoutMs: options.headerTimeoutMs,
    });
    if (raw.length === 0) {
      log.debug('[connection] Peer closed without sending a request');
      if (!socket.destroyed) socket.destroy();
      return;
    }

    headers = parseHeaders(raw);
    request = parseRequestLine(headers.requestLine, options.defaultDocument ?? DEFAULT_DOCUMENT);
    response = await staticFilesController.buildResponse(request, options.rootDir);
  } catch (err) {
    if (socket.destroyed) {
      log.error('[connection] Connection failed before a response could be sent', {
        error: err instanceof Error ? err.message : String(err),
      });
      return;
    }
    response = errorResponseFor(err);
    if (err instanceof HttpError && err.status < 500) {
      log.warn(`[connection] Rejected request: ${err.message}`, { status: err.status });
    } else {
      log.error('[connection] Failed to handle request', {
        error: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
      });
    }
  }

  try {
    const bytesWritten = await sendResponse(socket, response);
    log.http(`${request?.method ?? '-'} ${request?.path ?? '-'} ${statusOf(response)}`, {
      bytes: bytesWritten,
      host: headers?.host,
      userAgent: headers?.userAgent,
    });
  } catch (err) {
    log.error('[connection] Failed to write response', {
      error: err instanceof Error ? err.message : String(err),
    });
  } finally {
    // One exchange per connection, even when the peer keeps its side open
    if (!socket.destroyed) socket.destroy();
  }
}
