/**
 * src/entities/sendResponse.ts
 * Turns a response description into wire bytes and writes them out.
 * Every response closes the connection.
 */
import { Writable } from 'stream';
import { ErrorResponse, HttpResponse } from './http';
import { HttpError } from './errors';
import logger from '../utils/logger';

export const NOT_FOUND_BODY = 'YOU ARE A QUICHE EATER';

// Status lines keep the space before CRLF; clients compare them byte for byte.
function head(statusLine: string, headers: Record<string, string>): string {
  const headerLines = Object.entries(headers)
    .map(([k, v]) => `${k}: ${v}\r\n`)
    .join('');
  return `${statusLine} \r\n${headerLines}\r\n`;
}

export function serializeResponse(response: HttpResponse): Buffer {
  switch (response.kind) {
    case 'ok':
      return Buffer.concat([
        Buffer.from(
          head('HTTP/1.1 200 OK', {
            Connection: 'close',
            'Content-Type': response.contentType,
            'Content-Length': String(response.contentLength),
          }),
        ),
        response.body,
      ]);
    case 'not-found':
      return Buffer.from(
        head('HTTP/1.1 404 NOT FOUND', {
          Connection: 'close',
          'Content-Type': 'text/html; charset=utf8',
          'Content-Length': String(Buffer.byteLength(NOT_FOUND_BODY)),
        }) + NOT_FOUND_BODY,
      );
    case 'error':
      return Buffer.from(
        head(`HTTP/1.1 ${response.status} ${response.reason}`, {
          Connection: 'close',
          'Content-Type': 'text/plain; charset=utf8',
          ...response.headers,
          'Content-Length': String(Buffer.byteLength(response.reason)),
        }) + response.reason,
      );
  }
}

/**
 * Maps anything thrown while handling a request onto an error response.
 * Unknown errors become 500.
 */
export function errorResponseFor(err: unknown): ErrorResponse {
  if (err instanceof HttpError) {
    return {
      kind: 'error',
      status: err.status,
      reason: err.reason,
      headers: err.status === 405 ? { Allow: 'GET' } : undefined,
    };
  }
  return { kind: 'error', status: 500, reason: 'INTERNAL SERVER ERROR' };
}

/**
 * Writes the serialized response and half-closes the socket.
 * Resolves once the bytes are flushed; rejects on a write error.
 */
export function sendResponse(
  socket: Writable,
  response: HttpResponse,
): Promise<number> {
  if (socket.destroyed || socket.writableEnded) {
    logger.debug('[sendResponse] Attempted to write to closed socket', { kind: response.kind });
    return Promise.resolve(0);
  }

  const bytes = serializeResponse(response);
  return new Promise<number>((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    socket.once('error', onError);
    socket.end(bytes, (err?: Error | null) => {
      if (err) {
        reject(err);
        return;
      }
      socket.off('error', onError);
      resolve(bytes.length);
    });
  });
}
