import { Readable } from 'stream';
import { RequestTimeoutError, RequestTooLargeError } from '../entities/errors';
import logger from '../utils/logger';

const END_OF_HEADERS = Buffer.from('\r\n\r\n');
export const DEFAULT_MAX_HEADER_BYTES = 4096; // 4KB

export interface ReadRequestHeadOptions {
  /** Capacity of the raw request buffer. */
  capacity?: number;
  /** Rejects with RequestTimeoutError after this long; 0 waits forever. */
  timeoutMs?: number;
}

/**
 * True once the accumulated bytes contain `\r\n\r\n` anywhere.
 */
export function endOfRequestReached(bytes: Buffer): boolean {
  return bytes.includes(END_OF_HEADERS);
}

/**
 * Fills a fixed-capacity buffer from `socket` until the header block is
 * complete or the peer stops sending.
 *
 * Resolves with a view over the bytes read so far. An empty view means the
 * peer closed without sending anything. The socket is paused, not consumed,
 * so the caller can still write the response.
 */
export function readRequestHead(
  socket: Readable,
  options: ReadRequestHeadOptions = {},
): Promise<Buffer> {
  const capacity = options.capacity ?? DEFAULT_MAX_HEADER_BYTES;
  const timeoutMs = options.timeoutMs ?? 0;
  const buffer = Buffer.alloc(capacity);
  let received = 0;

  return new Promise<Buffer>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;

    const cleanup = () => {
      if (timer) clearTimeout(timer);
      socket.off('data', onData);
      socket.off('end', onEnd);
      socket.off('close', onEnd);
      socket.off('error', onError);
    };

    const onData = (chunk: Buffer) => {
      const take = Math.min(chunk.length, capacity - received);
      chunk.copy(buffer, received, 0, take);
      received += take;

      const head = buffer.subarray(0, received);
      if (endOfRequestReached(head)) {
        cleanup();
        socket.pause();
        resolve(head);
        return;
      }
      if (received === capacity) {
        cleanup();
        socket.pause();
        reject(new RequestTooLargeError(capacity));
      }
    };

    const onEnd = () => {
      cleanup();
      logger.debug('[requestReader] Peer stopped sending before end of headers', {
        bytesReceived: received,
      });
      resolve(buffer.subarray(0, received));
    };

    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };

    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        cleanup();
        socket.pause();
        reject(new RequestTimeoutError(timeoutMs));
      }, timeoutMs);
    }

    socket.on('data', onData);
    socket.once('end', onEnd);
    socket.once('close', onEnd);
    socket.once('error', onError);
  });
}
