/**
 * src/entities/errors.ts
 * Errors raised while reading, parsing and answering a single request.
 * Each carries the status line the connection handler answers with.
 */

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly reason: string,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class HeaderMalformedError extends HttpError {
  constructor(message = 'Header block is malformed') {
    super(400, 'BAD REQUEST', message);
  }
}

export class NoPathError extends HttpError {
  constructor() {
    super(400, 'BAD REQUEST', 'Request line has no path');
  }
}

export class ForbiddenPathError extends HttpError {
  constructor(readonly path: string) {
    super(403, 'FORBIDDEN', `Path escapes the served directory: ${path}`);
  }
}

export class MethodNotSupportedError extends HttpError {
  constructor(readonly method: string) {
    super(405, 'METHOD NOT ALLOWED', `Unsupported method: ${method}`);
  }
}

export class RequestTimeoutError extends HttpError {
  constructor(readonly timeoutMs: number) {
    super(408, 'REQUEST TIMEOUT', `Header block not received within ${timeoutMs}ms`);
  }
}

export class RequestTooLargeError extends HttpError {
  constructor(readonly capacity: number) {
    super(
      431,
      'REQUEST HEADER FIELDS TOO LARGE',
      `Header block exceeds ${capacity} bytes without a terminator`,
    );
  }
}

export class ProtoNotSupportedError extends HttpError {
  constructor(readonly version: string) {
    super(505, 'HTTP VERSION NOT SUPPORTED', `Unsupported protocol: ${version}`);
  }
}

/**
 * Raised by file resolution when the filesystem reports ENOENT.
 * Answered with the fixed 404 response rather than an error page.
 */
export class FileNotFoundError extends Error {
  constructor(readonly path: string) {
    super(`File not found: ${path}`);
    this.name = 'FileNotFoundError';
  }
}
