/**
 * src/entities/http.ts
 * Shapes passed between the reader, the parser and the response builder.
 */

/**
 * Header fields captured from the raw request. Everything except the
 * request line, `Host` and `User-Agent` is dropped.
 */
export interface ParsedHeaders {
  requestLine: string;
  host?: string;
  userAgent?: string;
}

export interface ResolvedRequest {
  method: 'GET';
  path: string; // `/` is already rewritten to the default document
  version: 'HTTP/1.1';
}

export interface OkResponse {
  kind: 'ok';
  contentType: string;
  contentLength: number;
  body: Buffer;
}

export interface NotFoundResponse {
  kind: 'not-found';
}

export interface ErrorResponse {
  kind: 'error';
  status: number;
  reason: string;
  headers?: Record<string, string>;
}

export type HttpResponse = OkResponse | NotFoundResponse | ErrorResponse;
