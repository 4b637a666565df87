import { ParsedHeaders, ResolvedRequest } from '../entities/http';
import {
  HeaderMalformedError,
  MethodNotSupportedError,
  NoPathError,
  ProtoNotSupportedError,
} from '../entities/errors';

export const DEFAULT_DOCUMENT = '/xd.html';
const SUPPORTED_METHOD = 'GET';
const SUPPORTED_VERSION = 'HTTP/1.1';

// Exact, case-sensitive header names and the field each one fills.
const RECOGNIZED_HEADERS = new Map<string, 'host' | 'userAgent'>([
  ['Host', 'host'],
  ['User-Agent', 'userAgent'],
]);

/**
 * Splits `input` on `delimiter` and drops empty pieces, so repeated
 * delimiters behave like one.
 */
function tokenize(input: string, delimiter: string): string[] {
  return input.split(delimiter).filter((token) => token.length > 0);
}

/**
 * Parses a raw header block into the request line plus the recognized
 * header fields.
 *
 * Unknown header names are skipped. A line without a `:` fails the whole
 * request. When a recognized header repeats, the last value wins.
 */
export function parseHeaders(raw: Buffer): ParsedHeaders {
  const [requestLine, ...lines] = tokenize(raw.toString('utf8'), '\r\n');
  if (requestLine === undefined) {
    throw new HeaderMalformedError('Header block has no request line');
  }

  const headers: ParsedHeaders = { requestLine };
  for (const line of lines) {
    const colon = line.indexOf(':');
    if (colon === -1) {
      throw new HeaderMalformedError(`Header line has no ':' separator: ${line}`);
    }
    const field = RECOGNIZED_HEADERS.get(line.slice(0, colon));
    if (!field) continue;
    headers[field] = line.slice(colon + 1).replace(/^ +/, '');
  }
  return headers;
}

/**
 * Validates `METHOD SP PATH SP VERSION`. Only `GET` over `HTTP/1.1` is
 * accepted; `/` is rewritten to `defaultDocument`.
 */
export function parseRequestLine(
  requestLine: string,
  defaultDocument: string = DEFAULT_DOCUMENT,
): ResolvedRequest {
  const [method, path, version] = tokenize(requestLine, ' ');

  if (method === undefined) throw new HeaderMalformedError('Request line is blank');
  if (method !== SUPPORTED_METHOD) throw new MethodNotSupportedError(method);

  if (path === undefined) throw new NoPathError();

  if (version === undefined) {
    throw new HeaderMalformedError(`Request line has no protocol version: ${requestLine}`);
  }
  if (version !== SUPPORTED_VERSION) throw new ProtoNotSupportedError(version);

  return {
    method: SUPPORTED_METHOD,
    path: path === '/' ? defaultDocument : path,
    version: SUPPORTED_VERSION,
  };
}

export function parsePath(requestLine: string, defaultDocument: string = DEFAULT_DOCUMENT): string {
  return parseRequestLine(requestLine, defaultDocument).path;
}
