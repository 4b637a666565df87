import { posix } from 'path';

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

// Checked in order; the first matching extension wins.
export const MIME_TYPES: ReadonlyArray<readonly [extension: string, mime: string]> = [
  ['.html', 'text/html'],
  ['.css', 'text/css'],
  ['.png', 'image/png'],
  ['.jpg', 'image/jpeg'],
  ['.gif', 'image/gif'],
];

/**
 * Returns the MIME type for a request path.
 *
 * The extension is taken from the last path segment, dot included, and
 * matched case-sensitively against {@link MIME_TYPES}. Paths without an
 * extension, or with one the table does not list, get
 * 'application/octet-stream'.
 *
 * @example
 * getMimeFromPath('/css/site.css'); // 'text/css'
 * getMimeFromPath('/blob.bin'); // 'application/octet-stream'
 */
export function getMimeFromPath(requestPath: string): string {
  const extension = posix.extname(requestPath);
  if (!extension) return DEFAULT_MIME_TYPE;

  for (const [candidate, mime] of MIME_TYPES) {
    if (candidate === extension) return mime;
  }
  return DEFAULT_MIME_TYPE;
}
