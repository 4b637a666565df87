import fs from 'fs';
import os from 'os';
import path from 'path';

/**
 * Creates a throwaway directory populated with `files` (relative path to
 * contents) and returns its absolute path.
 */
export function createTmpRoot(files: Record<string, string | Buffer>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'static-server-'));
  for (const [relPath, contents] of Object.entries(files)) {
    const abs = path.join(root, relPath);
    fs.mkdirSync(path.dirname(abs), { recursive: true });
    fs.writeFileSync(abs, contents);
  }
  return root;
}

export function removeTmpRoot(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}
