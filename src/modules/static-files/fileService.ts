// static-files/fileService.ts
import { open, FileHandle } from 'fs/promises';
import { isAbsolute, relative, resolve, sep } from 'path';
import { ForbiddenPathError, FileNotFoundError } from '../../entities/errors';

export class FileService {
  private readonly rootDir: string;

  constructor(rootDir: string = process.cwd()) {
    this.rootDir = resolve(rootDir);
  }

  private resolveSafe(requestPath: string): string {
    const relPath = requestPath.startsWith('/') ? requestPath.slice(1) : requestPath;
    const abs = resolve(this.rootDir, relPath);
    const fromRoot = relative(this.rootDir, abs);
    if (fromRoot === '..' || fromRoot.startsWith(`..${sep}`) || isAbsolute(fromRoot)) {
      throw new ForbiddenPathError(requestPath);
    }
    return abs;
  }

  private async openFile(requestPath: string): Promise<FileHandle> {
    try {
      return await open(this.resolveSafe(requestPath), 'r');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new FileNotFoundError(requestPath);
      }
      throw err;
    }
  }

  /**
   * Reads the whole file behind a request path into memory.
   *
   * @throws FileNotFoundError when the file does not exist
   * @throws ForbiddenPathError when the path resolves outside the root
   */
  async readFile(requestPath: string): Promise<Buffer> {
    const handle = await this.openFile(requestPath);
    try {
      return await handle.readFile();
    } finally {
      await handle.close();
    }
  }
}

/**
 * Reads the local file for `requestPath`, relative to `rootDir`.
 */
export function localFileGetContent(
  requestPath: string,
  rootDir: string = process.cwd(),
): Promise<Buffer> {
  return new FileService(rootDir).readFile(requestPath);
}
