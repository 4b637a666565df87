import { HttpResponse, ResolvedRequest } from '../../entities/http';
import { FileNotFoundError } from '../../entities/errors';
import { getMimeFromPath } from '../../utils/helpers';
import { FileService } from './fileService';

export { FileService, localFileGetContent } from './fileService';

export const staticFilesController = {
  /**
   * Resolves the requested file and describes the response for it.
   * A missing file becomes the fixed 404; any other failure is rethrown.
   */
  async buildResponse(
    request: ResolvedRequest,
    rootDir: string = process.cwd(),
  ): Promise<HttpResponse> {
    let body: Buffer;
    try {
      body = await new FileService(rootDir).readFile(request.path);
    } catch (err) {
      if (err instanceof FileNotFoundError) return { kind: 'not-found' };
      throw err;
    }

    return {
      kind: 'ok',
      contentType: getMimeFromPath(request.path),
      contentLength: body.length,
      body,
    };
  },
};
