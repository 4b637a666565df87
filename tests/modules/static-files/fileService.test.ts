import path from 'path';
import {
  FileService,
  localFileGetContent,
  staticFilesController,
} from '../../../src/modules/static-files';
import { FileNotFoundError, ForbiddenPathError } from '../../../src/entities/errors';
import { DEFAULT_DOCUMENT } from '../../../src/core/httpParser';
import { createTmpRoot, removeTmpRoot } from '../../helpers/tmpRoot';

describe('FileService', () => {
  let root: string;
  let service: FileService;

  beforeAll(() => {
    root = createTmpRoot({
      'index.html': '<p>home</p>',
      'nested/page.html': '<p>nested</p>',
      '..notes.html': 'dots',
      'pixel.gif': Buffer.from([0x47, 0x49, 0x46, 0x38, 0x39, 0x61]),
    });
    service = new FileService(root);
  });

  afterAll(() => {
    removeTmpRoot(root);
  });

  test('reads a file relative to the root', async () => {
    await expect(service.readFile('/index.html')).resolves.toEqual(Buffer.from('<p>home</p>'));
  });

  test('reads files in subdirectories', async () => {
    const body = await service.readFile('/nested/page.html');
    expect(body.toString()).toBe('<p>nested</p>');
  });

  test('returns binary contents unchanged', async () => {
    const body = await service.readFile('/pixel.gif');
    expect([...body]).toEqual([0x47, 0x49, 0x46, 0x38, 0x39, 0x61]);
  });

  test('allows .. segments that stay inside the root', async () => {
    const body = await service.readFile('/nested/../index.html');
    expect(body.toString()).toBe('<p>home</p>');
  });

  test('allows file names that merely start with two dots', async () => {
    const body = await service.readFile('/..notes.html');
    expect(body.toString()).toBe('dots');
  });

  test('reports a missing file as FileNotFoundError', async () => {
    await expect(service.readFile('/missing.html')).rejects.toBeInstanceOf(FileNotFoundError);
  });

  test('refuses paths that climb out of the root', async () => {
    await expect(service.readFile('/../outside.html')).rejects.toBeInstanceOf(ForbiddenPathError);
    await expect(service.readFile('/nested/../../outside.html')).rejects.toBeInstanceOf(
      ForbiddenPathError,
    );
  });

  test('passes other filesystem errors through', async () => {
    await expect(service.readFile('/nested')).rejects.toMatchObject({ code: 'EISDIR' });
  });

  test('localFileGetContent reads against the given root', async () => {
    const body = await localFileGetContent('/nested/page.html', root);
    expect(body.toString()).toBe('<p>nested</p>');
  });
});

describe('staticFilesController.buildResponse', () => {
  let root: string;

  beforeAll(() => {
    root = createTmpRoot({ 'style.css': 'body{}' });
  });

  afterAll(() => {
    removeTmpRoot(root);
  });

  test('describes a found file with its MIME type and length', async () => {
    const response = await staticFilesController.buildResponse(
      { method: 'GET', path: '/style.css', version: 'HTTP/1.1' },
      root,
    );
    expect(response).toEqual({
      kind: 'ok',
      contentType: 'text/css',
      contentLength: 6,
      body: Buffer.from('body{}'),
    });
  });

  test('turns a missing file into the fixed 404', async () => {
    const response = await staticFilesController.buildResponse(
      { method: 'GET', path: '/index.html', version: 'HTTP/1.1' },
      root,
    );
    expect(response).toEqual({ kind: 'not-found' });
  });

  test('rethrows path violations', async () => {
    await expect(
      staticFilesController.buildResponse(
        { method: 'GET', path: '/../style.css', version: 'HTTP/1.1' },
        root,
      ),
    ).rejects.toBeInstanceOf(ForbiddenPathError);
  });
});

describe('bundled public/ root', () => {
  test('contains the default document', async () => {
    const publicRoot = path.resolve(__dirname, '../../../public');
    const response = await staticFilesController.buildResponse(
      { method: 'GET', path: DEFAULT_DOCUMENT, version: 'HTTP/1.1' },
      publicRoot,
    );
    expect(response.kind).toBe('ok');
  });
});
