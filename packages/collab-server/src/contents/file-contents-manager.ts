import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { dirname, relative, resolve, sep } from 'node:path';
import { CollabError } from '../errors.js';
import type {
  ContentFormat,
  ContentModel,
  ContentsManager,
  ContentType,
  GetContentOptions,
  SaveContentModel,
} from './contents-manager.js';
import { splitPath } from './contents-manager.js';

export interface FileContentsManagerOptions {
  /** Directory every path is resolved against */
  rootDir: string;
}

/**
 * Contents manager backed by the local filesystem.
 *
 * `.ipynb` files are notebooks (JSON), everything else is a text file unless
 * `base64` is requested.
 */
export class FileContentsManager implements ContentsManager {
  private readonly rootDir: string;

  constructor(options: FileContentsManagerOptions) {
    this.rootDir = resolve(options.rootDir);
  }

  async get(path: string, options: GetContentOptions = {}): Promise<ContentModel> {
    const fullPath = this.resolvePath(path);
    const info = await stat(fullPath).catch((error: unknown) => {
      throw notFound(path, error);
    });

    const type: ContentType = info.isDirectory() ? 'directory' : (options.type ?? guessType(path));
    const model: ContentModel = {
      name: splitPath(this.relativePath(fullPath)).name,
      path: this.relativePath(fullPath),
      type,
      format: null,
      content: null,
      lastModified: info.mtimeMs,
      created: info.birthtimeMs,
      writable: true,
    };

    if ((options.content ?? true) && type !== 'directory') {
      const format = options.format ?? (type === 'notebook' ? 'json' : 'text');
      const raw = await readFile(fullPath);
      model.format = format;
      model.content = decode(raw, format, path);
    }

    return model;
  }

  async save(model: SaveContentModel, path: string): Promise<ContentModel> {
    if (model.type === 'directory') {
      throw new CollabError({ code: 'INVALID_REQUEST', message: 'Cannot save a directory', context: { path } });
    }

    const fullPath = this.resolvePath(path);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, encode(model.content, model.format, path));

    return this.get(path, { content: false, type: model.type });
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(this.resolvePath(path));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Absolute filesystem path of a contents path
   */
  resolvePath(path: string): string {
    const fullPath = resolve(this.rootDir, path.replace(/^\/+/, ''));
    if (fullPath !== this.rootDir && !fullPath.startsWith(this.rootDir + sep)) {
      throw new CollabError({ code: 'NOT_FOUND', message: `Path outside of root: ${path}`, context: { path } });
    }
    return fullPath;
  }

  private relativePath(fullPath: string): string {
    return relative(this.rootDir, fullPath).split(sep).join('/');
  }
}

function guessType(path: string): ContentType {
  return path.endsWith('.ipynb') ? 'notebook' : 'file';
}

function notFound(path: string, cause: unknown): CollabError {
  return new CollabError({ code: 'NOT_FOUND', message: `No such file: ${path}`, context: { path }, cause });
}

function decode(raw: Buffer, format: ContentFormat, path: string): unknown {
  switch (format) {
    case 'text':
      return raw.toString('utf8');
    case 'base64':
      return raw.toString('base64');
    case 'json':
      try {
        const parsed: unknown = JSON.parse(raw.toString('utf8'));
        return parsed;
      } catch (error) {
        throw new CollabError({
          code: 'INVALID_REQUEST',
          message: `File is not valid JSON: ${path}`,
          context: { path },
          cause: error,
        });
      }
  }
}

function encode(content: unknown, format: ContentFormat, path: string): string | Buffer {
  if (format === 'json') {
    return `${JSON.stringify(content, null, 1)}\n`;
  }
  if (typeof content !== 'string') {
    throw new CollabError({
      code: 'INVALID_REQUEST',
      message: `Expected string content for ${format} file`,
      context: { path },
    });
  }
  return format === 'base64' ? Buffer.from(content, 'base64') : content;
}

/**
 * Create a filesystem contents manager
 */
export function createFileContentsManager(options: FileContentsManagerOptions): FileContentsManager {
  return new FileContentsManager(options);
}
