/**
 * In-Memory Contents Manager
 * Simple backend for development and testing
 */

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

interface StoredFile {
  type: ContentType;
  format: ContentFormat;
  content: unknown;
  lastModified: number;
  created: number;
}

/**
 * In-memory contents manager.
 *
 * Every write gets a `lastModified` strictly greater than the previous one
 * for that path, even when the clock has not moved.
 */
export class MemoryContentsManager implements ContentsManager {
  private readonly files = new Map<string, StoredFile>();
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  async get(path: string, options: GetContentOptions = {}): Promise<ContentModel> {
    const file = this.files.get(normalize(path));
    if (!file) {
      throw new CollabError({ code: 'NOT_FOUND', message: `No such file: ${path}`, context: { path } });
    }
    return this.toModel(path, file, options.content ?? true);
  }

  async save(model: SaveContentModel, path: string): Promise<ContentModel> {
    const file = this.write(path, model.content, model.type, model.format);
    return this.toModel(path, file, false);
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(normalize(path));
  }

  /**
   * Create or replace a file, as an external editor would
   */
  setFile(path: string, content: unknown, type: ContentType = 'file', format?: ContentFormat): ContentModel {
    const file = this.write(path, content, type, format ?? (type === 'notebook' ? 'json' : 'text'));
    return this.toModel(path, file, false);
  }

  /**
   * Remove a file
   */
  deleteFile(path: string): void {
    this.files.delete(normalize(path));
  }

  /**
   * Current content of a file (for testing)
   */
  readContent(path: string): unknown {
    return this.files.get(normalize(path))?.content;
  }

  private write(path: string, content: unknown, type: ContentType, format: ContentFormat): StoredFile {
    const key = normalize(path);
    const previous = this.files.get(key);
    const lastModified = previous ? Math.max(this.now(), previous.lastModified + 1) : this.now();

    const file: StoredFile = {
      type,
      format,
      content: structuredClone(content),
      lastModified,
      created: previous?.created ?? lastModified,
    };
    this.files.set(key, file);
    return file;
  }

  private toModel(path: string, file: StoredFile, withContent: boolean): ContentModel {
    const key = normalize(path);
    return {
      name: splitPath(key).name,
      path: key,
      type: file.type,
      format: withContent ? file.format : null,
      content: withContent ? structuredClone(file.content) : null,
      lastModified: file.lastModified,
      created: file.created,
      writable: true,
    };
  }
}

function normalize(path: string): string {
  return path.replace(/^\/+/, '');
}

/**
 * Create an in-memory contents manager
 */
export function createMemoryContentsManager(options?: { now?: () => number }): MemoryContentsManager {
  return new MemoryContentsManager(options);
}
