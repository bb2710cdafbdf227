/**
 * Interfaces of the durable content backend
 */

/** Kind of a stored resource */
export type ContentType = 'file' | 'notebook' | 'directory';

/** Encoding of a resource's content */
export type ContentFormat = 'text' | 'base64' | 'json';

/**
 * A resource as returned by a contents manager
 */
export interface ContentModel {
  /** Base name */
  name: string;
  /** Path relative to the contents root, `/`-separated */
  path: string;
  type: ContentType;
  /** Null when the content was not requested */
  format: ContentFormat | null;
  /** Null when the content was not requested */
  content: unknown;
  /** Epoch milliseconds of the last write */
  lastModified: number;
  /** Epoch milliseconds of creation */
  created: number;
  writable: boolean;
}

/**
 * Options for {@link ContentsManager.get}
 */
export interface GetContentOptions {
  /** Include the content; defaults to true */
  content?: boolean;
  format?: ContentFormat;
  type?: ContentType;
}

/**
 * Model passed to {@link ContentsManager.save}
 */
export interface SaveContentModel {
  type: ContentType;
  format: ContentFormat;
  content: unknown;
}

/**
 * Reads and writes file-like resources by path.
 *
 * Implementations throw a `CollabError` with code `NOT_FOUND` for a
 * missing path.
 */
export interface ContentsManager {
  get(path: string, options?: GetContentOptions): Promise<ContentModel>;
  save(model: SaveContentModel, path: string): Promise<ContentModel>;
  exists(path: string): Promise<boolean>;
}

/**
 * Maps paths to identifiers that stay stable across renames
 */
export interface FileIdManager {
  /** Id of an already indexed path */
  getId(path: string): string | null;
  /** Current path of an id */
  getPath(id: string): string | null;
  /** Index a path, returning its id, or null when nothing exists at the path */
  index(path: string): Promise<string | null>;
}

/**
 * Split a `/`-separated path into its directory and base name
 */
export function splitPath(path: string): { dir: string; name: string } {
  const normalized = path.replace(/^\/+/, '');
  const index = normalized.lastIndexOf('/');
  if (index < 0) return { dir: '', name: normalized };
  return { dir: normalized.slice(0, index), name: normalized.slice(index + 1) };
}
