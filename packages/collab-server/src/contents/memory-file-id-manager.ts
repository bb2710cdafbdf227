import { randomUUID } from 'node:crypto';
import type { ContentsManager, FileIdManager } from './contents-manager.js';

/**
 * Keeps the path <-> id index in memory.
 *
 * Ids only survive renames performed through {@link MemoryFileIdManager.move}.
 */
export class MemoryFileIdManager implements FileIdManager {
  private readonly idsByPath = new Map<string, string>();
  private readonly pathsById = new Map<string, string>();
  private readonly contents: ContentsManager;
  private readonly generateId: () => string;

  constructor(options: { contents: ContentsManager; generateId?: () => string }) {
    this.contents = options.contents;
    this.generateId = options.generateId ?? randomUUID;
  }

  getId(path: string): string | null {
    return this.idsByPath.get(normalize(path)) ?? null;
  }

  getPath(id: string): string | null {
    return this.pathsById.get(id) ?? null;
  }

  async index(path: string): Promise<string | null> {
    const key = normalize(path);
    const existing = this.idsByPath.get(key);
    if (existing) return existing;

    if (!(await this.contents.exists(key))) return null;

    // another caller may have indexed the path while we checked
    const raced = this.idsByPath.get(key);
    if (raced) return raced;

    const id = this.generateId();
    this.idsByPath.set(key, id);
    this.pathsById.set(id, key);
    return id;
  }

  /**
   * Record a rename, keeping the id
   */
  move(oldPath: string, newPath: string): void {
    const id = this.idsByPath.get(normalize(oldPath));
    if (!id) return;
    this.idsByPath.delete(normalize(oldPath));
    this.idsByPath.set(normalize(newPath), id);
    this.pathsById.set(id, normalize(newPath));
  }
}

function normalize(path: string): string {
  return path.replace(/^\/+/, '');
}

/**
 * Create an in-memory file id index
 */
export function createMemoryFileIdManager(contents: ContentsManager): MemoryFileIdManager {
  return new MemoryFileIdManager({ contents });
}
