import { CollabError } from '../errors.js';
import type { StoredUpdate, UpdateStore } from './update-store.js';

/**
 * In-memory update log. Lost with the process; survives `close()` so that a
 * room created again for the same document can replay it.
 */
export class MemoryUpdateStore implements UpdateStore {
  private updates: StoredUpdate[] | null = null;

  async write(update: Uint8Array): Promise<void> {
    this.updates ??= [];
    this.updates.push({ update: update.slice(), timestamp: Date.now() });
  }

  async read(): Promise<StoredUpdate[]> {
    if (this.updates === null) {
      throw new CollabError({ code: 'DOCUMENT_NOT_FOUND' });
    }
    return [...this.updates];
  }

  async close(): Promise<void> {
    // nothing buffered
  }

  /** Number of stored updates */
  get length(): number {
    return this.updates?.length ?? 0;
  }
}
