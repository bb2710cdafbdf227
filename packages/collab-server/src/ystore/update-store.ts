import * as Y from 'yjs';

/**
 * A stored document update
 */
export interface StoredUpdate {
  update: Uint8Array;
  /** Epoch milliseconds of the write */
  timestamp: number;
}

/**
 * Append-only log of the updates of one document.
 *
 * Implement this interface to keep update logs elsewhere than in files.
 * `read` throws a `CollabError` with code `DOCUMENT_NOT_FOUND` when no log
 * exists yet.
 *
 * @see {@link FileUpdateStore} for the file implementation
 * @see {@link MemoryUpdateStore} for the in-memory implementation
 */
export interface UpdateStore {
  /** Append an update */
  write(update: Uint8Array): Promise<void>;
  /** Every update in write order */
  read(): Promise<StoredUpdate[]>;
  /** Wait for pending writes and release resources */
  close(): Promise<void>;
}

/**
 * Replay a store into a document
 */
export async function applyStoredUpdates(store: UpdateStore, ydoc: Y.Doc, origin?: unknown): Promise<number> {
  const updates = await store.read();
  Y.transact(
    ydoc,
    () => {
      for (const { update } of updates) {
        Y.applyUpdate(ydoc, update);
      }
    },
    origin
  );
  return updates.length;
}

/**
 * Append the complete state of a document
 */
export function writeDocumentState(store: UpdateStore, ydoc: Y.Doc): Promise<void> {
  return store.write(Y.encodeStateAsUpdate(ydoc));
}
