import * as Y from 'yjs';
import type { ContentType } from '../contents/contents-manager.js';
import { MemoryContentsManager } from '../contents/memory-contents-manager.js';
import { MemoryFileIdManager } from '../contents/memory-file-id-manager.js';
import { FileLoader } from '../loaders/file-loader.js';
import { silentLogger } from '../logger.js';
import type { RoomClient } from '../rooms/y-room.js';
import type { ConnectionTransport } from '../transport/ydoc-connection.js';
import { MessageQueue } from '../transport/message-queue.js';

/**
 * In-memory contents with a frozen clock starting at 1000, so the n-th
 * write of a path gets `lastModified` 1000 + n - 1
 */
export interface Fixture {
  contents: MemoryContentsManager;
  fileIds: MemoryFileIdManager;
  addFile(path: string, content: unknown, type?: ContentType): Promise<string>;
}

export function createFixture(): Fixture {
  const contents = new MemoryContentsManager({ now: () => 1000 });
  const fileIds = new MemoryFileIdManager({ contents });

  return {
    contents,
    fileIds,
    async addFile(path, content, type = 'file') {
      contents.setFile(path, content, type);
      const fileId = await fileIds.index(path);
      if (fileId === null) throw new Error(`failed to index ${path}`);
      return fileId;
    },
  };
}

export function createLoader(fixture: Fixture, fileId: string, pollInterval: number | null = null): FileLoader {
  return new FileLoader({
    fileId,
    fileIdManager: fixture.fileIds,
    contentsManager: fixture.contents,
    logger: silentLogger,
    pollInterval,
  });
}

/**
 * Room client fed by the test
 */
export class FakeClient implements RoomClient {
  readonly sent: Uint8Array[] = [];
  private readonly queue = new MessageQueue<Uint8Array>();

  constructor(readonly id: string) {}

  send(message: Uint8Array): void {
    this.sent.push(message);
  }

  push(message: Uint8Array): void {
    this.queue.push(message);
  }

  end(): void {
    this.queue.close();
  }

  [Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    return this.queue[Symbol.asyncIterator]();
  }
}

/**
 * Socket side of a connection that records what the server did
 */
export class FakeTransport implements ConnectionTransport {
  readonly sent: Uint8Array[] = [];
  closed: { code: number; reason: string } | null = null;
  failSends = false;

  send(message: Uint8Array, callback: (error?: Error) => void): void {
    if (this.failSends) throw new Error('socket not writable');
    this.sent.push(message);
    callback();
  }

  close(code: number, reason: string): void {
    this.closed = { code, reason };
  }
}

/**
 * Update turning the text of `base` into `text`, made by a separate client
 */
export function textEdit(base: Y.Doc, edit: (text: Y.Text) => void): Uint8Array {
  const client = new Y.Doc();
  Y.applyUpdate(client, Y.encodeStateAsUpdate(base));
  edit(client.getText('source'));
  const update = Y.encodeStateAsUpdate(client, Y.encodeStateVector(base));
  client.destroy();
  return update;
}
