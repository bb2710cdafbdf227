import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import * as decoding from 'lib0/decoding';
import * as encoding from 'lib0/encoding';
import { CollabError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { StoredUpdate, UpdateStore } from './update-store.js';

export interface FileUpdateStoreOptions {
  /** Absolute path of the log file */
  path: string;
  logger: Logger;
}

/**
 * Update log in a single append-only file.
 *
 * Each record is the update as a length-prefixed byte array followed by
 * the write time as a float64. A truncated trailing record (a crash during
 * an append) is dropped on read.
 */
export class FileUpdateStore implements UpdateStore {
  readonly path: string;
  private readonly logger: Logger;
  private chain: Promise<void> = Promise.resolve();

  constructor(options: FileUpdateStoreOptions) {
    this.path = options.path;
    this.logger = options.logger;
  }

  write(update: Uint8Array): Promise<void> {
    const encoder = encoding.createEncoder();
    encoding.writeVarUint8Array(encoder, update);
    encoding.writeFloat64(encoder, Date.now());
    const record = encoding.toUint8Array(encoder);

    const run = this.chain.then(async () => {
      await mkdir(dirname(this.path), { recursive: true });
      await appendFile(this.path, record);
    });
    this.chain = run.catch(() => undefined);
    return run;
  }

  async read(): Promise<StoredUpdate[]> {
    await this.chain;

    let data: Buffer;
    try {
      data = await readFile(this.path);
    } catch (error) {
      throw new CollabError({
        code: 'DOCUMENT_NOT_FOUND',
        message: `No update log at ${this.path}`,
        context: { path: this.path },
        cause: error,
      });
    }

    const updates: StoredUpdate[] = [];
    const decoder = decoding.createDecoder(new Uint8Array(data));
    while (decoding.hasContent(decoder)) {
      try {
        const update = decoding.readVarUint8Array(decoder);
        const timestamp = decoding.readFloat64(decoder);
        updates.push({ update, timestamp });
      } catch (error) {
        this.logger.warn(`Dropping truncated record at the end of ${this.path}:`, error);
        break;
      }
    }
    return updates;
  }

  async close(): Promise<void> {
    await this.chain;
  }
}

/**
 * Update log factory writing logs under `rootDir`, next to the documents
 * they belong to
 */
export function createFileUpdateStores(rootDir: string, logger: Logger): (path: string) => UpdateStore {
  const root = resolve(rootDir);
  return (path) => new FileUpdateStore({ path: join(root, path), logger });
}
