/**
 * File Loader
 *
 * Owns the storage side of one file: loading it, watching it for changes
 * made outside the server, and writing the collaborative document back.
 *
 * @module loaders
 */

import type {
  ContentFormat,
  ContentModel,
  ContentsManager,
  ContentType,
  FileIdManager,
  SaveContentModel,
} from '../contents/contents-manager.js';
import { Deferred } from '../deferred.js';
import { CollabError } from '../errors.js';
import type { Logger } from '../logger.js';

/**
 * Called when the file changed on disk. Receives the file's metadata.
 */
export type FileLoaderCallback = (event: 'metadata', model: ContentModel) => void | Promise<void>;

/**
 * Configuration for a file loader
 */
export interface FileLoaderOptions {
  /** Stable id of the file */
  fileId: string;
  fileIdManager: FileIdManager;
  contentsManager: ContentsManager;
  logger: Logger;
  /** Milliseconds between two checks for external changes; null disables the watcher */
  pollInterval: number | null;
  /** Storage access waits for this promise (the teardown of a previous loader for the same file) */
  ready?: Promise<void>;
}

interface PendingSave {
  model: SaveContentModel;
  timer: ReturnType<typeof setTimeout>;
  result: Deferred<ContentModel | null>;
}

/**
 * Loader for a single file.
 *
 * Every storage operation (load, change check, write) goes through one
 * serialized chain, so the loader never has two operations in flight on its
 * file. After writing, the loader adopts the timestamp of its own write and
 * therefore does not report its own saves as external changes.
 */
export class FileLoader {
  /** Timestamp of the last version of the file this loader has seen */
  lastModified: number | null = null;

  private readonly fileId_: string;
  private readonly fileIdManager: FileIdManager;
  private readonly contentsManager: ContentsManager;
  private readonly logger: Logger;
  private readonly pollInterval: number | null;
  private readonly subscriptions = new Map<string, FileLoaderCallback>();
  private chain: Promise<unknown>;
  private watcher: ReturnType<typeof setTimeout> | null = null;
  private pendingSave: PendingSave | null = null;
  private subscriberCount = 0;
  private cleaned = false;

  constructor(options: FileLoaderOptions) {
    this.fileId_ = options.fileId;
    this.fileIdManager = options.fileIdManager;
    this.contentsManager = options.contentsManager;
    this.logger = options.logger;
    this.pollInterval = options.pollInterval;
    this.chain = options.ready ?? Promise.resolve();

    if (this.pollInterval !== null) {
      this.scheduleWatch();
    }
  }

  get fileId(): string {
    return this.fileId_;
  }

  /**
   * Current path of the file. Resolved on each access since the file may
   * have been renamed.
   */
  get path(): string {
    const path = this.fileIdManager.getPath(this.fileId_);
    if (path === null) {
      throw new CollabError({
        code: 'NOT_FOUND',
        message: `No path for file id ${this.fileId_}`,
        context: { fileId: this.fileId_ },
      });
    }
    return path;
  }

  /** Number of holders registered through the loader registry */
  get numberOfSubscriptions(): number {
    return this.subscriberCount;
  }

  /** Whether a watcher tick is scheduled */
  get watching(): boolean {
    return this.watcher !== null;
  }

  /** Whether a debounced save is waiting for its delay */
  get hasPendingSave(): boolean {
    return this.pendingSave !== null;
  }

  /** @internal used by the loader registry */
  retain(): number {
    this.subscriberCount++;
    return this.subscriberCount;
  }

  /** @internal used by the loader registry */
  releaseRef(): number {
    this.subscriberCount = Math.max(0, this.subscriberCount - 1);
    return this.subscriberCount;
  }

  /**
   * Register a change callback under an id (a room id)
   */
  observe(id: string, callback: FileLoaderCallback): void {
    this.subscriptions.set(id, callback);
  }

  /**
   * Remove a change callback
   */
  unobserve(id: string): void {
    this.subscriptions.delete(id);
  }

  /**
   * Load the file with its content
   */
  loadContent(format: ContentFormat, type: ContentType): Promise<ContentModel> {
    return this.serialize(async () => {
      const model = await this.contentsManager.get(this.path, { content: true, format, type });
      this.lastModified = model.lastModified;
      return model;
    });
  }

  /**
   * Check the file for a change made outside this loader.
   *
   * Fires the observers when the file's timestamp advanced past the last
   * one seen (or none was seen yet), then adopts the new timestamp.
   * Resolves whether the observers were called.
   */
  async notify(): Promise<boolean> {
    const model = await this.serialize(async () => {
      if (this.cleaned) return null;

      const current = await this.contentsManager.get(this.path, { content: false });
      if (this.lastModified !== null && current.lastModified <= this.lastModified) {
        return null;
      }
      this.lastModified = current.lastModified;
      return current;
    });

    if (!model) return false;

    // observers run outside the chain: they usually reload the file through it
    for (const [id, callback] of this.subscriptions) {
      if (this.cleaned) break;
      try {
        await callback('metadata', model);
      } catch (error) {
        this.logger.error(`Change callback ${id} failed for ${model.path}:`, error);
      }
    }
    return true;
  }

  /**
   * Write a model after `delayMs` of quiet.
   *
   * A call made while a save is still waiting replaces its model and
   * restarts the delay; every caller of the collapsed batch receives the
   * same promise. Resolves with the written file's metadata, or null when
   * the loader was cleaned before the write happened. Rejects with
   * `OUT_OF_BAND_CHANGE` when the file changed on disk since it was last
   * read.
   */
  save(model: SaveContentModel, delayMs: number): Promise<ContentModel | null> {
    if (this.cleaned) return Promise.resolve(null);

    const pending = this.pendingSave;
    if (pending) {
      clearTimeout(pending.timer);
      pending.model = model;
      pending.timer = setTimeout(() => this.firePendingSave(), delayMs);
      return pending.result.promise;
    }

    const result = new Deferred<ContentModel | null>();
    this.pendingSave = {
      model,
      timer: setTimeout(() => this.firePendingSave(), delayMs),
      result,
    };
    return result.promise;
  }

  /**
   * Write a waiting save now and wait for every queued storage operation
   */
  async flush(): Promise<void> {
    const pending = this.pendingSave;
    if (pending) {
      clearTimeout(pending.timer);
      this.firePendingSave();
      try {
        await pending.result.promise;
      } catch (error) {
        this.logger.error(`Failed to flush pending save of ${this.fileId_}:`, error);
      }
    }
    await this.chain;
  }

  /**
   * Stop the watcher, drop a waiting save and every observer.
   *
   * No callback fires after this resolves. Safe to call repeatedly.
   */
  async clean(): Promise<void> {
    this.cleaned = true;

    if (this.watcher !== null) {
      clearTimeout(this.watcher);
      this.watcher = null;
    }

    const pending = this.pendingSave;
    if (pending) {
      clearTimeout(pending.timer);
      this.pendingSave = null;
      pending.result.resolve(null);
    }

    this.subscriptions.clear();
    await this.chain;
  }

  private firePendingSave(): void {
    const pending = this.pendingSave;
    if (!pending) return;
    this.pendingSave = null;

    void this.serialize(() => this.write(pending.model)).then(pending.result.resolve, pending.result.reject);
  }

  private async write(model: SaveContentModel): Promise<ContentModel> {
    const path = this.path;
    const current = await this.contentsManager.get(path, {
      content: false,
      format: model.format,
      type: model.type,
    });

    if (this.lastModified !== null && current.lastModified !== this.lastModified) {
      throw new CollabError({
        code: 'OUT_OF_BAND_CHANGE',
        message: `File ${path} changed on disk`,
        context: { path, known: this.lastModified, current: current.lastModified },
      });
    }

    this.logger.info('Saving file:', path);
    const saved = await this.contentsManager.save(model, path);
    this.lastModified = saved.lastModified;
    return saved;
  }

  private scheduleWatch(): void {
    if (this.cleaned || this.pollInterval === null) return;

    this.watcher = setTimeout(() => {
      this.watcher = null;
      void this.notify()
        .catch((error: unknown) => {
          this.logger.error(`Error watching file ${this.fileId_}:`, error);
        })
        .finally(() => this.scheduleWatch());
    }, this.pollInterval);
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.chain.then(() => task());
    this.chain = run.catch(() => undefined);
    return run;
  }
}
