/**
 * Document Room
 *
 * A room backed by a file: initialized from the file and its update log,
 * saved back after edits settle, overwritten when the file changes on disk.
 *
 * @module rooms
 */

import type { ContentFormat, ContentModel, ContentType, SaveContentModel } from '../contents/contents-manager.js';
import { createYDocument, type YDocument } from '../documents/index.js';
import { CollabError } from '../errors.js';
import type { FileLoader, FileLoaderCallback } from '../loaders/file-loader.js';
import type { Logger } from '../logger.js';
import type { LogLevel } from '../types.js';
import { applyStoredUpdates, writeDocumentState, type UpdateStore } from '../ystore/update-store.js';
import { YRoom } from './y-room.js';

/**
 * Lifecycle phase of a document room
 */
export type DocumentRoomPhase = 'uninitialized' | 'initializing' | 'live' | 'cleanup-scheduled' | 'destroyed';

/**
 * Receives the room's observability events
 */
export type RoomEventSink = (level: LogLevel, action: string, msg: string) => void;

export interface DocumentRoomOptions {
  roomId: string;
  fileFormat: ContentFormat;
  fileType: ContentType;
  loader: FileLoader;
  updateStore: UpdateStore;
  logger: Logger;
  /** Seconds of quiet before edits are written back; null never saves */
  saveDelay: number | null;
  onEvent?: RoomEventSink;
}

/** Origin of the changes the room makes itself; they never trigger a save */
const LOCAL_ORIGIN = Symbol('document-room');

export class DocumentRoom extends YRoom {
  readonly kind = 'document' as const;

  readonly fileFormat: ContentFormat;
  readonly fileType: ContentType;
  readonly document: YDocument<unknown>;

  private readonly loader: FileLoader;
  private readonly store: UpdateStore;
  private readonly saveDelay: number | null;
  private readonly onEvent: RoomEventSink;

  private initializing: Promise<void> | null = null;
  private cleanupTimer: ReturnType<typeof setTimeout> | null = null;
  private saveResult: Promise<ContentModel | null> | null = null;
  private lastModified_: number | null = null;

  constructor(options: DocumentRoomOptions) {
    super({ roomId: options.roomId, logger: options.logger, updateStore: options.updateStore, ready: false });

    this.fileFormat = options.fileFormat;
    this.fileType = options.fileType;
    this.loader = options.loader;
    this.store = options.updateStore;
    this.saveDelay = options.saveDelay;
    this.onEvent = options.onEvent ?? (() => undefined);
    this.document = createYDocument(options.fileType, this.ydoc);
  }

  get fileId(): string {
    return this.loader.fileId;
  }

  /** Timestamp of the file version the room's content corresponds to */
  get lastModified(): number | null {
    return this.lastModified_;
  }

  get phase(): DocumentRoomPhase {
    if (this.isDestroyed) return 'destroyed';
    if (!this.ready) return this.initializing ? 'initializing' : 'uninitialized';
    return this.cleanupTimer ? 'cleanup-scheduled' : 'live';
  }

  /** Whether a cleanup timer is pending */
  get cleanupScheduled(): boolean {
    return this.cleanupTimer !== null;
  }

  /**
   * Load the document and start relaying.
   *
   * Concurrent callers share one initialization. A failed initialization
   * leaves the room uninitialized so the next caller retries.
   */
  initialize(): Promise<void> {
    if (this.isDestroyed) {
      return Promise.reject(
        new CollabError({ code: 'NOT_FOUND', message: `Room ${this.roomId} was destroyed`, context: { roomId: this.roomId } })
      );
    }
    if (this.ready) return Promise.resolve();

    this.initializing ??= this.load().catch((error: unknown) => {
      this.initializing = null;
      throw error;
    });
    return this.initializing;
  }

  /**
   * Destroy the room after `delaySeconds` unless a client attaches before.
   *
   * A null delay keeps the room. Re-arming replaces the pending timer. When
   * the timer fires with clients attached, the room stays live.
   */
  scheduleCleanup(delaySeconds: number | null, onExpire: () => Promise<void>): boolean {
    if (this.isDestroyed) return false;

    this.cancelCleanup();
    if (delaySeconds === null) return false;

    this.cleanupTimer = setTimeout(() => {
      this.cleanupTimer = null;
      if (this.clientCount > 0) return;

      void onExpire().catch((error: unknown) => {
        this.logger.error(`Failed to clean room ${this.roomId}:`, error);
      });
    }, delaySeconds * 1000);
    return true;
  }

  /**
   * Cancel a pending cleanup. Returns whether one was pending.
   */
  cancelCleanup(): boolean {
    if (this.cleanupTimer === null) return false;
    clearTimeout(this.cleanupTimer);
    this.cleanupTimer = null;
    return true;
  }

  protected override async onDestroy(): Promise<void> {
    this.cancelCleanup();
    this.loader.unobserve(this.roomId);
    await super.onDestroy();
  }

  protected override onDocumentUpdate(_update: Uint8Array, origin: unknown): void {
    if (origin === LOCAL_ORIGIN) return;
    this.requestSave();
  }

  private async load(): Promise<void> {
    const model = await this.loader.loadContent(this.fileFormat, this.fileType);
    this.assertAlive();
    this.lastModified_ = model.lastModified;

    let readFromFile = false;
    try {
      await applyStoredUpdates(this.store, this.ydoc, LOCAL_ORIGIN);
      if (!this.document.hasSameSource(model.content)) {
        this.emit('info', 'initialize', 'The file is out-of-sync with the ystore.');
        readFromFile = true;
      }
    } catch (error) {
      if (!CollabError.isCode(error, 'DOCUMENT_NOT_FOUND')) throw error;
      readFromFile = true;
    }
    this.assertAlive();

    if (readFromFile) {
      this.emit('info', 'load', 'Content loaded from disk.');
      this.ydoc.transact(() => this.document.setSource(model.content), LOCAL_ORIGIN);
      await writeDocumentState(this.store, this.ydoc);
      this.assertAlive();
    }

    this.ydoc.transact(() => {
      this.document.dirty = false;
    }, LOCAL_ORIGIN);
    this.ready = true;
    this.loader.observe(this.roomId, this.handleFileChange);
  }

  private assertAlive(): void {
    if (this.isDestroyed) {
      throw new CollabError({
        code: 'NOT_FOUND',
        message: `Room ${this.roomId} was destroyed during initialization`,
        context: { roomId: this.roomId },
      });
    }
  }

  private requestSave(): void {
    if (this.saveDelay === null || this.isDestroyed) return;

    let content: unknown;
    try {
      content = this.document.source;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Cannot serialize room ${this.roomId}:`, error);
      this.emit('error', 'save', `Error saving file: ${message}`);
      return;
    }

    const model: SaveContentModel = { format: this.fileFormat, type: this.fileType, content };

    const result = this.loader.save(model, this.saveDelay * 1000);
    // callers of one debounced batch share its promise
    if (result === this.saveResult) return;
    this.saveResult = result;

    void result
      .then(
        (saved) => this.handleSaved(saved),
        (error: unknown) => this.handleSaveError(error)
      )
      .catch((error: unknown) => {
        this.logger.error(`Failed to handle save of room ${this.roomId}:`, error);
      })
      .finally(() => {
        if (this.saveResult === result) this.saveResult = null;
      });
  }

  private handleSaved(saved: ContentModel | null): void {
    if (!saved || this.isDestroyed) return;

    this.lastModified_ = saved.lastModified;
    this.ydoc.transact(() => {
      this.document.dirty = false;
    }, LOCAL_ORIGIN);
    this.emit('info', 'save', 'Content saved.');
  }

  private async handleSaveError(error: unknown): Promise<void> {
    if (this.isDestroyed) return;

    if (CollabError.isCode(error, 'OUT_OF_BAND_CHANGE')) {
      this.emit('info', 'overwrite', 'Out-of-band changes while saving.');
      await this.overwriteFromFile();
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`Error saving file ${this.fileId}:`, error);
    this.emit('error', 'save', `Error saving file: ${message}`);
  }

  private readonly handleFileChange: FileLoaderCallback = async (_event, model) => {
    if (this.isDestroyed) return;
    if (this.lastModified_ !== null && model.lastModified <= this.lastModified_) return;

    this.emit('info', 'overwrite', 'Out-of-band changes. Overwriting the room.');
    await this.overwriteFromFile();
  };

  private async overwriteFromFile(): Promise<void> {
    const model = await this.loader.loadContent(this.fileFormat, this.fileType);
    if (this.isDestroyed) return;

    this.lastModified_ = model.lastModified;
    this.ydoc.transact(() => {
      this.document.setSource(model.content);
      this.document.dirty = false;
    }, LOCAL_ORIGIN);
  }

  private emit(level: LogLevel, action: string, msg: string): void {
    this.onEvent(level, action, msg);
  }
}
