/**
 * Room Coordinator
 *
 * Owns the process-wide tables: live rooms, shared file loaders and the
 * connected-users directory. Every insertion into and removal from these
 * tables happens without yielding to the event loop, which makes each of
 * them atomic per key.
 *
 * @module coordinator
 */

import { Observable, Subject } from 'rxjs';
import type { ContentsManager, FileIdManager } from './contents/contents-manager.js';
import { CollabError } from './errors.js';
import { FileLoaderRegistry } from './loaders/file-loader-registry.js';
import type { Logger } from './logger.js';
import { decodeRoomId, isDocumentRoomId, updateLogPath } from './room-id.js';
import { DocumentRoom } from './rooms/document-room.js';
import { RoomRegistry } from './rooms/room-registry.js';
import { TransientRoom } from './rooms/transient-room.js';
import type { RoomClient, YRoom } from './rooms/y-room.js';
import { SessionIssuer } from './session.js';
import type { CollaborationEvent, CollaborationStats, LogLevel } from './types.js';
import type { UpdateStore } from './ystore/update-store.js';

/**
 * Creates the update log of a document from its path
 */
export type UpdateStoreFactory = (path: string) => UpdateStore;

export interface RoomCoordinatorOptions {
  contentsManager: ContentsManager;
  fileIdManager: FileIdManager;
  createUpdateStore: UpdateStoreFactory;
  logger: Logger;
  /** Seconds before an idle document room is destroyed; null keeps it */
  documentCleanupDelay: number | null;
  /** Seconds of quiet before edits are saved; null never saves */
  documentSaveDelay: number | null;
  /** Seconds between two checks of a file; null disables watching */
  filePollInterval: number | null;
  session?: SessionIssuer;
}

const CONFLICT_WARNING =
  'There is another collaborative session accessing the same file.\n' +
  'The synchronization between rooms is not supported and you might lose some of your changes.';

export class RoomCoordinator {
  readonly rooms = new RoomRegistry();
  readonly loaders: FileLoaderRegistry;
  readonly session: SessionIssuer;
  /** Awareness client id → display name */
  readonly connectedUsers = new Map<number, string>();

  private readonly options: RoomCoordinatorOptions;
  private readonly logger: Logger;
  private readonly eventsSubject = new Subject<CollaborationEvent>();
  private messagesReceived_ = 0;

  /**
   * Observability events: room creation, client joins, loads, saves,
   * overwrites, deletions and same-file conflicts
   */
  readonly events$: Observable<CollaborationEvent> = this.eventsSubject.asObservable();

  constructor(options: RoomCoordinatorOptions) {
    this.options = options;
    this.logger = options.logger;
    this.session = options.session ?? new SessionIssuer();
    this.loaders = new FileLoaderRegistry({
      fileIdManager: options.fileIdManager,
      contentsManager: options.contentsManager,
      logger: options.logger,
      filePollInterval: options.filePollInterval,
    });
  }

  get messagesReceived(): number {
    return this.messagesReceived_;
  }

  /**
   * The live room of an identity, created and registered on first use.
   *
   * Runs without yielding, so concurrent connectors of one identity always
   * receive the same instance.
   */
  getOrCreateRoom(roomId: string): YRoom {
    const existing = this.rooms.getRoom(roomId);
    if (existing) return existing;

    const room = isDocumentRoomId(roomId) ? this.createDocumentRoom(roomId) : new TransientRoom(roomId, this.logger);
    this.rooms.addRoom(roomId, room);
    return room;
  }

  /**
   * Detach a client from its room.
   *
   * The last client of a document room starts the cleanup delay; an empty
   * transient room is destroyed right away.
   */
  async leaveRoom(room: YRoom, client: RoomClient): Promise<void> {
    room.removeClient(client);
    if (room.clientCount > 0 || room.isDestroyed) return;

    if (room instanceof DocumentRoom) {
      this.scheduleCleanup(room);
    } else {
      await this.destroyRoom(room);
    }
  }

  /**
   * Arm the cleanup timer of an idle document room
   */
  scheduleCleanup(room: DocumentRoom): boolean {
    const delay = this.options.documentCleanupDelay;
    const scheduled = room.scheduleCleanup(delay, async () => {
      await this.destroyRoom(room);
    });
    if (scheduled) {
      this.logger.info(`Cleaning room: ${room.roomId}`);
    }
    return scheduled;
  }

  /**
   * Unregister and destroy a room without clients, then release its file
   * loader. Resolves false when the room had clients or was already gone.
   */
  async destroyRoom(room: YRoom, force = false): Promise<boolean> {
    if (room.isDestroyed) return false;
    if (room.clientCount > 0 && !force) return false;

    this.rooms.deleteRoom(room);
    const destroyed = await room.destroy(force);
    if (!destroyed) return false;

    if (room instanceof DocumentRoom) {
      this.logger.info(`Room ${room.roomId} deleted`);
      this.emit('info', room.roomId, 'clean', 'Room deleted.');

      const path = this.resolvePath(room.fileId);
      if (await this.loaders.release(room.fileId)) {
        this.logger.info(`Deleting file ${path ?? room.fileId}`);
        this.emit('info', room.roomId, 'clean', 'Loader deleted.');
      }
    } else {
      this.logger.debug(`Transient room ${room.roomId} deleted`);
    }
    return true;
  }

  /** Record an inbound frame */
  recordMessage(): void {
    this.messagesReceived_++;
  }

  userJoined(clientId: number, name: string): void {
    this.connectedUsers.set(clientId, name);
    this.logger.debug(`Y user joined: ${name}`);
  }

  userLeft(clientId: number): void {
    const name = this.connectedUsers.get(clientId);
    if (name === undefined) return;
    this.connectedUsers.delete(clientId);
    this.logger.debug(`Y user left: ${name}`);
  }

  /**
   * Publish an observability event for a room
   */
  emit(level: LogLevel, roomId: string, action?: string, msg?: string): void {
    const event: CollaborationEvent = {
      level,
      room: roomId,
      path: this.roomPath(roomId),
      timestamp: Date.now(),
    };
    if (action) event.action = action;
    if (msg) event.msg = msg;

    this.eventsSubject.next(event);
  }

  getStats(): CollaborationStats {
    return {
      rooms: this.rooms.roomIds(),
      loaders: this.loaders.size,
      connectedUsers: Object.fromEntries(
        Array.from(this.connectedUsers, ([clientId, name]) => [String(clientId), name])
      ),
      messagesReceived: this.messagesReceived_,
      sessionId: this.session.sessionId,
    };
  }

  /**
   * Destroy every room, write pending saves and stop every watcher
   */
  async stop(): Promise<void> {
    await Promise.all(this.rooms.rooms().map((room) => this.destroyRoom(room, true)));
    await this.loaders.clear();
    this.connectedUsers.clear();
    this.eventsSubject.complete();
  }

  private createDocumentRoom(roomId: string): DocumentRoom {
    const { format, type, fileId } = decodeRoomId(roomId);

    const path = this.resolvePath(fileId);
    if (path === null) {
      throw new CollabError({
        code: 'NOT_FOUND',
        message: `No file with id ${fileId}`,
        context: { roomId, fileId },
      });
    }

    const conflicting = this.rooms
      .rooms()
      .some(
        (room) =>
          room instanceof DocumentRoom && room.roomId !== roomId && !room.isDestroyed && room.fileId === fileId
      );
    if (conflicting) {
      this.emit('warn', roomId, undefined, CONFLICT_WARNING);
    }

    const loader = this.loaders.acquire(fileId);
    try {
      const room = new DocumentRoom({
        roomId,
        fileFormat: format,
        fileType: type,
        loader,
        updateStore: this.options.createUpdateStore(updateLogPath(path, type)),
        logger: this.logger,
        saveDelay: this.options.documentSaveDelay,
        onEvent: (level, action, msg) => this.emit(level, roomId, action, msg),
      });
      this.emit('info', roomId, 'initialize', 'Room created.');
      return room;
    } catch (error) {
      void this.loaders.release(fileId);
      throw error;
    }
  }

  private roomPath(roomId: string): string | null {
    if (!isDocumentRoomId(roomId)) return null;
    const fileId = roomId.split(':').slice(2).join(':');
    return this.resolvePath(fileId);
  }

  private resolvePath(fileId: string): string | null {
    return this.options.fileIdManager.getPath(fileId);
  }
}
