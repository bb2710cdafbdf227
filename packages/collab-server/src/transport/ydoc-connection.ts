/**
 * Transport Adapter
 *
 * One per WebSocket: queues inbound frames for the room's relay, writes the
 * room's broadcasts back and runs the connection's open/close lifecycle.
 *
 * @module transport
 */

import { randomUUID } from 'node:crypto';
import { CollabError } from '../errors.js';
import type { Logger } from '../logger.js';
import { MessageType, readAwarenessChanges, readUserName } from '../protocol.js';
import type { RoomCoordinator } from '../room-coordinator.js';
import { isDocumentRoomId } from '../room-id.js';
import { DocumentRoom } from '../rooms/document-room.js';
import type { RoomClient, YRoom } from '../rooms/y-room.js';
import { MessageQueue } from './message-queue.js';

/**
 * WebSocket close codes used by the server
 */
export const CloseCode = {
  GOING_AWAY: 1001,
  PROTOCOL_ERROR: 1002,
  UNSUPPORTED_DATA: 1003,
  INTERNAL_ERROR: 1011,
} as const;

export type CloseCode = (typeof CloseCode)[keyof typeof CloseCode];

/**
 * The socket side of a connection
 */
export interface ConnectionTransport {
  /** Write a binary frame; `callback` receives the write error, if any */
  send(message: Uint8Array, callback: (error?: Error) => void): void;
  close(code: number, reason: string): void;
}

export interface YDocConnectionOptions {
  roomId: string;
  /** Session token presented by the client (the `sessionId` query parameter) */
  sessionId: string | null;
  transport: ConnectionTransport;
  coordinator: RoomCoordinator;
  logger: Logger;
  id?: string;
}

export class YDocConnection implements RoomClient {
  readonly id: string;
  readonly roomId: string;

  private readonly sessionId: string | null;
  private readonly transport: ConnectionTransport;
  private readonly coordinator: RoomCoordinator;
  private readonly logger: Logger;
  private readonly queue = new MessageQueue<Uint8Array>();
  private room_: YRoom | null = null;
  private relay: Promise<void> | null = null;
  private closed = false;
  /** Awareness client ids this connection announced with a user name */
  private readonly announcedUsers = new Set<number>();

  constructor(options: YDocConnectionOptions) {
    this.id = options.id ?? randomUUID();
    this.roomId = options.roomId;
    this.sessionId = options.sessionId;
    this.transport = options.transport;
    this.coordinator = options.coordinator;
    this.logger = options.logger;
  }

  /** The room this connection joined, once opened */
  get room(): YRoom | null {
    return this.room_;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Resolves when the relay of this connection has ended */
  get done(): Promise<void> {
    return this.relay ?? Promise.resolve();
  }

  /**
   * Join the room and start relaying.
   *
   * A stale session token closes the connection before any room is
   * touched. For a document room, a pending cleanup is cancelled and the
   * room is initialized first. Resolves whether the relay started.
   */
  async open(): Promise<boolean> {
    if (isDocumentRoomId(this.roomId) || this.sessionId !== null) {
      try {
        this.coordinator.session.assertValid(this.sessionId);
      } catch (error) {
        if (!CollabError.isCode(error, 'SESSION_EXPIRED')) throw error;
        this.close(CloseCode.UNSUPPORTED_DATA, error.message);
        return false;
      }
    }
    if (this.closed) return false;

    let room: YRoom;
    try {
      room = this.coordinator.getOrCreateRoom(this.roomId);
    } catch (error) {
      this.logger.error(`Failed to open room ${this.roomId}:`, error);
      this.close(CloseCode.INTERNAL_ERROR, errorMessage(error));
      return false;
    }

    this.room_ = room;
    room.addClient(this);

    if (room instanceof DocumentRoom) {
      room.cancelCleanup();
      try {
        await room.initialize();
      } catch (error) {
        this.logger.error(`Failed to initialize room ${this.roomId}:`, error);
        this.coordinator.emit('error', this.roomId, 'initialize', `Room initialization failed: ${errorMessage(error)}`);
        this.close(CloseCode.INTERNAL_ERROR, 'Room initialization failed');
        return false;
      }
      if (this.closed) return false;

      this.coordinator.emit('info', this.roomId, 'initialize', 'New client connected.');
    }

    this.relay = room.serve(this).catch((error: unknown) => {
      this.logger.error(`Relay of ${this.id} in room ${this.roomId} failed:`, error);
    });
    return true;
  }

  /**
   * Handle an inbound frame. Text and empty frames close the connection.
   */
  handleMessage(data: Uint8Array, isBinary: boolean): void {
    if (this.closed) return;

    if (!isBinary) {
      this.close(CloseCode.UNSUPPORTED_DATA, 'Binary frames only');
      return;
    }
    if (data.length === 0) {
      this.close(CloseCode.PROTOCOL_ERROR, 'Empty frame');
      return;
    }

    this.coordinator.recordMessage();

    if (data[0] === MessageType.AWARENESS && this.room_) {
      try {
        this.trackUsers(this.room_, data);
      } catch (error) {
        if (!CollabError.isCode(error, 'PROTOCOL_ERROR')) throw error;
        this.logger.debug(`Malformed awareness frame from ${this.id}:`, error);
        this.close(CloseCode.PROTOCOL_ERROR, 'Malformed awareness message');
        return;
      }
    }

    this.queue.push(data);
  }

  /**
   * Write a binary frame. Failures are logged and the connection stays open.
   */
  send(message: Uint8Array): void {
    if (this.closed) return;
    try {
      this.transport.send(message, (error) => {
        if (error) this.logger.debug(`Failed to write message to ${this.id}:`, error);
      });
    } catch (error) {
      this.logger.debug(`Failed to write message to ${this.id}:`, error);
    }
  }

  /**
   * Next inbound frame, or null once the connection closed and the queue
   * drained
   */
  recv(): Promise<Uint8Array | null> {
    return this.queue.next();
  }

  [Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    return this.queue[Symbol.asyncIterator]();
  }

  /**
   * Close the socket and leave the room
   */
  close(code: number, reason: string): void {
    if (this.closed) return;
    try {
      // close reasons are limited to 123 bytes
      this.transport.close(code, reason.slice(0, 120));
    } catch (error) {
      this.logger.debug(`Failed to close connection ${this.id}:`, error);
    }
    this.handleClose();
  }

  /**
   * The socket closed: end the inbound stream and leave the room. The last
   * client of a document room starts its cleanup delay.
   */
  handleClose(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue.close();

    for (const clientId of this.announcedUsers) {
      this.coordinator.userLeft(clientId);
    }
    this.announcedUsers.clear();

    const room = this.room_;
    if (!room) return;

    void this.coordinator.leaveRoom(room, this).catch((error: unknown) => {
      this.logger.error(`Failed to leave room ${this.roomId}:`, error);
    });
  }

  private trackUsers(room: YRoom, frame: Uint8Array): void {
    const changes = readAwarenessChanges(room.awareness, frame);

    for (const { clientId, state } of changes.added) {
      const name = readUserName(state);
      if (name === null) continue;
      this.coordinator.userJoined(clientId, name);
      this.announcedUsers.add(clientId);
    }
    for (const clientId of changes.removed) {
      this.coordinator.userLeft(clientId);
      this.announcedUsers.delete(clientId);
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
