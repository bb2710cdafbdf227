/**
 * Room base: one authoritative `Y.Doc` with its awareness and the clients
 * relaying to it.
 *
 * @module rooms
 */

import * as decoding from 'lib0/decoding';
import * as encoding from 'lib0/encoding';
import { Awareness } from 'y-protocols/awareness';
import * as awarenessProtocol from 'y-protocols/awareness';
import * as syncProtocol from 'y-protocols/sync';
import * as Y from 'yjs';
import type { Logger } from '../logger.js';
import { encodeAwareness, encodeSyncStep1, encodeSyncUpdate, MessageType } from '../protocol.js';
import type { UpdateStore } from '../ystore/update-store.js';

/**
 * A connection attached to a room.
 *
 * `send` must not throw: a failed write is the connection's business.
 * Iterating yields inbound frames until the connection closes.
 */
export interface RoomClient extends AsyncIterable<Uint8Array> {
  readonly id: string;
  send(message: Uint8Array): void;
}

export type RoomKind = 'document' | 'transient';

export interface YRoomOptions {
  roomId: string;
  logger: Logger;
  /** Update log receiving every update once the room is ready */
  updateStore?: UpdateStore;
  /** Whether the room relays and persists updates from the start */
  ready?: boolean;
}

/**
 * Shared capability of both room variants.
 *
 * Once ready, every update of the document is broadcast to all clients
 * (except the one it came from) and appended to the update log.
 */
export abstract class YRoom {
  abstract readonly kind: RoomKind;

  readonly roomId: string;
  readonly ydoc: Y.Doc;
  readonly awareness: Awareness;

  protected readonly logger: Logger;
  protected readonly updateStore?: UpdateStore;
  protected ready: boolean;

  private readonly clients_ = new Set<RoomClient>();
  private readonly awarenessIds = new Map<RoomClient, Set<number>>();
  private destroyed_ = false;

  constructor(options: YRoomOptions) {
    this.roomId = options.roomId;
    this.logger = options.logger;
    this.updateStore = options.updateStore;
    this.ready = options.ready ?? true;

    this.ydoc = new Y.Doc();
    this.awareness = new Awareness(this.ydoc);
    // the server takes part in no session of its own
    this.awareness.setLocalState(null);

    this.ydoc.on('update', this.handleDocumentUpdate);
    this.awareness.on('update', this.handleAwarenessUpdate);
  }

  /** Connected clients */
  get clients(): RoomClient[] {
    return Array.from(this.clients_);
  }

  get clientCount(): number {
    return this.clients_.size;
  }

  get isReady(): boolean {
    return this.ready;
  }

  get isDestroyed(): boolean {
    return this.destroyed_;
  }

  hasClient(client: RoomClient): boolean {
    return this.clients_.has(client);
  }

  /**
   * Attach a client. Counted as connected from now on, before its relay
   * starts.
   */
  addClient(client: RoomClient): void {
    this.clients_.add(client);
  }

  /**
   * Detach a client and drop the awareness states it controlled.
   * Returns false when the client was not attached.
   */
  removeClient(client: RoomClient): boolean {
    if (!this.clients_.delete(client)) return false;

    const ids = this.awarenessIds.get(client);
    this.awarenessIds.delete(client);
    if (ids && ids.size > 0 && !this.destroyed_) {
      awarenessProtocol.removeAwarenessStates(this.awareness, Array.from(ids), null);
    }
    return true;
  }

  /**
   * Relay a client's frames to the room until its stream ends.
   *
   * Starts with the first sync step and the current awareness states. The
   * client is detached when the stream ends.
   */
  async serve(client: RoomClient): Promise<void> {
    this.addClient(client);
    try {
      client.send(encodeSyncStep1(this.ydoc));

      const states = Array.from(this.awareness.getStates().keys());
      if (states.length > 0) {
        client.send(encodeAwareness(this.awareness, states));
      }

      for await (const message of client) {
        if (this.destroyed_) break;
        this.handleMessage(client, message);
      }
    } finally {
      this.removeClient(client);
    }
  }

  /**
   * Send a frame to every client but `except`
   */
  broadcast(message: Uint8Array, except?: RoomClient): void {
    for (const client of this.clients_) {
      if (client !== except) client.send(message);
    }
  }

  /**
   * Release the document.
   *
   * Refused (resolves false) while clients are attached, unless `force` is
   * set, which drops them. Resolves true when this call destroyed the room.
   */
  async destroy(force = false): Promise<boolean> {
    if (this.destroyed_) return false;
    if (this.clients_.size > 0 && !force) return false;
    this.destroyed_ = true;

    this.ydoc.off('update', this.handleDocumentUpdate);
    this.awareness.off('update', this.handleAwarenessUpdate);
    this.clients_.clear();
    this.awarenessIds.clear();

    try {
      await this.onDestroy();
    } finally {
      this.awareness.destroy();
      this.ydoc.destroy();
    }
    return true;
  }

  /**
   * Hook for variants releasing their own resources on destruction
   */
  protected async onDestroy(): Promise<void> {
    await this.updateStore?.close();
  }

  protected handleMessage(client: RoomClient, message: Uint8Array): void {
    try {
      const decoder = decoding.createDecoder(message);
      const type = decoding.readVarUint(decoder);

      switch (type) {
        case MessageType.SYNC: {
          const encoder = encoding.createEncoder();
          encoding.writeVarUint(encoder, MessageType.SYNC);
          syncProtocol.readSyncMessage(decoder, encoder, this.ydoc, client);
          if (encoding.length(encoder) > 1) {
            client.send(encoding.toUint8Array(encoder));
          }
          break;
        }
        case MessageType.AWARENESS:
          awarenessProtocol.applyAwarenessUpdate(this.awareness, decoding.readVarUint8Array(decoder), client);
          break;
        default:
          this.logger.debug(`Ignoring message of type ${type} in room ${this.roomId}`);
      }
    } catch (error) {
      this.logger.error(`Failed to apply message from ${client.id} in room ${this.roomId}:`, error);
    }
  }

  private readonly handleDocumentUpdate = (update: Uint8Array, origin: unknown): void => {
    if (!this.ready) return;

    const sender = this.isClient(origin) ? origin : undefined;
    this.broadcast(encodeSyncUpdate(update), sender);

    if (this.updateStore) {
      void this.updateStore.write(update).catch((error: unknown) => {
        this.logger.error(`Failed to append update of room ${this.roomId}:`, error);
      });
    }

    this.onDocumentUpdate(update, origin);
  };

  private readonly handleAwarenessUpdate = (
    { added, updated, removed }: { added: number[]; updated: number[]; removed: number[] },
    origin: unknown
  ): void => {
    if (this.isClient(origin)) {
      let ids = this.awarenessIds.get(origin);
      if (!ids) {
        ids = new Set();
        this.awarenessIds.set(origin, ids);
      }
      for (const id of added) ids.add(id);
      for (const id of removed) ids.delete(id);
    }

    const changed = [...added, ...updated, ...removed];
    if (changed.length > 0) {
      this.broadcast(encodeAwareness(this.awareness, changed));
    }
  };

  /**
   * Hook for variants reacting to document updates once the room is ready
   */
  protected onDocumentUpdate(_update: Uint8Array, _origin: unknown): void {
    // no-op by default
  }

  private isClient(origin: unknown): origin is RoomClient {
    for (const client of this.clients_) {
      if (client === origin) return true;
    }
    return false;
  }
}
