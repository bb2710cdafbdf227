import { CollabError } from '../errors.js';
import type { YRoom } from './y-room.js';

/**
 * Room identity → the one live room serving it
 */
export class RoomRegistry<TRoom extends YRoom = YRoom> {
  private readonly rooms_ = new Map<string, TRoom>();

  get size(): number {
    return this.rooms_.size;
  }

  roomExists(roomId: string): boolean {
    return this.rooms_.has(roomId);
  }

  getRoom(roomId: string): TRoom | undefined {
    return this.rooms_.get(roomId);
  }

  /**
   * Register a room. Throws `ROOM_EXISTS` when the identity is taken.
   */
  addRoom(roomId: string, room: TRoom): void {
    if (this.rooms_.has(roomId)) {
      throw new CollabError({
        code: 'ROOM_EXISTS',
        message: `Room ${roomId} already exists`,
        context: { roomId },
      });
    }
    this.rooms_.set(roomId, room);
  }

  /**
   * Unregister a room. Only removes the entry when it still points at this
   * instance, so a late cleanup never drops a replacement room.
   */
  deleteRoom(room: TRoom): boolean {
    if (this.rooms_.get(room.roomId) !== room) return false;
    this.rooms_.delete(room.roomId);
    return true;
  }

  roomIds(): string[] {
    return Array.from(this.rooms_.keys());
  }

  rooms(): TRoom[] {
    return Array.from(this.rooms_.values());
  }
}
