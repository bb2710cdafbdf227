import type { Logger } from '../logger.js';
import { YRoom } from './y-room.js';

/**
 * Room whose shared state lives only as long as the room, such as the
 * awareness channel of a workspace. Relays from creation and persists
 * nothing.
 */
export class TransientRoom extends YRoom {
  readonly kind = 'transient' as const;

  constructor(roomId: string, logger: Logger) {
    super({ roomId, logger, ready: true });
  }
}
