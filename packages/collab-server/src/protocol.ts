/**
 * Frame layout of the Yjs WebSocket protocol.
 *
 * The first varint of a frame is its message type. Sync frames carry a
 * y-protocols sync message, awareness frames a length-prefixed awareness
 * update.
 */

import * as decoding from 'lib0/decoding';
import * as encoding from 'lib0/encoding';
import type { Awareness } from 'y-protocols/awareness';
import * as awarenessProtocol from 'y-protocols/awareness';
import * as syncProtocol from 'y-protocols/sync';
import type * as Y from 'yjs';
import { CollabError } from './errors.js';

export const MessageType = {
  SYNC: 0,
  AWARENESS: 1,
} as const;

export type MessageType = (typeof MessageType)[keyof typeof MessageType];

/**
 * Participants added and removed by an awareness update
 */
export interface AwarenessChanges {
  added: { clientId: number; state: Record<string, unknown> }[];
  removed: number[];
}

/**
 * Decode the participants an awareness frame adds or removes, relative to
 * the states currently known to `awareness`. The update is not applied.
 */
export function readAwarenessChanges(awareness: Awareness, frame: Uint8Array): AwarenessChanges {
  try {
    const frameDecoder = decoding.createDecoder(frame);
    const type = decoding.readVarUint(frameDecoder);
    if (type !== MessageType.AWARENESS) {
      throw new Error(`Not an awareness frame: ${type}`);
    }

    const decoder = decoding.createDecoder(decoding.readVarUint8Array(frameDecoder));
    const known = awareness.getStates();
    const changes: AwarenessChanges = { added: [], removed: [] };

    const count = decoding.readVarUint(decoder);
    for (let i = 0; i < count; i++) {
      const clientId = decoding.readVarUint(decoder);
      decoding.readVarUint(decoder); // clock
      const state: unknown = JSON.parse(decoding.readVarString(decoder));

      if (state === null) {
        changes.removed.push(clientId);
      } else if (isRecord(state) && !known.has(clientId)) {
        changes.added.push({ clientId, state });
      }
    }
    return changes;
  } catch (error) {
    throw new CollabError({ code: 'PROTOCOL_ERROR', message: 'Malformed awareness frame', cause: error });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Display name carried by an awareness state (`state.user.name`)
 */
export function readUserName(state: Record<string, unknown>): string | null {
  const user = state.user;
  if (typeof user !== 'object' || user === null || !('name' in user)) return null;
  return typeof user.name === 'string' ? user.name : null;
}

/**
 * First sync step, asking the client for what the server is missing
 */
export function encodeSyncStep1(ydoc: Y.Doc): Uint8Array {
  const encoder = encoding.createEncoder();
  encoding.writeVarUint(encoder, MessageType.SYNC);
  syncProtocol.writeSyncStep1(encoder, ydoc);
  return encoding.toUint8Array(encoder);
}

/**
 * Sync frame carrying a document update
 */
export function encodeSyncUpdate(update: Uint8Array): Uint8Array {
  const encoder = encoding.createEncoder();
  encoding.writeVarUint(encoder, MessageType.SYNC);
  syncProtocol.writeUpdate(encoder, update);
  return encoding.toUint8Array(encoder);
}

/**
 * Awareness frame for the given participants
 */
export function encodeAwareness(awareness: Awareness, clientIds: number[]): Uint8Array {
  const encoder = encoding.createEncoder();
  encoding.writeVarUint(encoder, MessageType.AWARENESS);
  encoding.writeVarUint8Array(encoder, awarenessProtocol.encodeAwarenessUpdate(awareness, clientIds));
  return encoding.toUint8Array(encoder);
}
