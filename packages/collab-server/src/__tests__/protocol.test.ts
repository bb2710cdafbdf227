import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { applyAwarenessUpdate, Awareness, encodeAwarenessUpdate } from 'y-protocols/awareness';
import * as Y from 'yjs';
import { encodeAwareness, readAwarenessChanges, readUserName } from '../protocol.js';

describe('readAwarenessChanges', () => {
  let serverDoc: Y.Doc;
  let server: Awareness;
  let peerDoc: Y.Doc;
  let peer: Awareness;

  beforeEach(() => {
    serverDoc = new Y.Doc();
    server = new Awareness(serverDoc);
    server.setLocalState(null);
    peerDoc = new Y.Doc();
    peer = new Awareness(peerDoc);
  });

  afterEach(() => {
    server.destroy();
    peer.destroy();
    serverDoc.destroy();
    peerDoc.destroy();
  });

  it('reports participants the server does not know yet', () => {
    peer.setLocalState({ user: { name: 'Ada' } });

    const changes = readAwarenessChanges(server, encodeAwareness(peer, [peerDoc.clientID]));

    expect(changes).toEqual({ added: [{ clientId: peerDoc.clientID, state: { user: { name: 'Ada' } } }], removed: [] });
  });

  it('ignores known participants and reports removals', () => {
    peer.setLocalState({ user: { name: 'Ada' } });
    const frame = encodeAwareness(peer, [peerDoc.clientID]);
    applyAwarenessUpdate(server, encodeAwarenessUpdate(peer, [peerDoc.clientID]), 'peer');

    expect(readAwarenessChanges(server, frame)).toEqual({ added: [], removed: [] });

    peer.setLocalState(null);
    expect(readAwarenessChanges(server, encodeAwareness(peer, [peerDoc.clientID]))).toEqual({
      added: [],
      removed: [peerDoc.clientID],
    });
  });

  it('rejects frames it cannot decode', () => {
    expect(() => readAwarenessChanges(server, Uint8Array.of(1, 3, 1, 2, 3))).toThrow('Malformed awareness frame');
    expect(() => readAwarenessChanges(server, Uint8Array.of(0, 0))).toThrow('Malformed awareness frame');
  });
});

describe('readUserName', () => {
  it('reads user.name when it is a string', () => {
    expect(readUserName({ user: { name: 'Ada' } })).toBe('Ada');
    expect(readUserName({ user: { name: 42 } })).toBeNull();
    expect(readUserName({ user: 'Ada' })).toBeNull();
    expect(readUserName({ cursor: 3 })).toBeNull();
  });
});
