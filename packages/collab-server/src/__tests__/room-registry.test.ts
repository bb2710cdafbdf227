import { afterEach, describe, expect, it } from 'vitest';
import { silentLogger } from '../logger.js';
import { decodeRoomId, encodeRoomId, isDocumentRoomId, updateLogPath } from '../room-id.js';
import { RoomRegistry } from '../rooms/room-registry.js';
import { TransientRoom } from '../rooms/transient-room.js';

describe('RoomRegistry', () => {
  const created: TransientRoom[] = [];
  const room = (id: string): TransientRoom => {
    const instance = new TransientRoom(id, silentLogger);
    created.push(instance);
    return instance;
  };

  afterEach(async () => {
    await Promise.all(created.splice(0).map((instance) => instance.destroy(true)));
  });

  it('registers one room per identity', () => {
    const registry = new RoomRegistry();
    const first = room('lobby');
    registry.addRoom('lobby', first);

    expect(registry.roomExists('lobby')).toBe(true);
    expect(registry.getRoom('lobby')).toBe(first);
    expect(() => registry.addRoom('lobby', room('lobby'))).toThrow('Room lobby already exists');
    expect(registry.size).toBe(1);
  });

  it('deletes idempotently', () => {
    const registry = new RoomRegistry();
    const first = room('lobby');
    registry.addRoom('lobby', first);

    expect(registry.deleteRoom(first)).toBe(true);
    expect(registry.deleteRoom(first)).toBe(false);
    expect(registry.roomExists('lobby')).toBe(false);
  });

  it('keeps a replacement when an old instance is deleted', () => {
    const registry = new RoomRegistry();
    const stale = room('lobby');
    registry.addRoom('lobby', stale);
    registry.deleteRoom(stale);

    const replacement = room('lobby');
    registry.addRoom('lobby', replacement);

    expect(registry.deleteRoom(stale)).toBe(false);
    expect(registry.getRoom('lobby')).toBe(replacement);
  });

  it('lists rooms and identities', () => {
    const registry = new RoomRegistry();
    const a = room('a');
    const b = room('b');
    registry.addRoom('a', a);
    registry.addRoom('b', b);

    expect(registry.roomIds()).toEqual(['a', 'b']);
    expect(registry.rooms()).toEqual([a, b]);
  });
});

describe('room identities', () => {
  it('tells document rooms by their two separators', () => {
    expect(isDocumentRoomId('text:file:abc')).toBe(true);
    expect(isDocumentRoomId('json:notebook:a:b')).toBe(true);
    expect(isDocumentRoomId('awareness')).toBe(false);
    expect(isDocumentRoomId('text:file')).toBe(false);
  });

  it('splits on the first two separators only', () => {
    expect(decodeRoomId('json:notebook:id:with:colons')).toEqual({
      format: 'json',
      type: 'notebook',
      fileId: 'id:with:colons',
    });
    expect(encodeRoomId({ format: 'text', type: 'file', fileId: 'abc' })).toBe('text:file:abc');
  });

  it('rejects unknown formats and types', () => {
    expect(() => decodeRoomId('yaml:file:abc')).toThrow('Unknown document format: yaml');
    expect(() => decodeRoomId('text:directory:abc')).toThrow('Unsupported document type: directory');
    expect(() => decodeRoomId('text:slides:abc')).toThrow('Unsupported document type: slides');
  });

  it('derives a hidden update log next to the file', () => {
    expect(updateLogPath('notes/todo.md', 'file')).toBe('notes/.file:todo.md.y');
    expect(updateLogPath('analysis.ipynb', 'notebook')).toBe('.notebook:analysis.ipynb.y');
  });
});
