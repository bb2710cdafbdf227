import { describe, expect, it } from 'vitest';
import { createCollaborationServer, createMemoryUpdateStores, matchRoute, readToken } from '../collaboration-server.js';
import { silentLogger } from '../logger.js';
import { createFixture } from './helpers.js';

describe('matchRoute', () => {
  const base = '/api/collaboration';

  it('matches the session, room and stats routes', () => {
    expect(matchRoute(base, '/api/collaboration/session/notes/todo.md')).toEqual({
      kind: 'session',
      path: 'notes/todo.md',
    });
    expect(matchRoute(base, '/api/collaboration/room/text:file:abc')).toEqual({
      kind: 'room',
      roomId: 'text:file:abc',
    });
    expect(matchRoute(base, '/api/collaboration/stats')).toEqual({ kind: 'stats' });
  });

  it('decodes escaped segments', () => {
    expect(matchRoute(base, '/api/collaboration/room/text%3Afile%3Aabc')).toEqual({
      kind: 'room',
      roomId: 'text:file:abc',
    });
    expect(matchRoute(base, '/api/collaboration/session/my%20notes.md')).toEqual({
      kind: 'session',
      path: 'my notes.md',
    });
  });

  it('rejects everything else', () => {
    expect(matchRoute(base, '/api/other/room/abc')).toEqual({ kind: 'unknown' });
    expect(matchRoute(base, '/api/collaboration/room/')).toEqual({ kind: 'unknown' });
    expect(matchRoute(base, '/api/collaboration/files/abc')).toEqual({ kind: 'unknown' });
    expect(matchRoute(base, '/api/collaboration/room/%E0%A4%A')).toEqual({ kind: 'unknown' });
  });

  it('accepts the root as base path', () => {
    expect(matchRoute('/', '/room/lobby')).toEqual({ kind: 'room', roomId: 'lobby' });
  });
});

describe('readToken', () => {
  const url = (query = '') => new URL(`http://localhost/api/collaboration/stats${query}`);

  it('reads the authorization header', () => {
    expect(readToken({ authorization: 'token test-secret' }, url())).toBe('test-secret');
    expect(readToken({ authorization: 'Bearer test-secret' }, url())).toBe('test-secret');
  });

  it('falls back to the query parameter', () => {
    expect(readToken({}, url('?token=test-secret'))).toBe('test-secret');
    expect(readToken({ authorization: 'Basic abc' }, url('?token=test-secret'))).toBe('test-secret');
    expect(readToken({}, url())).toBeNull();
  });
});

describe('CollaborationServer', () => {
  const createServer = (options: { requireAuth?: boolean; token?: string } = {}) => {
    const fx = createFixture();
    return createCollaborationServer({
      contentsManager: fx.contents,
      fileIdManager: fx.fileIds,
      logger: silentLogger,
      requireAuth: options.requireAuth,
      validateAuth: options.token === undefined ? undefined : async (candidate) => candidate === options.token,
    });
  };
  const url = (query = '') => new URL(`http://localhost/api/collaboration/room/lobby${query}`);

  it('resolves its configuration over the defaults', () => {
    const server = createServer();
    expect(server.config.basePath).toBe('/api/collaboration');
    expect(server.config.documentCleanupDelay).toBe(60);
    expect(server.config.requireAuth).toBe(true);
    expect(server.connectionCount).toBe(0);
  });

  it('accepts a valid token', async () => {
    const server = createServer({ token: 'test-secret' });
    await expect(server.authenticate({}, url('?token=test-secret'))).resolves.toEqual({ userId: 'test-secret' });
  });

  it('refuses a wrong or missing token', async () => {
    const server = createServer({ token: 'test-secret' });
    await expect(server.authenticate({ authorization: 'token wrong' }, url())).resolves.toBeNull();
    await expect(server.authenticate({}, url())).resolves.toBeNull();
  });

  it('refuses everything when auth is required without a validator', async () => {
    const server = createServer();
    await expect(server.authenticate({}, url('?token=test-secret'))).resolves.toBeNull();
  });

  it('lets anyone in when auth is disabled', async () => {
    const server = createServer({ requireAuth: false });
    await expect(server.authenticate({}, url())).resolves.toEqual({ userId: 'anonymous' });
  });

  it('rejects an invalid configuration', () => {
    const fx = createFixture();
    expect(() =>
      createCollaborationServer({
        contentsManager: fx.contents,
        fileIdManager: fx.fileIds,
        logger: silentLogger,
        basePath: 'api/',
      })
    ).toThrow('Invalid configuration');
  });
});

describe('createMemoryUpdateStores', () => {
  it('hands out one store per path', () => {
    const factory = createMemoryUpdateStores();
    expect(factory('.file:a.md.y')).toBe(factory('.file:a.md.y'));
    expect(factory('.file:a.md.y')).not.toBe(factory('.file:b.md.y'));
  });
});
