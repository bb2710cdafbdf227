import { beforeEach, describe, expect, it } from 'vitest';
import { handleSessionRequest } from '../http/session-handler.js';
import { SessionIssuer } from '../session.js';
import { createFixture, type Fixture } from './helpers.js';

describe('handleSessionRequest', () => {
  let fx: Fixture;
  let session: SessionIssuer;

  beforeEach(() => {
    fx = createFixture();
    session = new SessionIssuer('test-session');
  });

  it('indexes a new path with status 201', async () => {
    fx.contents.setFile('notes.md', 'hello');

    const response = await handleSessionRequest('notes.md', { format: 'text', type: 'file' }, {
      fileIdManager: fx.fileIds,
      session,
    });

    expect(response.status).toBe(201);
    expect(response.body).toEqual({
      format: 'text',
      type: 'file',
      fileId: fx.fileIds.getId('notes.md'),
      sessionId: 'test-session',
    });
  });

  it('returns the known id with status 200', async () => {
    fx.contents.setFile('notes.md', 'hello');
    const deps = { fileIdManager: fx.fileIds, session };

    const first = await handleSessionRequest('notes.md', { format: 'text', type: 'file' }, deps);
    const second = await handleSessionRequest('notes.md', { format: 'json', type: 'notebook' }, deps);

    expect(second.status).toBe(200);
    expect(second.body.fileId).toBe(first.body.fileId);
    expect(second.body.format).toBe('json');
  });

  it('rejects a missing file', async () => {
    await expect(
      handleSessionRequest('missing.md', { format: 'text', type: 'file' }, { fileIdManager: fx.fileIds, session })
    ).rejects.toMatchObject({ code: 'NOT_FOUND', status: 404, message: "File 'missing.md' does not exist" });
  });

  it('rejects a malformed body', async () => {
    fx.contents.setFile('notes.md', 'hello');
    const deps = { fileIdManager: fx.fileIds, session };

    await expect(handleSessionRequest('notes.md', { type: 'file' }, deps)).rejects.toMatchObject({
      code: 'INVALID_REQUEST',
      status: 400,
      message: 'Invalid session request: format',
    });
    await expect(handleSessionRequest('notes.md', { format: 'yaml', type: 'file' }, deps)).rejects.toMatchObject({
      code: 'INVALID_REQUEST',
    });
    expect(fx.fileIds.getId('notes.md')).toBeNull();
  });
});

describe('SessionIssuer', () => {
  it('rejects tokens of another process as expired', () => {
    const session = new SessionIssuer('test-session');

    expect(() => session.assertValid('test-session')).not.toThrow();
    expect(() => session.assertValid('old-session')).toThrow(
      expect.objectContaining({ code: 'SESSION_EXPIRED', status: 410, message: 'Document session old-session expired' })
    );
    expect(() => session.assertValid(null)).toThrow('Document session  expired');
  });
});
