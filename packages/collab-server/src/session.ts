import { randomUUID } from 'node:crypto';
import { CollabError } from './errors.js';

/**
 * Issues the token identifying the current server process.
 *
 * Clients receive it from the session endpoint and present it when they
 * connect to a document room. A token from an earlier process (the server
 * restarted in between) no longer matches, and the client has to request a
 * new session before its in-memory copy of the document can be trusted.
 * This guards against stale state; it is not an access control.
 */
export class SessionIssuer {
  readonly sessionId: string;

  constructor(sessionId: string = randomUUID()) {
    this.sessionId = sessionId;
  }

  /**
   * Whether a client-supplied token belongs to this process
   */
  validate(candidate: string | null | undefined): boolean {
    return candidate === this.sessionId;
  }

  /**
   * Throw SESSION_EXPIRED unless the token belongs to this process
   */
  assertValid(candidate: string | null | undefined): void {
    if (this.validate(candidate)) return;
    throw new CollabError({
      code: 'SESSION_EXPIRED',
      message: `Document session ${candidate ?? ''} expired`,
      context: { sessionId: candidate ?? null },
    });
  }
}
