import { z } from 'zod';
import type { FileIdManager } from '../contents/contents-manager.js';
import { CollabError } from '../errors.js';
import type { SessionIssuer } from '../session.js';

const sessionRequestSchema = z.object({
  format: z.enum(['text', 'base64', 'json']),
  type: z.string().min(1),
});

export type SessionRequest = z.infer<typeof sessionRequestSchema>;

/**
 * Document session handed to a client
 */
export interface DocumentSession extends SessionRequest {
  fileId: string;
  sessionId: string;
}

export interface SessionResponse {
  /** 201 when the path was indexed by this request, 200 otherwise */
  status: 200 | 201;
  body: DocumentSession;
}

/**
 * Resolve a path to its file id and hand out the session token.
 *
 * Repeating the request for a known path returns the same id with status
 * 200. Throws `INVALID_REQUEST` for a bad body and `NOT_FOUND` for a path
 * that does not exist.
 */
export async function handleSessionRequest(
  path: string,
  body: unknown,
  deps: { fileIdManager: FileIdManager; session: SessionIssuer }
): Promise<SessionResponse> {
  const parsed = sessionRequestSchema.safeParse(body);
  if (!parsed.success) {
    throw new CollabError({
      code: 'INVALID_REQUEST',
      message: `Invalid session request: ${parsed.error.issues.map((issue) => issue.path.join('.') || issue.message).join(', ')}`,
    });
  }
  const { format, type } = parsed.data;

  const known = deps.fileIdManager.getId(path);
  const fileId = known ?? (await deps.fileIdManager.index(path));
  if (fileId === null) {
    throw new CollabError({
      code: 'NOT_FOUND',
      message: `File '${path}' does not exist`,
      context: { path },
    });
  }

  return {
    status: known === null ? 201 : 200,
    body: { format, type, fileId, sessionId: deps.session.sessionId },
  };
}
