/**
 * Room identities.
 *
 * A document room is named `<format>:<type>:<fileId>`; any name without
 * two separators is a transient room.
 */

import type { ContentFormat, ContentType } from './contents/contents-manager.js';
import { splitPath } from './contents/contents-manager.js';
import { isSupportedDocumentType } from './documents/index.js';
import { CollabError } from './errors.js';

const FORMATS: readonly ContentFormat[] = ['text', 'base64', 'json'];

export interface DocumentRoomId {
  format: ContentFormat;
  type: ContentType;
  fileId: string;
}

/**
 * Whether a room identity names a document room
 */
export function isDocumentRoomId(roomId: string): boolean {
  return roomId.split(':').length > 2;
}

/**
 * Split a document room identity on its first two separators. The file id
 * may itself contain `:`.
 */
export function decodeRoomId(roomId: string): DocumentRoomId {
  const first = roomId.indexOf(':');
  const second = first < 0 ? -1 : roomId.indexOf(':', first + 1);
  if (second < 0) {
    throw new CollabError({
      code: 'INVALID_REQUEST',
      message: `Not a document room: ${roomId}`,
      context: { roomId },
    });
  }

  const format = roomId.slice(0, first);
  const type = roomId.slice(first + 1, second);
  const fileId = roomId.slice(second + 1);

  if (!isContentFormat(format)) {
    throw new CollabError({
      code: 'INVALID_REQUEST',
      message: `Unknown document format: ${format}`,
      context: { roomId, format },
    });
  }
  if (!isDocumentType(type)) {
    throw new CollabError({
      code: 'UNSUPPORTED_DOCUMENT_TYPE',
      message: `Unsupported document type: ${type}`,
      context: { roomId, fileType: type },
    });
  }
  return { format, type, fileId };
}

export function encodeRoomId({ format, type, fileId }: DocumentRoomId): string {
  return `${format}:${type}:${fileId}`;
}

/**
 * Update log path of a document: a hidden sibling of the file carrying the
 * document type, e.g. `notes/.file:todo.md.y`
 */
export function updateLogPath(path: string, fileType: string): string {
  const { dir, name } = splitPath(path);
  const logName = `.${fileType}:${name}.y`;
  return dir ? `${dir}/${logName}` : logName;
}

function isContentFormat(value: string): value is ContentFormat {
  return FORMATS.some((format) => format === value);
}

function isDocumentType(value: string): value is ContentType {
  return value !== 'directory' && isSupportedDocumentType(value);
}
