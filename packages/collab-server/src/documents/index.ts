import type * as Y from 'yjs';
import { CollabError } from '../errors.js';
import type { YDocument } from './y-document.js';
import { YFile } from './y-file.js';
import { YNotebook } from './y-notebook.js';

export { YDocument } from './y-document.js';
export { YFile } from './y-file.js';
export { YNotebook, parseNotebook, type NotebookCell, type NotebookContent } from './y-notebook.js';

const DOCUMENT_TYPES: Record<string, new (ydoc: Y.Doc) => YDocument<unknown>> = {
  file: YFile,
  notebook: YNotebook,
};

/**
 * Whether a file type has a document model
 */
export function isSupportedDocumentType(fileType: string): boolean {
  return Object.hasOwn(DOCUMENT_TYPES, fileType);
}

/**
 * Create the document model for a file type inside a `Y.Doc`
 */
export function createYDocument(fileType: string, ydoc: Y.Doc): YDocument<unknown> {
  const DocumentClass = Object.hasOwn(DOCUMENT_TYPES, fileType) ? DOCUMENT_TYPES[fileType] : undefined;
  if (!DocumentClass) {
    throw new CollabError({
      code: 'UNSUPPORTED_DOCUMENT_TYPE',
      message: `Unsupported document type: ${fileType}`,
      context: { fileType },
    });
  }
  return new DocumentClass(ydoc);
}
