import * as Y from 'yjs';
import { CollabError } from '../errors.js';
import { YDocument } from './y-document.js';

/**
 * Plain text file: the content is a single `Y.Text` named `source`.
 */
export class YFile extends YDocument<string> {
  private readonly text: Y.Text;

  constructor(ydoc: Y.Doc) {
    super(ydoc);
    this.text = ydoc.getText('source');
  }

  get source(): string {
    return this.text.toString();
  }

  setSource(value: unknown): void {
    if (typeof value !== 'string') {
      throw new CollabError({ code: 'INVALID_REQUEST', message: 'Text file content must be a string' });
    }
    if (value === this.text.toString()) return;

    this.ydoc.transact(() => {
      this.text.delete(0, this.text.length);
      this.text.insert(0, value);
    });
  }

  hasSameSource(value: unknown): boolean {
    return value === this.source;
  }
}
