import * as Y from 'yjs';

/**
 * Shared document model living inside a room's `Y.Doc`.
 *
 * `source` is the document's content in the form its file stores it; the
 * `state` map carries flags shared with the clients, such as `dirty`.
 */
export abstract class YDocument<TSource> {
  readonly ydoc: Y.Doc;
  protected readonly state: Y.Map<unknown>;

  constructor(ydoc: Y.Doc) {
    this.ydoc = ydoc;
    this.state = ydoc.getMap('state');
  }

  /** Whether the document has edits not yet written to its file */
  get dirty(): boolean {
    return this.state.get('dirty') === true;
  }

  set dirty(value: boolean) {
    if (this.state.get('dirty') === value) return;
    this.state.set('dirty', value);
  }

  /** Content in file form */
  abstract get source(): TSource;

  /** Replace the whole content */
  abstract setSource(value: unknown): void;

  /** Whether a file's content equals the document's content */
  abstract hasSameSource(value: unknown): boolean;
}
