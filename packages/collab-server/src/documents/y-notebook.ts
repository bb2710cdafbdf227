import { isDeepStrictEqual } from 'node:util';
import * as Y from 'yjs';
import { z } from 'zod';
import { CollabError } from '../errors.js';
import { YDocument } from './y-document.js';

const multilineSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value.join('') : value));

const cellSchema = z
  .object({
    id: z.string().optional(),
    cell_type: z.enum(['code', 'markdown', 'raw']),
    source: multilineSchema,
    metadata: z.record(z.unknown()).default({}),
    outputs: z.array(z.unknown()).optional(),
    execution_count: z.number().int().nullable().optional(),
    attachments: z.record(z.unknown()).optional(),
  })
  .passthrough();

const notebookSchema = z.object({
  cells: z.array(cellSchema),
  metadata: z.record(z.unknown()).default({}),
  nbformat: z.number().int().default(4),
  nbformat_minor: z.number().int().default(5),
});

/** A notebook cell with its source joined into one string */
export type NotebookCell = z.output<typeof cellSchema>;

/** A notebook as read from and written to its file */
export type NotebookContent = z.output<typeof notebookSchema>;

/**
 * Validate notebook JSON, joining multi-line sources
 */
export function parseNotebook(value: unknown): NotebookContent {
  const result = notebookSchema.safeParse(value);
  if (!result.success) {
    throw new CollabError({
      code: 'INVALID_REQUEST',
      message: `Invalid notebook: ${result.error.issues[0]?.message ?? 'unknown error'}`,
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Notebook: cells in a `Y.Array` of `Y.Map`s whose `source` is a `Y.Text`,
 * notebook-level fields in the `meta` map.
 */
export class YNotebook extends YDocument<NotebookContent> {
  private readonly cells: Y.Array<Y.Map<unknown>>;
  private readonly meta: Y.Map<unknown>;

  constructor(ydoc: Y.Doc) {
    super(ydoc);
    this.cells = ydoc.getArray('cells');
    this.meta = ydoc.getMap('meta');
  }

  get source(): NotebookContent {
    const nbformat = this.meta.get('nbformat');
    const nbformatMinor = this.meta.get('nbformat_minor');
    const metadata = this.meta.get('metadata');

    return {
      cells: this.cells.toArray().map(readCell),
      metadata: isRecord(metadata) ? metadata : {},
      nbformat: typeof nbformat === 'number' ? nbformat : 4,
      nbformat_minor: typeof nbformatMinor === 'number' ? nbformatMinor : 5,
    };
  }

  setSource(value: unknown): void {
    const notebook = parseNotebook(value);

    this.ydoc.transact(() => {
      this.cells.delete(0, this.cells.length);
      this.cells.insert(0, notebook.cells.map(createCell));
      this.meta.set('metadata', notebook.metadata);
      this.meta.set('nbformat', notebook.nbformat);
      this.meta.set('nbformat_minor', notebook.nbformat_minor);
    });
  }

  hasSameSource(value: unknown): boolean {
    const result = notebookSchema.safeParse(value);
    if (!result.success) return false;
    try {
      return isDeepStrictEqual(result.data, this.source);
    } catch (error) {
      if (CollabError.isCode(error, 'INVALID_REQUEST')) return false;
      throw error;
    }
  }
}

function createCell(cell: NotebookCell): Y.Map<unknown> {
  const map = new Y.Map<unknown>();
  for (const [key, value] of Object.entries(cell)) {
    if (value === undefined) continue;
    map.set(key, key === 'source' ? new Y.Text(String(value)) : value);
  }
  return map;
}

function readCell(map: Y.Map<unknown>): NotebookCell {
  const raw: Record<string, unknown> = {};
  map.forEach((value, key) => {
    if (value instanceof Y.Text) {
      raw[key] = value.toString();
    } else if (value instanceof Y.AbstractType) {
      // clients may nest shared types anywhere in a cell
      raw[key] = value.toJSON();
    } else {
      raw[key] = value;
    }
  });

  const result = cellSchema.safeParse(raw);
  if (!result.success) {
    throw new CollabError({
      code: 'INVALID_REQUEST',
      message: `Invalid notebook cell: ${result.error.issues[0]?.message ?? 'unknown error'}`,
      cause: result.error,
    });
  }
  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
