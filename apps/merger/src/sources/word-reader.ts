/**
 * Word source reader.
 *
 * Opens a .docx report with the same document model the templates use and
 * reads its main body in one of three layouts:
 * - table: a header row of the selected table names the columns; each data
 *   row i yields `row{i}_col{header}` (optionally `{prefix}_row{i}_col{header}`)
 * - key_value: one key cell and one value cell per row of the selected table
 * - text: the paragraphs outside tables, one per line, under a single key
 */

import { SourceReadError, TemplateError } from '@report-merge/shared';
import type { WordSourceSpec } from '../config/settings';
import { TemplateDocument } from '../template/docx-document';
import type { TemplateParagraph } from '../template/docx-document';
import { runText } from '../template/run-text';
import type { ReadContext } from './excel-reader';
import { normalizeKey, normalizeValue } from './value-normalizer';
import { setMappingValue } from './value-mapping';

const BODY_PART = 'word/document.xml';

/** Cell texts of one table by 0-based row and column; a cell's paragraphs are joined by newlines. */
export type TableGrid = string[][];

function paragraphText(paragraph: TemplateParagraph): string {
  return paragraph.runs.map(runText).join('');
}

function openDocument(bytes: Buffer, origin: string): TemplateDocument {
  try {
    return TemplateDocument.load(bytes, origin);
  } catch (err) {
    if (err instanceof TemplateError) {
      throw new SourceReadError(origin, 'not a readable .docx document', { cause: err });
    }
    throw err;
  }
}

/** Paragraphs outside tables, one per line, without leading or trailing blank lines. */
export function bodyText(paragraphs: readonly TemplateParagraph[]): string {
  return paragraphs
    .filter((paragraph) => paragraph.cell === undefined)
    .map(paragraphText)
    .join('\n')
    .replace(/^\n+|\n+$/g, '');
}

/** Every table of the part, keyed by its 0-based position in document order. */
export function tableGrids(paragraphs: readonly TemplateParagraph[]): Map<number, TableGrid> {
  const tables = new Map<number, TableGrid>();

  for (const paragraph of paragraphs) {
    const { cell } = paragraph;
    if (!cell) continue;

    let grid = tables.get(cell.table);
    if (!grid) {
      grid = [];
      tables.set(cell.table, grid);
    }
    let row = grid[cell.row];
    if (!row) {
      row = [];
      grid[cell.row] = row;
    }
    const text = paragraphText(paragraph);
    const current = row[cell.col];
    row[cell.col] = current === undefined ? text : `${current}\n${text}`;
  }
  return tables;
}

function readTable(grid: TableGrid, spec: WordSourceSpec, ctx: ReadContext): Map<string, string> {
  const headers = new Map<number, string>();
  (grid[spec.headerRow - 1] ?? []).forEach((text, column) => {
    const name = normalizeKey(normalizeValue(text));
    if (name) headers.set(column, name);
  });
  if (headers.size === 0) {
    throw new SourceReadError(ctx.origin, `header row ${spec.headerRow} of table ${spec.table} is empty`);
  }

  const values = new Map<string, string>();
  const origins = new Map<string, string>();
  const prefix = spec.prefix ? `${spec.prefix}_` : '';
  let index = 0;

  for (let rowIndex = spec.headerRow; rowIndex < grid.length; rowIndex++) {
    const row = grid[rowIndex] ?? [];
    const cells = [...headers].map(([column, name]) => [name, normalizeValue(row[column])] as const);
    if (cells.every(([, text]) => text.trim() === '')) continue;

    index++;
    for (const [name, text] of cells) {
      const key = `${prefix}row${index}_col${name}`;
      setMappingValue(values, origins, key, text, `${ctx.origin} row ${rowIndex + 1}`, ctx.policy);
    }
  }
  return values;
}

function readKeyValue(grid: TableGrid, spec: WordSourceSpec, ctx: ReadContext): Map<string, string> {
  const values = new Map<string, string>();
  const origins = new Map<string, string>();

  grid.forEach((row, rowIndex) => {
    const label = normalizeValue(row[spec.keyColumn - 1]).trim();
    if (label === '') return;

    const key = normalizeKey(label);
    if (!key) {
      ctx.logger.warn({ origin: ctx.origin, row: rowIndex + 1, label }, 'Skipping row with unusable key');
      return;
    }
    const value = normalizeValue(row[spec.valueColumn - 1]);
    setMappingValue(values, origins, key, value, `${ctx.origin} row ${rowIndex + 1}`, ctx.policy);
  });
  return values;
}

function selectTable(paragraphs: readonly TemplateParagraph[], spec: WordSourceSpec, origin: string): TableGrid {
  const grid = tableGrids(paragraphs).get(spec.table - 1);
  if (!grid) {
    throw new SourceReadError(origin, `table ${spec.table} not found`);
  }
  return grid;
}

export async function readWordSource(
  bytes: Buffer,
  spec: WordSourceSpec,
  ctx: ReadContext,
): Promise<Map<string, string>> {
  const document = openDocument(bytes, ctx.origin);
  const paragraphs = document.part(BODY_PART)?.paragraphs ?? [];
  let values: Map<string, string>;

  if (spec.layout === 'text') {
    if (spec.key === undefined) {
      throw new SourceReadError(ctx.origin, 'the text layout needs a key');
    }
    values = new Map([[spec.key, normalizeValue(bodyText(paragraphs))]]);
  } else {
    const grid = selectTable(paragraphs, spec, ctx.origin);
    values = spec.layout === 'key_value' ? readKeyValue(grid, spec, ctx) : readTable(grid, spec, ctx);
  }

  ctx.logger.debug({ origin: ctx.origin, layout: spec.layout, keys: values.size }, 'Word source read');
  return values;
}
