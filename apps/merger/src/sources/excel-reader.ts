/**
 * Excel source reader.
 *
 * Reads one worksheet with exceljs in either layout:
 * - key_value: one key column and one value column per row
 * - table: a header row names the columns; each data row i yields
 *   `row{i}_col{header}` (optionally `{prefix}_row{i}_col{header}`)
 */

import { Readable } from 'stream';
import ExcelJS from 'exceljs';
import type { CellValue, Row, Workbook, Worksheet } from 'exceljs';
import { SourceReadError } from '@report-merge/shared';
import type { DuplicateKeyPolicy } from '@report-merge/shared';
import type { Logger } from '../logger';
import type { ExcelSourceSpec } from '../config/settings';
import { normalizeKey, normalizeValue } from './value-normalizer';
import type { RawValue } from './value-normalizer';
import { setMappingValue } from './value-mapping';

export interface ReadContext {
  /** Label for messages: the configured name or the resolved path. */
  origin: string;
  policy: DuplicateKeyPolicy;
  logger: Logger;
}

/** Flatten an exceljs cell value into something `normalizeValue` accepts. */
export function cellToRaw(value: CellValue): RawValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) {
    return value;
  }
  if ('richText' in value) {
    return value.richText.map((part) => part.text).join('');
  }
  if ('formula' in value || 'sharedFormula' in value) {
    const result = value.result;
    if (result === undefined) return null;
    return cellToRaw(result);
  }
  if ('hyperlink' in value) {
    return value.text;
  }
  if ('error' in value) {
    return value.error;
  }
  return null;
}

function cellText(row: Row, column: number | string): string {
  return normalizeValue(cellToRaw(row.getCell(column).value)).trim();
}

async function openWorkbook(bytes: Buffer, origin: string): Promise<Workbook> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.read(Readable.from(bytes));
  } catch (err) {
    throw new SourceReadError(origin, 'not a readable .xlsx workbook', { cause: err });
  }
  return workbook;
}

function selectSheet(workbook: Workbook, spec: ExcelSourceSpec, origin: string): Worksheet {
  const sheet = spec.sheet === undefined ? workbook.worksheets[0] : workbook.getWorksheet(spec.sheet);
  if (!sheet) {
    throw new SourceReadError(
      origin,
      spec.sheet === undefined ? 'workbook has no worksheets' : `sheet "${spec.sheet}" not found`,
    );
  }
  return sheet;
}

function readKeyValue(sheet: Worksheet, spec: ExcelSourceSpec, ctx: ReadContext): Map<string, string> {
  const values = new Map<string, string>();
  const origins = new Map<string, string>();
  const last = spec.lastRow ?? sheet.rowCount;

  for (let rowNumber = spec.firstRow ?? 1; rowNumber <= last; rowNumber++) {
    const row = sheet.getRow(rowNumber);
    const label = cellText(row, spec.keyColumn);
    if (label === '') continue;

    const key = normalizeKey(label);
    if (!key) {
      ctx.logger.warn({ origin: ctx.origin, row: rowNumber, label }, 'Skipping row with unusable key');
      continue;
    }
    const value = normalizeValue(cellToRaw(row.getCell(spec.valueColumn).value));
    setMappingValue(values, origins, key, value, `${ctx.origin} row ${rowNumber}`, ctx.policy);
  }
  return values;
}

function readTable(sheet: Worksheet, spec: ExcelSourceSpec, ctx: ReadContext): Map<string, string> {
  const headers = new Map<number, string>();
  sheet.getRow(spec.headerRow).eachCell((cell, column) => {
    const name = normalizeKey(normalizeValue(cellToRaw(cell.value)));
    if (name) headers.set(column, name);
  });
  if (headers.size === 0) {
    throw new SourceReadError(ctx.origin, `header row ${spec.headerRow} is empty`);
  }

  const values = new Map<string, string>();
  const origins = new Map<string, string>();
  const prefix = spec.prefix ? `${spec.prefix}_` : '';
  const last = spec.lastRow ?? sheet.rowCount;
  let index = 0;

  for (let rowNumber = spec.firstRow ?? spec.headerRow + 1; rowNumber <= last; rowNumber++) {
    const row = sheet.getRow(rowNumber);
    const cells = [...headers].map(([column, name]) => [name, cellToRaw(row.getCell(column).value)] as const);
    if (cells.every(([, raw]) => normalizeValue(raw).trim() === '')) continue;

    index++;
    for (const [name, raw] of cells) {
      const key = `${prefix}row${index}_col${name}`;
      setMappingValue(values, origins, key, normalizeValue(raw), `${ctx.origin} row ${rowNumber}`, ctx.policy);
    }
  }
  return values;
}

export async function readExcelSource(
  bytes: Buffer,
  spec: ExcelSourceSpec,
  ctx: ReadContext,
): Promise<Map<string, string>> {
  const workbook = await openWorkbook(bytes, ctx.origin);
  const sheet = selectSheet(workbook, spec, ctx.origin);
  const values = spec.layout === 'table' ? readTable(sheet, spec, ctx) : readKeyValue(sheet, spec, ctx);

  ctx.logger.debug(
    { origin: ctx.origin, sheet: sheet.name, layout: spec.layout, keys: values.size },
    'Excel source read',
  );
  return values;
}
