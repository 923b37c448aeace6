import { PLACEHOLDER_KEY_PATTERN } from '@report-merge/shared';

export type RawValue = string | number | boolean | Date | null | undefined;

// Characters XML 1.0 cannot carry, even escaped.
const XML_ILLEGAL = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Spreadsheet dates carry no zone and come back from exceljs as UTC
 * instants, so they are formatted in UTC.
 */
export function formatDate(date: Date): string {
  const day = `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  const hasTime = date.getUTCHours() !== 0 || date.getUTCMinutes() !== 0 || date.getUTCSeconds() !== 0;
  return hasTime
    ? `${day} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
    : day;
}

function formatNumber(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  if (Number.isInteger(value)) {
    return String(value);
  }
  // 0.1 + 0.2 style float noise disappears at 12 significant digits
  return String(Number(value.toPrecision(12)));
}

/** Render a source value as replacement text. */
export function normalizeValue(raw: RawValue): string {
  if (raw === null || raw === undefined) {
    return '';
  }
  if (raw instanceof Date) {
    return Number.isNaN(raw.getTime()) ? '' : formatDate(raw);
  }
  if (typeof raw === 'number') {
    return formatNumber(raw);
  }
  if (typeof raw === 'boolean') {
    return raw ? 'true' : 'false';
  }
  return raw.replace(/\r\n?/g, '\n').replace(XML_ILLEGAL, '');
}

/**
 * Turn a label such as ` Total Revenue ` into `Total_Revenue`.
 * Returns null when the result could not appear inside a placeholder.
 */
export function normalizeKey(raw: string): string | null {
  const key = raw.trim().replace(/\s+/g, '_');
  return PLACEHOLDER_KEY_PATTERN.test(key) ? key : null;
}
