/**
 * Value mapping assembly.
 *
 * Layers, lowest first:
 * 1. built-in values (report_date, year, month); any source may shadow them
 * 2. configured sources, in order; a key supplied twice follows the
 *    duplicate-key policy
 * 3. inline `values` from settings, which always win
 */

import { DuplicateKeyError } from '@report-merge/shared';
import type { DuplicateKeyPolicy, ValueMapping } from '@report-merge/shared';
import { normalizeValue } from './value-normalizer';
import type { RawValue } from './value-normalizer';

export interface TargetMonth {
  year: number;
  /** 1-12 */
  month: number;
}

export interface SourceValues {
  /** File or object the values came from, for error messages. */
  origin: string;
  values: ReadonlyMap<string, string>;
}

/**
 * Insert `key` into `map`, tracking where each key came from.
 * @throws DuplicateKeyError when the key exists and the policy is `error`.
 */
export function setMappingValue(
  map: Map<string, string>,
  origins: Map<string, string>,
  key: string,
  value: string,
  origin: string,
  policy: DuplicateKeyPolicy,
): void {
  const previous = origins.get(key);
  if (previous !== undefined && policy === 'error') {
    throw new DuplicateKeyError(key, previous, origin);
  }
  map.set(key, value);
  origins.set(key, origin);
}

/** `YYYYMM` when given, otherwise the month before `now`. */
export function resolveTargetMonth(targetDate: string | undefined, now: Date): TargetMonth {
  if (targetDate) {
    return { year: Number(targetDate.slice(0, 4)), month: Number(targetDate.slice(4, 6)) };
  }
  const previous = new Date(now.getFullYear(), now.getMonth() - 1, 1);
  return { year: previous.getFullYear(), month: previous.getMonth() + 1 };
}

export function formatYearMonth(target: TargetMonth): string {
  return `${target.year}${String(target.month).padStart(2, '0')}`;
}

function localDate(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

export function builtinValues(target: TargetMonth, now: Date): Map<string, string> {
  return new Map([
    ['report_date', localDate(now)],
    ['year', String(target.year)],
    ['month', String(target.month).padStart(2, '0')],
  ]);
}

export interface BuildMappingInput {
  builtins?: ReadonlyMap<string, string>;
  sources: readonly SourceValues[];
  inline?: Readonly<Record<string, RawValue>>;
  policy: DuplicateKeyPolicy;
}

export function buildValueMapping(input: BuildMappingInput): ValueMapping {
  const mapping = new Map(input.builtins ?? []);
  const origins = new Map<string, string>();

  for (const source of input.sources) {
    for (const [key, value] of source.values) {
      setMappingValue(mapping, origins, key, value, source.origin, input.policy);
    }
  }

  for (const [key, value] of Object.entries(input.inline ?? {})) {
    mapping.set(key, normalizeValue(value));
  }

  return mapping;
}
