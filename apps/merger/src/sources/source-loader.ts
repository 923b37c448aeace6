import { readFile } from 'fs/promises';
import { basename } from 'path';
import { SourceReadError, isMergeError } from '@report-merge/shared';
import type { DuplicateKeyPolicy } from '@report-merge/shared';
import type { SourceSpec } from '../config/settings';
import type { Logger } from '../logger';
import type { ObjectStore } from '../storage/object-store';
import { readExcelSource } from './excel-reader';
import type { ReadContext } from './excel-reader';
import { readPdfSource } from './pdf-reader';
import { readWordSource } from './word-reader';
import type { SourceValues, TargetMonth } from './value-mapping';
import { formatYearMonth } from './value-mapping';

export interface SourceLoadOptions {
  target: TargetMonth;
  policy: DuplicateKeyPolicy;
  logger: Logger;
  /** When set, source paths are object keys in this store. */
  store?: ObjectStore;
}

/** Expand `{year}`, `{month}` and `{yyyymm}` in a source path. */
export function expandSourcePath(path: string, target: TargetMonth): string {
  const month = String(target.month).padStart(2, '0');
  return path
    .replaceAll('{year}', String(target.year))
    .replaceAll('{month}', month)
    .replaceAll('{yyyymm}', formatYearMonth(target));
}

async function fetchBytes(location: string, options: SourceLoadOptions): Promise<Buffer> {
  try {
    return options.store ? await options.store.get(location) : await readFile(location);
  } catch (err) {
    const where = options.store ? 'object storage' : 'disk';
    throw new SourceReadError(location, `cannot read from ${where}`, { cause: err });
  }
}

function readValues(bytes: Buffer, spec: SourceSpec, ctx: ReadContext): Promise<Map<string, string>> {
  switch (spec.type) {
    case 'excel':
      return readExcelSource(bytes, spec, ctx);
    case 'pdf':
      return readPdfSource(bytes, spec, ctx);
    case 'word':
      return readWordSource(bytes, spec, ctx);
  }
}

export async function readSource(spec: SourceSpec, options: SourceLoadOptions): Promise<SourceValues> {
  const location = expandSourcePath(spec.path, options.target);
  const origin = spec.name ?? basename(location);
  const bytes = await fetchBytes(location, options);
  const ctx = { origin, policy: options.policy, logger: options.logger };

  try {
    return { origin, values: await readValues(bytes, spec, ctx) };
  } catch (err) {
    if (isMergeError(err)) throw err;
    throw new SourceReadError(origin, 'unexpected failure while reading', { cause: err });
  }
}

/** Read every configured source, in order. */
export async function readSources(specs: readonly SourceSpec[], options: SourceLoadOptions): Promise<SourceValues[]> {
  const results: SourceValues[] = [];
  for (const spec of specs) {
    results.push(await readSource(spec, options));
  }
  return results;
}
