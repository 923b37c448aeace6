/**
 * Merge Pipeline
 *
 * The one entry point both invocation shells call:
 * load template → read sources → build value mapping → scan → substitute → materialize.
 * Every merge works on its own parsed copy of the template; only the
 * converter and the template cache are shared between merges.
 */

import { randomUUID } from 'crypto';
import { readFile } from 'fs/promises';
import { performance } from 'perf_hooks';
import { ConfigurationError, TemplateError } from '@report-merge/shared';
import type { MergeResult, SubstitutionOutcome, ValueMapping } from '@report-merge/shared';
import type { TemplateCache } from '../cache/template-cache';
import type { MergeSettings } from '../config/settings';
import { logger as rootLogger } from '../logger';
import type { Logger } from '../logger';
import { addUnmatchedPlaceholders, incMergeRuns, observeMergeDuration } from '../metrics/merge-metrics';
import { materialize } from '../output/materializer';
import { SofficeConverter } from '../renderers/pdf-converter';
import type { OfficeConverter } from '../renderers/pdf-converter';
import { readSources } from '../sources/source-loader';
import { buildValueMapping, builtinValues, formatYearMonth, resolveTargetMonth } from '../sources/value-mapping';
import { S3ObjectStore } from '../storage/object-store';
import type { ObjectStore } from '../storage/object-store';
import { TemplateDocument } from '../template/docx-document';
import { placeholderKeys, scanTemplate } from '../template/token-scanner';
import { substituteTokens } from '../template/substitution';

export interface MergeDependencies {
  converter?: OfficeConverter;
  store?: ObjectStore;
  templateCache?: TemplateCache;
  logger?: Logger;
  /** Clock used for naming and built-in values. */
  now?: () => Date;
}

export interface VariableReport {
  matched: readonly string[];
  missing: readonly string[];
  /** Mapped keys no placeholder asked for. */
  unused: readonly string[];
}

const converters = new Map<string, SofficeConverter>();

/**
 * One converter per binary and timeout for the whole process, so concurrent
 * merges share its conversion queue.
 */
function sharedConverter(binary: string, timeoutMs: number): SofficeConverter {
  const key = `${binary}:${timeoutMs}`;
  let converter = converters.get(key);
  if (!converter) {
    converter = new SofficeConverter({ binary, timeoutMs });
    converters.set(key, converter);
  }
  return converter;
}

/** Production collaborators for `settings`. */
export function createDependencies(
  settings: MergeSettings,
  shared: Pick<MergeDependencies, 'templateCache' | 'logger'> = {},
): MergeDependencies {
  return {
    ...shared,
    converter: settings.convertToPdf ? sharedConverter(settings.office.binary, settings.office.timeoutMs) : undefined,
    store: settings.minio ? S3ObjectStore.fromSettings(settings.minio) : undefined,
  };
}

async function loadTemplateBytes(path: string, cache: TemplateCache | undefined): Promise<Buffer> {
  if (cache) {
    return cache.load(path);
  }
  try {
    return await readFile(path);
  } catch (err) {
    throw new TemplateError(path, 'cannot read template', { cause: err });
  }
}

export function buildVariableReport(outcome: SubstitutionOutcome, mapping: ValueMapping): VariableReport {
  const used = new Set([...outcome.matched, ...outcome.unmatched]);
  return {
    matched: [...outcome.matched],
    missing: [...outcome.unmatched],
    unused: [...mapping.keys()].filter((key) => !used.has(key)).sort(),
  };
}

export function formatVariableReport(report: VariableReport): string {
  const section = (title: string, keys: readonly string[]) =>
    `${title} (${keys.length})${keys.length > 0 ? `\n${keys.map((key) => `  - ${key}`).join('\n')}` : ''}`;
  return [
    section('Matched', report.matched),
    section('Missing', report.missing),
    section('Unused', report.unused),
  ].join('\n');
}

export async function merge(settings: MergeSettings, deps: MergeDependencies = {}): Promise<MergeResult> {
  const started = performance.now();
  const log = (deps.logger ?? rootLogger).child(
    { mergeId: randomUUID() },
    settings.verbose ? { level: 'debug' } : {},
  );

  try {
    const now = deps.now?.() ?? new Date();
    const target = resolveTargetMonth(settings.targetDate, now);
    log.info(
      { template: settings.templatePath, sources: settings.sources.length, target: formatYearMonth(target) },
      'Merge started',
    );

    if (settings.useMinio && !deps.store) {
      throw new ConfigurationError('use_minio is set but no object store is configured');
    }

    const templateBytes = await loadTemplateBytes(settings.templatePath, deps.templateCache);
    const document = TemplateDocument.load(templateBytes, settings.templatePath);

    const sources = await readSources(settings.sources, {
      target,
      policy: settings.duplicateKeys,
      logger: log,
      store: settings.useMinio ? deps.store : undefined,
    });
    const mapping = buildValueMapping({
      builtins: settings.builtins ? builtinValues(target, now) : undefined,
      sources,
      inline: settings.values,
      policy: settings.duplicateKeys,
    });

    const tokens = scanTemplate(document);
    const outcome = substituteTokens(document, tokens, mapping);
    log.info(
      { placeholders: tokens.length, replaced: outcome.replaced, unmatched: outcome.unmatched },
      'Placeholders substituted',
    );
    const report = buildVariableReport(outcome, mapping);
    log.debug({ report }, 'Variable report');

    const written = await materialize(document, outcome, {
      outputDir: settings.outputDir,
      namingPattern: settings.outputNamingPattern,
      createDateFolder: settings.createDateFolder,
      convertToPdf: settings.convertToPdf,
      upload: settings.upload,
      uploadPrefix: settings.uploadPrefix,
      logger: log,
      converter: deps.converter,
      store: deps.store,
      now,
    });
    const result: MergeResult = Object.freeze({ ...written, unused: Object.freeze([...report.unused]) });

    addUnmatchedPlaceholders(result.unmatched.length);
    incMergeRuns('success');
    log.info({ outputFile: result.outputFile, durationMs: Math.round(performance.now() - started) }, 'Merge completed');
    return result;
  } catch (err) {
    incMergeRuns('failed');
    log.error({ err }, 'Merge failed');
    throw err;
  } finally {
    observeMergeDuration((performance.now() - started) / 1000);
  }
}

/** Unique placeholder keys of a template, in document order. */
export async function inspectTemplate(path: string, cache?: TemplateCache): Promise<string[]> {
  const document = TemplateDocument.load(await loadTemplateBytes(path, cache), path);
  return placeholderKeys(scanTemplate(document));
}
