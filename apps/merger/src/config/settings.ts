/**
 * Merge Settings
 *
 * Resolves the settings of one merge from three layers, later layers winning:
 * 1. JSON config file (`config.json` in the working directory unless a path is given)
 * 2. Environment variables (MINIO_*, TEMPLATE_PATH, OUTPUT_DIR, SOFFICE_PATH)
 * 3. Explicit overrides (command-line flags or an HTTP request body)
 *
 * The merged snake_case document is validated with zod and handed to the
 * pipeline as camelCase `MergeSettings`.
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { z } from 'zod';
import {
  ConfigurationError,
  CONVERSION_TIMEOUT_MS,
  DEFAULT_MINIO_BUCKET,
  DEFAULT_MINIO_REGION,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_OUTPUT_NAMING_PATTERN,
  DEFAULT_SOFFICE_BINARY,
  DEFAULT_UPLOAD_PREFIX,
  PLACEHOLDER_KEY_PATTERN,
} from '@report-merge/shared';
import type { DuplicateKeyPolicy } from '@report-merge/shared';

export const DEFAULT_CONFIG_FILE = 'config.json';

// ── Source descriptors ──────────────────────────────────────────────

const keySchema = z.string().regex(PLACEHOLDER_KEY_PATTERN, 'must be a valid placeholder key');

const columnSchema = z.union([
  z.number().int().positive(),
  z.string().regex(/^[A-Za-z]{1,3}$/, 'must be a column letter'),
]);

const excelSourceSchema = z
  .object({
    type: z.literal('excel'),
    path: z.string().min(1),
    name: z.string().optional(),
    sheet: z.string().optional(),
    layout: z.enum(['key_value', 'table']).default('key_value'),
    key_column: columnSchema.default('A'),
    value_column: columnSchema.default('B'),
    header_row: z.number().int().positive().default(1),
    first_row: z.number().int().positive().optional(),
    last_row: z.number().int().positive().optional(),
    prefix: keySchema.optional(),
  })
  .transform((s) => ({
    type: s.type,
    path: s.path,
    name: s.name,
    sheet: s.sheet,
    layout: s.layout,
    keyColumn: s.key_column,
    valueColumn: s.value_column,
    headerRow: s.header_row,
    firstRow: s.first_row,
    lastRow: s.last_row,
    prefix: s.prefix,
  }));

const ruleBase = {
  key: keySchema,
  optional: z.boolean().default(false),
};

const pdfRuleSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('label'), label: z.string().min(1), ...ruleBase }),
  z.object({
    kind: z.literal('line'),
    page: z.number().int().positive().default(1),
    line: z.number().int().positive(),
    ...ruleBase,
  }),
  z.object({
    kind: z.literal('pattern'),
    pattern: z.string().min(1).refine(isValidPattern, 'must be a valid regular expression'),
    flags: z.string().regex(/^[imsu]*$/).default(''),
    ...ruleBase,
  }),
  z.object({ kind: z.literal('text'), page: z.number().int().positive().optional(), ...ruleBase }),
]);

const pdfSourceSchema = z.object({
  type: z.literal('pdf'),
  path: z.string().min(1),
  name: z.string().optional(),
  rules: z.array(pdfRuleSchema).min(1),
});

const wordSourceSchema = z
  .object({
    type: z.literal('word'),
    path: z.string().min(1),
    name: z.string().optional(),
    layout: z.enum(['table', 'key_value', 'text']).default('table'),
    /** Target key of the `text` layout. */
    key: keySchema.optional(),
    /** 1-based, in document order. */
    table: z.number().int().positive().default(1),
    header_row: z.number().int().positive().default(1),
    key_column: z.number().int().positive().default(1),
    value_column: z.number().int().positive().default(2),
    prefix: keySchema.optional(),
  })
  .refine((s) => s.layout !== 'text' || s.key !== undefined, {
    message: 'key is required for the text layout',
    path: ['key'],
  })
  .transform((s) => ({
    type: s.type,
    path: s.path,
    name: s.name,
    layout: s.layout,
    key: s.key,
    table: s.table,
    headerRow: s.header_row,
    keyColumn: s.key_column,
    valueColumn: s.value_column,
    prefix: s.prefix,
  }));

const sourceSchema = z.union([excelSourceSchema, pdfSourceSchema, wordSourceSchema]);

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

// ── Settings document ───────────────────────────────────────────────

const scalarValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const settingsSchema = z.object({
  template_path: z.string({ required_error: 'template_path is required' }).min(1),
  output_dir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
  output_naming_pattern: z.string().min(1).default(DEFAULT_OUTPUT_NAMING_PATTERN),
  create_date_folder: z.boolean().default(true),
  target_date: z
    .string()
    .regex(/^\d{4}(0[1-9]|1[0-2])$/, 'target_date must be YYYYMM')
    .optional(),
  use_minio: z.boolean().default(false),
  upload: z.boolean().default(false),
  upload_prefix: z.string().default(DEFAULT_UPLOAD_PREFIX),
  convert_to_pdf: z.boolean().default(false),
  minio_endpoint: z.string().min(1).optional(),
  minio_secure: z.boolean().default(false),
  minio_region: z.string().min(1).default(DEFAULT_MINIO_REGION),
  minio_bucket: z.string().min(1).default(DEFAULT_MINIO_BUCKET),
  minio_credentials: z
    .object({
      access_key: z.string().min(1),
      secret_key: z.string().min(1),
    })
    .optional(),
  duplicate_keys: z.enum(['error', 'override']).default('error'),
  builtins: z.boolean().default(true),
  values: z.record(keySchema, scalarValueSchema).default({}),
  sources: z.array(sourceSchema).default([]),
  office: z
    .object({
      binary: z.string().min(1).default(DEFAULT_SOFFICE_BINARY),
      timeout_ms: z.number().int().positive().default(CONVERSION_TIMEOUT_MS),
    })
    .default({}),
  verbose: z.boolean().default(false),
});

export type SettingsDocument = z.input<typeof settingsSchema>;
export type SourceSpec = z.output<typeof sourceSchema>;
export type ExcelSourceSpec = z.output<typeof excelSourceSchema>;
export type PdfSourceSpec = z.output<typeof pdfSourceSchema>;
export type WordSourceSpec = z.output<typeof wordSourceSchema>;
export type PdfRule = z.output<typeof pdfRuleSchema>;
export type ScalarValue = z.output<typeof scalarValueSchema>;

export interface MinioSettings {
  endpoint: string;
  region: string;
  bucket: string;
  accessKey: string;
  secretKey: string;
}

export interface MergeSettings {
  templatePath: string;
  outputDir: string;
  outputNamingPattern: string;
  createDateFolder: boolean;
  /** Report month as YYYYMM; the previous month when absent. */
  targetDate?: string;
  /** Read sources from object storage instead of the local file system. */
  useMinio: boolean;
  upload: boolean;
  uploadPrefix: string;
  convertToPdf: boolean;
  /** Present whenever `useMinio` or `upload` is on. */
  minio?: MinioSettings;
  duplicateKeys: DuplicateKeyPolicy;
  builtins: boolean;
  values: Record<string, ScalarValue>;
  sources: SourceSpec[];
  office: { binary: string; timeoutMs: number };
  verbose: boolean;
}

// ── Parsing ─────────────────────────────────────────────────────────

/**
 * Validate a merged settings document.
 * @throws ConfigurationError on schema violations or when object storage
 *   is enabled without an endpoint and credentials.
 */
export function parseSettings(raw: unknown): MergeSettings {
  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? `${first.path.join('.')}: ` : '';
    throw new ConfigurationError(`Invalid configuration: ${where}${first?.message ?? 'unknown issue'}`, {
      details: { issues: parsed.error.issues },
      cause: parsed.error,
    });
  }

  const doc = parsed.data;
  let minio: MinioSettings | undefined;

  if (doc.minio_endpoint && doc.minio_credentials) {
    minio = {
      endpoint: endpointUrl(doc.minio_endpoint, doc.minio_secure),
      region: doc.minio_region,
      bucket: doc.minio_bucket,
      accessKey: doc.minio_credentials.access_key,
      secretKey: doc.minio_credentials.secret_key,
    };
  } else if (doc.use_minio || doc.upload) {
    const missing = doc.minio_endpoint ? 'minio_credentials' : 'minio_endpoint';
    throw new ConfigurationError(`Object storage is enabled but ${missing} is not set`, {
      details: { missing },
    });
  }

  return {
    templatePath: doc.template_path,
    outputDir: doc.output_dir,
    outputNamingPattern: doc.output_naming_pattern,
    createDateFolder: doc.create_date_folder,
    targetDate: doc.target_date,
    useMinio: doc.use_minio,
    upload: doc.upload,
    uploadPrefix: doc.upload_prefix,
    convertToPdf: doc.convert_to_pdf,
    minio,
    duplicateKeys: doc.duplicate_keys,
    builtins: doc.builtins,
    values: doc.values,
    sources: doc.sources,
    office: { binary: doc.office.binary, timeoutMs: doc.office.timeout_ms },
    verbose: doc.verbose,
  };
}

/** `host:port` endpoints get a scheme from `minio_secure`. */
export function endpointUrl(endpoint: string, secure: boolean): string {
  if (/^https?:\/\//i.test(endpoint)) {
    return endpoint;
  }
  return `${secure ? 'https' : 'http'}://${endpoint}`;
}

// ── Layers ──────────────────────────────────────────────────────────

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively merge `override` into `base`. Objects merge key by key;
 * arrays and scalars replace; `undefined` leaves the base untouched.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

function parseBoolean(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/** Settings layer contributed by the environment. */
export function settingsFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const layer: Record<string, unknown> = {};
  const credentials: Record<string, unknown> = {};

  if (env.TEMPLATE_PATH) layer.template_path = env.TEMPLATE_PATH;
  if (env.OUTPUT_DIR) layer.output_dir = env.OUTPUT_DIR;
  if (env.MINIO_ENDPOINT) layer.minio_endpoint = env.MINIO_ENDPOINT;
  if (env.MINIO_SECURE) layer.minio_secure = parseBoolean(env.MINIO_SECURE);
  if (env.MINIO_REGION) layer.minio_region = env.MINIO_REGION;
  const bucket = env.MINIO_BUCKET ?? env.MINIO_BUCKET_NAME;
  if (bucket) layer.minio_bucket = bucket;
  if (env.USE_MINIO) layer.use_minio = parseBoolean(env.USE_MINIO);
  if (env.MINIO_ACCESS_KEY) credentials.access_key = env.MINIO_ACCESS_KEY;
  if (env.MINIO_SECRET_KEY) credentials.secret_key = env.MINIO_SECRET_KEY;
  if (Object.keys(credentials).length > 0) layer.minio_credentials = credentials;
  if (env.SOFFICE_PATH) layer.office = { binary: env.SOFFICE_PATH };

  return layer;
}

async function readConfigFile(path: string, required: boolean): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    const missing = isPlainObject(err) && err.code === 'ENOENT';
    if (missing && !required) {
      return {};
    }
    throw new ConfigurationError(`Cannot read config file ${path}`, { cause: err, details: { path } });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Config file ${path} is not valid JSON`, { cause: err, details: { path } });
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file ${path} must contain a JSON object`, { details: { path } });
  }
  return parsed;
}

export interface LoadSettingsOptions {
  /** Explicit config file; it must exist. */
  configPath?: string;
  /** Snake_case settings that win over file and environment. */
  overrides?: Record<string, unknown>;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export async function loadSettings(options: LoadSettingsOptions = {}): Promise<MergeSettings> {
  const cwd = options.cwd ?? process.cwd();
  const path = resolve(cwd, options.configPath ?? DEFAULT_CONFIG_FILE);
  const fileLayer = await readConfigFile(path, options.configPath !== undefined);
  const envLayer = settingsFromEnv(options.env ?? process.env);

  const merged = deepMerge(deepMerge(fileLayer, envLayer), options.overrides ?? {});
  return parseSettings(merged);
}
