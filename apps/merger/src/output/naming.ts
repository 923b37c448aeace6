import { join } from 'path';
import { ConfigurationError } from '@report-merge/shared';

export interface TimestampParts {
  /** YYYYMMDD */
  date: string;
  /** HHmmss */
  time: string;
  /** YYYYMMDD_HHmmss */
  timestamp: string;
}

export interface OutputLocation {
  directory: string;
  fileName: string;
  path: string;
  /** YYYYMMDD of the merge, also used for the upload key. */
  dateFolder: string;
}

export interface OutputNamingOptions {
  outputDir: string;
  pattern: string;
  createDateFolder: boolean;
}

const PATTERN_TOKEN = /\{([a-z_]+)\}/g;

/** Local-time stamp parts of `now`. */
export function timestampParts(now: Date): TimestampParts {
  const pad = (n: number) => String(n).padStart(2, '0');
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return { date, time, timestamp: `${date}_${time}` };
}

/**
 * Expand `{timestamp}`, `{date}` and `{time}` in the naming pattern.
 * The result always ends in `.docx`.
 * @throws ConfigurationError on unknown tokens or a name with path separators.
 */
export function expandNamingPattern(pattern: string, now: Date): string {
  const parts = timestampParts(now);
  const values: Record<string, string> = {
    timestamp: parts.timestamp,
    date: parts.date,
    time: parts.time,
  };

  const name = pattern.replace(PATTERN_TOKEN, (token, field: string) => {
    const value = values[field];
    if (value === undefined) {
      throw new ConfigurationError(`Unknown token ${token} in output_naming_pattern`);
    }
    return value;
  });

  if (name.trim() === '' || /[\\/]/.test(name)) {
    throw new ConfigurationError(`output_naming_pattern must produce a plain file name, got "${name}"`);
  }
  return name.toLowerCase().endsWith('.docx') ? name : `${name}.docx`;
}

export function resolveOutputLocation(options: OutputNamingOptions, now: Date): OutputLocation {
  const dateFolder = timestampParts(now).date;
  const directory = options.createDateFolder ? join(options.outputDir, dateFolder) : options.outputDir;
  const fileName = expandNamingPattern(options.pattern, now);
  return { directory, fileName, path: join(directory, fileName), dateFolder };
}

/** `report.docx` → `report.pdf` */
export function pdfNameFor(docxName: string): string {
  return docxName.replace(/\.docx$/i, '.pdf');
}

/** Object key for an uploaded artifact: `{prefix}/{YYYYMMDD}/{file}`. */
export function uploadKey(prefix: string, dateFolder: string, fileName: string): string {
  return [prefix.replace(/^\/+|\/+$/g, ''), dateFolder, fileName].filter((segment) => segment !== '').join('/');
}
