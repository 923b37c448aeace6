import { execFile } from 'child_process';
import type { ExecFileOptions } from 'child_process';
import { promisify } from 'util';
import { writeFileSync, readFileSync, existsSync, mkdtempSync, rmSync } from 'fs';
import { join, basename } from 'path';
import { tmpdir } from 'os';
import { pathToFileURL } from 'url';
import { ConversionError, CONVERSION_MAX_ATTEMPTS, CONVERSION_TIMEOUT_MS, DEFAULT_SOFFICE_BINARY } from '@report-merge/shared';
import { logger } from '../logger';

/** Turns a finished .docx into a PDF. */
export interface OfficeConverter {
  convertToPdf(docx: Buffer, name: string): Promise<Buffer>;
}

export type ExecFileFn = (file: string, args: string[], options: ExecFileOptions) => Promise<unknown>;

export interface SofficeConverterOptions {
  binary?: string;
  timeoutMs?: number;
  maxAttempts?: number;
  exec?: ExecFileFn;
  /** Parent directory of the per-conversion work directories. */
  tmpRoot?: string;
}

const TRANSIENT_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'EAGAIN', 'ETIMEDOUT']);

const execFileAsync = promisify(execFile);
const defaultExec: ExecFileFn = (file, args, options) => execFileAsync(file, args, options);

/** Timeouts (the child is killed) and refused or reset office connections. */
export function isTransientFailure(err: unknown): boolean {
  if (typeof err !== 'object' || err === null) return false;
  if ('killed' in err && err.killed === true) return true;
  return 'code' in err && typeof err.code === 'string' && TRANSIENT_CODES.has(err.code);
}

function describeFailure(err: unknown, binary: string): string {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    if (err.code === 'ENOENT') return `LibreOffice binary not found: ${binary}`;
    if (typeof err.code === 'number') return `${binary} exited with code ${err.code}`;
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Converts DOCX to PDF with LibreOffice headless.
 *
 * - Isolated work directory and user profile per conversion, removed afterwards
 * - Conversions run one at a time; the office process is not re-entrant
 * - Bounded by a timeout; a transient failure is retried once
 */
export class SofficeConverter implements OfficeConverter {
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly exec: ExecFileFn;
  private readonly tmpRoot: string;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: SofficeConverterOptions = {}) {
    this.binary = options.binary ?? DEFAULT_SOFFICE_BINARY;
    this.timeoutMs = options.timeoutMs ?? CONVERSION_TIMEOUT_MS;
    this.maxAttempts = options.maxAttempts ?? CONVERSION_MAX_ATTEMPTS;
    this.exec = options.exec ?? defaultExec;
    this.tmpRoot = options.tmpRoot ?? tmpdir();
  }

  convertToPdf(docx: Buffer, name: string): Promise<Buffer> {
    const run = this.queue.then(() => this.convertWithRetry(docx, name));
    // The queue only orders conversions; each caller gets its own outcome from `run`.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async convertWithRetry(docx: Buffer, name: string): Promise<Buffer> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.convertOnce(docx, name);
      } catch (err) {
        if (err instanceof ConversionError) throw err;
        if (attempt < this.maxAttempts && isTransientFailure(err)) {
          logger.warn({ name, attempt, err }, 'PDF conversion failed transiently, retrying');
          continue;
        }
        throw new ConversionError(describeFailure(err, this.binary), {
          cause: err,
          details: { name, attempts: attempt },
        });
      }
    }
  }

  private async convertOnce(docx: Buffer, name: string): Promise<Buffer> {
    const workDir = mkdtempSync(join(this.tmpRoot, 'report-merge-pdf-'));
    const stem = basename(name, '.docx').replace(/[^\p{L}\p{N}_.-]/gu, '_') || 'document';
    const inputPath = join(workDir, `${stem}.docx`);

    try {
      writeFileSync(inputPath, docx);

      await this.exec(this.binary, [
        '--headless',
        '--norestore',
        '--nofirststartwizard',
        `-env:UserInstallation=${pathToFileURL(join(workDir, 'profile')).href}`,
        '--convert-to', 'pdf',
        '--outdir', workDir,
        inputPath,
      ], {
        timeout: this.timeoutMs,
        env: {
          ...process.env,
          HOME: workDir,
        },
      });

      const pdfPath = join(workDir, `${stem}.pdf`);
      if (!existsSync(pdfPath)) {
        throw new ConversionError(`PDF conversion produced no file for ${name}`);
      }
      const pdf = readFileSync(pdfPath);
      if (pdf.length === 0) {
        throw new ConversionError(`PDF conversion produced an empty file for ${name}`);
      }

      logger.info({ name, inputSize: docx.length, outputSize: pdf.length }, 'PDF conversion successful');
      return pdf;
    } finally {
      try {
        rmSync(workDir, { recursive: true, force: true });
      } catch (cleanupErr) {
        logger.warn({ workDir, err: cleanupErr }, 'Failed to cleanup temp directory');
      }
    }
  }
}
