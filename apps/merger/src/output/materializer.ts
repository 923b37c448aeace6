/**
 * Output Materializer
 *
 * Turns a substituted document into files: name it, convert it when a PDF
 * is requested, write the results, then upload them when asked. Conversion
 * happens before anything is written, and every file is written under a
 * temporary name and renamed into place, so a failed merge leaves no
 * partial output behind. A failed upload keeps the local files.
 */

import { randomUUID } from 'crypto';
import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { ConfigurationError, DOCX_CONTENT_TYPE, PDF_CONTENT_TYPE, UploadError } from '@report-merge/shared';
import type { MergeResult, SubstitutionOutcome } from '@report-merge/shared';
import type { Logger } from '../logger';
import { incConversions, incUploads } from '../metrics/merge-metrics';
import type { OfficeConverter } from '../renderers/pdf-converter';
import type { ObjectStore } from '../storage/object-store';
import type { TemplateDocument } from '../template/docx-document';
import { pdfNameFor, resolveOutputLocation, uploadKey } from './naming';
import type { OutputLocation } from './naming';

export interface MaterializeOptions {
  outputDir: string;
  namingPattern: string;
  createDateFolder: boolean;
  convertToPdf: boolean;
  upload: boolean;
  uploadPrefix: string;
  logger: Logger;
  converter?: OfficeConverter;
  store?: ObjectStore;
  now?: Date;
}

interface PendingFile {
  path: string;
  bytes: Buffer;
}

/**
 * Stage every file under a temporary name, then rename them into place.
 * On any failure the staged files and those already renamed are removed.
 */
async function writeAllOrNothing(files: readonly PendingFile[]): Promise<void> {
  const staged = files.map((file) => ({ ...file, temporary: `${file.path}.${randomUUID()}.tmp` }));
  const committed: string[] = [];
  try {
    for (const file of staged) {
      await writeFile(file.temporary, file.bytes);
    }
    for (const file of staged) {
      await rename(file.temporary, file.path);
      committed.push(file.path);
    }
  } catch (err) {
    await Promise.all([
      ...staged.map((file) => rm(file.temporary, { force: true })),
      ...committed.map((path) => rm(path, { force: true })),
    ]);
    throw err;
  }
}

async function convert(docx: Buffer, location: OutputLocation, options: MaterializeOptions): Promise<Buffer> {
  if (!options.converter) {
    throw new ConfigurationError('PDF output requested but no office converter is configured');
  }
  try {
    const pdf = await options.converter.convertToPdf(docx, location.fileName);
    incConversions('success');
    return pdf;
  } catch (err) {
    incConversions('failed');
    throw err;
  }
}

interface UploadedUrls {
  uploadUrl: string;
  pdfUploadUrl?: string;
}

async function upload(
  docx: Buffer,
  pdf: Buffer | undefined,
  location: OutputLocation,
  options: MaterializeOptions,
): Promise<UploadedUrls> {
  if (!options.store) {
    throw new ConfigurationError('Upload requested but no object store is configured');
  }
  const docxKey = uploadKey(options.uploadPrefix, location.dateFolder, location.fileName);
  try {
    const uploadUrl = await options.store.put(docxKey, docx, DOCX_CONTENT_TYPE);
    let pdfUploadUrl: string | undefined;
    if (pdf) {
      const pdfKey = uploadKey(options.uploadPrefix, location.dateFolder, pdfNameFor(location.fileName));
      pdfUploadUrl = await options.store.put(pdfKey, pdf, PDF_CONTENT_TYPE);
    }
    incUploads('success');
    options.logger.info({ key: docxKey }, 'Output uploaded');
    return pdfUploadUrl ? { uploadUrl, pdfUploadUrl } : { uploadUrl };
  } catch (err) {
    incUploads('failed');
    options.logger.warn({ key: docxKey, outputFile: location.path, err }, 'Upload failed, local output kept');
    const reason = err instanceof Error ? err.message : String(err);
    throw new UploadError(`Upload of ${location.fileName} failed: ${reason}`, location.path, {
      cause: err,
      details: { key: docxKey },
    });
  }
}

export async function materialize(
  document: TemplateDocument,
  outcome: SubstitutionOutcome,
  options: MaterializeOptions,
): Promise<MergeResult> {
  const now = options.now ?? new Date();
  const location = resolveOutputLocation(
    { outputDir: options.outputDir, pattern: options.namingPattern, createDateFolder: options.createDateFolder },
    now,
  );

  const docx = document.toBuffer();
  const pdf = options.convertToPdf ? await convert(docx, location, options) : undefined;
  const pdfPath = pdf ? location.path.replace(/\.docx$/i, '.pdf') : undefined;

  await mkdir(location.directory, { recursive: true });
  const files: PendingFile[] = [{ path: location.path, bytes: docx }];
  if (pdf && pdfPath) {
    files.push({ path: pdfPath, bytes: pdf });
  }
  await writeAllOrNothing(files);
  options.logger.info({ outputFile: location.path, size: docx.length, pdfFile: pdfPath }, 'Output written');

  const urls = options.upload ? await upload(docx, pdf, location, options) : undefined;

  return Object.freeze({
    outputFile: location.path,
    ...(pdfPath ? { pdfFile: pdfPath } : {}),
    size: docx.length,
    matched: Object.freeze([...outcome.matched]),
    unmatched: Object.freeze([...outcome.unmatched]),
    ...urls,
    createdAt: now.toISOString(),
  });
}
