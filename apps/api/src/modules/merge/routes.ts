/**
 * Merge API Routes
 *
 * Endpoints:
 * - POST /   Run one merge; the body holds settings overrides plus an optional `config_path`
 *
 * The body is layered over config file and environment exactly like the
 * command-line flags, so both shells run the same `merge` with the same rules.
 * Only the fields a command-line user could set are accepted; storage
 * endpoints, credentials, sources and the office binary come from the
 * server's own configuration. Unknown fields are a validation error.
 */

import { Router } from 'express';
import type { RequestHandler } from 'express';
import { performance } from 'perf_hooks';
import { z } from 'zod';
import { createDependencies, loadSettings, merge } from '@report-merge/merger';
import type { TemplateCache } from '@report-merge/merger';
import type { MergeResult } from '@report-merge/shared';
import type { Logger } from '../../shared/logger';

export const mergeRequestSchema = z
  .object({
    config_path: z.string().min(1).optional(),
    template_path: z.string().min(1).optional(),
    output_dir: z.string().min(1).optional(),
    output_naming_pattern: z.string().min(1).optional(),
    create_date_folder: z.boolean().optional(),
    use_minio: z.boolean().optional(),
    upload: z.boolean().optional(),
    convert_to_pdf: z.boolean().optional(),
    target_date: z.string().optional(),
    values: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).optional(),
    verbose: z.boolean().optional(),
  })
  .strict();

export interface MergeRequest {
  configPath?: string;
  /** Snake_case settings that win over config file and environment. */
  overrides: Record<string, unknown>;
}

export type MergeRunner = (request: MergeRequest) => Promise<MergeResult>;

export interface MergeResponse {
  success: true;
  message: string;
  output_file: string;
  pdf_file: string | null;
  upload_url: string | null;
  pdf_upload_url: string | null;
  matched: readonly string[];
  unmatched: readonly string[];
  /** Seconds. */
  processing_time: number;
}

/** Production runner: resolve settings per request, share cache and converter. */
export function createMergeRunner(shared: { templateCache: TemplateCache; logger: Logger }): MergeRunner {
  return async ({ configPath, overrides }) => {
    const settings = await loadSettings({ configPath, overrides });
    return merge(settings, createDependencies(settings, shared));
  };
}

export function formatMergeResponse(result: MergeResult, processingTime: number): MergeResponse {
  return {
    success: true,
    message: result.unmatched.length > 0
      ? `Merge completed with ${result.unmatched.length} unmatched placeholder(s)`
      : 'Merge completed',
    output_file: result.outputFile,
    pdf_file: result.pdfFile ?? null,
    upload_url: result.uploadUrl ?? null,
    pdf_upload_url: result.pdfUploadUrl ?? null,
    matched: result.matched,
    unmatched: result.unmatched,
    processing_time: Math.round(processingTime * 1000) / 1000,
  };
}

export function createMergeHandler(run: MergeRunner): RequestHandler {
  return async (req, res, next) => {
    const started = performance.now();
    try {
      const { config_path: configPath, ...overrides } = mergeRequestSchema.parse(req.body ?? {});
      const result = await run({ configPath, overrides });
      res.json(formatMergeResponse(result, (performance.now() - started) / 1000));
    } catch (err) {
      next(err);
    }
  };
}

export function createMergeRouter(run: MergeRunner): Router {
  const router = Router();
  router.post('/', createMergeHandler(run));
  return router;
}
