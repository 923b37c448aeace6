import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { isMergeError, UploadError } from '@report-merge/shared';
import type { MergeErrorCode } from '@report-merge/shared';
import { logger } from '../shared/logger';

/** Request-level failures that are not merge failures, e.g. unknown routes. */
export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(method: string, path: string) {
    super(404, `No route for ${method} ${path}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

const MERGE_ERROR_STATUS: Record<MergeErrorCode, number> = {
  CONFIGURATION_ERROR: 400,
  DUPLICATE_KEY: 409,
  SOURCE_READ_ERROR: 422,
  TEMPLATE_ERROR: 422,
  CONVERSION_ERROR: 502,
  UPLOAD_ERROR: 502,
};

export function statusForMergeError(code: MergeErrorCode): number {
  return MERGE_ERROR_STATUS[code];
}

interface ErrorEnvelope {
  success: false;
  message: string;
  error: string;
  code: string;
  details?: Record<string, unknown>;
  output_file?: string;
}

/** body-parser rejects malformed JSON with a 4xx `status` on the error. */
function clientStatus(err: Error): number | undefined {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return undefined;
}

function send(res: Response, status: number, envelope: ErrorEnvelope): void {
  res.status(status).json(envelope);
}

/**
 * Global error handler middleware.
 * Every failure leaves as `{ success: false, message, error, code, details }`.
 */
export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (isMergeError(err)) {
    const status = statusForMergeError(err.code);
    if (status >= 500) {
      logger.error({ err, code: err.code }, 'Merge failed');
    } else {
      logger.warn({ code: err.code, message: err.message }, 'Merge rejected');
    }
    send(res, status, {
      success: false,
      message: err.message,
      error: err.name,
      code: err.code,
      details: err.details,
      ...(err instanceof UploadError ? { output_file: err.outputFile } : {}),
    });
    return;
  }

  if (err instanceof AppError) {
    send(res, err.statusCode, {
      success: false,
      message: err.message,
      error: err.name,
      code: err.code,
      details: err.details,
    });
    return;
  }

  if (err instanceof ZodError) {
    send(res, 400, {
      success: false,
      message: 'Request validation failed',
      error: 'ValidationError',
      code: 'VALIDATION_ERROR',
      details: { issues: err.issues },
    });
    return;
  }

  const status = clientStatus(err);
  if (status !== undefined) {
    send(res, status, {
      success: false,
      message: err.message,
      error: err.name,
      code: 'INVALID_REQUEST',
    });
    return;
  }

  // Unexpected errors
  logger.error({ err }, 'Unhandled error');
  send(res, 500, {
    success: false,
    message: 'An unexpected error occurred',
    error: err.name,
    code: 'INTERNAL_ERROR',
  });
}
