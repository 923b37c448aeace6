// === Application Constants ===

export const APP_NAME = 'Report Merge';
export const APP_VERSION = '0.1.0';

// === Placeholders ===

/** Placeholder keys: letters, digits, `_`, `.` and `-`. */
export const PLACEHOLDER_KEY_PATTERN = /^[\p{L}\p{M}\p{N}_.-]+$/u;

const PLACEHOLDER_SOURCE = '\\{\\{[ \\u00a0]*([\\p{L}\\p{M}\\p{N}_.-]+)[ \\u00a0]*\\}\\}';

/**
 * Returns a fresh global matcher for `{{ key }}` tokens.
 * Global regexes carry `lastIndex`, so callers never share one.
 */
export function createPlaceholderPattern(): RegExp {
  return new RegExp(PLACEHOLDER_SOURCE, 'gu');
}

// === Output ===

export const DEFAULT_OUTPUT_DIR = 'output';
export const DEFAULT_OUTPUT_NAMING_PATTERN = 'report_{timestamp}.docx';
export const DEFAULT_UPLOAD_PREFIX = 'reports';

export const DOCX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
export const PDF_CONTENT_TYPE = 'application/pdf';

// === Object Storage ===

export const DEFAULT_MINIO_BUCKET = 'report';
export const DEFAULT_MINIO_REGION = 'us-east-1';
export const PRESIGNED_URL_EXPIRY_SECONDS = 3600; // 1 hour

// === Conversion ===

export const CONVERSION_TIMEOUT_MS = 60_000;
export const CONVERSION_MAX_ATTEMPTS = 2;
export const DEFAULT_SOFFICE_BINARY = 'soffice';

// === Service ===

export const DEFAULT_API_HOST = '127.0.0.1';
export const DEFAULT_API_PORT = 8000;
