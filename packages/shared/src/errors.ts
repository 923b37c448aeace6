export type MergeErrorCode =
  | 'SOURCE_READ_ERROR'
  | 'TEMPLATE_ERROR'
  | 'DUPLICATE_KEY'
  | 'CONVERSION_ERROR'
  | 'UPLOAD_ERROR'
  | 'CONFIGURATION_ERROR';

interface MergeErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base class for every failure that aborts a merge.
 * Each subclass carries a stable `code` the invocation shells map to
 * exit codes and HTTP statuses.
 */
export class MergeError extends Error {
  public readonly details?: Record<string, unknown>;

  constructor(
    public readonly code: MergeErrorCode,
    message: string,
    options: MergeErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'MergeError';
    this.details = options.details;
  }
}

/** A source file cannot be opened or does not match its configured layout. */
export class SourceReadError extends MergeError {
  constructor(public readonly source: string, message: string, options: MergeErrorOptions = {}) {
    super('SOURCE_READ_ERROR', `${source}: ${message}`, {
      ...options,
      details: { source, ...options.details },
    });
    this.name = 'SourceReadError';
  }
}

/** The template is missing or is not a usable .docx package. */
export class TemplateError extends MergeError {
  constructor(public readonly templatePath: string, message: string, options: MergeErrorOptions = {}) {
    super('TEMPLATE_ERROR', `${templatePath}: ${message}`, {
      ...options,
      details: { templatePath, ...options.details },
    });
    this.name = 'TemplateError';
  }
}

/** Two sources supply the same key while the policy is `error`. */
export class DuplicateKeyError extends MergeError {
  constructor(
    public readonly key: string,
    public readonly firstOrigin: string,
    public readonly secondOrigin: string,
  ) {
    super('DUPLICATE_KEY', `Key "${key}" is supplied by both ${firstOrigin} and ${secondOrigin}`, {
      details: { key, firstOrigin, secondOrigin },
    });
    this.name = 'DuplicateKeyError';
  }
}

/** The office converter failed, timed out twice, or produced nothing. */
export class ConversionError extends MergeError {
  constructor(message: string, options: MergeErrorOptions = {}) {
    super('CONVERSION_ERROR', message, options);
    this.name = 'ConversionError';
  }
}

/** Upload to object storage failed; `outputFile` stays on disk. */
export class UploadError extends MergeError {
  constructor(
    message: string,
    public readonly outputFile: string,
    options: MergeErrorOptions = {},
  ) {
    super('UPLOAD_ERROR', message, {
      ...options,
      details: { outputFile, ...options.details },
    });
    this.name = 'UploadError';
  }
}

export class ConfigurationError extends MergeError {
  constructor(message: string, options: MergeErrorOptions = {}) {
    super('CONFIGURATION_ERROR', message, options);
    this.name = 'ConfigurationError';
  }
}

export function isMergeError(err: unknown): err is MergeError {
  return err instanceof MergeError;
}
