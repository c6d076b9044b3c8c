/**
 * Error types raised by sitemap entities and the video fragment builder.
 *
 * Absent optional data is never an error. Errors are raised where a bad value
 * enters (setters, constructors) or where a custom field transform fails.
 */

/**
 * Base class for all errors thrown by this package.
 */
export class SitemapError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * A video attribute setter received a value of the wrong shape or range
 * (malformed URL, negative duration, a list for a scalar field, ...).
 */
export class InvalidVideoValueError extends SitemapError {
  public readonly field: string;

  constructor(field: string, reason: string, details?: Record<string, unknown>) {
    super(
      `Invalid value for video field "${field}": ${reason}`,
      'INVALID_VIDEO_VALUE',
      { field, ...details }
    );
    this.field = field;
  }
}

/**
 * The base `<url>` entry received an invalid `loc`, `lastmod`, `changefreq`
 * or `priority`.
 */
export class InvalidSitemapUrlError extends SitemapError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Invalid sitemap URL entry: ${reason}`, 'INVALID_SITEMAP_URL', details);
  }
}

/**
 * A custom field transform threw while rendering. The original error is kept
 * as `cause`.
 */
export class VideoTransformError extends SitemapError {
  public readonly field: string;

  constructor(field: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(
      `Failed to render video field "${field}": ${message}`,
      'VIDEO_TRANSFORM_FAILED',
      { field }
    );
    this.field = field;
    this.cause = cause;
  }
}

export function isSitemapError(error: unknown): error is SitemapError {
  return error instanceof SitemapError;
}
