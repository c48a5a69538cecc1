// errors.ts - Error Types shared by every layer

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

export type ErrorCategory =
  | 'validation'
  | 'config'
  | 'transport'
  | 'decode'
  | 'remote'
  | 'not_found'
  | 'cardinality';

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/** Base error class for all gpuform errors */
export class GpuformError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    category: ErrorCategory,
    options?: {
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'GpuformError';
    this.code = code;
    this.category = category;
    this.details = options?.details;
  }
}

/** Precondition failed before any network call. Never retried. */
export class ValidationError extends GpuformError {
  constructor(
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(options?.code ?? 'INVALID_INPUT', message, 'validation', options);
    this.name = 'ValidationError';
  }
}

/** Provider could not be configured (e.g. no credential anywhere) */
export class ConfigurationError extends GpuformError {
  constructor(
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(options?.code ?? 'INVALID_CONFIG', message, 'config', options);
    this.name = 'ConfigurationError';
  }
}
