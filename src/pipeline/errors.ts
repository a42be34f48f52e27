/**
 * Fatal pipeline errors. These surface to the caller unmodified; per-chunk
 * inference failures live in ../inference/errors and never reach this far.
 */

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Rejected configuration value (chunk length, padding, retry budget...)
 */
export class InvalidConfigurationError extends PipelineError {
  field: string;

  constructor(field: string, message: string) {
    super(message, { field });
    this.name = 'InvalidConfigurationError';
    this.field = field;
  }
}

/**
 * Missing, empty or unsupported input media
 */
export class InputError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'InputError';
  }
}

/**
 * ffmpeg/ffprobe (or any MediaBackend) failure
 */
export class MediaBackendError extends PipelineError {
  operation: string;
  stderr?: string;

  constructor(operation: string, message: string, stderr?: string) {
    super(message, { operation });
    this.name = 'MediaBackendError';
    this.operation = operation;
    this.stderr = stderr;
  }
}
