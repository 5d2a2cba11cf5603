/**
 * Triage Errors
 *
 * Error taxonomy for the triage pipeline. Per-document errors are recorded
 * on the candidate record; configuration and input errors abort the batch.
 */

// =============================================================================
// BASE ERROR
// =============================================================================

export class TriageError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TriageError';
  }
}

// =============================================================================
// ERROR TYPES
// =============================================================================

export type ExtractionErrorCode =
  | 'EXTRACTION_UNAVAILABLE'
  | 'EXTRACTION_FAILED'
  | 'EMPTY_DOCUMENT'
  | 'FILE_TOO_LARGE'
  | 'UNSUPPORTED_FORMAT';

/**
 * Document could not be read or turned into text. Recorded per record.
 */
export class ExtractionError extends TriageError {
  constructor(
    message: string,
    public readonly extractionCode: ExtractionErrorCode,
    details?: Record<string, unknown>
  ) {
    super(message, extractionCode, details);
    this.name = 'ExtractionError';
  }
}

/**
 * Keyword list, settings or survey table missing or malformed. Fatal.
 */
export class ConfigurationError extends TriageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Input folder cannot be listed at all. Fatal.
 */
export class InputUnavailableError extends TriageError {
  constructor(directory: string, cause?: unknown) {
    super(`Input folder not accessible: ${directory}`, 'INPUT_UNAVAILABLE', {
      directory,
      cause: describeError(cause),
    });
    this.name = 'InputUnavailableError';
  }
}

/**
 * Notification transport failed or timed out.
 */
export class TransportError extends TriageError {
  constructor(
    message: string,
    public readonly retryable: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message, 'TRANSPORT_ERROR', details);
    this.name = 'TransportError';
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return error === undefined ? 'Unknown error' : String(error);
}

export function isFatalError(error: unknown): error is ConfigurationError | InputUnavailableError {
  return error instanceof ConfigurationError || error instanceof InputUnavailableError;
}
