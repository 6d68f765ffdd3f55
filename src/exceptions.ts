/**
 * Error taxonomy for the extraction pipeline.
 *
 * Request-fatal errors carry the HTTP status they surface as; per-file
 * upload errors (ObjectWriteError) never leave the orchestrator.
 */

export type ExtractionErrorCode =
  | 'validation_error'
  | 'configuration_error'
  | 'credentials_error'
  | 'agent_failure'
  | 'object_write_error'
  | 'io_failure';

export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly code: ExtractionErrorCode,
    public readonly statusCode: number = 500,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ExtractionError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Bad request input. Not retried.
 */
export class ValidationError extends ExtractionError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, 'validation_error', 400);
    this.name = 'ValidationError';
  }
}

export type ConfigurationProblem =
  | 'invalid_config'
  | 'bucket_not_found'
  | 'access_denied'
  | 'bucket_unreachable'
  | 'missing_credentials'
  | 'invalid_credentials';

export class ConfigurationError extends ExtractionError {
  constructor(
    message: string,
    public readonly problem: ConfigurationProblem = 'invalid_config',
    options?: { cause?: unknown }
  ) {
    super(message, 'configuration_error', 500, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Missing or rejected storage credentials. Every upload in a batch would
 * fail identically, so the batch is aborted.
 */
export class CredentialsError extends ConfigurationError {
  constructor(
    message: string,
    problem: 'missing_credentials' | 'invalid_credentials' = 'invalid_credentials',
    options?: { cause?: unknown }
  ) {
    super(message, problem, options);
    this.name = 'CredentialsError';
  }
}

export type AgentFailureReason = 'timeout' | 'crashed';

export class AgentFailure extends ExtractionError {
  constructor(
    message: string,
    public readonly reason: AgentFailureReason,
    options?: { cause?: unknown }
  ) {
    super(message, 'agent_failure', 500, options);
    this.name = 'AgentFailure';
  }
}

export class ObjectWriteError extends ExtractionError {
  constructor(
    message: string,
    public readonly objectKey: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'object_write_error', 500, options);
    this.name = 'ObjectWriteError';
  }
}

export class IOFailure extends ExtractionError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'io_failure', 500, options);
    this.name = 'IOFailure';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
