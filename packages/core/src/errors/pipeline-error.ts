/**
 * Error types for every stage of a sync run
 */

export type PipelineStage = 'config' | 'extract' | 'transform' | 'load' | 'pipeline';

export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'TIMEOUT'
  | 'CONNECTION_FAILED'
  | 'HTTP_ERROR'
  | 'RATE_LIMITED'
  | 'MALFORMED_RESPONSE'
  | 'RETRIES_EXHAUSTED'
  | 'MISSING_FIELD'
  | 'COERCION_FAILED'
  | 'SCHEMA_FAILED'
  | 'WRITE_FAILED'
  | 'INVALID_STATE'
  | 'UNKNOWN';

export interface PipelineErrorDetails {
  /** Error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable message */
  message: string;
  /** Stage that raised the error */
  stage: PipelineStage;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: unknown;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class PipelineError extends Error {
  readonly code: ErrorCode;
  readonly stage: PipelineStage;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: PipelineErrorDetails) {
    super(details.message);
    this.name = 'PipelineError';
    this.code = details.code;
    this.stage = details.stage;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause !== undefined) {
      this.cause = details.cause;
    }

    if ('captureStackTrace' in Error) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Multi-line description printed when a run fails
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}] during ${this.stage}: ${this.message}`];

    if (this.cause instanceof Error && this.cause.message !== this.message) {
      parts.push(`Caused by: ${this.cause.message}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      stage: this.stage,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

type StageErrorDetails = Omit<PipelineErrorDetails, 'stage'>;

/** Environment is missing or invalid; raised before any stage runs */
export class ConfigError extends PipelineError {
  constructor(details: Omit<StageErrorDetails, 'code'> & { code?: ErrorCode }) {
    super({ ...details, code: details.code ?? 'CONFIGURATION_ERROR', stage: 'config' });
    this.name = 'ConfigError';
  }
}

export interface FetchErrorDetails extends StageErrorDetails {
  /** Whether another attempt may succeed */
  retryable?: boolean;
  /** HTTP status, when a response was received */
  status?: number;
}

export class FetchError extends PipelineError {
  readonly retryable: boolean;
  readonly status?: number;

  constructor(details: FetchErrorDetails) {
    super({ ...details, stage: 'extract' });
    this.name = 'FetchError';
    this.retryable = details.retryable ?? false;
    this.status = details.status;
  }
}

export interface TransformErrorDetails extends StageErrorDetails {
  /** Target column whose value could not be produced */
  field: string;
  /** Position of the raw record in the extracted collection */
  recordIndex: number;
}

/** Per-record failure; the record is skipped, the run continues */
export class TransformError extends PipelineError {
  readonly field: string;
  readonly recordIndex: number;

  constructor(details: TransformErrorDetails) {
    super({ ...details, stage: 'transform' });
    this.name = 'TransformError';
    this.field = details.field;
    this.recordIndex = details.recordIndex;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), field: this.field, recordIndex: this.recordIndex };
  }
}

export class LoadError extends PipelineError {
  constructor(details: StageErrorDetails) {
    super({ ...details, stage: 'load' });
    this.name = 'LoadError';
  }
}

/**
 * Helper to wrap unknown errors as PipelineError
 */
export function wrapError(
  error: unknown,
  stage: PipelineStage,
  defaultCode: ErrorCode = 'UNKNOWN'
): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  return new PipelineError({
    code: defaultCode,
    message,
    stage,
    cause: error,
  });
}
