/**
 * Error classes for the procdoc pipeline.
 *
 * Every error names the stage it belongs to and carries a remediation hint
 * that is safe to show to the user. Stage-scoped errors are recoverable: the
 * session keeps earlier artifacts and the failed stage can be retried.
 */

export type PipelineStage =
  | 'ingest'
  | 'audio'
  | 'transcription'
  | 'moments'
  | 'review'
  | 'frames'
  | 'generation'
  | 'export'
  | 'upload';

export type ErrorSeverity = 'user' | 'system';

export interface PipelineErrorOptions {
  cause?: unknown;
  severity?: ErrorSeverity;
  details?: Record<string, unknown>;
}

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
  readonly code: string;
  readonly stage: PipelineStage;
  readonly remediation: string;
  readonly severity: ErrorSeverity;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    stage: PipelineStage,
    remediation: string,
    options: PipelineErrorOptions = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PipelineError';
    this.code = code;
    this.stage = stage;
    this.remediation = remediation;
    this.severity = options.severity ?? 'system';
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toUserMessage(): string {
    return `${STAGE_LABELS[this.stage]} failed: ${this.message}\n  Suggestion: ${this.remediation}`;
  }

  toString(): string {
    return `${this.name} [${this.code}] (${this.stage}): ${this.message}`;
  }
}

export const STAGE_LABELS: Record<PipelineStage, string> = {
  ingest: 'Video upload',
  audio: 'Audio extraction',
  transcription: 'Transcription',
  moments: 'Moment analysis',
  review: 'Moment review',
  frames: 'Frame extraction',
  generation: 'Document generation',
  export: 'Document export',
  upload: 'Drive upload',
};

/**
 * Container or codec the pipeline cannot read
 */
export class UnsupportedFormatError extends PipelineError {
  constructor(message: string, stage: 'ingest' | 'audio' = 'ingest', options: PipelineErrorOptions = {}) {
    super(
      message,
      'UNSUPPORTED_FORMAT',
      stage,
      'Upload an MP4, MOV, AVI, WebM or MKV recording that includes a narration audio track.',
      { severity: 'user', ...options }
    );
    this.name = 'UnsupportedFormatError';
  }
}

export class TranscriptionError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(
      message,
      'TRANSCRIPTION_FAILED',
      'transcription',
      'Check your network connection and DEEPGRAM_API_KEY, then retry transcription.',
      options
    );
    this.name = 'TranscriptionError';
  }
}

export class MomentParseError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(
      message,
      'MOMENT_PARSE_FAILED',
      'moments',
      'Add the key moments manually, or re-record with clearer narration of each action.',
      { severity: 'user', ...options }
    );
    this.name = 'MomentParseError';
  }
}

/**
 * A moment edit that cannot be applied (unknown id, negative timestamp, ...)
 */
export class MomentEditError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(message, 'MOMENT_EDIT_INVALID', 'review', 'Fix the moment list and submit the edit again.', {
      severity: 'user',
      ...options,
    });
    this.name = 'MomentEditError';
  }
}

export class FrameExtractionError extends PipelineError {
  readonly momentId: string;

  constructor(message: string, momentId: string, options: PipelineErrorOptions = {}) {
    super(
      message,
      'FRAME_EXTRACTION_FAILED',
      'frames',
      'Adjust the moment timestamp or retry frame extraction.',
      options
    );
    this.name = 'FrameExtractionError';
    this.momentId = momentId;
  }
}

export class GenerationError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(
      message,
      'GENERATION_FAILED',
      'generation',
      'Check your network connection and ANTHROPIC_API_KEY, then retry document generation.',
      options
    );
    this.name = 'GenerationError';
  }
}

export class DocumentWriteError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(
      message,
      'DOCUMENT_WRITE_FAILED',
      'export',
      'Choose an output directory you can write to and make sure the disk is not full.',
      options
    );
    this.name = 'DocumentWriteError';
  }
}

export class AuthError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(
      message,
      'AUTH_FAILED',
      'upload',
      'Re-authenticate with Google Drive and retry the upload.',
      { severity: 'user', ...options }
    );
    this.name = 'AuthError';
  }
}

/**
 * A required setting (API key, OAuth client) is missing
 */
export class ConfigurationError extends PipelineError {
  constructor(message: string, stage: PipelineStage, remediation: string) {
    super(message, 'CONFIGURATION_MISSING', stage, remediation, { severity: 'user' });
    this.name = 'ConfigurationError';
  }
}

/**
 * A stage was requested before the artifacts it depends on exist
 */
export class StageOrderError extends PipelineError {
  constructor(stage: PipelineStage, message: string) {
    super(message, 'STAGE_OUT_OF_ORDER', stage, 'Complete the earlier pipeline stages first.', {
      severity: 'user',
    });
    this.name = 'StageOrderError';
  }
}

/**
 * The session was finished or abandoned while work was outstanding
 */
export class SessionClosedError extends PipelineError {
  constructor(stage: PipelineStage, message = 'Session has been closed') {
    super(message, 'SESSION_CLOSED', stage, 'Start a new session to process another recording.', {
      severity: 'user',
    });
    this.name = 'SessionClosedError';
  }
}

/**
 * Describe any thrown value in one line
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
