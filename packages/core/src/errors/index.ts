/**
 * Custom Error Classes
 */

import type { JobState } from '../stateMachine.js';

/**
 * Base error class for all cutline errors
 */
export class CutlineError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CutlineError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends CutlineError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * A remove-range the user supplied cannot be turned into a cut-list
 */
export class SegmentValidationError extends CutlineError {
  constructor(
    message: string,
    details?: { index?: number; start?: number; end?: number; duration?: number }
  ) {
    super(message, 'SEGMENT_VALIDATION_ERROR', details);
    this.name = 'SegmentValidationError';
  }
}

/**
 * No encoder at all, not even the software one, can run on this host
 */
export class EncoderUnavailableError extends CutlineError {
  constructor(encoder: string) {
    super(
      `No usable encoder: ${encoder} is not available`,
      'ENCODER_UNAVAILABLE',
      { encoder }
    );
    this.name = 'EncoderUnavailableError';
  }
}

/**
 * An encoding profile cannot be rendered into encoder arguments
 */
export class ProfileIncompatibleError extends CutlineError {
  constructor(encoder: string, codec: string, message?: string) {
    super(
      message ?? `Profile for ${encoder} uses codec ${codec}, which has no parameter set`,
      'PROFILE_INCOMPATIBLE',
      { encoder, codec }
    );
    this.name = 'ProfileIncompatibleError';
  }
}

/**
 * External tool missing or exited unsuccessfully
 */
export class ProcessExecutionError extends CutlineError {
  public readonly exitCode: number | null;
  public readonly stderrTail: string;

  constructor(
    command: string,
    exitCode: number | null,
    stderrTail: string,
    message?: string
  ) {
    super(
      message ?? (exitCode === null
        ? `Failed to run ${command}`
        : `${command} exited with code ${exitCode}`),
      'PROCESS_EXECUTION_ERROR',
      { command, exitCode, stderrTail }
    );
    this.name = 'ProcessExecutionError';
    this.exitCode = exitCode;
    this.stderrTail = stderrTail;
  }
}

/**
 * Transcription failed; reported as a warning, never fails a job
 */
export class SubtitleGenerationError extends CutlineError {
  constructor(message: string, cause?: string) {
    super(message, 'SUBTITLE_GENERATION_ERROR', cause ? { cause } : undefined);
    this.name = 'SubtitleGenerationError';
  }
}

/**
 * The caller cancelled the job
 */
export class CancelledError extends CutlineError {
  constructor(jobId: string) {
    super(`Job ${jobId} was cancelled`, 'CANCELLED', { jobId });
    this.name = 'CancelledError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends CutlineError {
  constructor(
    jobId: string,
    fromState: JobState,
    toState: JobState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { jobId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * Settings document unreadable or ill-typed
 */
export class ConfigError extends CutlineError {
  constructor(path: string, message: string) {
    super(`Invalid settings in ${path}: ${message}`, 'CONFIG_ERROR', { path });
    this.name = 'ConfigError';
  }
}
