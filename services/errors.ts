/**
 * Dubbing Error Types
 *
 * Every failure raised by the pipeline carries a stable `code` so the task
 * layer can report it without matching on messages.
 */

export type DubbingErrorCode =
  | 'VALIDATION_ERROR'
  | 'TIMING_ESCALATION_ERROR'
  | 'SYNTHESIS_ERROR'
  | 'MERGE_BOUNDS_ERROR'
  | 'EXPORT_ERROR'
  | 'CANCELLED'
  | 'CONFIG_ERROR'
  | 'TIMEOUT';

export class DubbingError extends Error {
  constructor(
    message: string,
    public readonly code: DubbingErrorCode,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'DubbingError';
  }
}

/** A cue that cannot be timed: non-positive duration, blank text, bad timestamps. */
export class ValidationError extends DubbingError {
  constructor(message: string, public readonly cueIndex?: number) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/** The text simplifier failed for one cue. Absorbed: the original text is kept. */
export class TimingEscalationError extends DubbingError {
  constructor(message: string, public readonly cueIndex: number, originalError?: Error) {
    super(message, 'TIMING_ESCALATION_ERROR', originalError);
    this.name = 'TimingEscalationError';
  }
}

export class SynthesisError extends DubbingError {
  constructor(
    message: string,
    public readonly cueIndex: number,
    public readonly attempts: number,
    originalError?: Error,
  ) {
    super(message, 'SYNTHESIS_ERROR', originalError);
    this.name = 'SynthesisError';
  }
}

export class MergeBoundsError extends DubbingError {
  constructor(message: string, public readonly cueIndex: number) {
    super(message, 'MERGE_BOUNDS_ERROR');
    this.name = 'MergeBoundsError';
  }
}

export class ExportError extends DubbingError {
  constructor(message: string, public readonly outputPath: string, originalError?: Error) {
    super(message, 'EXPORT_ERROR', originalError);
    this.name = 'ExportError';
  }
}

export class CancelledError extends DubbingError {
  constructor(message: string = 'Operation cancelled') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

export class ConfigError extends DubbingError {
  constructor(message: string, originalError?: Error) {
    super(message, 'CONFIG_ERROR', originalError);
    this.name = 'ConfigError';
  }
}

export class TimeoutError extends DubbingError {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

/** Normalize an unknown thrown value into an Error instance. */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

export function isCancelled(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}
