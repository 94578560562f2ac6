/**
 * Core dubbing data types shared by the timing, synthesis and merge layers.
 */

// ============================================================================
// Cues
// ============================================================================

export interface Cue {
  /** Display index from the source file; not necessarily dense */
  readonly index: number;
  readonly startMs: number;
  readonly endMs: number;
  readonly text: string;
}

export function createCue(index: number, startMs: number, endMs: number, text: string): Cue {
  return Object.freeze({ index, startMs, endMs, text });
}

export function cueDuration(cue: Cue): number {
  return cue.endMs - cue.startMs;
}

export function withTiming(cue: Cue, startMs: number, endMs: number): Cue {
  return createCue(cue.index, startMs, endMs, cue.text);
}

export function withText(cue: Cue, text: string): Cue {
  return createCue(cue.index, cue.startMs, cue.endMs, text);
}

/** Cues from plain text carry no timing (start == end == 0). */
export function isTimed(cue: Cue): boolean {
  return cue.endMs > cue.startMs;
}

// ============================================================================
// Timing decisions
// ============================================================================

export type TimingDecision =
  | { kind: 'no_change' }
  | { kind: 'time_borrow'; frontMs: number; backMs: number; partial: boolean }
  | { kind: 'need_escalation'; shortfallMs: number; minRequiredMs: number }
  | { kind: 'rejected'; reason: string };

export interface TimingDecisionRecord {
  cueIndex: number;
  /** Position of the cue in the input list */
  position: number;
  decision: TimingDecision;
}

// ============================================================================
// Audio
// ============================================================================

export interface AudioSegment {
  index: number;
  startMs: number;
  endMs: number;
  text: string;
  /** Mono samples in [-1, 1] */
  samples: Float32Array;
  sampleRate: number;
}

export type SpeedMode = 'standard' | 'high_quality' | 'ultra_wide';

export const SPEED_MODES: readonly SpeedMode[] = ['standard', 'high_quality', 'ultra_wide'];

export type DubbingStrategy = 'basic' | 'stretch';

export const DUBBING_STRATEGIES: readonly DubbingStrategy[] = ['basic', 'stretch'];

export type OverflowPolicy = 'truncate' | 'keep';

export type ExportFormat = 'wav' | 'mp3' | 'flac' | 'ogg';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['wav', 'mp3', 'flac', 'ogg'];

/** What the synthesis pipeline does when a cue exhausts its retries */
export type SynthesisExhaustionPolicy = 'fail' | 'silence';
