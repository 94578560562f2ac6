/**
 * Cue validation: rejects cues that cannot be timed and reports overlaps.
 */

import { ValidationError } from '../errors';
import { timingLogger } from '../logger';
import { cueDuration, type Cue } from '../../types/dubbing';

export interface CueValidationResult {
  valid: Cue[];
  /** Input positions of the accepted cues, parallel to `valid` */
  positions: number[];
  rejected: Array<{ position: number; error: ValidationError }>;
  /** Pairs of consecutive cue indices whose slots overlap */
  overlaps: Array<[number, number]>;
}

export function validateCue(cue: Cue): ValidationError | null {
  if (!Number.isFinite(cue.startMs) || !Number.isFinite(cue.endMs)) {
    return new ValidationError(`Cue ${cue.index} has non-finite timestamps`, cue.index);
  }
  if (cue.startMs < 0 || cue.endMs < 0) {
    return new ValidationError(`Cue ${cue.index} has a negative timestamp`, cue.index);
  }
  if (cueDuration(cue) <= 0) {
    return new ValidationError(
      `Cue ${cue.index} has non-positive duration (${cue.startMs}ms -> ${cue.endMs}ms)`,
      cue.index
    );
  }
  if (cue.text.trim() === '') {
    return new ValidationError(`Cue ${cue.index} has empty text`, cue.index);
  }
  return null;
}

/**
 * Split cues into valid and rejected. Overlaps between consecutive valid cues
 * are logged and reported, never corrected.
 */
export function validateCues(cues: readonly Cue[]): CueValidationResult {
  const result: CueValidationResult = { valid: [], positions: [], rejected: [], overlaps: [] };

  cues.forEach((cue, position) => {
    const error = validateCue(cue);
    if (error) {
      timingLogger.warn(error.message);
      result.rejected.push({ position, error });
      return;
    }

    const previous = result.valid[result.valid.length - 1];
    if (previous && previous.endMs > cue.startMs) {
      timingLogger.warn(
        `Cue ${previous.index} (ends ${previous.endMs}ms) overlaps cue ${cue.index} (starts ${cue.startMs}ms)`
      );
      result.overlaps.push([previous.index, cue.index]);
    }

    result.valid.push(cue);
    result.positions.push(position);
  });

  return result;
}
