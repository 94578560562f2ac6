/**
 * Merge Engine
 *
 * Two ways to turn synthesized segments into one track:
 * - concatenate: back to back, ignoring cue timing
 * - assemble: each segment placed on its cue's exact sample window, fitted by
 *   time-stretch, zero padding or truncation, then peak normalized
 */

import { MergeBoundsError, toError } from '../errors';
import { mergeLogger } from '../logger';
import type { TimeStretcher } from '../ffmpeg/atempoStretch';
import type { AudioSegment, OverflowPolicy, SpeedMode } from '../../types/dubbing';
import { msToSamples, resampleLinear } from './resample';

// ============================================================
// SPEED LIMITS
// ============================================================

export interface SpeedRange {
  min: number;
  max: number;
}

export const SPEED_RANGES: Record<SpeedMode, SpeedRange> = {
  standard: { min: 0.25, max: 4.0 },
  high_quality: { min: 0.5, max: 2.0 },
  ultra_wide: { min: 0.1, max: 10.0 },
};

export function clampSpeedRatio(ratio: number, mode: SpeedMode): number {
  const { min, max } = SPEED_RANGES[mode];
  return Math.min(max, Math.max(min, ratio));
}

// ============================================================
// BUFFER HELPERS
// ============================================================

/** Truncate or zero-pad to exactly `length` samples. */
export function fitToLength(samples: Float32Array, length: number): Float32Array {
  if (samples.length === length) return samples;
  if (samples.length > length) return samples.slice(0, length);
  const padded = new Float32Array(length);
  padded.set(samples);
  return padded;
}

export function findPeak(samples: Float32Array): number {
  let peak = 0;
  for (let i = 0; i < samples.length; i++) {
    const value = Math.abs(samples[i]);
    if (value > peak) peak = value;
  }
  return peak;
}

/**
 * Scale `samples` in place so the peak does not exceed `maxAmplitude`.
 * Quieter audio is left untouched.
 */
export function normalizePeak(samples: Float32Array, maxAmplitude: number): { peak: number; normalized: boolean } {
  const peak = findPeak(samples);
  if (peak <= maxAmplitude || peak === 0) {
    return { peak, normalized: false };
  }

  const gain = maxAmplitude / peak;
  for (let i = 0; i < samples.length; i++) {
    samples[i] *= gain;
  }
  mergeLogger.info(`Normalized peak ${peak.toFixed(3)} -> ${maxAmplitude}`);
  return { peak, normalized: true };
}

// ============================================================
// CONCATENATION
// ============================================================

/** Segments in index order, empty buffers dropped. */
export function concatenate(segments: readonly AudioSegment[]): Float32Array {
  const kept = [...segments]
    .sort((a, b) => a.index - b.index)
    .filter(segment => segment.samples.length > 0);

  const total = kept.reduce((sum, segment) => sum + segment.samples.length, 0);
  const output = new Float32Array(total);

  let offset = 0;
  for (const segment of kept) {
    output.set(segment.samples, offset);
    offset += segment.samples.length;
  }

  mergeLogger.info(`Concatenated ${kept.length}/${segments.length} segments (${total} samples)`);
  return output;
}

// ============================================================
// TIME-SYNCED ASSEMBLY
// ============================================================

export interface AssembleOptions {
  sampleRate: number;
  speedMode: SpeedMode;
  maxAmplitude: number;
  /** Ratios within this distance of 1.0 skip the stretch and only fix length */
  stretchThreshold: number;
  stretchEnabled: boolean;
  overflowPolicy: OverflowPolicy;
  stretcher?: TimeStretcher;
}

export type PlacementAction = 'exact' | 'padded' | 'stretched' | 'length-fixed' | 'truncated';

export interface SegmentPlacement {
  index: number;
  startSample: number;
  endSample: number;
  sourceSamples: number;
  action: PlacementAction;
  /** Tempo applied by the stretcher, when one ran */
  tempo?: number;
}

export interface SkippedSegment {
  index: number;
  reason: string;
}

export interface AssembleResult {
  samples: Float32Array;
  sampleRate: number;
  placements: SegmentPlacement[];
  skipped: SkippedSegment[];
  peak: number;
  normalized: boolean;
}

/** Track length for the given segments: the latest end time. */
export function totalSamplesFor(segments: readonly AudioSegment[], sampleRate: number): number {
  const maxEnd = segments.reduce((max, segment) => Math.max(max, segment.endMs), 0);
  return msToSamples(maxEnd, sampleRate);
}

async function fitSegment(
  segment: AudioSegment,
  samples: Float32Array,
  windowLength: number,
  options: AssembleOptions
): Promise<{ placed: Float32Array; action: PlacementAction; tempo?: number }> {
  if (samples.length === windowLength) {
    return { placed: samples, action: 'exact' };
  }
  if (samples.length < windowLength) {
    return { placed: fitToLength(samples, windowLength), action: 'padded' };
  }

  if (!options.stretchEnabled) {
    const message = `Segment ${segment.index} overflows its window by ${samples.length - windowLength} samples`;
    if (options.overflowPolicy === 'keep') {
      mergeLogger.warn(`${message}; excess not copied past the window edge`);
    } else {
      mergeLogger.debug(`${message}; truncated`);
    }
    return { placed: samples.subarray(0, windowLength), action: 'truncated' };
  }

  const ratio = samples.length / windowLength;
  const tempo = clampSpeedRatio(ratio, options.speedMode);
  if (tempo !== ratio) {
    mergeLogger.warn(
      `Segment ${segment.index} needs ${ratio.toFixed(2)}x, limited to ${tempo}x (${options.speedMode})`
    );
  }

  if (Math.abs(tempo - 1) <= options.stretchThreshold || !options.stretcher) {
    return { placed: fitToLength(samples, windowLength), action: 'length-fixed' };
  }

  try {
    const stretched = await options.stretcher.stretch(samples, options.sampleRate, tempo);
    return { placed: fitToLength(stretched, windowLength), action: 'stretched', tempo };
  } catch (error) {
    mergeLogger.warn(
      `Stretch failed for segment ${segment.index}, falling back to length fix: ${toError(error).message}`
    );
    return { placed: fitToLength(samples, windowLength), action: 'length-fixed' };
  }
}

/**
 * Place every segment on its cue's half-open sample window
 * [round(start * sr / 1000), round(end * sr / 1000)).
 *
 * Segments whose window lies outside the track are skipped with a
 * MergeBoundsError logged; they never abort the merge.
 */
export async function assemble(segments: readonly AudioSegment[], options: AssembleOptions): Promise<AssembleResult> {
  const { sampleRate } = options;
  const totalSamples = totalSamplesFor(segments, sampleRate);
  const buffer = new Float32Array(totalSamples);
  const placements: SegmentPlacement[] = [];
  const skipped: SkippedSegment[] = [];

  const ordered = [...segments].sort((a, b) => a.startMs - b.startMs);

  for (const segment of ordered) {
    if (segment.samples.length === 0) {
      mergeLogger.warn(`Segment ${segment.index} is empty, skipping`);
      skipped.push({ index: segment.index, reason: 'empty segment' });
      continue;
    }

    const startSample = Math.max(0, msToSamples(segment.startMs, sampleRate));
    const endSample = Math.min(totalSamples, msToSamples(segment.endMs, sampleRate));

    if (startSample >= endSample) {
      const error = new MergeBoundsError(
        `Segment ${segment.index} window [${segment.startMs}ms, ${segment.endMs}ms) is outside the ${totalSamples}-sample track`,
        segment.index
      );
      mergeLogger.warn(error.message);
      skipped.push({ index: segment.index, reason: error.message });
      continue;
    }

    const samples = segment.sampleRate === sampleRate
      ? segment.samples
      : resampleLinear(segment.samples, segment.sampleRate, sampleRate);

    const windowLength = endSample - startSample;
    const { placed, action, tempo } = await fitSegment(segment, samples, windowLength, options);
    buffer.set(placed, startSample);

    placements.push({
      index: segment.index,
      startSample,
      endSample,
      sourceSamples: samples.length,
      action,
      tempo,
    });
  }

  const { peak, normalized } = normalizePeak(buffer, options.maxAmplitude);

  mergeLogger.info(
    `Assembled ${placements.length} segments into ${totalSamples} samples` +
    (skipped.length > 0 ? ` (${skipped.length} skipped)` : '')
  );

  return { samples: buffer, sampleRate, placements, skipped, peak, normalized };
}
