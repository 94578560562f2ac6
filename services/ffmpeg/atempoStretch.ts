/**
 * Pitch-preserving time stretch through ffmpeg's atempo filter.
 */

import { ffmpegLogger } from '../logger';
import { f32leToFloat, floatToF32le, runFfmpeg } from './ffmpegProcess';

export interface TimeStretcher {
  readonly name: string;
  /**
   * Play `samples` at `tempo` times the original speed
   * (2.0 halves the duration). Output length is approximate.
   */
  stretch(samples: Float32Array, sampleRate: number, tempo: number): Promise<Float32Array>;
}

const ATEMPO_MIN = 0.5;
const ATEMPO_MAX = 2.0;

/**
 * Chain atempo stages so each stays within [0.5, 2.0], which every ffmpeg
 * build accepts. The product of the stages equals `tempo`.
 */
export function buildAtempoFilters(tempo: number): string[] {
  if (!Number.isFinite(tempo) || tempo <= 0) {
    throw new RangeError(`Tempo must be a positive number, got ${tempo}`);
  }

  const filters: string[] = [];
  let remaining = tempo;
  while (remaining > ATEMPO_MAX) {
    filters.push(`atempo=${ATEMPO_MAX}`);
    remaining /= ATEMPO_MAX;
  }
  while (remaining < ATEMPO_MIN) {
    filters.push(`atempo=${ATEMPO_MIN}`);
    remaining /= ATEMPO_MIN;
  }
  if (Math.abs(remaining - 1) > 1e-6) {
    filters.push(`atempo=${Number(remaining.toFixed(6))}`);
  }
  return filters;
}

export class FfmpegAtempoStretcher implements TimeStretcher {
  readonly name = 'ffmpeg-atempo';

  async stretch(samples: Float32Array, sampleRate: number, tempo: number): Promise<Float32Array> {
    const filters = buildAtempoFilters(tempo);
    if (filters.length === 0 || samples.length === 0) {
      return samples.slice();
    }

    const format = ['-f', 'f32le', '-ar', String(sampleRate), '-ac', '1'];
    const output = await runFfmpeg(
      [...format, '-i', 'pipe:0', '-filter:a', filters.join(','), ...format, 'pipe:1'],
      floatToF32le(samples)
    );

    const stretched = f32leToFloat(output);
    ffmpegLogger.debug(`atempo ${tempo.toFixed(3)}: ${samples.length} -> ${stretched.length} samples`);
    return stretched;
  }
}
