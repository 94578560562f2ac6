/**
 * Merge Engine Property-Based Tests
 *
 * Property 4: Concatenation preserves every sample
 * Property 5: Speed ratios stay within the mode's range
 * Property 6: Assembled placements cover exactly their cue windows
 */

import { describe, it, expect, vi } from 'vitest';
import * as fc from 'fast-check';
import {
  SPEED_RANGES,
  assemble,
  clampSpeedRatio,
  concatenate,
  findPeak,
  fitToLength,
  normalizePeak,
  totalSamplesFor,
  type AssembleOptions,
} from '../../services/audio/mergeEngine';
import type { TimeStretcher } from '../../services/ffmpeg/atempoStretch';
import { SPEED_MODES, type AudioSegment } from '../../types/dubbing';

// ============================================================================
// Helpers
// ============================================================================

const RATE = 16000;

function segment(index: number, startMs: number, endMs: number, length: number, value = 0.5, sampleRate = RATE): AudioSegment {
  return {
    index,
    startMs,
    endMs,
    text: `cue ${index}`,
    samples: new Float32Array(length).fill(value),
    sampleRate,
  };
}

function assembleOptions(overrides: Partial<AssembleOptions> = {}): AssembleOptions {
  return {
    sampleRate: RATE,
    speedMode: 'standard',
    maxAmplitude: 1,
    stretchThreshold: 0.05,
    stretchEnabled: true,
    overflowPolicy: 'keep',
    ...overrides,
  };
}

/** Plays back at `tempo` by shortening the buffer, filled with 0.25 */
function fakeStretcher() {
  const stretch = vi.fn(async (samples: Float32Array, _sampleRate: number, tempo: number) =>
    new Float32Array(Math.round(samples.length / tempo)).fill(0.25)
  );
  return { name: 'fake', stretch } satisfies TimeStretcher;
}

// ============================================================================
// Buffer helpers
// ============================================================================

describe('fitToLength', () => {
  it('pads with zeros', () => {
    expect(Array.from(fitToLength(new Float32Array([0.5, 0.5]), 4))).toEqual([0.5, 0.5, 0, 0]);
  });

  it('truncates', () => {
    expect(Array.from(fitToLength(new Float32Array([0.5, 0.25, 0.125]), 2))).toEqual([0.5, 0.25]);
  });
});

describe('normalizePeak', () => {
  it('scales down audio louder than the ceiling', () => {
    const samples = new Float32Array([2, -1, 0.5]);
    expect(normalizePeak(samples, 1)).toEqual({ peak: 2, normalized: true });
    expect(Array.from(samples)).toEqual([1, -0.5, 0.25]);
  });

  it('leaves quieter audio untouched', () => {
    const samples = new Float32Array([0.5, -0.25]);
    expect(normalizePeak(samples, 1)).toEqual({ peak: 0.5, normalized: false });
    expect(Array.from(samples)).toEqual([0.5, -0.25]);
  });
});

// ============================================================================
// Concatenation
// ============================================================================

describe('concatenate', () => {
  it('joins segments in index order and drops empty ones', () => {
    const output = concatenate([
      segment(2, 0, 0, 2, 0.25),
      segment(3, 0, 0, 0),
      segment(1, 0, 0, 3, 0.5),
    ]);
    expect(Array.from(output)).toEqual([0.5, 0.5, 0.5, 0.25, 0.25]);
  });

  it('joins two one-second segments around an empty one into two seconds', () => {
    const output = concatenate([segment(1, 0, 0, 16000, 0.5), segment(2, 0, 0, 0), segment(3, 0, 0, 16000, 0.25)]);
    expect(output.length).toBe(32000);
    expect(output[15999]).toBe(0.5);
    expect(output[16000]).toBe(0.25);
  });
});

describe('Property 4: Concatenation preserves every sample', () => {
  it('output length is the sum of segment lengths', () => {
    fc.assert(
      fc.property(fc.array(fc.integer({ min: 0, max: 500 }), { maxLength: 20 }), lengths => {
        const segments = lengths.map((length, i) => segment(i + 1, 0, 0, length));
        const total = lengths.reduce((sum, length) => sum + length, 0);
        expect(concatenate(segments).length).toBe(total);
      })
    );
  });
});

// ============================================================================
// Speed limits
// ============================================================================

describe('Property 5: Speed ratios stay within the mode range', () => {
  it('clamps any ratio into the configured range', () => {
    fc.assert(
      fc.property(
        fc.double({ min: 0.001, max: 1000, noNaN: true }),
        fc.constantFrom(...SPEED_MODES),
        (ratio, mode) => {
          const clamped = clampSpeedRatio(ratio, mode);
          expect(clamped).toBeGreaterThanOrEqual(SPEED_RANGES[mode].min);
          expect(clamped).toBeLessThanOrEqual(SPEED_RANGES[mode].max);
          if (ratio >= SPEED_RANGES[mode].min && ratio <= SPEED_RANGES[mode].max) {
            expect(clamped).toBe(ratio);
          }
        }
      )
    );
  });
});

// ============================================================================
// Time-synced assembly
// ============================================================================

describe('assemble', () => {
  it('places segments on their cue windows and pads short ones', async () => {
    const result = await assemble(
      [segment(2, 1500, 2000, 4000, 0.25), segment(1, 0, 1000, 16000, 0.5)],
      assembleOptions()
    );

    expect(result.samples.length).toBe(32000);
    expect(result.samples[0]).toBe(0.5);
    expect(result.samples[15999]).toBe(0.5);
    expect(result.samples[16000]).toBe(0);
    expect(result.samples[24000]).toBe(0.25);
    expect(result.samples[27999]).toBe(0.25);
    expect(result.samples[28000]).toBe(0);
    expect(result.placements).toEqual([
      { index: 1, startSample: 0, endSample: 16000, sourceSamples: 16000, action: 'exact', tempo: undefined },
      { index: 2, startSample: 24000, endSample: 32000, sourceSamples: 4000, action: 'padded', tempo: undefined },
    ]);
    expect(result.normalized).toBe(false);
  });

  it('time-stretches a segment longer than its window', async () => {
    const stretcher = fakeStretcher();
    const result = await assemble([segment(1, 0, 1000, 24000)], assembleOptions({ stretcher }));

    expect(stretcher.stretch).toHaveBeenCalledTimes(1);
    expect(stretcher.stretch.mock.calls[0][2]).toBe(1.5);
    expect(result.placements[0]).toMatchObject({ action: 'stretched', tempo: 1.5, sourceSamples: 24000 });
    expect(result.samples.length).toBe(16000);
    expect(result.samples[15999]).toBe(0.25);
  });

  it('only fixes the length when the ratio is within the threshold', async () => {
    const stretcher = fakeStretcher();
    const result = await assemble([segment(1, 0, 1000, 16400)], assembleOptions({ stretcher }));

    expect(stretcher.stretch).not.toHaveBeenCalled();
    expect(result.placements[0].action).toBe('length-fixed');
    expect(result.samples[15999]).toBe(0.5);
  });

  it('limits the tempo to the speed mode range', async () => {
    const stretcher = fakeStretcher();
    const result = await assemble(
      [segment(1, 0, 1000, 48000)],
      assembleOptions({ stretcher, speedMode: 'high_quality' })
    );

    expect(stretcher.stretch.mock.calls[0][2]).toBe(2);
    expect(result.placements[0]).toMatchObject({ action: 'stretched', tempo: 2 });
    expect(result.samples.length).toBe(16000);
  });

  it('falls back to a length fix when the stretcher fails', async () => {
    const stretcher: TimeStretcher = {
      name: 'broken',
      stretch: async () => {
        throw new Error('ffmpeg missing');
      },
    };
    const result = await assemble([segment(1, 0, 1000, 24000)], assembleOptions({ stretcher }));

    expect(result.placements[0].action).toBe('length-fixed');
    expect(result.samples[0]).toBe(0.5);
  });

  it('truncates overflow when stretching is disabled', async () => {
    const stretcher = fakeStretcher();
    const result = await assemble(
      [segment(1, 0, 1000, 24000)],
      assembleOptions({ stretcher, stretchEnabled: false, overflowPolicy: 'truncate' })
    );

    expect(stretcher.stretch).not.toHaveBeenCalled();
    expect(result.placements[0].action).toBe('truncated');
    expect(result.samples.length).toBe(16000);
  });

  it('resamples segments delivered at another rate', async () => {
    const result = await assemble([segment(1, 0, 500, 4000, 0.5, 8000)], assembleOptions());

    expect(result.placements[0]).toMatchObject({ sourceSamples: 8000, action: 'exact' });
  });

  it('normalizes a track that exceeds the amplitude ceiling', async () => {
    const result = await assemble(
      [segment(1, 0, 1000, 16000, 2), segment(2, 1000, 2000, 16000, 0.5)],
      assembleOptions()
    );

    expect(result).toMatchObject({ peak: 2, normalized: true });
    expect(result.samples[0]).toBe(1);
    expect(result.samples[16000]).toBe(0.25);
  });

  it('skips empty segments and zero-length windows without failing', async () => {
    const result = await assemble(
      [segment(1, 0, 1000, 16000), segment(2, 1000, 1500, 0), segment(3, 2000, 2000, 800)],
      assembleOptions()
    );

    expect(result.placements.map(p => p.index)).toEqual([1]);
    expect(result.skipped.map(s => s.index)).toEqual([2, 3]);
    expect(result.skipped[0].reason).toBe('empty segment');
    expect(result.skipped[1].reason).toContain('Segment 3 window [2000ms, 2000ms)');
  });

  it('sizes the track by the latest end time', () => {
    expect(totalSamplesFor([segment(1, 0, 1000, 1), segment(2, 500, 2500, 1)], RATE)).toBe(40000);
    expect(totalSamplesFor([], RATE)).toBe(0);
  });
});

describe('Property 6: Assembled placements cover exactly their cue windows', () => {
  it('every placement spans round(start * sr / 1000) to round(end * sr / 1000)', async () => {
    const windowsArb = fc.array(
      fc.record({
        gap: fc.integer({ min: 0, max: 300 }),
        duration: fc.integer({ min: 1, max: 300 }),
        length: fc.integer({ min: 1, max: 8000 }),
      }),
      { minLength: 1, maxLength: 8 }
    );

    await fc.assert(
      fc.asyncProperty(windowsArb, async windows => {
        let cursor = 0;
        const segments = windows.map((w, i) => {
          const startMs = cursor + w.gap;
          cursor = startMs + w.duration;
          return segment(i + 1, startMs, cursor, w.length);
        });

        const result = await assemble(segments, assembleOptions({ stretcher: fakeStretcher() }));

        expect(result.samples.length).toBe(Math.round((cursor * RATE) / 1000));
        expect(result.placements).toHaveLength(segments.length);
        result.placements.forEach((placement, i) => {
          expect(placement.startSample).toBe(Math.round((segments[i].startMs * RATE) / 1000));
          expect(placement.endSample).toBe(Math.round((segments[i].endMs * RATE) / 1000));
        });
        expect(findPeak(result.samples)).toBeLessThanOrEqual(1);
      }),
      { numRuns: 30 }
    );
  });
});
