/**
 * Linear-interpolation resampling. Adequate for speech moving between
 * 16/22.05/24/44.1/48 kHz.
 */
export function resampleLinear(samples: Float32Array, fromRate: number, toRate: number): Float32Array {
  if (fromRate <= 0 || toRate <= 0) {
    throw new RangeError(`Sample rates must be positive (got ${fromRate} -> ${toRate})`);
  }
  if (fromRate === toRate || samples.length === 0) {
    return samples;
  }

  const outLength = Math.round((samples.length * toRate) / fromRate);
  const output = new Float32Array(outLength);
  const step = fromRate / toRate;
  const last = samples.length - 1;

  for (let i = 0; i < outLength; i++) {
    const position = i * step;
    const i0 = Math.min(Math.floor(position), last);
    const i1 = Math.min(i0 + 1, last);
    const frac = position - i0;
    output[i] = samples[i0] + (samples[i1] - samples[i0]) * frac;
  }

  return output;
}

/** Duration in ms of `sampleCount` samples. */
export function samplesToMs(sampleCount: number, sampleRate: number): number {
  return (sampleCount / sampleRate) * 1000;
}

/** Sample offset of a millisecond timestamp. */
export function msToSamples(ms: number, sampleRate: number): number {
  return Math.round((ms * sampleRate) / 1000);
}
