/**
 * Synthesis Pipeline
 *
 * One engine call per cue on a bounded pool. Results come back in cue order
 * regardless of completion order. Each call retries with backoff; a cue that
 * still fails either aborts the batch (default) or becomes silence.
 */

import { CancelledError, SynthesisError, isCancelled, toError } from '../errors';
import { synthesisLogger } from '../logger';
import { ParallelExecutionEngine } from '../parallelExecutionEngine';
import { resampleLinear, msToSamples } from '../audio/resample';
import {
  attemptsOf,
  throwIfCancelled,
  withRetryBackoff,
  type RetryPolicy,
} from '../shared/robustUtils';
import {
  cueDuration,
  type AudioSegment,
  type Cue,
  type SynthesisExhaustionPolicy,
} from '../../types/dubbing';
import type { SynthesisParams, TtsEngine } from './ttsEngine';

export type SynthesisProgressCallback = (completed: number, total: number) => void;

export interface SynthesisOptions {
  engine: TtsEngine;
  maxConcurrency: number;
  retry: RetryPolicy;
  /** Every segment is delivered at this rate */
  sampleRate: number;
  onExhausted?: SynthesisExhaustionPolicy;
  onProgress?: SynthesisProgressCallback;
  signal?: AbortSignal;
  params?: SynthesisParams;
}

function silentSegment(cue: Cue, sampleRate: number): AudioSegment {
  return {
    index: cue.index,
    startMs: cue.startMs,
    endMs: cue.endMs,
    text: cue.text,
    samples: new Float32Array(msToSamples(Math.max(0, cueDuration(cue)), sampleRate)),
    sampleRate,
  };
}

/**
 * Synthesize every cue. `result[i]` belongs to `cues[i]`.
 *
 * @throws CancelledError when the signal aborts; in-flight calls finish first
 * @throws SynthesisError for the first cue that exhausted its retries
 *   (only with the default `fail` policy)
 */
export async function synthesizeAll(
  cues: readonly Cue[],
  voiceRef: string,
  options: SynthesisOptions
): Promise<AudioSegment[]> {
  const { engine, retry, sampleRate, signal, params = {} } = options;
  const onExhausted = options.onExhausted ?? 'fail';
  throwIfCancelled(signal, 'Synthesis cancelled before start');

  const concurrency = Math.max(1, Math.min(options.maxConcurrency, engine.maxConcurrency ?? Infinity));
  if (concurrency < options.maxConcurrency) {
    synthesisLogger.info(`Engine ${engine.name} limits concurrency to ${concurrency}`);
  }

  // In completion order
  const failures: SynthesisError[] = [];

  const synthesizeCue = async (cue: Cue): Promise<AudioSegment> => {
    try {
      const audio = await withRetryBackoff(
        async () => {
          const result = await engine.synthesize(cue.text, voiceRef, params);
          if (result.samples.length === 0) {
            throw new Error('Engine returned empty audio');
          }
          return result;
        },
        retry,
        { signal, label: `synthesize cue ${cue.index}` }
      );

      const samples = audio.sampleRate === sampleRate
        ? audio.samples
        : resampleLinear(audio.samples, audio.sampleRate, sampleRate);
      return { index: cue.index, startMs: cue.startMs, endMs: cue.endMs, text: cue.text, samples, sampleRate };
    } catch (thrown) {
      if (isCancelled(thrown)) throw thrown;
      const cause = toError(thrown);
      const attempts = attemptsOf(cause);

      if (onExhausted === 'silence') {
        synthesisLogger.warn(`Cue ${cue.index} failed after ${attempts} attempts, substituting silence: ${cause.message}`);
        return silentSegment(cue, sampleRate);
      }

      const error = new SynthesisError(
        `Synthesis failed for cue ${cue.index} after ${attempts} attempts: ${cause.message}`,
        cue.index,
        attempts,
        cause
      );
      failures.push(error);
      synthesisLogger.error(error.message);
      throw error;
    }
  };

  const total = cues.length;
  const startTime = Date.now();
  const results = await new ParallelExecutionEngine().execute(
    cues.map(cue => () => synthesizeCue(cue)),
    {
      concurrencyLimit: concurrency,
      stopOnFailure: onExhausted === 'fail',
      signal,
      onProgress: progress => options.onProgress?.(progress.completedTasks + progress.failedTasks, total),
    }
  );

  if (signal?.aborted) {
    throw new CancelledError('Synthesis cancelled');
  }
  if (failures.length > 0) {
    throw failures[0];
  }

  const segments: AudioSegment[] = [];
  for (const result of results) {
    if (result.state === 'completed') {
      segments.push(result.data);
    } else if (result.state === 'failed' && isCancelled(result.error)) {
      throw result.error;
    } else {
      throw new SynthesisError(`Cue ${cues[result.position].index} was not synthesized`, cues[result.position].index, 0);
    }
  }

  synthesisLogger.info(`Synthesized ${segments.length} cues in ${((Date.now() - startTime) / 1000).toFixed(1)}s`);
  return segments;
}
