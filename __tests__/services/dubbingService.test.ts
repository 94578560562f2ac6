/**
 * Dubbing Service Tests
 *
 * End-to-end jobs with an in-process engine, stretcher and exporter.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { runDubbing, runSubtitleOptimization, type DubbingRequest } from '../../services/dubbingService';
import { defaultDubbingConfig, mergeDubbingConfig, type DubbingConfig } from '../../services/config/dubbingConfig';
import type { AudioExporter } from '../../services/audio/audioExporter';
import type { TimeStretcher } from '../../services/ffmpeg/atempoStretch';
import type { TtsEngine } from '../../services/synthesis/ttsEngine';
import { CancelledError, SynthesisError, ValidationError } from '../../services/errors';
import type { ExportFormat } from '../../types/dubbing';

// ============================================================================
// Fixtures
// ============================================================================

const SRT = [
  '1',
  '00:00:00,000 --> 00:00:01,000',
  'Hello world',
  '',
  '2',
  '00:00:02,000 --> 00:00:03,000',
  'Good night',
  '',
].join('\n');

// 1 kHz keeps sample counts equal to milliseconds
const config: DubbingConfig = mergeDubbingConfig(defaultDubbingConfig(), {
  audio: { sampleRate: 1000 },
  synthesis: { baseDelayMs: 0, maxDelayMs: 0, maxRetries: 1 },
});

function fakeEngine(samplesPerCue: number) {
  const synthesize = vi.fn(async (_text: string) => ({
    samples: new Float32Array(samplesPerCue).fill(0.5),
    sampleRate: 1000,
  }));
  return { name: 'fake', synthesize } satisfies TtsEngine;
}

interface ExportCall {
  samples: Float32Array;
  sampleRate: number;
  outputPath: string;
  format: ExportFormat;
}

function fakeExporter() {
  const calls: ExportCall[] = [];
  const exporter: AudioExporter = {
    export: async (samples, sampleRate, outputPath, format) => {
      calls.push({ samples, sampleRate, outputPath, format });
      return outputPath;
    },
  };
  return { exporter, calls };
}

const passthroughStretcher: TimeStretcher = {
  name: 'passthrough',
  stretch: async samples => samples,
};

function srtRequest(overrides: Partial<DubbingRequest> = {}): DubbingRequest {
  return {
    input: { kind: 'text', content: SRT },
    format: 'srt',
    voiceRef: 'voice.wav',
    outputPath: '/out/dubbed.wav',
    ...overrides,
  };
}

// ============================================================================
// runDubbing
// ============================================================================

describe('runDubbing', () => {
  it('places each cue on its timeline slot for the stretch strategy', async () => {
    const engine = fakeEngine(1000);
    const { exporter, calls } = fakeExporter();
    const onProgress = vi.fn();

    const result = await runDubbing(
      srtRequest(),
      { config, resolveEngine: () => engine, exporter, stretcher: passthroughStretcher, gateway: null },
      { onProgress }
    );

    expect(result).toMatchObject({
      outputPath: '/out/dubbed.wav',
      strategy: 'stretch',
      cueCount: 2,
      durationMs: 3000,
      skipped: [],
    });
    expect(result.report?.timeBorrowedCount).toBe(0);

    expect(calls).toHaveLength(1);
    expect(calls[0]).toMatchObject({ sampleRate: 1000, outputPath: '/out/dubbed.wav', format: 'wav' });
    expect(calls[0].samples.length).toBe(3000);
    expect([calls[0].samples[0], calls[0].samples[1500], calls[0].samples[2500]]).toEqual([0.5, 0, 0.5]);

    expect(onProgress.mock.calls).toEqual([
      [10, 'Initializing TTS engine'],
      [20, 'Parsing input'],
      [30, 'Optimizing subtitle timing'],
      [50, 'Synthesizing 2 cues'],
      [70, 'Synthesized 1/2 cues'],
      [90, 'Synthesized 2/2 cues'],
      [90, 'Merging audio'],
      [95, 'Exporting audio'],
      [100, 'Dubbing complete'],
    ]);
  });

  it('concatenates for the basic strategy', async () => {
    const engine = fakeEngine(400);
    const { exporter, calls } = fakeExporter();

    const result = await runDubbing(
      srtRequest({ strategy: 'basic', outputFormat: 'mp3', outputPath: '/out/dubbed.mp3' }),
      { config, resolveEngine: () => engine, exporter, gateway: null }
    );

    expect(result.strategy).toBe('basic');
    expect(result.report).toBeUndefined();
    expect(calls[0].samples.length).toBe(800);
    expect(calls[0].format).toBe('mp3');
  });

  it('uses the basic strategy for plain text input', async () => {
    const engine = fakeEngine(300);
    const { exporter, calls } = fakeExporter();

    const result = await runDubbing(
      {
        input: { kind: 'text', content: 'Hello there. Good night.' },
        format: 'txt',
        voiceRef: 'Kore',
        outputPath: '/out/story.wav',
        language: 'en',
      },
      { config, resolveEngine: () => engine, exporter, gateway: null }
    );

    expect(result).toMatchObject({ strategy: 'basic', cueCount: 2, durationMs: 600 });
    expect(engine.synthesize.mock.calls.map(call => call[0])).toEqual(['Hello there.', 'Good night.']);
    expect(calls[0].samples.length).toBe(600);
  });

  it('reads input from a file', async () => {
    const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'dubbing-input-'));
    try {
      const inputPath = path.join(dir, 'input.srt');
      await fs.promises.writeFile(inputPath, SRT, 'utf-8');
      const { exporter } = fakeExporter();

      const result = await runDubbing(
        srtRequest({ input: { kind: 'file', path: inputPath } }),
        { config, resolveEngine: () => fakeEngine(1000), exporter, stretcher: passthroughStretcher, gateway: null }
      );

      expect(result.cueCount).toBe(2);
    } finally {
      await fs.promises.rm(dir, { recursive: true, force: true });
    }
  });

  it('rejects input without any cues', async () => {
    const { exporter } = fakeExporter();

    await expect(
      runDubbing(srtRequest({ input: { kind: 'text', content: '\n\n' } }), {
        config,
        resolveEngine: () => fakeEngine(10),
        exporter,
        gateway: null,
      })
    ).rejects.toThrow(new ValidationError('No usable cues found in SRT input'));
  });

  it('fails when every cue is rejected by validation', async () => {
    const { exporter } = fakeExporter();
    const backwards = '1\n00:00:02,000 --> 00:00:01,000\nBackwards\n';

    await expect(
      runDubbing(srtRequest({ input: { kind: 'text', content: backwards } }), {
        config,
        resolveEngine: () => fakeEngine(10),
        exporter,
        gateway: null,
      })
    ).rejects.toThrow('Every cue was rejected during timing validation');
  });

  it('surfaces the cue that failed synthesis', async () => {
    const { exporter, calls } = fakeExporter();
    const engine: TtsEngine = {
      name: 'flaky',
      synthesize: async text => {
        if (text === 'Good night') throw new Error('voice rejected');
        return { samples: new Float32Array(10), sampleRate: 1000 };
      },
    };

    const error = await runDubbing(srtRequest(), {
      config,
      resolveEngine: () => engine,
      exporter,
      stretcher: passthroughStretcher,
      gateway: null,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SynthesisError);
    expect(error).toMatchObject({ cueIndex: 2, attempts: 2 });
    expect(calls).toHaveLength(0);
  });

  it('stops before doing any work when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const resolveEngine = vi.fn(() => fakeEngine(10));
    const { exporter } = fakeExporter();

    await expect(
      runDubbing(srtRequest(), { config, resolveEngine, exporter, gateway: null }, { signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError);
    expect(resolveEngine).not.toHaveBeenCalled();
  });
});

// ============================================================================
// runSubtitleOptimization
// ============================================================================

describe('runSubtitleOptimization', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'dubbing-optimize-'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('writes an SRT with borrowed time', async () => {
    const outputPath = path.join(dir, 'optimized.srt');
    const content = '1\n00:00:00,000 --> 00:00:00,300\n你好吗\n\n2\n00:00:01,300 --> 00:00:02,000\n好\n';
    const timingConfig = mergeDubbingConfig(config, { timing: { minGapThresholdMs: 300 } });

    const result = await runSubtitleOptimization(
      { input: { kind: 'text', content }, outputPath },
      { config: timingConfig, gateway: null }
    );

    expect(result.outputPath).toBe(outputPath);
    expect(result.report.timeBorrowedCount).toBe(1);
    expect(result.report.stillShort).toEqual([]);
    await expect(fs.promises.readFile(outputPath, 'utf-8')).resolves.toBe(
      '1\n00:00:00,000 --> 00:00:00,650\n你好吗\n\n2\n00:00:01,300 --> 00:00:02,000\n好\n'
    );
  });
});
