/**
 * Dubbing Service
 *
 * End-to-end job: parse cues, fix timing, synthesize, merge, export.
 * Cancellation is checked before every expensive step and progress is
 * reported on a 0-100 scale.
 */

import fs from 'fs';
import path from 'path';
import { EscalationGateway } from './ai/escalationGateway';
import { GeminiSimplifier } from './ai/geminiSimplifier';
import { hasGeminiCredentials } from './ai/geminiClient';
import { FileAudioExporter, type AudioExporter } from './audio/audioExporter';
import { assemble, concatenate, type SkippedSegment } from './audio/mergeEngine';
import type { DubbingConfig } from './config/dubbingConfig';
import { ValidationError } from './errors';
import { FfmpegAtempoStretcher, type TimeStretcher } from './ffmpeg/atempoStretch';
import { logger } from './logger';
import { parseSrt, serializeSrt } from './parsers/srtParser';
import { parseTxt } from './parsers/txtParser';
import { createRetryPolicy, throwIfCancelled, type RetryPolicy } from './shared/robustUtils';
import { synthesizeAll } from './synthesis/synthesisPipeline';
import { getTtsEngine, type TtsEngine } from './synthesis/ttsEngine';
import { optimizeSubtitles, type OptimizationReport } from './timing/subtitleOptimizer';
import type { Cue, DubbingStrategy, ExportFormat } from '../types/dubbing';

const dubbingLog = logger.child('Job');

// ============================================================================
// Types
// ============================================================================

export type InputFormat = 'srt' | 'txt';

export type DubbingInput =
  | { kind: 'file'; path: string }
  | { kind: 'text'; content: string };

export interface DubbingRequest {
  input: DubbingInput;
  format: InputFormat;
  /** Reference audio path, or a voice name for engines with prebuilt voices */
  voiceRef: string;
  outputPath: string;
  outputFormat?: ExportFormat;
  engineName?: string;
  strategy?: DubbingStrategy;
  language?: string;
  promptText?: string;
  /** Run time borrowing + simplification before a stretch merge (default true) */
  optimize?: boolean;
}

export interface DubbingDependencies {
  config: DubbingConfig;
  resolveEngine?: (name: string) => TtsEngine;
  stretcher?: TimeStretcher;
  exporter?: AudioExporter;
  /** null disables simplification; undefined builds one from config when credentials exist */
  gateway?: EscalationGateway | null;
}

export type ProgressReporter = (progress: number, message: string) => void;

export interface JobHooks {
  signal?: AbortSignal;
  onProgress?: ProgressReporter;
}

export interface DubbingResult {
  outputPath: string;
  strategy: DubbingStrategy;
  cueCount: number;
  durationMs: number;
  report?: OptimizationReport;
  skipped: SkippedSegment[];
}

export interface OptimizationRequest {
  input: DubbingInput;
  outputPath: string;
}

export interface OptimizationResult {
  outputPath: string;
  report: OptimizationReport;
}

// ============================================================================
// Helpers
// ============================================================================

export function synthesisRetryPolicy(config: DubbingConfig): RetryPolicy {
  return createRetryPolicy({
    maxRetries: config.synthesis.maxRetries,
    baseDelayMs: config.synthesis.baseDelayMs,
    maxDelayMs: config.synthesis.maxDelayMs,
  });
}

/** Gemini-backed gateway, or null when disabled or no credentials are set. */
export function createEscalationGateway(config: DubbingConfig, language?: string): EscalationGateway | null {
  if (!config.escalation.enabled) return null;
  if (!hasGeminiCredentials()) {
    dubbingLog.warn('Subtitle simplification disabled: no Gemini credentials');
    return null;
  }
  return new EscalationGateway({
    simplifier: new GeminiSimplifier({ model: config.escalation.model }),
    maxConcurrency: config.escalation.maxConcurrency,
    retry: createRetryPolicy({
      maxRetries: config.escalation.maxRetries,
      baseDelayMs: config.escalation.baseDelayMs,
      maxDelayMs: config.escalation.maxDelayMs,
    }),
    timeoutMs: config.escalation.timeoutMs,
    contextRadius: config.escalation.contextRadius,
    language,
  });
}

async function readInput(input: DubbingInput): Promise<string> {
  return input.kind === 'file' ? fs.promises.readFile(input.path, 'utf-8') : input.content;
}

export async function loadCues(input: DubbingInput, format: InputFormat, language?: string): Promise<Cue[]> {
  const content = await readInput(input);
  const cues = format === 'srt' ? parseSrt(content).cues : parseTxt(content, language);
  if (cues.length === 0) {
    throw new ValidationError(`No usable cues found in ${format.toUpperCase()} input`);
  }
  return cues;
}

function report(hooks: JobHooks, progress: number, message: string): void {
  hooks.onProgress?.(Math.round(progress), message);
  dubbingLog.info(`[${Math.round(progress)}%] ${message}`);
}

// ============================================================================
// Jobs
// ============================================================================

export async function runDubbing(
  request: DubbingRequest,
  deps: DubbingDependencies,
  hooks: JobHooks = {}
): Promise<DubbingResult> {
  const { config } = deps;
  const { signal } = hooks;
  const language = request.language ?? config.basic.language;

  throwIfCancelled(signal);
  report(hooks, 10, 'Initializing TTS engine');
  const engineName = request.engineName ?? config.basic.ttsEngine;
  const engine = deps.resolveEngine ? deps.resolveEngine(engineName) : getTtsEngine(engineName, config);

  throwIfCancelled(signal);
  report(hooks, 20, 'Parsing input');
  let cues = await loadCues(request.input, request.format, language);

  let strategy = request.strategy ?? config.basic.strategy;
  if (request.format === 'txt' && strategy !== 'basic') {
    dubbingLog.info('Text input has no timing, using basic strategy');
    strategy = 'basic';
  }

  throwIfCancelled(signal);
  let optimizationReport: OptimizationReport | undefined;
  if (strategy === 'stretch' && request.optimize !== false) {
    report(hooks, 30, 'Optimizing subtitle timing');
    const gateway = deps.gateway === undefined ? createEscalationGateway(config, language) : deps.gateway;
    const optimized = await optimizeSubtitles(cues, { timing: config.timing, gateway, signal });
    cues = optimized.cues;
    optimizationReport = optimized.report;
    if (cues.length === 0) {
      throw new ValidationError('Every cue was rejected during timing validation');
    }
  }

  throwIfCancelled(signal);
  report(hooks, 50, `Synthesizing ${cues.length} cues`);
  const segments = await synthesizeAll(cues, request.voiceRef, {
    engine,
    maxConcurrency: config.synthesis.maxConcurrency,
    retry: synthesisRetryPolicy(config),
    sampleRate: config.audio.sampleRate,
    onExhausted: config.synthesis.onExhausted,
    signal,
    params: { language, promptText: request.promptText },
    onProgress: (completed, total) => {
      report(hooks, 50 + (40 * completed) / total, `Synthesized ${completed}/${total} cues`);
    },
  });

  throwIfCancelled(signal);
  report(hooks, 90, 'Merging audio');
  let samples: Float32Array;
  let skipped: SkippedSegment[] = [];
  if (strategy === 'stretch') {
    const merged = await assemble(segments, {
      ...config.audio,
      stretcher: deps.stretcher ?? new FfmpegAtempoStretcher(),
    });
    samples = merged.samples;
    skipped = merged.skipped;
  } else {
    samples = concatenate(segments);
  }

  throwIfCancelled(signal);
  report(hooks, 95, 'Exporting audio');
  const exporter = deps.exporter ?? new FileAudioExporter();
  const outputPath = await exporter.export(
    samples,
    config.audio.sampleRate,
    request.outputPath,
    request.outputFormat ?? config.basic.outputFormat
  );

  report(hooks, 100, 'Dubbing complete');
  return {
    outputPath,
    strategy,
    cueCount: cues.length,
    durationMs: Math.round((samples.length / config.audio.sampleRate) * 1000),
    report: optimizationReport,
    skipped,
  };
}

/**
 * Optimize an SRT file's timing (and text, when a simplifier is available)
 * and write the result as a new SRT.
 */
export async function runSubtitleOptimization(
  request: OptimizationRequest,
  deps: Pick<DubbingDependencies, 'config' | 'gateway'>,
  hooks: JobHooks = {}
): Promise<OptimizationResult> {
  const { config } = deps;
  const { signal } = hooks;

  throwIfCancelled(signal);
  report(hooks, 20, 'Parsing subtitles');
  const cues = await loadCues(request.input, 'srt');

  throwIfCancelled(signal);
  report(hooks, 40, 'Optimizing subtitle timing');
  const gateway = deps.gateway === undefined ? createEscalationGateway(config) : deps.gateway;
  const optimized = await optimizeSubtitles(cues, { timing: config.timing, gateway, signal });

  throwIfCancelled(signal);
  report(hooks, 90, 'Writing optimized subtitles');
  await fs.promises.mkdir(path.dirname(request.outputPath), { recursive: true });
  await fs.promises.writeFile(request.outputPath, serializeSrt(optimized.cues), 'utf-8');

  report(hooks, 100, 'Optimization complete');
  return { outputPath: request.outputPath, report: optimized.report };
}
