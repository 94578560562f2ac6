/**
 * Dubbing configuration
 *
 * One zod schema holds every tunable with its default. The same values can be
 * supplied three ways, applied in this order:
 *   1. config/dubbing.json (nested sections)
 *   2. DUBBING_* environment variables (flat keys, e.g. DUBBING_BORROW_RATIO)
 *   3. flat key/value maps passed by callers (CLI flags, API bodies)
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError } from '../errors';
import { createLogger } from '../logger';

const configLog = createLogger('Config');

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const DEFAULT_CONFIG_PATH = path.join(__dirname, '../../config/dubbing.json');

// ============================================================================
// Schema
// ============================================================================

const BasicSchema = z.object({
  ttsEngine: z.string().min(1).default('gemini'),
  strategy: z.enum(['basic', 'stretch']).default('stretch'),
  language: z.string().min(1).default('zh'),
  outputFormat: z.enum(['wav', 'mp3', 'flac', 'ogg']).default('wav'),
});

const TimingSchema = z.object({
  chineseCharMs: z.number().int().positive().default(150),
  englishWordMs: z.number().int().positive().default(250),
  minGapThresholdMs: z.number().int().nonnegative().default(200),
  borrowRatio: z.number().gt(0).lte(1).default(1.0),
  extraBufferMs: z.number().int().nonnegative().default(200),
});

const SynthesisSchema = z.object({
  maxConcurrency: z.number().int().positive().default(8),
  maxRetries: z.number().int().nonnegative().default(2),
  baseDelayMs: z.number().int().nonnegative().default(1000),
  maxDelayMs: z.number().int().nonnegative().default(30000),
  onExhausted: z.enum(['fail', 'silence']).default('fail'),
});

const EscalationSchema = z.object({
  enabled: z.boolean().default(true),
  model: z.string().min(1).default('gemini-3-flash-preview'),
  maxConcurrency: z.number().int().positive().default(50),
  maxRetries: z.number().int().nonnegative().default(3),
  timeoutMs: z.number().int().positive().default(60000),
  baseDelayMs: z.number().int().nonnegative().default(1000),
  maxDelayMs: z.number().int().nonnegative().default(30000),
  contextRadius: z.number().int().nonnegative().default(3),
});

const AudioSchema = z.object({
  sampleRate: z.number().int().positive().default(44100),
  speedMode: z.enum(['standard', 'high_quality', 'ultra_wide']).default('standard'),
  maxAmplitude: z.number().gt(0).lte(1).default(1.0),
  stretchThreshold: z.number().nonnegative().default(0.05),
  stretchEnabled: z.boolean().default(true),
  overflowPolicy: z.enum(['truncate', 'keep']).default('keep'),
});

const EnginesSchema = z.object({
  gemini: z.object({
    model: z.string().min(1).default('gemini-2.5-flash-preview-tts'),
    voice: z.string().min(1).default('Kore'),
  }).default({}),
  http: z.object({
    baseUrl: z.string().url().default('http://127.0.0.1:9880'),
    timeoutMs: z.number().int().positive().default(120000),
    maxConcurrency: z.number().int().positive().default(1),
  }).default({}),
});

export const DubbingConfigSchema = z.object({
  basic: BasicSchema.default({}),
  timing: TimingSchema.default({}),
  synthesis: SynthesisSchema.default({}),
  escalation: EscalationSchema.default({}),
  audio: AudioSchema.default({}),
  engines: EnginesSchema.default({}),
});

export type DubbingConfig = z.infer<typeof DubbingConfigSchema>;
export type TimingConfig = DubbingConfig['timing'];
export type AudioConfig = DubbingConfig['audio'];

// ============================================================================
// Flat keys
// ============================================================================

/** Flat key -> [section, field] */
export const FLAT_CONFIG_KEYS = {
  chinese_char_ms: ['timing', 'chineseCharMs'],
  english_word_ms: ['timing', 'englishWordMs'],
  min_gap_threshold_ms: ['timing', 'minGapThresholdMs'],
  borrow_ratio: ['timing', 'borrowRatio'],
  extra_buffer_ms: ['timing', 'extraBufferMs'],
  max_concurrency: ['synthesis', 'maxConcurrency'],
  max_retries: ['synthesis', 'maxRetries'],
  speed_mode: ['audio', 'speedMode'],
  sample_rate: ['audio', 'sampleRate'],
  tts_engine: ['basic', 'ttsEngine'],
  strategy: ['basic', 'strategy'],
  llm_model: ['escalation', 'model'],
  llm_max_concurrency: ['escalation', 'maxConcurrency'],
  llm_max_retries: ['escalation', 'maxRetries'],
  llm_timeout_ms: ['escalation', 'timeoutMs'],
  on_synthesis_exhausted: ['synthesis', 'onExhausted'],
} as const satisfies Record<string, readonly [string, string]>;

export type FlatConfigKey = keyof typeof FLAT_CONFIG_KEYS;

function isFlatConfigKey(key: string): key is FlatConfigKey {
  return Object.prototype.hasOwnProperty.call(FLAT_CONFIG_KEYS, key);
}

// ============================================================================
// Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeRecords(base: Record<string, unknown>, patch: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? mergeRecords(current, value) : value;
  }
  return merged;
}

function coerceFlatValue(raw: string | number | boolean): string | number | boolean {
  if (typeof raw !== 'string') return raw;
  const trimmed = raw.trim();
  if (trimmed === 'true') return true;
  if (trimmed === 'false') return false;
  if (trimmed !== '' && !Number.isNaN(Number(trimmed))) return Number(trimmed);
  return trimmed;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Validate a (possibly partial) nested config object, filling in defaults.
 * @throws ConfigError listing every invalid field
 */
export function parseDubbingConfig(input: unknown): DubbingConfig {
  const result = DubbingConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid dubbing configuration: ${details}`);
  }
  return result.data;
}

export function defaultDubbingConfig(): DubbingConfig {
  return parseDubbingConfig({});
}

/** Deep-merge a nested patch over an existing config and re-validate. */
export function mergeDubbingConfig(base: DubbingConfig, patch: unknown): DubbingConfig {
  if (!isRecord(patch)) {
    throw new ConfigError('Configuration patch must be an object');
  }
  return parseDubbingConfig(mergeRecords(base, patch));
}

/**
 * Apply flat key/value settings such as `{ borrow_ratio: 0.5 }`.
 * Unknown keys are logged and ignored.
 */
export function applyFlatConfig(
  base: DubbingConfig,
  flat: Record<string, string | number | boolean>
): DubbingConfig {
  const patch: Record<string, Record<string, unknown>> = {};
  for (const [key, raw] of Object.entries(flat)) {
    if (!isFlatConfigKey(key)) {
      configLog.warn(`Ignoring unknown config key "${key}"`);
      continue;
    }
    const [section, field] = FLAT_CONFIG_KEYS[key];
    patch[section] = { ...patch[section], [field]: coerceFlatValue(raw) };
  }
  return mergeDubbingConfig(base, patch);
}

/** Collect DUBBING_<FLAT_KEY> variables from the environment. */
export function flatConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const key of Object.keys(FLAT_CONFIG_KEYS)) {
    const value = env[`DUBBING_${key.toUpperCase()}`];
    if (value !== undefined && value !== '') {
      flat[key] = value;
    }
  }
  return flat;
}

/**
 * Load config from disk and the environment.
 * A missing file yields the defaults; an unreadable or invalid one throws.
 */
export async function loadDubbingConfig(
  filePath: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): Promise<DubbingConfig> {
  let fileContents: unknown = {};
  try {
    const raw = await fs.promises.readFile(filePath, 'utf-8');
    fileContents = JSON.parse(raw);
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      configLog.info(`No config file at ${filePath}, using defaults`);
    } else {
      throw new ConfigError(
        `Failed to read config file ${filePath}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  const fromFile = parseDubbingConfig(fileContents);
  const config = applyFlatConfig(fromFile, flatConfigFromEnv(env));

  if (env.TTS_SERVER_URL) {
    return mergeDubbingConfig(config, { engines: { http: { baseUrl: env.TTS_SERVER_URL } } });
  }
  return config;
}

export async function saveDubbingConfig(
  config: DubbingConfig,
  filePath: string = DEFAULT_CONFIG_PATH
): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  configLog.info(`Saved config to ${filePath}`);
}
