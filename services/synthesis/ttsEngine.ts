/**
 * Speech engine contract and the per-type instance registry.
 *
 * Engines are expensive to set up (model load, client auth), so the registry
 * keeps one instance per engine type. An instance is rebuilt when the
 * `engines` config section it was built from changes; the replaced one may
 * still be serving a running task, so it is only cleaned up with the rest.
 */

import type { DubbingConfig } from '../config/dubbingConfig';
import { ConfigError, toError } from '../errors';
import { synthesisLogger } from '../logger';

export interface SynthesizedAudio {
  /** Mono samples in [-1, 1] at the engine's native rate */
  samples: Float32Array;
  sampleRate: number;
}

export interface SynthesisParams {
  language?: string;
  /** Transcript of the reference audio, for engines that clone from it */
  promptText?: string;
}

export interface TtsEngine {
  readonly name: string;
  /** Upper bound on concurrent calls this engine tolerates (1 = serialized) */
  readonly maxConcurrency?: number;
  synthesize(text: string, voiceRef: string, params: SynthesisParams): Promise<SynthesizedAudio>;
  cleanup?(): Promise<void>;
}

export type TtsEngineFactory = (config: DubbingConfig) => TtsEngine;

const factories = new Map<string, TtsEngineFactory>();
const instances = new Map<string, { engine: TtsEngine; configKey: string }>();
const retired: TtsEngine[] = [];

export function registerTtsEngine(name: string, factory: TtsEngineFactory): void {
  factories.set(name, factory);
}

export function listTtsEngines(): string[] {
  return [...factories.keys()];
}

/**
 * Shared engine instance for `name`, created on first use and rebuilt
 * when `config.engines` differs from the one it was created with.
 * @throws ConfigError when no engine of that name is registered
 */
export function getTtsEngine(name: string, config: DubbingConfig): TtsEngine {
  const configKey = JSON.stringify(config.engines);
  const existing = instances.get(name);
  if (existing?.configKey === configKey) return existing.engine;

  const factory = factories.get(name);
  if (!factory) {
    throw new ConfigError(`Unknown TTS engine "${name}". Available: ${listTtsEngines().join(', ') || 'none'}`);
  }

  const engine = factory(config);
  instances.set(name, { engine, configKey });
  if (existing) {
    retired.push(existing.engine);
    synthesisLogger.info(`Reinitialized TTS engine ${name} after a config change`);
  } else {
    synthesisLogger.info(`Initialized TTS engine: ${name}`);
  }
  return engine;
}

export async function cleanupAllEngines(): Promise<void> {
  const engines = [...retired, ...[...instances.values()].map(entry => entry.engine)];
  retired.length = 0;
  instances.clear();

  const results = await Promise.allSettled(engines.map(engine => engine.cleanup?.()));
  results.forEach((result, i) => {
    if (result.status === 'rejected') {
      synthesisLogger.error(`Cleanup failed for ${engines[i].name}`, toError(result.reason).message);
    }
  });
}
