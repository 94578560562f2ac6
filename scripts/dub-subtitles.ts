import '../server/env';

import path from 'path';
import { parseArgs } from 'util';
import {
  applyFlatConfig,
  loadDubbingConfig,
} from '../services/config/dubbingConfig';
import { runDubbing, runSubtitleOptimization, type InputFormat } from '../services/dubbingService';
import { toError } from '../services/errors';
import { createLogger } from '../services/logger';
import { registerBuiltinEngines } from '../services/synthesis/engines/index';
import { cleanupAllEngines } from '../services/synthesis/ttsEngine';

/**
 * Command-line dubbing
 *
 *   tsx scripts/dub-subtitles.ts --input movie.srt --voice speaker.wav --output out.wav
 *   tsx scripts/dub-subtitles.ts --input movie.srt --optimize-only --output movie.optimized.srt
 *
 * Any flat config key can be overridden with --set key=value
 * (e.g. --set borrow_ratio=0.8 --set speed_mode=high_quality).
 */

const cliLog = createLogger('CLI');

const USAGE = `Usage: dub-subtitles --input <file.srt|file.txt> --output <file> [options]

Options:
  --voice <path|name>     Reference audio (http engine) or voice name (gemini)
  --engine <name>         TTS engine (default from config)
  --strategy <basic|stretch>
  --language <code>
  --prompt-text <text>    Transcript of the reference audio
  --optimize-only         Only optimize subtitle timing and write an SRT
  --no-optimize           Skip timing optimization before a stretch merge
  --config <path>         Config file (default config/dubbing.json)
  --set key=value         Override a flat config key (repeatable)
  --help`;

// ── Helpers ──────────────────────────────────────────────────────

function parseOverrides(pairs: string[]): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw new Error(`Expected key=value, got "${pair}"`);
    }
    overrides[pair.slice(0, separator).trim()] = pair.slice(separator + 1).trim();
  }
  return overrides;
}

function inputFormatOf(filePath: string): InputFormat {
  return path.extname(filePath).toLowerCase() === '.txt' ? 'txt' : 'srt';
}

// ── Main ─────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      input: { type: 'string', short: 'i' },
      output: { type: 'string', short: 'o' },
      voice: { type: 'string', short: 'v' },
      engine: { type: 'string' },
      strategy: { type: 'string' },
      language: { type: 'string' },
      'prompt-text': { type: 'string' },
      'optimize-only': { type: 'boolean', default: false },
      'no-optimize': { type: 'boolean', default: false },
      config: { type: 'string' },
      set: { type: 'string', multiple: true, default: [] },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help || !values.input || !values.output) {
    console.log(USAGE);
    process.exitCode = values.help ? 0 : 1;
    return;
  }

  const baseConfig = await loadDubbingConfig(values.config ? path.resolve(values.config) : undefined);
  const config = applyFlatConfig(baseConfig, parseOverrides(values.set));
  const input = { kind: 'file' as const, path: path.resolve(values.input) };
  const outputPath = path.resolve(values.output);
  const onProgress = (progress: number, message: string) => {
    process.stdout.write(`\r[${String(progress).padStart(3)}%] ${message.padEnd(50)}`);
  };

  if (values['optimize-only']) {
    const result = await runSubtitleOptimization({ input, outputPath }, { config }, { onProgress });
    process.stdout.write('\n');
    cliLog.info(
      `Wrote ${result.outputPath}: ${result.report.timeBorrowedCount} borrowed, ` +
      `${result.report.simplifiedCount} simplified, ${result.report.stillShort.length} still short`
    );
    return;
  }

  const strategy = values.strategy;
  if (strategy !== undefined && strategy !== 'basic' && strategy !== 'stretch') {
    throw new Error(`Unknown strategy "${strategy}"`);
  }

  registerBuiltinEngines();
  const engineName = values.engine ?? config.basic.ttsEngine;
  const voiceRef = values.voice ?? config.engines.gemini.voice;

  const result = await runDubbing(
    {
      input,
      format: inputFormatOf(input.path),
      voiceRef: engineName === 'gemini' ? voiceRef : path.resolve(voiceRef),
      outputPath,
      engineName,
      strategy,
      language: values.language,
      promptText: values['prompt-text'],
      optimize: !values['no-optimize'],
    },
    { config },
    { onProgress }
  );
  process.stdout.write('\n');

  cliLog.info(`Wrote ${result.outputPath} (${(result.durationMs / 1000).toFixed(1)}s, ${result.cueCount} cues, ${result.strategy})`);
  if (result.skipped.length > 0) {
    cliLog.warn(`${result.skipped.length} segments were skipped during merge`);
  }
}

void main()
  .catch((error) => {
    process.stdout.write('\n');
    cliLog.error(toError(error).message);
    process.exitCode = 1;
  })
  .finally(() => cleanupAllEngines());
