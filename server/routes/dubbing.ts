import { Router, Request, Response } from 'express';
import path from 'path';
import { z } from 'zod';
import { runDubbing, type DubbingInput, type InputFormat } from '../../services/dubbingService';
import { createLogger } from '../../services/logger';
import { SPEED_RANGES } from '../../services/audio/mergeEngine';
import { TTS_VOICES } from '../../services/synthesis/engines/index';
import { listTtsEngines } from '../../services/synthesis/ttsEngine';
import { DUBBING_STRATEGIES, EXPORT_FORMATS } from '../../types/dubbing';
import { configStore } from '../services/configStore';
import { taskQueue } from '../services/taskQueue/index';
import { RESULT_DIR, removeUploads, resultUrlFor } from '../utils/index';
import { upload, uploadedFile, uploadedPaths } from './uploads';

const dubbingLog = createLogger('DubbingRoute');

const router = Router();

const SUPPORTED_LANGUAGES = [
  { code: 'zh', name: 'Chinese' },
  { code: 'en', name: 'English' },
  { code: 'ja', name: 'Japanese' },
  { code: 'ko', name: 'Korean' },
  { code: 'fr', name: 'French' },
  { code: 'de', name: 'German' },
  { code: 'es', name: 'Spanish' },
];

const DubbingFormSchema = z.object({
  input_mode: z.enum(['file', 'text']).default('file'),
  input_text: z.string().optional(),
  text_format: z.enum(['srt', 'txt']).optional(),
  tts_engine: z.string().min(1).optional(),
  strategy: z.enum(['basic', 'stretch']).optional(),
  language: z.string().min(1).optional(),
  prompt_text: z.string().optional(),
  voice: z.string().min(1).optional(),
  output_format: z.enum(['wav', 'mp3', 'flac', 'ogg']).optional(),
  optimize: z.enum(['true', 'false']).optional(),
});

function formatFromFileName(name: string): InputFormat | null {
  const ext = path.extname(name).toLowerCase();
  if (ext === '.srt') return 'srt';
  if (ext === '.txt') return 'txt';
  return null;
}

/**
 * Engines, strategies, speed modes and languages the server accepts
 */
router.get('/options', (_req: Request, res: Response) => {
  res.json({
    engines: listTtsEngines(),
    strategies: DUBBING_STRATEGIES,
    speedModes: SPEED_RANGES,
    outputFormats: EXPORT_FORMATS,
    voices: Object.values(TTS_VOICES),
    languages: SUPPORTED_LANGUAGES,
  });
});

/**
 * Start a dubbing task
 * multipart fields: input_file, voice_file + DubbingFormSchema fields
 */
router.post(
  '/',
  upload.fields([{ name: 'input_file', maxCount: 1 }, { name: 'voice_file', maxCount: 1 }]),
  (req: Request, res: Response) => {
    const uploads = uploadedPaths(req);
    const rejectRequest = (body: Record<string, unknown>) => {
      removeUploads(uploads);
      res.status(400).json(body);
    };

    const parsed = DubbingFormSchema.safeParse(req.body);
    if (!parsed.success) {
      rejectRequest({ error: 'Invalid request', details: parsed.error.issues });
      return;
    }
    const form = parsed.data;
    const config = configStore.get();

    let input: DubbingInput;
    let format: InputFormat;
    if (form.input_mode === 'text') {
      const content = form.input_text?.trim();
      if (!content) {
        rejectRequest({ error: 'input_text is required in text mode' });
        return;
      }
      input = { kind: 'text', content };
      format = form.text_format ?? (content.includes('-->') ? 'srt' : 'txt');
    } else {
      const inputFile = uploadedFile(req, 'input_file');
      if (!inputFile) {
        rejectRequest({ error: 'input_file is required' });
        return;
      }
      const detected = formatFromFileName(inputFile.originalname);
      if (!detected) {
        rejectRequest({ error: 'Only .srt and .txt input files are supported' });
        return;
      }
      input = { kind: 'file', path: inputFile.path };
      format = detected;
    }

    const engineName = form.tts_engine ?? config.basic.ttsEngine;
    if (!listTtsEngines().includes(engineName)) {
      rejectRequest({ error: `Unknown TTS engine "${engineName}"` });
      return;
    }

    const voiceFile = uploadedFile(req, 'voice_file');
    const voiceRef = voiceFile?.path ?? form.voice ?? (engineName === 'gemini' ? config.engines.gemini.voice : undefined);
    if (!voiceRef) {
      rejectRequest({ error: `voice_file is required for the ${engineName} engine` });
      return;
    }

    const outputFormat = form.output_format ?? config.basic.outputFormat;

    const task = taskQueue.submit('dubbing', async (current, { signal, reportProgress }) => {
      const result = await runDubbing(
        {
          input,
          format,
          voiceRef,
          outputPath: path.join(RESULT_DIR, `dubbed_${current.taskId}.${outputFormat}`),
          outputFormat,
          engineName,
          strategy: form.strategy,
          language: form.language,
          promptText: form.prompt_text,
          optimize: form.optimize !== 'false',
        },
        { config: configStore.get() },
        { signal, onProgress: reportProgress }
      );

      return {
        resultPath: result.outputPath,
        resultUrl: resultUrlFor(result.outputPath),
        message: 'Dubbing complete',
        summary: {
          cueCount: result.cueCount,
          durationMs: result.durationMs,
          timeBorrowed: result.report?.timeBorrowedCount,
          simplified: result.report?.simplifiedCount,
          stillShort: result.report?.stillShort.length,
          skippedSegments: result.skipped.length,
        },
      };
    }, { onSettled: () => removeUploads(uploads) });

    dubbingLog.info(`Accepted dubbing task ${task.taskId} (${format}, engine=${engineName})`);
    res.status(202).json({ taskId: task.taskId, status: task.status });
  }
);

export default router;
