import { Router, Request, Response } from 'express';
import path from 'path';
import { runSubtitleOptimization, type DubbingInput } from '../../services/dubbingService';
import { createLogger } from '../../services/logger';
import { configStore } from '../services/configStore';
import { taskQueue } from '../services/taskQueue/index';
import { RESULT_DIR, removeUploads, resultUrlFor } from '../utils/index';
import { upload, uploadedFile, uploadedPaths } from './uploads';

const optimizationLog = createLogger('OptimizationRoute');

const router = Router();

/**
 * Start a subtitle optimization task.
 * Accepts an uploaded `srt_file` or an `srt_content` field.
 */
router.post('/', upload.fields([{ name: 'srt_file', maxCount: 1 }]), (req: Request, res: Response) => {
  const uploads = uploadedPaths(req);
  const rejectRequest = (body: Record<string, unknown>) => {
    removeUploads(uploads);
    res.status(400).json(body);
  };

  const srtFile = uploadedFile(req, 'srt_file');
  const content: unknown = req.body?.srt_content;

  let input: DubbingInput;
  if (srtFile) {
    if (path.extname(srtFile.originalname).toLowerCase() !== '.srt') {
      rejectRequest({ error: 'Only .srt files can be optimized' });
      return;
    }
    input = { kind: 'file', path: srtFile.path };
  } else if (typeof content === 'string' && content.trim()) {
    input = { kind: 'text', content };
  } else {
    rejectRequest({ error: 'srt_file or srt_content is required' });
    return;
  }

  const task = taskQueue.submit('optimization', async (current, { signal, reportProgress }) => {
    const result = await runSubtitleOptimization(
      { input, outputPath: path.join(RESULT_DIR, `optimized_${current.taskId}.srt`) },
      { config: configStore.get() },
      { signal, onProgress: reportProgress }
    );

    return {
      resultPath: result.outputPath,
      resultUrl: resultUrlFor(result.outputPath),
      message: 'Optimization complete',
      summary: {
        cueCount: result.report.optimizedCount,
        timeBorrowed: result.report.timeBorrowedCount,
        simplified: result.report.simplifiedCount,
        stillShort: result.report.stillShort.length,
      },
    };
  }, { onSettled: () => removeUploads(uploads) });

  optimizationLog.info(`Accepted optimization task ${task.taskId}`);
  res.status(202).json({ taskId: task.taskId, status: task.status });
});

export default router;
