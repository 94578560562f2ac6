import { Router, Request, Response } from 'express';
import { hasGeminiCredentials } from '../../services/ai/geminiClient';
import { listTtsEngines } from '../../services/synthesis/ttsEngine';
import { taskQueue } from '../services/taskQueue/index';

const router = Router();

/**
 * Health check endpoint
 */
router.get('/', (_req: Request, res: Response) => {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    apis: {
      gemini: hasGeminiCredentials(),
    },
    engines: listTtsEngines(),
    tasks: taskQueue.getStats(),
  });
});

export default router;
