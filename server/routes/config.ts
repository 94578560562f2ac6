import { Router, Request, Response } from 'express';
import { ConfigError, toError } from '../../services/errors';
import { createLogger } from '../../services/logger';
import { configStore } from '../services/configStore';

const configLog = createLogger('ConfigRoute');

const router = Router();

router.get('/', (_req: Request, res: Response) => {
  res.json(configStore.get());
});

/**
 * Merge a nested partial config, e.g. { "timing": { "borrowRatio": 0.8 } }
 */
router.post('/', async (req: Request, res: Response) => {
  try {
    const updated = await configStore.update(req.body);
    configLog.info('Configuration updated');
    res.json({ success: true, config: updated });
  } catch (error) {
    if (error instanceof ConfigError) {
      res.status(400).json({ success: false, error: error.message });
      return;
    }
    const cause = toError(error);
    configLog.error('Failed to save configuration', cause.message);
    res.status(500).json({ success: false, error: cause.message });
  }
});

export default router;
