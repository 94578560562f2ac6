import { Router, Request, Response } from 'express';
import { createLogger } from '../../services/logger';
import { isTerminalStatus, type TaskProgress } from '../types/dubbingTask';
import { taskQueue } from '../services/taskQueue/index';

const taskLog = createLogger('TaskRoute');

const router = Router();

router.get('/', (_req: Request, res: Response) => {
  res.json({ tasks: taskQueue.listTasks(), stats: taskQueue.getStats() });
});

/**
 * Task status
 */
router.get('/:taskId', (req: Request, res: Response) => {
  const task = taskQueue.getTask(req.params.taskId);
  if (!task) {
    res.status(404).json({ error: 'Task not found' });
    return;
  }
  res.json(task);
});

/**
 * Cancel a task. Repeating the call on a cancelled task succeeds;
 * finished tasks answer 409.
 */
router.post('/:taskId/cancel', (req: Request, res: Response) => {
  const result = taskQueue.cancel(req.params.taskId);
  if (result.accepted) {
    res.json({ success: true, task: result.task });
    return;
  }
  if (result.reason === 'not_found') {
    res.status(404).json({ success: false, error: 'Task not found' });
    return;
  }
  res.status(409).json({
    success: false,
    error: `Task already ${result.task?.status ?? 'finished'}`,
    task: result.task,
  });
});

/**
 * SSE progress stream
 */
router.get('/:taskId/events', (req: Request, res: Response) => {
  const { taskId } = req.params;
  if (!taskQueue.getTask(taskId)) {
    res.status(404).json({ error: 'Task not found' });
    return;
  }

  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');

  const sendProgress = (progress: TaskProgress) => {
    res.write(`data: ${JSON.stringify(progress)}\n\n`);
  };

  // Keep-alive ping every 30 seconds
  const keepAlive = setInterval(() => {
    res.write(': ping\n\n');
  }, 30000);

  const unsubscribe = taskQueue.subscribe(taskId, (progress) => {
    sendProgress(progress);

    // Close connection on terminal states
    if (isTerminalStatus(progress.status)) {
      clearInterval(keepAlive);
      setTimeout(() => res.end(), 100);
    }
  });

  // Handle client disconnect
  req.on('close', () => {
    clearInterval(keepAlive);
    unsubscribe();
    taskLog.debug(`SSE client disconnected for task ${taskId}`);
  });
});

export default router;
