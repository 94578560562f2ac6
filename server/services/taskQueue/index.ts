/**
 * Task Queue Manager
 *
 * Manages the lifecycle of dubbing and subtitle-optimization tasks:
 * - Bounded concurrent execution (queued → processing → terminal)
 * - One update path (`transition`) that refuses to leave a terminal state,
 *   so a worker finishing late cannot overwrite a cancellation
 * - Idempotent cancellation wired to each task's AbortController
 * - SSE progress subscriptions
 * - Retention cleanup of finished tasks
 */

import { EventEmitter } from 'events';
import { CancelledError, DubbingError, SynthesisError, toError } from '../../../services/errors';
import { createLogger } from '../../../services/logger';
import {
  canTransition,
  createDubbingTask,
  isTerminalStatus,
  type DubbingTask,
  type TaskKind,
  type TaskProgress,
  type TaskProgressCallback,
  type TaskStatus,
  type TaskSummary,
} from '../../types/dubbingTask';

const log = createLogger('TaskQueue');

// Maximum concurrently running tasks
export const MAX_CONCURRENT_TASKS = 4;

// Task retention after reaching a terminal state
const FINISHED_TASK_RETENTION_MS = 30 * 60 * 1000; // 30 minutes

export interface TaskContext {
  signal: AbortSignal;
  reportProgress: (progress: number, message: string) => void;
}

export interface TaskOutcome {
  resultPath?: string;
  resultUrl?: string;
  summary?: TaskSummary;
  message?: string;
}

export type TaskProcessor = (task: DubbingTask, context: TaskContext) => Promise<TaskOutcome>;

export type CancelResult =
  | { accepted: true; task: DubbingTask }
  | { accepted: false; reason: 'not_found' | 'already_finished'; task?: DubbingTask };

type TaskPatch = Partial<Pick<DubbingTask,
  'progress' | 'message' | 'resultPath' | 'resultUrl' | 'summary' | 'error' | 'errorCode' | 'failedCueIndex'>>;

export interface SubmitOptions {
  /** Runs once the task holds no more resources: after its processor returns, or when cancelled while queued */
  onSettled?: (task: DubbingTask) => void;
}

export interface TaskQueueOptions {
  maxConcurrent?: number;
  retentionMs?: number;
}

export class TaskQueueManager extends EventEmitter {
  private tasks: Map<string, DubbingTask> = new Map();
  private processors: Map<string, TaskProcessor> = new Map();
  private controllers: Map<string, AbortController> = new Map();
  private settleHooks: Map<string, (task: DubbingTask) => void> = new Map();
  private subscribers: Map<string, Set<TaskProgressCallback>> = new Map();
  private processingQueue: string[] = [];
  private activeTasks: Set<string> = new Set();
  private readonly maxConcurrent: number;
  private readonly retentionMs: number;

  constructor(options: TaskQueueOptions = {}) {
    super();
    this.maxConcurrent = options.maxConcurrent ?? MAX_CONCURRENT_TASKS;
    this.retentionMs = options.retentionMs ?? FINISHED_TASK_RETENTION_MS;
  }

  /**
   * Create a task and queue it for processing
   */
  submit(kind: TaskKind, processor: TaskProcessor, options: SubmitOptions = {}): DubbingTask {
    const task = createDubbingTask(kind);
    this.tasks.set(task.taskId, task);
    this.processors.set(task.taskId, processor);
    this.controllers.set(task.taskId, new AbortController());
    if (options.onSettled) {
      this.settleHooks.set(task.taskId, options.onSettled);
    }
    this.processingQueue.push(task.taskId);

    log.info(`Created ${kind} task ${task.taskId} (${this.processingQueue.length} in queue, ${this.activeTasks.size} active)`);
    this.emitProgress(task);
    this.processNext();
    return { ...task };
  }

  /**
   * Snapshot of a task by ID
   */
  getTask(taskId: string): DubbingTask | undefined {
    const task = this.tasks.get(taskId);
    return task ? { ...task } : undefined;
  }

  listTasks(): DubbingTask[] {
    return [...this.tasks.values()].map(task => ({ ...task }));
  }

  /**
   * The single path through which status changes.
   * Returns false (and changes nothing) for a transition the state machine forbids.
   */
  transition(taskId: string, status: TaskStatus, patch: TaskPatch = {}): boolean {
    const task = this.tasks.get(taskId);
    if (!task) {
      log.warn(`Attempted to update non-existent task ${taskId}`);
      return false;
    }
    if (!canTransition(task.status, status)) {
      log.debug(`Ignoring ${task.status} -> ${status} for task ${taskId}`);
      return false;
    }

    task.status = status;
    Object.assign(task, patch);

    switch (status) {
      case 'processing':
        task.startedAt = Date.now();
        break;

      case 'completed':
        task.progress = 100;
        task.completedAt = Date.now();
        break;

      case 'failed':
      case 'cancelled':
        task.completedAt = Date.now();
        break;
    }

    if (isTerminalStatus(status)) {
      this.scheduleCleanup(taskId);
    }

    this.emitProgress(task);
    return true;
  }

  /**
   * Update progress of a running task. Ignored once the task is terminal.
   */
  updateProgress(taskId: string, progress: number, message: string): void {
    const task = this.tasks.get(taskId);
    if (!task || isTerminalStatus(task.status)) return;

    task.progress = Math.max(0, Math.min(100, progress));
    task.message = message;
    this.emitProgress(task);
  }

  /**
   * Cancel a task. Cancelling an already-cancelled task succeeds again;
   * completed and failed tasks cannot be cancelled.
   */
  cancel(taskId: string): CancelResult {
    const task = this.tasks.get(taskId);
    if (!task) {
      return { accepted: false, reason: 'not_found' };
    }
    if (task.status === 'cancelled') {
      return { accepted: true, task: { ...task } };
    }
    if (isTerminalStatus(task.status)) {
      return { accepted: false, reason: 'already_finished', task: { ...task } };
    }

    const wasQueued = this.processingQueue.includes(taskId);
    this.processingQueue = this.processingQueue.filter(id => id !== taskId);
    this.controllers.get(taskId)?.abort();
    this.transition(taskId, 'cancelled', { message: 'Cancelled by user' });
    // A running task releases its handles when its processor returns
    if (wasQueued) {
      this.release(taskId);
      this.processNext();
    }
    log.info(`Task ${taskId} cancelled`);
    return { accepted: true, task: { ...task } };
  }

  /**
   * Subscribe to task progress updates
   */
  subscribe(taskId: string, callback: TaskProgressCallback): () => void {
    let subs = this.subscribers.get(taskId);
    if (!subs) {
      subs = new Set();
      this.subscribers.set(taskId, subs);
    }
    subs.add(callback);

    // Send current state immediately
    const task = this.tasks.get(taskId);
    if (task) {
      callback(this.createProgressEvent(task));
    }

    // Return unsubscribe function
    return () => {
      const current = this.subscribers.get(taskId);
      if (current) {
        current.delete(callback);
        if (current.size === 0) {
          this.subscribers.delete(taskId);
        }
      }
    };
  }

  /**
   * Resolves once nothing is queued or running
   */
  whenIdle(): Promise<void> {
    if (this.activeTasks.size === 0 && this.processingQueue.length === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => this.once('idle', () => resolve()));
  }

  getStats(): Record<TaskStatus, number> & { total: number; active: number; held: number } {
    const stats = { total: this.tasks.size, active: this.activeTasks.size, held: this.processors.size, queued: 0, processing: 0, completed: 0, failed: 0, cancelled: 0 };
    for (const task of this.tasks.values()) {
      stats[task.status]++;
    }
    return stats;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private processNext(): void {
    while (this.activeTasks.size < this.maxConcurrent) {
      const taskId = this.processingQueue.shift();
      if (!taskId) break;
      this.activeTasks.add(taskId);
      void this.runTask(taskId);
    }

    if (this.activeTasks.size === 0 && this.processingQueue.length === 0) {
      this.emit('idle');
    }
  }

  private async runTask(taskId: string): Promise<void> {
    const processor = this.processors.get(taskId);
    const controller = this.controllers.get(taskId);
    const task = this.tasks.get(taskId);

    try {
      if (!task || !processor || !controller || !this.transition(taskId, 'processing', { message: 'Processing' })) {
        return;
      }

      log.info(`Processing ${task.kind} task ${taskId}`);
      const outcome = await processor(
        { ...task },
        {
          signal: controller.signal,
          reportProgress: (progress, message) => {
            if (controller.signal.aborted) return;
            this.updateProgress(taskId, progress, message);
          },
        }
      );

      if (controller.signal.aborted) {
        log.info(`Task ${taskId} finished after cancellation; result discarded`);
        return;
      }
      this.transition(taskId, 'completed', { ...outcome, message: outcome.message ?? 'Completed' });
    } catch (thrown) {
      this.handleTaskError(taskId, thrown, controller?.signal.aborted ?? false);
    } finally {
      this.activeTasks.delete(taskId);
      this.release(taskId);
      this.processNext();
    }
  }

  /**
   * Drop the processor and controller of a task and run its settle hook
   */
  private release(taskId: string): void {
    this.processors.delete(taskId);
    this.controllers.delete(taskId);

    const onSettled = this.settleHooks.get(taskId);
    this.settleHooks.delete(taskId);
    const task = this.tasks.get(taskId);
    if (!onSettled || !task) return;

    try {
      onSettled({ ...task });
    } catch (error) {
      log.error(`Settle hook failed for task ${taskId}:`, toError(error).message);
    }
  }

  private handleTaskError(taskId: string, thrown: unknown, aborted: boolean): void {
    if (aborted || thrown instanceof CancelledError) {
      this.transition(taskId, 'cancelled', { message: 'Cancelled' });
      return;
    }

    const error = toError(thrown);
    log.error(`Task ${taskId} failed: ${error.message}`);
    this.transition(taskId, 'failed', {
      message: 'Failed',
      error: error.message,
      errorCode: error instanceof DubbingError ? error.code : undefined,
      failedCueIndex: error instanceof SynthesisError ? error.cueIndex : undefined,
    });
  }

  /**
   * Emit progress to all subscribers
   */
  private emitProgress(task: DubbingTask): void {
    const progress = this.createProgressEvent(task);
    const subs = this.subscribers.get(task.taskId);

    if (subs) {
      for (const callback of subs) {
        try {
          callback(progress);
        } catch (error) {
          log.error('Subscriber callback error:', toError(error).message);
        }
      }
    }

    // Also emit on EventEmitter for general listeners
    this.emit('progress', progress);
  }

  private createProgressEvent(task: DubbingTask): TaskProgress {
    return {
      taskId: task.taskId,
      kind: task.kind,
      status: task.status,
      progress: task.progress,
      message: task.message,
      resultUrl: task.resultUrl,
      summary: task.summary,
      error: task.status === 'failed' ? task.error : undefined,
      failedCueIndex: task.failedCueIndex,
    };
  }

  private scheduleCleanup(taskId: string): void {
    const timer = setTimeout(() => {
      const subs = this.subscribers.get(taskId);
      if (!subs || subs.size === 0) {
        this.tasks.delete(taskId);
        log.debug(`Cleaned up finished task ${taskId}`);
      }
    }, this.retentionMs);
    timer.unref();
  }
}

export const taskQueue = new TaskQueueManager();
