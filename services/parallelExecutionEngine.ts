/**
 * Parallel Execution Engine
 *
 * Runs a batch of async tasks with controlled concurrency, progress tracking
 * and cancellation support.
 *
 * Features:
 * - Worker pool with configurable concurrency
 * - Results returned in submission order, whatever order tasks finish in
 * - Task state tracking (queued, in-progress, completed, failed, cancelled)
 * - Stop-dispatch on cancellation or on the first failure (fail-fast)
 * - Progress event emission after every finished task
 */

import { toError } from './errors';
import { createLogger } from './logger';

const poolLogger = createLogger('Pool');

// ============================================================================
// Types and Interfaces
// ============================================================================

export type TaskState = 'queued' | 'in-progress' | 'completed' | 'failed' | 'cancelled';

export interface ExecutionOptions {
  concurrencyLimit: number;
  /** Stop dispatching queued tasks once one fails */
  stopOnFailure?: boolean;
  /** Checked before every dispatch; in-flight tasks are never interrupted */
  signal?: AbortSignal;
  onProgress?: (progress: ExecutionProgress) => void;
}

export type TaskResult<T> =
  | { position: number; state: 'completed'; data: T; duration: number }
  | { position: number; state: 'failed'; error: Error; duration: number }
  | { position: number; state: 'cancelled' };

export interface ExecutionProgress {
  executionId: string;
  totalTasks: number;
  completedTasks: number;
  failedTasks: number;
  inProgressTasks: number;
  queuedTasks: number;
}

interface TaskMetadata<T> {
  position: number;
  execute: () => Promise<T>;
  state: TaskState;
}

// ============================================================================
// Parallel Execution Engine
// ============================================================================

export class ParallelExecutionEngine {
  private executionId = '';
  private taskQueue: TaskMetadata<unknown>[] = [];
  private inProgress = 0;
  private completed = 0;
  private failed = 0;
  private total = 0;
  private halted = false;

  /**
   * Execute tasks with at most `concurrencyLimit` running at once.
   * `results[i]` always belongs to `tasks[i]`.
   */
  async execute<T>(tasks: Array<() => Promise<T>>, options: ExecutionOptions): Promise<TaskResult<T>[]> {
    this.executionId = `exec_${Date.now()}_${Math.random().toString(36).substring(2, 8)}`;
    this.halted = false;
    this.inProgress = 0;
    this.completed = 0;
    this.failed = 0;
    this.total = tasks.length;

    const queue: TaskMetadata<T>[] = tasks.map((execute, position) => ({
      position,
      execute,
      state: 'queued',
    }));
    this.taskQueue = queue;

    const results: Array<TaskResult<T> | undefined> = new Array(tasks.length).fill(undefined);
    const limit = Math.max(1, Math.floor(options.concurrencyLimit));

    // Start worker pool
    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(limit, tasks.length); i++) {
      workers.push(this.worker(queue, results, options));
    }
    await Promise.all(workers);

    return results.map((result, position) => result ?? { position, state: 'cancelled' as const });
  }

  /** Stop dispatching queued tasks. In-flight tasks run to completion. */
  cancel(): void {
    this.halted = true;
  }

  getProgress(): ExecutionProgress {
    return {
      executionId: this.executionId,
      totalTasks: this.total,
      completedTasks: this.completed,
      failedTasks: this.failed,
      inProgressTasks: this.inProgress,
      queuedTasks: this.taskQueue.length,
    };
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private shouldStop(options: ExecutionOptions): boolean {
    return this.halted || options.signal?.aborted === true;
  }

  private async worker<T>(
    queue: TaskMetadata<T>[],
    results: Array<TaskResult<T> | undefined>,
    options: ExecutionOptions
  ): Promise<void> {
    while (!this.shouldStop(options)) {
      const metadata = queue.shift();
      if (!metadata) break;
      results[metadata.position] = await this.executeTask(metadata, options);
    }
  }

  private async executeTask<T>(metadata: TaskMetadata<T>, options: ExecutionOptions): Promise<TaskResult<T>> {
    metadata.state = 'in-progress';
    this.inProgress++;
    const startTime = Date.now();

    let result: TaskResult<T>;
    try {
      const data = await metadata.execute();
      metadata.state = 'completed';
      this.completed++;
      result = { position: metadata.position, state: 'completed', data, duration: Date.now() - startTime };
    } catch (thrown) {
      metadata.state = 'failed';
      this.failed++;
      if (options.stopOnFailure) {
        this.halted = true;
      }
      result = { position: metadata.position, state: 'failed', error: toError(thrown), duration: Date.now() - startTime };
    } finally {
      this.inProgress--;
    }

    this.emitProgress(options);
    return result;
  }

  private emitProgress(options: ExecutionOptions): void {
    if (!options.onProgress) return;
    try {
      options.onProgress(this.getProgress());
    } catch (error) {
      // A misbehaving listener must not break the batch
      poolLogger.warn('Progress listener threw', toError(error).message);
    }
  }
}

// ============================================================================
// Concurrency Limiter
// ============================================================================

/**
 * Bounds how many calls run at once across independent callers.
 * Waiters are served in FIFO order.
 */
export class ConcurrencyLimiter {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.waiters.length;
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.waiters.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  private release(): void {
    this.active--;
    const next = this.waiters.shift();
    next?.();
  }
}
