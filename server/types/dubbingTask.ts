/**
 * Dubbing Task Type Definitions
 */

/**
 * Task status state machine:
 * queued → processing → completed
 *    ↓          ↓
 * cancelled   failed | cancelled
 *
 * Terminal states never change again.
 */
export type TaskStatus =
  | 'queued'
  | 'processing'
  | 'completed'
  | 'failed'
  | 'cancelled';

export type TaskKind = 'dubbing' | 'optimization';

const ALLOWED_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  queued: ['processing', 'cancelled', 'failed'],
  processing: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function isTerminalStatus(status: TaskStatus): boolean {
  return ALLOWED_TRANSITIONS[status].length === 0;
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Outcome summary stored on a finished task
 */
export interface TaskSummary {
  cueCount: number;
  durationMs?: number;
  timeBorrowed?: number;
  simplified?: number;
  stillShort?: number;
  skippedSegments?: number;
}

export interface DubbingTask {
  taskId: string;
  kind: TaskKind;
  status: TaskStatus;
  progress: number; // 0-100
  message: string;

  createdAt: number;
  startedAt?: number;
  completedAt?: number;

  resultPath?: string;
  resultUrl?: string;
  summary?: TaskSummary;

  error?: string;
  errorCode?: string;
  /** Cue that caused a synthesis failure */
  failedCueIndex?: number;
}

/**
 * Task progress information sent via SSE and status polling
 */
export interface TaskProgress {
  taskId: string;
  kind: TaskKind;
  status: TaskStatus;
  progress: number;
  message: string;
  resultUrl?: string;
  summary?: TaskSummary;
  error?: string;
  failedCueIndex?: number;
}

export type TaskProgressCallback = (progress: TaskProgress) => void;

/**
 * Generate a unique task ID
 */
export function generateTaskId(): string {
  const timestamp = Date.now();
  const random = Math.random().toString(36).substring(2, 10);
  return `task_${timestamp}_${random}`;
}

export function createDubbingTask(kind: TaskKind, taskId: string = generateTaskId()): DubbingTask {
  return {
    taskId,
    kind,
    status: 'queued',
    progress: 0,
    message: 'Queued',
    createdAt: Date.now(),
  };
}
