import type { TaskProgress, TaskState, TaskStatus } from '../types';
import { isTerminal } from '../types';
import type { EventHub } from '../events/event-hub';
import type { TaskStore } from '../services/storage.service';
import { DuplicateTaskError, PipelineError, TaskNotFoundError, describeError } from '../errors';
import { createLogger, type Logger } from '../logger';

const ALLOWED_TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  pending: ['running'],
  running: ['completed', 'failed', 'stopped'],
  completed: [],
  failed: [],
  stopped: []
};

export function canTransition(from: TaskState, to: TaskState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Copy of a task that shares nothing with the registry
 */
function snapshot(task: TaskStatus): TaskStatus {
  return {
    ...task,
    createdAt: new Date(task.createdAt),
    completedAt: task.completedAt ? new Date(task.completedAt) : null,
    lastUpdate: new Date(task.lastUpdate)
  };
}

export interface TaskManagerOptions {
  hub: EventHub;
  store: TaskStore;
  /** Terminal tasks older than this are dropped by the cleanup sweep */
  ttlMs?: number;
  logger?: Logger;
}

/**
 * Task Manager - owns the task registry and is the single writer of task status
 */
export class TaskManager {
  private tasks: Map<number, TaskStatus> = new Map();
  private controllers: Map<number, AbortController> = new Map();
  private chains: Map<number, Promise<void>> = new Map();
  // Tasks with a terminal transition queued; a stop can no longer change the outcome
  private finishing: Set<number> = new Set();
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;
  private lastId = 0;
  private readonly hub: EventHub;
  private readonly store: TaskStore;
  private readonly ttlMs: number;
  private readonly logger: Logger;

  constructor(options: TaskManagerOptions) {
    this.hub = options.hub;
    this.store = options.store;
    this.ttlMs = options.ttlMs ?? 60 * 60 * 1000;
    this.logger = options.logger ?? createLogger('task-manager');
  }

  /**
   * Reserve the next task id
   */
  nextId(): number {
    this.lastId += 1;
    return this.lastId;
  }

  /**
   * Register a new task in `pending` and announce it
   */
  createTask(taskId: number, rawQuery: string): TaskStatus {
    if (this.tasks.has(taskId)) {
      throw new DuplicateTaskError(taskId);
    }
    this.lastId = Math.max(this.lastId, taskId);

    const now = new Date();
    const task: TaskStatus = {
      id: taskId,
      rawQuery,
      refinedQuery: null,
      status: 'pending',
      message: 'Waiting to start...',
      documentsFound: 0,
      documentsProcessed: 0,
      recordsFound: 0,
      createdAt: now,
      completedAt: null,
      lastUpdate: now
    };

    this.tasks.set(taskId, task);
    this.controllers.set(taskId, new AbortController());
    this.publishUpdate(task);
    return snapshot(task);
  }

  /**
   * Persist a registered task. Failure here means the task cannot run.
   */
  async saveTask(taskId: number): Promise<void> {
    const task = this.requireTask(taskId);
    try {
      await this.store.saveTask(snapshot(task));
    } catch (error) {
      throw new PipelineError('setup', error);
    }
  }

  /**
   * Get a task by ID
   */
  getTask(taskId: number): TaskStatus | undefined {
    const task = this.tasks.get(taskId);
    return task ? snapshot(task) : undefined;
  }

  private requireTask(taskId: number): TaskStatus {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }

  /**
   * Cancellation signal of a task, raised by requestStop
   */
  getSignal(taskId: number): AbortSignal {
    const controller = this.controllers.get(taskId);
    if (!controller) {
      throw new TaskNotFoundError(taskId);
    }
    return controller.signal;
  }

  /**
   * Ask a running task to stop at its next checkpoint. Unknown tasks,
   * finishing or finished tasks and repeated requests are no-ops.
   */
  requestStop(taskId: number): boolean {
    const task = this.tasks.get(taskId);
    const controller = this.controllers.get(taskId);
    if (!task || !controller || isTerminal(task.status) || this.finishing.has(taskId) || controller.signal.aborted) {
      return false;
    }

    controller.abort();
    this.logger.info({ taskId }, 'Stop requested');
    return true;
  }

  /**
   * Update counters without announcing them
   */
  updateTask(taskId: number, progress: TaskProgress): void {
    const task = this.tasks.get(taskId);
    if (!task || isTerminal(task.status)) return;

    Object.assign(task, progress, { lastUpdate: new Date() });
  }

  /**
   * Announce progress of a running task. The status stays `running`.
   */
  reportProgress(taskId: number, message: string, progress: TaskProgress = {}): boolean {
    const task = this.tasks.get(taskId);
    if (!task || task.status !== 'running') return false;

    Object.assign(task, progress, { message, lastUpdate: new Date() });
    this.publishUpdate(task);
    return true;
  }

  /**
   * Move a task to its next state. The status is persisted first, then recorded
   * and announced. Transitions of one task are applied one at a time, so only the
   * first terminal transition is ever recorded; later ones resolve to false.
   * Once a terminal transition is queued, stop requests are refused.
   */
  transition(taskId: number, next: TaskState, message: string): Promise<boolean> {
    if (isTerminal(next) && this.tasks.has(taskId)) {
      this.finishing.add(taskId);
    }

    return this.serialize(taskId, async () => {
      const task = this.requireTask(taskId);
      if (!canTransition(task.status, next)) {
        this.logger.debug({ taskId, from: task.status, to: next }, 'Transition ignored');
        return false;
      }

      await this.apply(task, next, message, next === 'failed');
      return true;
    });
  }

  /**
   * Fail a task from wherever it is. A task that never started passes through
   * `running` first. Status writes that fail are logged, never thrown.
   */
  fail(taskId: number, message: string): Promise<boolean> {
    if (this.tasks.has(taskId)) {
      this.finishing.add(taskId);
    }

    return this.serialize(taskId, async () => {
      const task = this.requireTask(taskId);
      if (isTerminal(task.status)) return false;

      if (task.status === 'pending') {
        await this.apply(task, 'running', message, true);
      }
      await this.apply(task, 'failed', message, true);
      return true;
    });
  }

  /**
   * Delete a finished task
   */
  deleteTask(taskId: number): boolean {
    const task = this.tasks.get(taskId);
    if (!task || !isTerminal(task.status)) return false;

    this.controllers.delete(taskId);
    this.chains.delete(taskId);
    this.finishing.delete(taskId);
    return this.tasks.delete(taskId);
  }

  /**
   * Clean up old finished tasks
   */
  cleanupOldTasks(now = Date.now()): number {
    let cleaned = 0;

    for (const [id, task] of this.tasks) {
      const age = now - task.lastUpdate.getTime();
      if (age > this.ttlMs && this.deleteTask(id)) {
        cleaned++;
      }
    }

    if (cleaned > 0) {
      this.logger.info({ cleaned }, 'Cleaned up old tasks');
    }

    return cleaned;
  }

  /**
   * Start automatic cleanup
   */
  startCleanup(intervalMs = 10 * 60 * 1000): void {
    if (this.cleanupInterval) return;

    this.cleanupInterval = setInterval(() => {
      this.cleanupOldTasks();
    }, intervalMs);
    this.cleanupInterval.unref();
  }

  /**
   * Stop cleanup interval
   */
  stopCleanup(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }

  /**
   * All tasks, newest first
   */
  getAllTasks(): TaskStatus[] {
    return Array.from(this.tasks.values())
      .sort((a, b) => b.id - a.id)
      .map(snapshot);
  }

  /**
   * Ids of tasks that have not reached a terminal state
   */
  getLiveTaskIds(): number[] {
    return Array.from(this.tasks.values())
      .filter(task => !isTerminal(task.status))
      .map(task => task.id);
  }

  get taskCount(): number {
    return this.tasks.size;
  }

  private serialize<T>(taskId: number, work: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(taskId) ?? Promise.resolve();
    const result = previous.then(work);
    this.chains.set(
      taskId,
      result.then(
        () => undefined,
        () => undefined
      )
    );
    return result;
  }

  private async apply(task: TaskStatus, next: TaskState, message: string, tolerateWriteFailure: boolean): Promise<void> {
    try {
      await this.store.updateTaskStatus(task.id, next, message);
    } catch (error) {
      if (!tolerateWriteFailure) {
        throw new PipelineError('status', error);
      }
      this.logger.error({ taskId: task.id, status: next, err: describeError(error) }, 'Could not persist task status');
    }

    const now = new Date();
    Object.assign(task, {
      status: next,
      message,
      lastUpdate: now,
      completedAt: isTerminal(next) ? now : null
    });
    this.logger.info({ taskId: task.id, status: next, message }, 'Task status changed');
    this.publishUpdate(task);
  }

  private publishUpdate(task: TaskStatus): void {
    this.hub.publish({
      type: 'task_update',
      taskId: task.id,
      status: task.status,
      message: task.message,
      timestamp: task.lastUpdate
    });
  }
}
