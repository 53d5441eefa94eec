import { describe, expect, it, vi } from 'vitest';
import { TaskManager, canTransition } from './task-manager';
import { EventHub } from '../events/event-hub';
import { MemoryTaskStore } from '../services/storage.service';
import { DuplicateTaskError, PipelineError } from '../errors';
import type { TaskState } from '../types';
import { deferred, drain, silentLogger, statusesOf } from '../../test/fakes';

class GatedCompletionStore extends MemoryTaskStore {
  completionStarted = false;

  constructor(private readonly gate: Promise<void>) {
    super();
  }

  async updateTaskStatus(taskId: number, status: TaskState, message: string): Promise<void> {
    if (status === 'completed') {
      this.completionStarted = true;
      await this.gate;
    }
    await super.updateTaskStatus(taskId, status, message);
  }
}

class BrokenStatusStore extends MemoryTaskStore {
  async updateTaskStatus(): Promise<void> {
    throw new Error('disk full');
  }
}

function setup(store = new MemoryTaskStore()) {
  const hub = new EventHub({ logger: silentLogger });
  const tasks = new TaskManager({ hub, store, ttlMs: 1000, logger: silentLogger });
  const events = hub.subscribe('all');
  return { hub, tasks, store, events };
}

describe('canTransition', () => {
  it('follows pending -> running -> terminal', () => {
    const allowed: Array<[TaskState, TaskState]> = [
      ['pending', 'running'],
      ['running', 'completed'],
      ['running', 'failed'],
      ['running', 'stopped']
    ];
    for (const [from, to] of allowed) {
      expect(canTransition(from, to)).toBe(true);
    }

    expect(canTransition('pending', 'failed')).toBe(false);
    expect(canTransition('pending', 'stopped')).toBe(false);
    expect(canTransition('pending', 'completed')).toBe(false);
    expect(canTransition('running', 'pending')).toBe(false);
    expect(canTransition('completed', 'running')).toBe(false);
    expect(canTransition('stopped', 'failed')).toBe(false);
  });
});

describe('TaskManager', () => {
  it('assigns increasing ids', () => {
    const { tasks } = setup();
    expect(tasks.nextId()).toBe(1);
    expect(tasks.nextId()).toBe(2);

    tasks.createTask(10, 'manual id');
    expect(tasks.nextId()).toBe(11);
  });

  it('registers a pending task and announces it', async () => {
    const { tasks, events } = setup();

    const task = tasks.createTask(1, 'X concert anyone selling tickets');

    expect(task).toMatchObject({ id: 1, status: 'pending', rawQuery: 'X concert anyone selling tickets', refinedQuery: null });
    expect(await drain(events)).toEqual([
      { type: 'task_update', taskId: 1, status: 'pending', message: 'Waiting to start...', timestamp: task.lastUpdate }
    ]);
  });

  it('rejects a second task with the same id', () => {
    const { tasks } = setup();
    tasks.createTask(1, 'first');

    expect(() => tasks.createTask(1, 'second')).toThrow(DuplicateTaskError);
  });

  it('persists, records and announces each transition', async () => {
    const { tasks, store, events } = setup();
    tasks.createTask(1, 'query');
    await tasks.saveTask(1);

    await expect(tasks.transition(1, 'running', 'Refining search query...')).resolves.toBe(true);
    await expect(tasks.transition(1, 'completed', '0 documents processed, 0 matches')).resolves.toBe(true);

    const task = tasks.getTask(1);
    expect(task?.status).toBe('completed');
    expect(task?.completedAt).toBeInstanceOf(Date);
    expect(statusesOf(await drain(events))).toEqual(['pending', 'running', 'completed']);

    const [stored] = await store.listTasks();
    expect(stored).toMatchObject({ id: 1, status: 'completed', message: '0 documents processed, 0 matches' });
  });

  it('ignores transitions that leave a terminal state', async () => {
    const { tasks, events } = setup();
    tasks.createTask(1, 'query');
    await tasks.saveTask(1);
    await tasks.transition(1, 'running', 'running');
    await drain(events);

    const results = await Promise.all([
      tasks.transition(1, 'completed', 'done'),
      tasks.transition(1, 'stopped', 'stopped'),
      tasks.transition(1, 'failed', 'failed')
    ]);

    expect(results).toEqual([true, false, false]);
    expect(tasks.getTask(1)?.status).toBe('completed');
    expect(statusesOf(await drain(events))).toEqual(['completed']);
  });

  it('fails the transition when the status cannot be persisted', async () => {
    const { tasks, events } = setup(new BrokenStatusStore());
    tasks.createTask(1, 'query');
    await tasks.saveTask(1);

    await expect(tasks.transition(1, 'running', 'running')).rejects.toThrow(PipelineError);
    await expect(tasks.transition(1, 'running', 'running')).rejects.toThrow('Status update failed: disk full');
    expect(tasks.getTask(1)?.status).toBe('pending');

    // A failure is still recorded even if it cannot be persisted
    await expect(tasks.fail(1, 'Status update failed: disk full')).resolves.toBe(true);
    expect(tasks.getTask(1)).toMatchObject({ status: 'failed', message: 'Status update failed: disk full' });
    expect(statusesOf(await drain(events))).toEqual(['pending', 'running', 'failed']);
  });

  it('fails a running task directly and ignores a finished one', async () => {
    const { tasks, events } = setup();
    tasks.createTask(1, 'query');
    await tasks.saveTask(1);
    await tasks.transition(1, 'running', 'running');

    await expect(tasks.fail(1, 'Note search failed: HTTP 502')).resolves.toBe(true);
    await expect(tasks.fail(1, 'again')).resolves.toBe(false);

    expect(tasks.getTask(1)?.message).toBe('Note search failed: HTTP 502');
    expect(statusesOf(await drain(events))).toEqual(['pending', 'running', 'failed']);
  });

  it('refuses a stop once the final status is being written', async () => {
    const gate = deferred();
    const store = new GatedCompletionStore(gate.promise);
    const { tasks } = setup(store);
    tasks.createTask(1, 'query');
    await tasks.saveTask(1);
    await tasks.transition(1, 'running', 'running');

    const completing = tasks.transition(1, 'completed', '1 document processed, 0 matches');
    await vi.waitFor(() => expect(store.completionStarted).toBe(true));

    expect(tasks.getTask(1)?.status).toBe('running');
    expect(tasks.requestStop(1)).toBe(false);
    expect(tasks.getSignal(1).aborted).toBe(false);

    gate.resolve();
    await expect(completing).resolves.toBe(true);
    expect(tasks.getTask(1)?.status).toBe('completed');
  });

  it('hands out copies that share nothing with the registry', () => {
    const { tasks } = setup();
    const created = tasks.createTask(1, 'query');
    const createdAt = created.createdAt.getTime();

    created.createdAt.setTime(0);
    tasks.getTask(1)?.lastUpdate.setTime(0);
    tasks.getAllTasks()[0]?.createdAt.setTime(0);

    expect(tasks.getTask(1)?.createdAt.getTime()).toBe(createdAt);
    expect(tasks.getTask(1)?.lastUpdate.getTime()).toBe(createdAt);
  });

  it('raises the stop flag once for a live task', async () => {
    const { tasks } = setup();
    expect(tasks.requestStop(42)).toBe(false);

    tasks.createTask(1, 'query');
    await tasks.saveTask(1);
    await tasks.transition(1, 'running', 'running');

    expect(tasks.requestStop(1)).toBe(true);
    expect(tasks.getSignal(1).aborted).toBe(true);
    expect(tasks.requestStop(1)).toBe(false);
  });

  it('treats a stop request on a finished task as a no-op', async () => {
    const { tasks } = setup();
    tasks.createTask(1, 'query');
    await tasks.saveTask(1);
    await tasks.transition(1, 'running', 'running');
    await tasks.transition(1, 'completed', 'done');

    expect(tasks.requestStop(1)).toBe(false);
    expect(tasks.getSignal(1).aborted).toBe(false);
  });

  it('announces progress only while running', async () => {
    const { tasks, events } = setup();
    tasks.createTask(1, 'query');
    await tasks.saveTask(1);

    expect(tasks.reportProgress(1, 'too early')).toBe(false);
    await tasks.transition(1, 'running', 'running');
    expect(tasks.reportProgress(1, 'Found 3 notes, analyzing...', { documentsFound: 3 })).toBe(true);

    expect(tasks.getTask(1)).toMatchObject({ status: 'running', message: 'Found 3 notes, analyzing...', documentsFound: 3 });
    const messages = (await drain(events)).map(event => event.type === 'task_update' && event.message);
    expect(messages).toEqual(['Waiting to start...', 'running', 'Found 3 notes, analyzing...']);
  });

  it('cleans up finished tasks past their time to live', async () => {
    const { tasks } = setup();
    tasks.createTask(1, 'finished');
    await tasks.saveTask(1);
    await tasks.transition(1, 'running', 'running');
    await tasks.transition(1, 'failed', 'failed');
    tasks.createTask(2, 'still running');
    await tasks.saveTask(2);
    await tasks.transition(2, 'running', 'running');

    const later = Date.now() + 5000;

    expect(tasks.cleanupOldTasks(later)).toBe(1);
    expect(tasks.getTask(1)).toBeUndefined();
    expect(tasks.getTask(2)?.status).toBe('running');
    expect(tasks.deleteTask(2)).toBe(false);
  });
});
