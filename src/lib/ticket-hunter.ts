import type { ReadableStream } from 'node:stream/web';
import type { ExtractedRecord, RecordQuery, SubscriptionFilter, TaskStatus } from './types';
import { EventHub, type Subscription } from './events/event-hub';
import { createEventStream } from './events/sse';
import { MemoryTaskStore, type TaskStore } from './services/storage.service';
import type { Classifier } from './services/classifier.service';
import { createLlmClassifier } from './services/classifier.service';
import type { QueryRefiner } from './services/query-refiner.service';
import { createLlmQueryRefiner } from './services/query-refiner.service';
import type { DocumentSource } from './services/note-search.service';
import { createMcpNoteSource } from './services/note-search.service';
import { AnalysisPool } from './tasks/analysis-pool';
import { TaskManager } from './tasks/task-manager';
import { processSearchTask } from './tasks/task-processor';
import { describeError } from './errors';
import { getEnv, type Env } from './env';
import { createLogger, type Logger } from './logger';

export interface TicketHunterDependencies {
  refiner: QueryRefiner;
  source: DocumentSource;
  classifier: Classifier;
  store?: TaskStore;
  hub?: EventHub;
  concurrency?: number;
  progressInterval?: number;
  skipKnownDocuments?: boolean;
  taskTtlMs?: number;
  /** Heartbeat interval of streams opened with streamEvents */
  heartbeatMs?: number;
  /** Interval of the finished-task cleanup sweep; 0 disables it */
  cleanupIntervalMs?: number;
  logger?: Logger;
}

export interface TicketHunter {
  readonly hub: EventHub;
  /** Start a search task in the background and return its id */
  startTask(rawQuery: string): number;
  /** Ask a task to stop; false when there is nothing to stop */
  stopTask(taskId: number): boolean;
  subscribe(filter?: SubscriptionFilter): Subscription;
  unsubscribe(subscription: Subscription): void;
  /** Subscribe and serve the events as a `text/event-stream` body */
  streamEvents(filter?: SubscriptionFilter): ReadableStream<Uint8Array>;
  getTask(taskId: number): TaskStatus | undefined;
  listTasks(): TaskStatus[];
  listRecords(query?: RecordQuery): Promise<ExtractedRecord[]>;
  searchRecords(text: string): Promise<ExtractedRecord[]>;
  /** Resolves with the task once it reaches a terminal state */
  waitForTask(taskId: number): Promise<TaskStatus | undefined>;
  /** Stop every live task, wait for them and close all subscriptions */
  shutdown(): Promise<void>;
}

export function createTicketHunter(deps: TicketHunterDependencies): TicketHunter {
  const logger = deps.logger ?? createLogger('ticket-hunter');
  const hub = deps.hub ?? new EventHub({ logger });
  const store = deps.store ?? new MemoryTaskStore();
  const tasks = new TaskManager({ hub, store, ttlMs: deps.taskTtlMs, logger });
  const pool = new AnalysisPool({
    classifier: deps.classifier,
    store,
    hub,
    concurrency: deps.concurrency,
    progressInterval: deps.progressInterval,
    skipKnownDocuments: deps.skipKnownDocuments,
    logger
  });
  const runs = new Map<number, Promise<TaskStatus | undefined>>();

  const cleanupIntervalMs = deps.cleanupIntervalMs ?? 10 * 60 * 1000;
  if (cleanupIntervalMs > 0) {
    tasks.startCleanup(cleanupIntervalMs);
  }

  return {
    hub,

    startTask(rawQuery: string): number {
      const taskId = tasks.nextId();

      const run = processSearchTask(
        { taskId, rawQuery },
        { tasks, refiner: deps.refiner, source: deps.source, pool, logger }
      )
        .catch(error => {
          logger.error({ taskId, err: describeError(error) }, 'Task could not run');
          return tasks.getTask(taskId);
        })
        .finally(() => {
          runs.delete(taskId);
        });

      runs.set(taskId, run);
      return taskId;
    },

    stopTask(taskId: number): boolean {
      return tasks.requestStop(taskId);
    },

    subscribe(filter: SubscriptionFilter = 'all'): Subscription {
      return hub.subscribe(filter);
    },

    unsubscribe(subscription: Subscription): void {
      hub.unsubscribe(subscription);
    },

    streamEvents(filter: SubscriptionFilter = 'all'): ReadableStream<Uint8Array> {
      return createEventStream(hub.subscribe(filter), { heartbeatMs: deps.heartbeatMs });
    },

    getTask(taskId: number): TaskStatus | undefined {
      return tasks.getTask(taskId);
    },

    listTasks(): TaskStatus[] {
      return tasks.getAllTasks();
    },

    listRecords(query?: RecordQuery): Promise<ExtractedRecord[]> {
      return store.listRecords(query);
    },

    searchRecords(text: string): Promise<ExtractedRecord[]> {
      return store.searchRecords(text);
    },

    async waitForTask(taskId: number): Promise<TaskStatus | undefined> {
      const run = runs.get(taskId);
      return run ? run : tasks.getTask(taskId);
    },

    async shutdown(): Promise<void> {
      tasks.stopCleanup();
      for (const taskId of tasks.getLiveTaskIds()) {
        tasks.requestStop(taskId);
      }
      await Promise.all(runs.values());
      hub.close();
    }
  };
}

/**
 * Wire the production collaborators from configuration
 */
export function createDefaultTicketHunter(env: Env = getEnv(), logger?: Logger): TicketHunter {
  const llm = { apiUrl: env.LLM_API_URL, apiKey: env.LLM_API_KEY, model: env.LLM_MODEL };
  let root = logger;
  if (!root) {
    root = createLogger('ticket-hunter');
    root.level = env.LOG_LEVEL;
  }

  return createTicketHunter({
    refiner: createLlmQueryRefiner(llm, { timeoutMs: env.REFINE_TIMEOUT_MS, logger: root }),
    classifier: createLlmClassifier(llm, { timeoutMs: env.CLASSIFY_TIMEOUT_MS }),
    source: createMcpNoteSource({
      mcpUrl: env.NOTE_SEARCH_MCP_URL,
      noteUrlBase: env.NOTE_URL_BASE,
      timeoutMs: env.SEARCH_TIMEOUT_MS,
      logger: root
    }),
    hub: new EventHub({
      bufferSize: env.SUBSCRIBER_BUFFER_SIZE,
      graceMs: env.SUBSCRIPTION_GRACE_MS,
      logger: root
    }),
    concurrency: env.ANALYSIS_CONCURRENCY,
    progressInterval: env.PROGRESS_INTERVAL,
    taskTtlMs: env.TASK_TTL_MS,
    heartbeatMs: env.SSE_HEARTBEAT_MS,
    logger: root
  });
}
