import type { AnalysisSummary, NoteDocument, SourceDocument, TaskState, TaskStatus } from '../types';
import type { TaskManager } from './task-manager';
import type { AnalysisPool } from './analysis-pool';
import type { QueryRefiner } from '../services/query-refiner.service';
import type { DocumentSource } from '../services/note-search.service';
import { PipelineError, describeError } from '../errors';
import { createLogger, type Logger } from '../logger';

export interface ProcessSearchParams {
  taskId: number;
  rawQuery: string;
}

export interface ProcessorDependencies {
  tasks: TaskManager;
  refiner: QueryRefiner;
  source: DocumentSource;
  pool: AnalysisPool;
  logger?: Logger;
}

function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

/**
 * Final message of a finished analysis, e.g. "3 documents processed, 1 match"
 */
export function formatSummary(summary: Pick<AnalysisSummary, 'processed' | 'matched'>): string {
  return `${plural(summary.processed, 'document')} processed, ${plural(summary.matched, 'match', 'matches')}`;
}

/**
 * Bind a provider batch to a task, dropping repeated note ids
 */
export function toTaskDocuments(taskId: number, batch: SourceDocument[]): NoteDocument[] {
  const seen = new Set<string>();
  const documents: NoteDocument[] = [];
  const createdAt = new Date();

  for (const item of batch) {
    if (seen.has(item.id)) continue;
    seen.add(item.id);
    documents.push({ ...item, taskId, createdAt });
  }

  return documents;
}

async function refineQuery(refiner: QueryRefiner, rawQuery: string, logger: Logger): Promise<string> {
  try {
    const refined = (await refiner.refine(rawQuery)).trim();
    return refined || rawQuery;
  } catch (error) {
    logger.warn({ err: describeError(error) }, 'Query refinement failed, using raw query');
    return rawQuery;
  }
}

/**
 * Run one search task from registration to a terminal state.
 * Rejects only when the task id is already taken; every other outcome is
 * recorded on the task and announced through the event hub.
 */
export async function processSearchTask(params: ProcessSearchParams, deps: ProcessorDependencies): Promise<TaskStatus | undefined> {
  const { taskId, rawQuery } = params;
  const { tasks, refiner, source, pool } = deps;
  const logger = (deps.logger ?? createLogger('task-processor')).child({ taskId });

  tasks.createTask(taskId, rawQuery);
  const signal = tasks.getSignal(taskId);

  const finish = async (state: TaskState, message: string): Promise<TaskStatus | undefined> => {
    await tasks.transition(taskId, state, message);
    return tasks.getTask(taskId);
  };

  try {
    await tasks.saveTask(taskId);
    await tasks.transition(taskId, 'running', 'Refining search query...');

    // Refinement never fails the task
    const refinedQuery = await refineQuery(refiner, rawQuery, logger);
    logger.info({ rawQuery, refinedQuery }, 'Search query ready');
    tasks.reportProgress(
      taskId,
      refinedQuery === rawQuery
        ? `Searching notes for "${refinedQuery}"...`
        : `Searching notes for "${refinedQuery}" (refined from "${rawQuery}")...`,
      { refinedQuery }
    );

    if (signal.aborted) {
      return await finish('stopped', 'Stopped before note search');
    }

    let batch: SourceDocument[];
    try {
      batch = await source.search(refinedQuery);
    } catch (error) {
      throw new PipelineError('search', error);
    }

    const documents = toTaskDocuments(taskId, batch);
    logger.info({ count: documents.length }, 'Notes found');

    if (signal.aborted) {
      return await finish('stopped', `Stopped before analysis, ${plural(documents.length, 'note')} found`);
    }

    tasks.reportProgress(taskId, `Found ${plural(documents.length, 'note')}, analyzing...`, {
      documentsFound: documents.length
    });

    let summary: AnalysisSummary;
    try {
      summary = await pool.run(taskId, documents, {
        signal,
        onProgress: progress => {
          tasks.reportProgress(
            taskId,
            `Processed ${progress.processed}/${progress.total} notes, ${plural(progress.matched, 'match', 'matches')} found`,
            { documentsProcessed: progress.processed, recordsFound: progress.matched }
          );
        }
      });
    } catch (error) {
      throw new PipelineError('analysis', error);
    }

    tasks.updateTask(taskId, { documentsProcessed: summary.processed, recordsFound: summary.matched });

    // A stop that arrives before the terminal state is recorded wins
    if (signal.aborted) {
      return await finish('stopped', `Stopped after ${summary.processed} of ${plural(summary.total, 'document')} processed, ${plural(summary.matched, 'match', 'matches')}`);
    }

    return await finish('completed', formatSummary(summary));
  } catch (error) {
    const failure = error instanceof PipelineError ? error : new PipelineError('pipeline', error);
    logger.error({ stage: failure.stage, err: failure.message }, 'Task failed');

    try {
      await tasks.fail(taskId, failure.message);
    } catch (transitionError) {
      logger.error({ err: describeError(transitionError) }, 'Could not record task failure');
    }
    return tasks.getTask(taskId);
  }
}
