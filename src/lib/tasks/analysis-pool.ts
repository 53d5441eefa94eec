import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import type { AnalysisSummary, ExtractedRecord, NoteDocument } from '../types';
import type { Classifier } from '../services/classifier.service';
import type { TaskStore } from '../services/storage.service';
import type { EventHub } from '../events/event-hub';
import { describeError } from '../errors';
import { createLogger, type Logger } from '../logger';

export interface AnalysisPoolOptions {
  classifier: Classifier;
  store: TaskStore;
  hub: EventHub;
  /** Classification calls allowed at once, per run */
  concurrency?: number;
  /** Report progress every N processed notes */
  progressInterval?: number;
  /** Skip notes already stored by an earlier task */
  skipKnownDocuments?: boolean;
  logger?: Logger;
}

export interface AnalysisRunOptions {
  signal?: AbortSignal;
  onProgress?: (summary: AnalysisSummary) => void;
}

export type DocumentOutcome = 'matched' | 'unmatched' | 'duplicate' | 'failed' | 'skipped';

export const DEFAULT_CONCURRENCY = 5;

/**
 * Classifies a batch of notes with bounded parallelism.
 * A failing note is logged and counted; it never fails the batch.
 */
export class AnalysisPool {
  readonly concurrency: number;
  private readonly progressInterval: number;
  private readonly skipKnownDocuments: boolean;
  private readonly logger: Logger;

  constructor(private readonly options: AnalysisPoolOptions) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
    this.progressInterval = Math.max(1, options.progressInterval ?? 5);
    this.skipKnownDocuments = options.skipKnownDocuments ?? true;
    this.logger = options.logger ?? createLogger('analysis-pool');
  }

  /**
   * Analyze every note of a batch. Resolves once each started note has finished;
   * notes not started when the signal is raised are counted as skipped.
   */
  async run(taskId: number, documents: NoteDocument[], runOptions: AnalysisRunOptions = {}): Promise<AnalysisSummary> {
    const { signal, onProgress } = runOptions;
    const limit = pLimit(this.concurrency);
    const summary: AnalysisSummary = {
      total: documents.length,
      processed: 0,
      matched: 0,
      failed: 0,
      skipped: 0
    };

    this.logger.info({ taskId, total: documents.length, concurrency: this.concurrency }, 'Analyzing notes');

    await Promise.all(
      documents.map(document =>
        limit(async () => {
          const outcome = await this.analyzeDocument(taskId, document, signal);

          if (outcome === 'skipped') {
            summary.skipped++;
          } else {
            summary.processed++;
            if (outcome === 'matched') summary.matched++;
            if (outcome === 'failed') summary.failed++;
          }

          // The last unit always reports, even when it was skipped
          const finished = summary.processed + summary.skipped === summary.total;
          const onInterval = outcome !== 'skipped' && summary.processed % this.progressInterval === 0;
          if (finished || onInterval) {
            onProgress?.({ ...summary });
          }
        })
      )
    );

    this.logger.info({ taskId, ...summary }, 'Analysis finished');
    return summary;
  }

  private async analyzeDocument(taskId: number, document: NoteDocument, signal?: AbortSignal): Promise<DocumentOutcome> {
    if (signal?.aborted) return 'skipped';

    const { classifier, store, hub } = this.options;

    try {
      if (this.skipKnownDocuments && (await this.isKnownElsewhere(taskId, document))) {
        this.logger.debug({ taskId, documentId: document.id }, 'Note already analyzed, skipping');
        return 'duplicate';
      }

      try {
        await store.saveDocument(document);
      } catch (error) {
        this.logger.error({ taskId, documentId: document.id, err: describeError(error) }, 'Failed to save note');
      }

      // Last checkpoint before the classification call
      if (signal?.aborted) return 'skipped';

      const verdict = await classifier.classify(document.text);
      if (!verdict.matched) return 'unmatched';

      const record: ExtractedRecord = Object.freeze({
        id: uuidv4(),
        taskId,
        documentId: document.id,
        documentUrl: document.url,
        ...verdict.fields,
        createdAt: new Date()
      });

      try {
        await store.saveRecord(record);
      } catch (error) {
        this.logger.error({ taskId, documentId: document.id, err: describeError(error) }, 'Failed to save record');
      }

      hub.publish({ type: 'record_found', taskId, record, timestamp: new Date(record.createdAt) });
      this.logger.info({ taskId, documentId: document.id, eventName: record.eventName }, 'Ticket listing found');
      return 'matched';
    } catch (error) {
      this.logger.warn({ taskId, documentId: document.id, err: describeError(error) }, 'Note analysis failed, skipping');
      return 'failed';
    }
  }

  private async isKnownElsewhere(taskId: number, document: NoteDocument): Promise<boolean> {
    try {
      const existing = await this.options.store.findDocument(document.id);
      return existing !== null && existing.taskId !== taskId;
    } catch (error) {
      this.logger.error({ taskId, documentId: document.id, err: describeError(error) }, 'Failed to look up note');
      return false;
    }
  }
}
