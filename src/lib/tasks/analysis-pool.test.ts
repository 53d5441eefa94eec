import { describe, expect, it, vi } from 'vitest';
import { AnalysisPool, type AnalysisPoolOptions } from './analysis-pool';
import { toTaskDocuments } from './task-processor';
import { EventHub } from '../events/event-hub';
import { MemoryTaskStore } from '../services/storage.service';
import type { AnalysisSummary, ClassificationVerdict } from '../types';
import { deferred, drain, listing, makeDocuments, scriptedClassifier, silentLogger, sleep } from '../../test/fakes';

class FailingRecordStore extends MemoryTaskStore {
  async saveRecord(): Promise<void> {
    throw new Error('write rejected');
  }
}

const noMatch: ClassificationVerdict = { matched: false };

function createPool(overrides: Partial<AnalysisPoolOptions> & Pick<AnalysisPoolOptions, 'classifier'>) {
  const hub = overrides.hub ?? new EventHub({ logger: silentLogger });
  const store = overrides.store ?? new MemoryTaskStore();
  const pool = new AnalysisPool({ logger: silentLogger, ...overrides, hub, store });
  return { pool, hub, store };
}

describe('AnalysisPool', () => {
  it('never runs more classifications at once than its concurrency', async () => {
    let live = 0;
    let maxLive = 0;
    const classifier = scriptedClassifier(async text => {
      live++;
      maxLive = Math.max(maxLive, live);
      await sleep(text.length % 6);
      live--;
      return noMatch;
    });
    const { pool } = createPool({ classifier, concurrency: 3 });

    const summary = await pool.run(1, toTaskDocuments(1, makeDocuments(30)));

    expect(maxLive).toBe(3);
    expect(classifier.calls).toHaveLength(30);
    expect(summary).toEqual({ total: 30, processed: 30, matched: 0, failed: 0, skipped: 0 });
  });

  it('counts matches and failures without failing the batch', async () => {
    const classifier = scriptedClassifier(text => {
      if (text === 'text of note-2') throw new Error('classifier reply is not JSON');
      if (text === 'text of note-1' || text === 'text of note-3') {
        return { matched: true, fields: listing({ eventName: `Show for ${text}` }) };
      }
      return noMatch;
    });
    const { pool, hub, store } = createPool({ classifier });
    const events = hub.subscribe('all');

    const summary = await pool.run(1, toTaskDocuments(1, makeDocuments(5)));

    expect(summary).toEqual({ total: 5, processed: 5, matched: 2, failed: 1, skipped: 0 });

    const records = await store.listRecords({ taskId: 1 });
    expect(records.map(record => record.documentId).sort()).toEqual(['note-1', 'note-3']);
    expect(records.every(record => record.taskId === 1)).toBe(true);

    const found = (await drain(events)).filter(event => event.type === 'record_found');
    expect(found).toHaveLength(2);
  });

  it('builds the record from the note and the extracted fields', async () => {
    const fields = listing({ eventName: 'Harbor Lights Tour', city: 'Shanghai', eventDate: '2026-05-01', price: '880' });
    const classifier = scriptedClassifier(() => ({ matched: true, fields }));
    const { pool, store } = createPool({ classifier });

    await pool.run(7, toTaskDocuments(7, makeDocuments(1)));

    const [record] = await store.listRecords();
    expect(record).toMatchObject({
      ...fields,
      taskId: 7,
      documentId: 'note-1',
      documentUrl: 'https://notes.example/note-1'
    });
    expect(record?.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('reports progress every interval and at the end', async () => {
    const classifier = scriptedClassifier(() => noMatch);
    const { pool } = createPool({ classifier, concurrency: 1, progressInterval: 2 });
    const reports: AnalysisSummary[] = [];

    await pool.run(1, toTaskDocuments(1, makeDocuments(5)), { onProgress: summary => reports.push(summary) });

    expect(reports.map(report => report.processed)).toEqual([2, 4, 5]);
  });

  it('lets in-flight notes finish and skips the rest once stopped', async () => {
    const gate = deferred<ClassificationVerdict>();
    const classifier = scriptedClassifier(() => gate.promise);
    const { pool } = createPool({ classifier, concurrency: 1 });
    const controller = new AbortController();

    const running = pool.run(1, toTaskDocuments(1, makeDocuments(4)), { signal: controller.signal });
    await vi.waitFor(() => expect(classifier.calls).toHaveLength(1));

    controller.abort();
    gate.resolve({ matched: true, fields: listing({ eventName: 'In flight' }) });

    await expect(running).resolves.toEqual({ total: 4, processed: 1, matched: 1, failed: 0, skipped: 3 });
    expect(classifier.calls).toEqual(['text of note-1']);
  });

  it('sends a final progress report when the last notes are skipped', async () => {
    const gate = deferred<ClassificationVerdict>();
    const classifier = scriptedClassifier(() => gate.promise);
    const { pool } = createPool({ classifier, concurrency: 1, progressInterval: 5 });
    const controller = new AbortController();
    const reports: AnalysisSummary[] = [];

    const running = pool.run(1, toTaskDocuments(1, makeDocuments(4)), {
      signal: controller.signal,
      onProgress: summary => reports.push(summary)
    });
    await vi.waitFor(() => expect(classifier.calls).toHaveLength(1));
    controller.abort();
    gate.resolve(noMatch);
    await running;

    expect(reports).toEqual([{ total: 4, processed: 1, matched: 0, failed: 0, skipped: 3 }]);
  });

  it('does not classify anything when stopped before the run', async () => {
    const classifier = scriptedClassifier(() => noMatch);
    const { pool } = createPool({ classifier });
    const controller = new AbortController();
    controller.abort();

    const summary = await pool.run(1, toTaskDocuments(1, makeDocuments(3)), { signal: controller.signal });

    expect(summary).toEqual({ total: 3, processed: 0, matched: 0, failed: 0, skipped: 3 });
    expect(classifier.calls).toEqual([]);
  });

  it('skips notes already analyzed by an earlier task', async () => {
    const classifier = scriptedClassifier(() => noMatch);
    const { pool, store } = createPool({ classifier });
    await store.saveDocument({ id: 'note-2', text: 'text of note-2', url: 'https://notes.example/note-2', taskId: 1, createdAt: new Date() });

    const summary = await pool.run(2, toTaskDocuments(2, makeDocuments(3)));

    expect(summary.processed).toBe(3);
    expect(classifier.calls).toEqual(['text of note-1', 'text of note-3']);
    expect((await store.findDocument('note-2'))?.taskId).toBe(1);
  });

  it('classifies known notes again when skipping is disabled', async () => {
    const classifier = scriptedClassifier(() => noMatch);
    const { pool, store } = createPool({ classifier, skipKnownDocuments: false });
    await store.saveDocument({ id: 'note-1', text: 'text of note-1', url: 'https://notes.example/note-1', taskId: 1, createdAt: new Date() });

    await pool.run(2, toTaskDocuments(2, makeDocuments(1)));

    expect(classifier.calls).toEqual(['text of note-1']);
  });

  it('still announces a match whose record cannot be stored', async () => {
    const classifier = scriptedClassifier(() => ({ matched: true, fields: listing({ eventName: 'Unsaved' }) }));
    const { pool, hub } = createPool({ classifier, store: new FailingRecordStore() });
    const events = hub.subscribe(1);

    const summary = await pool.run(1, toTaskDocuments(1, makeDocuments(1)));

    expect(summary.matched).toBe(1);
    const [event] = await drain(events);
    expect(event?.type === 'record_found' && event.record.eventName).toBe('Unsaved');
  });
});
