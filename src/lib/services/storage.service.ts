import type { ExtractedRecord, NoteDocument, RecordQuery, TaskState, TaskStatus } from '../types';
import { isTerminal } from '../types';

/**
 * Durable storage used by the pipeline. Writes are expected to be idempotent.
 */
export interface TaskStore {
  saveTask(task: TaskStatus): Promise<void>;
  updateTaskStatus(taskId: number, status: TaskState, message: string): Promise<void>;
  listTasks(limit?: number): Promise<TaskStatus[]>;
  saveDocument(document: NoteDocument): Promise<void>;
  findDocument(documentId: string): Promise<NoteDocument | null>;
  saveRecord(record: ExtractedRecord): Promise<void>;
  listRecords(query?: RecordQuery): Promise<ExtractedRecord[]>;
  searchRecords(text: string, limit?: number): Promise<ExtractedRecord[]>;
}

const DEFAULT_TASK_LIMIT = 20;
const DEFAULT_RECORD_LIMIT = 50;

function newestFirst<T extends { createdAt: Date }>(a: T, b: T): number {
  return b.createdAt.getTime() - a.createdAt.getTime();
}

/**
 * Process-local store, used when no database is configured and in tests.
 * Values are copied in and out, as a database would.
 */
export class MemoryTaskStore implements TaskStore {
  private tasks: Map<number, TaskStatus> = new Map();
  private documents: Map<string, NoteDocument> = new Map();
  private records: Map<string, ExtractedRecord> = new Map();

  async saveTask(task: TaskStatus): Promise<void> {
    this.tasks.set(task.id, structuredClone(task));
  }

  async updateTaskStatus(taskId: number, status: TaskState, message: string): Promise<void> {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new Error(`Task ${taskId} is not stored`);
    }

    const now = new Date();
    Object.assign(task, {
      status,
      message,
      lastUpdate: now,
      completedAt: isTerminal(status) ? now : null
    });
  }

  async listTasks(limit = DEFAULT_TASK_LIMIT): Promise<TaskStatus[]> {
    return Array.from(this.tasks.values())
      .sort((a, b) => b.id - a.id)
      .slice(0, limit)
      .map(task => structuredClone(task));
  }

  async saveDocument(document: NoteDocument): Promise<void> {
    // First writer keeps the note; a note is owned by the task that found it
    if (!this.documents.has(document.id)) {
      this.documents.set(document.id, structuredClone(document));
    }
  }

  async findDocument(documentId: string): Promise<NoteDocument | null> {
    const document = this.documents.get(documentId);
    return document ? structuredClone(document) : null;
  }

  async saveRecord(record: ExtractedRecord): Promise<void> {
    const duplicate = Array.from(this.records.values()).some(
      existing => existing.documentId === record.documentId && existing.id !== record.id
    );
    if (duplicate) {
      throw new Error(`Note ${record.documentId} already has a record`);
    }
    this.records.set(record.id, structuredClone(record));
  }

  async listRecords(query: RecordQuery = {}): Promise<ExtractedRecord[]> {
    const { taskId, limit = DEFAULT_RECORD_LIMIT } = query;
    return Array.from(this.records.values())
      .filter(record => taskId === undefined || record.taskId === taskId)
      .sort(newestFirst)
      .slice(0, limit)
      .map(record => structuredClone(record));
  }

  async searchRecords(text: string, limit = DEFAULT_RECORD_LIMIT): Promise<ExtractedRecord[]> {
    const needle = text.trim().toLowerCase();
    if (!needle) return [];

    return Array.from(this.records.values())
      .filter(record =>
        [record.eventName, record.area, record.notes].some(field => field.toLowerCase().includes(needle))
      )
      .sort(newestFirst)
      .slice(0, limit)
      .map(record => structuredClone(record));
  }
}
