import type { ExtractedRecord } from './record';
import type { TaskState } from './task';

export interface TaskUpdateEvent {
  readonly type: 'task_update';
  readonly taskId: number;
  readonly status: TaskState;
  readonly message: string;
  readonly timestamp: Date;
}

export interface RecordFoundEvent {
  readonly type: 'record_found';
  readonly taskId: number;
  readonly record: ExtractedRecord;
  readonly timestamp: Date;
}

export type HubEvent = TaskUpdateEvent | RecordFoundEvent;

/** A task id, or every task */
export type SubscriptionFilter = number | 'all';
