export type TaskState = 'pending' | 'running' | 'completed' | 'failed' | 'stopped';

export const TERMINAL_STATES: readonly TaskState[] = ['completed', 'failed', 'stopped'];

export function isTerminal(state: TaskState): boolean {
  return TERMINAL_STATES.includes(state);
}

export interface TaskStatus {
  id: number;
  rawQuery: string;
  refinedQuery: string | null;
  status: TaskState;
  message: string;
  documentsFound: number;
  documentsProcessed: number;
  recordsFound: number;
  createdAt: Date;
  completedAt: Date | null;
  lastUpdate: Date;
}

export interface TaskProgress {
  refinedQuery?: string;
  documentsFound?: number;
  documentsProcessed?: number;
  recordsFound?: number;
}

export interface AnalysisSummary {
  total: number;
  processed: number;
  matched: number;
  failed: number;
  skipped: number;
}
