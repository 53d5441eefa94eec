export type PipelineStage = 'setup' | 'refine' | 'search' | 'analysis' | 'status' | 'pipeline';

const STAGE_LABELS: Record<PipelineStage, string> = {
  setup: 'Task setup',
  refine: 'Query refinement',
  search: 'Note search',
  analysis: 'Note analysis',
  status: 'Status update',
  pipeline: 'Pipeline'
};

/**
 * Render any thrown value as a single line
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message.split('\n')[0] || error.name;
  }
  if (typeof error === 'string') {
    return error.split('\n')[0];
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/**
 * Failure that terminates a task. The message names the stage and the cause.
 */
export class PipelineError extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, cause: unknown) {
    super(`${STAGE_LABELS[stage]} failed: ${describeError(cause)}`, { cause });
    this.name = 'PipelineError';
    this.stage = stage;
  }
}

export class DuplicateTaskError extends Error {
  constructor(readonly taskId: number) {
    super(`Task ${taskId} already exists`);
    this.name = 'DuplicateTaskError';
  }
}

export class TaskNotFoundError extends Error {
  constructor(readonly taskId: number) {
    super(`Task ${taskId} not found`);
    this.name = 'TaskNotFoundError';
  }
}

export class LlmRequestError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'LlmRequestError';
  }
}

export class ClassificationError extends Error {
  constructor(message: string, readonly raw?: string) {
    super(message);
    this.name = 'ClassificationError';
  }
}

export class NoteSearchError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'NoteSearchError';
  }
}
