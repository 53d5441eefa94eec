export * from './lib/types';
export * from './lib/errors';
export { loadEnv, getEnv, type Env } from './lib/env';
export { logger, createLogger, type Logger } from './lib/logger';
export { EventHub, Subscription, type EventHubOptions } from './lib/events/event-hub';
export { createEventStream, formatSseEvent, SSE_HEADERS, HEARTBEAT_FRAME } from './lib/events/sse';
export { MemoryTaskStore, type TaskStore } from './lib/services/storage.service';
export { callChatCompletion, type ChatMessage, type LlmConfig } from './lib/services/llm.service';
export { createLlmQueryRefiner, cleanRefinedQuery, type QueryRefiner } from './lib/services/query-refiner.service';
export { createLlmClassifier, parseClassification, type Classifier } from './lib/services/classifier.service';
export {
  createMcpNoteSource,
  parseFeeds,
  type DocumentSource,
  type NoteSearchConfig,
  type NoteSearchFilters
} from './lib/services/note-search.service';
export { AnalysisPool, type AnalysisPoolOptions, type AnalysisRunOptions } from './lib/tasks/analysis-pool';
export { TaskManager, canTransition, type TaskManagerOptions } from './lib/tasks/task-manager';
export { processSearchTask, formatSummary, toTaskDocuments } from './lib/tasks/task-processor';
export {
  createTicketHunter,
  createDefaultTicketHunter,
  type TicketHunter,
  type TicketHunterDependencies
} from './lib/ticket-hunter';
