import { describeError } from '../errors';
import { createLogger, type Logger } from '../logger';
import { callChatCompletion, type LlmConfig } from './llm.service';
import { buildRefinePrompt } from './prompts';

/**
 * Rewrites a user's request into a search query. Never rejects:
 * on any failure the input comes back unchanged.
 */
export interface QueryRefiner {
  refine(text: string): Promise<string>;
}

const MAX_QUERY_LENGTH = 100;

/**
 * Clean a model reply down to a single-line query
 */
export function cleanRefinedQuery(reply: string): string | null {
  const firstLine = reply
    .split('\n')
    .map(line => line.trim())
    .find(line => line.length > 0);

  if (!firstLine) return null;

  const cleaned = firstLine
    .replace(/^(keywords?|query)\s*:\s*/i, '')
    .replace(/^["'“”]+|["'“”]+$/g, '')
    .trim();

  if (!cleaned || cleaned.length > MAX_QUERY_LENGTH) return null;
  return cleaned;
}

export function createLlmQueryRefiner(
  config: LlmConfig,
  options: { timeoutMs?: number; logger?: Logger } = {}
): QueryRefiner {
  const logger = options.logger ?? createLogger('query-refiner');

  return {
    async refine(text: string): Promise<string> {
      try {
        const reply = await callChatCompletion(
          config,
          [{ role: 'user', content: buildRefinePrompt(text) }],
          { temperature: 0.3, timeoutMs: options.timeoutMs ?? 30000 }
        );

        const refined = cleanRefinedQuery(reply);
        if (!refined) {
          logger.warn({ reply }, 'Refinement reply unusable, keeping original query');
          return text;
        }

        logger.info({ original: text, refined }, 'Query refined');
        return refined;
      } catch (error) {
        logger.warn({ err: describeError(error) }, 'Query refinement failed, keeping original query');
        return text;
      }
    }
  };
}
