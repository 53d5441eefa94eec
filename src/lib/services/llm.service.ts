import { z } from 'zod';
import { LlmRequestError } from '../errors';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmConfig {
  apiUrl: string;
  apiKey: string;
  model: string;
}

export interface ChatCompletionOptions {
  temperature?: number;
  timeoutMs?: number;
}

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish()
        })
      })
    )
    .default([])
});

/**
 * Call an OpenAI-compatible chat completion endpoint and return the reply text.
 * Rejects with LlmRequestError on HTTP errors, timeouts and empty replies.
 */
export async function callChatCompletion(
  config: LlmConfig,
  messages: ChatMessage[],
  { temperature = 0.3, timeoutMs = 60000 }: ChatCompletionOptions = {}
): Promise<string> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(config.apiUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${config.apiKey}`
      },
      body: JSON.stringify({
        model: config.model,
        messages,
        temperature,
        stream: false
      }),
      signal: controller.signal
    });

    if (!response.ok) {
      throw new LlmRequestError(`LLM API error: ${response.status}`, response.status);
    }

    const parsed = chatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new LlmRequestError('LLM API returned an unexpected payload');
    }

    const content = parsed.data.choices[0]?.message.content?.trim();
    if (!content) {
      throw new LlmRequestError('LLM API returned an empty reply');
    }

    return content;
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new LlmRequestError(`LLM request timed out after ${timeoutMs}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timeout);
  }
}
