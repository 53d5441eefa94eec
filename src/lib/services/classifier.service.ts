import { z } from 'zod';
import type { ClassificationVerdict } from '../types';
import { ClassificationError, describeError } from '../errors';
import { callChatCompletion, type LlmConfig } from './llm.service';
import { buildTicketAnalysisPrompt } from './prompts';

/**
 * Decides whether one note is a ticket resale listing. Rejects per call.
 */
export interface Classifier {
  classify(text: string): Promise<ClassificationVerdict>;
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const textField = z
  .union([z.string(), z.number()])
  .nullish()
  .transform(value => (value === null || value === undefined ? '' : String(value).trim()));

const dateField = z
  .string()
  .nullish()
  .transform(value => {
    const trimmed = value?.trim();
    if (!trimmed || !DATE_PATTERN.test(trimmed) || Number.isNaN(Date.parse(trimmed))) {
      return null;
    }
    return trimmed;
  });

const classificationSchema = z.object({
  is_ticket_resale: z
    .union([z.boolean(), z.enum(['true', 'false'])])
    .transform(value => value === true || value === 'true'),
  event_name: textField,
  city: textField,
  event_date: dateField,
  area: textField,
  price: textField,
  quantity: textField,
  contact: textField,
  notes: textField
});

/**
 * Parse the model reply: the first `{...}` block, validated against the listing schema
 */
export function parseClassification(reply: string): ClassificationVerdict {
  const jsonMatch = reply.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new ClassificationError('Classifier reply contains no JSON object', reply);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(jsonMatch[0]);
  } catch (error) {
    throw new ClassificationError(`Classifier reply is not valid JSON: ${describeError(error)}`, reply);
  }

  const parsed = classificationSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ClassificationError(`Classifier reply does not match schema: ${issue.path.join('.')} ${issue.message}`, reply);
  }

  const data = parsed.data;
  if (!data.is_ticket_resale) {
    return { matched: false };
  }

  return {
    matched: true,
    fields: {
      eventName: data.event_name,
      city: data.city,
      eventDate: data.event_date,
      area: data.area,
      price: data.price,
      quantity: data.quantity,
      contact: data.contact,
      notes: data.notes
    }
  };
}

export function createLlmClassifier(config: LlmConfig, options: { timeoutMs?: number } = {}): Classifier {
  return {
    async classify(text: string): Promise<ClassificationVerdict> {
      const reply = await callChatCompletion(
        config,
        [{ role: 'user', content: buildTicketAnalysisPrompt(text) }],
        { temperature: 0.1, timeoutMs: options.timeoutMs ?? 60000 }
      );
      return parseClassification(reply);
    }
  };
}
