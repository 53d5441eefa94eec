import { z } from 'zod';
import type { SourceDocument } from '../types';
import { NoteSearchError } from '../errors';
import { createLogger, type Logger } from '../logger';

/**
 * Returns one ordered batch of notes for a query. Rejects on provider errors and timeouts.
 */
export interface DocumentSource {
  search(query: string): Promise<SourceDocument[]>;
}

/** Filter values are the provider's own wire values */
export interface NoteSearchFilters {
  location: string;
  note_type: string;
  publish_time: string;
  search_scope: string;
  sort_by: string;
}

export interface NoteSearchConfig {
  mcpUrl: string;
  noteUrlBase: string;
  timeoutMs?: number;
  filters?: Partial<NoteSearchFilters>;
  logger?: Logger;
}

const DEFAULT_FILTERS: NoteSearchFilters = {
  location: '不限',
  note_type: '图文',
  publish_time: '不限',
  search_scope: '未看过',
  sort_by: '最新'
};

const PROTOCOL_VERSION = '2025-06-18';
const CLIENT_INFO = { name: 'ticket-hunter', version: '0.1.0' };
const SESSION_HEADER = 'Mcp-Session-Id';

const jsonRpcResponseSchema = z.object({
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number().optional(),
      message: z.string().default('Unknown error')
    })
    .optional()
});

const toolResultSchema = z.object({
  content: z
    .array(
      z.object({
        type: z.string().optional(),
        text: z.string().optional()
      })
    )
    .default([]),
  isError: z.boolean().optional()
});

const feedSchema = z.object({
  id: z.string().min(1),
  modelType: z.literal('note'),
  noteCard: z.object({
    displayTitle: z.string().nullish()
  })
});

/**
 * Map the provider payload (`{ feeds: [...] }` or a bare array) to documents.
 * Entries that are not notes, or lack an id or a note card, are left out.
 */
export function parseFeeds(payload: unknown, noteUrlBase: string): SourceDocument[] {
  let feeds: unknown[] = [];
  if (Array.isArray(payload)) {
    feeds = payload;
  } else if (payload && typeof payload === 'object' && 'feeds' in payload && Array.isArray(payload.feeds)) {
    feeds = payload.feeds;
  }

  const base = noteUrlBase.replace(/\/+$/, '');
  const documents: SourceDocument[] = [];

  for (const feed of feeds) {
    const parsed = feedSchema.safeParse(feed);
    if (!parsed.success) continue;

    documents.push({
      id: parsed.data.id,
      text: parsed.data.noteCard.displayTitle?.trim() ?? '',
      url: `${base}/${parsed.data.id}`
    });
  }

  return documents;
}

/**
 * Read a JSON-RPC reply sent either as JSON or as a single SSE frame
 */
async function readJsonRpc(response: Response): Promise<unknown> {
  const contentType = response.headers.get('content-type') || '';

  if (contentType.includes('text/event-stream')) {
    const body = await response.text();
    const dataLines = body
      .split('\n')
      .filter(line => line.startsWith('data:'))
      .map(line => line.slice('data:'.length).trim());

    const last = dataLines[dataLines.length - 1];
    if (!last) {
      throw new NoteSearchError('Note search reply stream carried no data');
    }
    return JSON.parse(last);
  }

  return response.json();
}

/**
 * Document source backed by a note search MCP server reached over streamable HTTP
 */
export function createMcpNoteSource(config: NoteSearchConfig): DocumentSource {
  const logger = config.logger ?? createLogger('note-search');
  const filters = { ...DEFAULT_FILTERS, ...config.filters };
  let requestId = 0;

  async function post(
    body: Record<string, unknown>,
    sessionId: string | null,
    signal: AbortSignal
  ): Promise<Response> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Accept': 'application/json, text/event-stream'
    };
    if (sessionId) {
      headers[SESSION_HEADER] = sessionId;
    }

    const response = await fetch(config.mcpUrl, {
      method: 'POST',
      headers,
      body: JSON.stringify({ jsonrpc: '2.0', ...body }),
      signal
    });

    if (!response.ok) {
      throw new NoteSearchError(`Note search HTTP ${response.status}`, response.status);
    }
    return response;
  }

  async function rpc(
    method: string,
    params: Record<string, unknown>,
    sessionId: string | null,
    signal: AbortSignal
  ): Promise<{ result: unknown; response: Response }> {
    requestId += 1;
    const response = await post({ id: requestId, method, params }, sessionId, signal);
    const parsed = jsonRpcResponseSchema.safeParse(await readJsonRpc(response));

    if (!parsed.success) {
      throw new NoteSearchError(`Malformed reply to ${method}`);
    }
    if (parsed.data.error) {
      throw new NoteSearchError(`${method} failed: ${parsed.data.error.message}`);
    }
    return { result: parsed.data.result, response };
  }

  return {
    async search(query: string): Promise<SourceDocument[]> {
      const timeoutMs = config.timeoutMs ?? 120000;
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), timeoutMs);

      try {
        const init = await rpc(
          'initialize',
          { protocolVersion: PROTOCOL_VERSION, capabilities: {}, clientInfo: CLIENT_INFO },
          null,
          controller.signal
        );
        const sessionId = init.response.headers.get(SESSION_HEADER);
        logger.debug({ sessionId }, 'Note search session initialized');

        // The notification reply is empty; release its connection
        const initialized = await post({ method: 'notifications/initialized' }, sessionId, controller.signal);
        await initialized.body?.cancel();

        const call = await rpc(
          'tools/call',
          { name: 'search_feeds', arguments: { keyword: query, filters } },
          sessionId,
          controller.signal
        );

        const toolResult = toolResultSchema.safeParse(call.result);
        if (!toolResult.success) {
          logger.warn('search_feeds returned no content');
          return [];
        }

        const text = toolResult.data.content[0]?.text ?? '';
        if (toolResult.data.isError) {
          throw new NoteSearchError(`search_feeds failed: ${text || 'tool reported an error'}`);
        }
        if (!text) {
          logger.warn('search_feeds returned an empty result');
          return [];
        }

        let payload: unknown;
        try {
          payload = JSON.parse(text);
        } catch {
          logger.warn({ length: text.length }, 'search_feeds result is not JSON');
          return [];
        }

        const documents = parseFeeds(payload, config.noteUrlBase);
        logger.info({ query, count: documents.length }, 'Note search finished');
        return documents;
      } catch (error) {
        if (error instanceof Error && error.name === 'AbortError') {
          throw new NoteSearchError(`Note search timed out after ${timeoutMs}ms`);
        }
        throw error;
      } finally {
        clearTimeout(timeout);
      }
    }
  };
}
