import 'dotenv/config';
import { z } from 'zod';

const envSchema = z.object({
  // Required: OpenAI-compatible chat completion endpoint
  LLM_API_KEY: z.string().min(1, 'LLM API key is required'),
  LLM_API_URL: z.string().url().default('https://open.bigmodel.cn/api/paas/v4/chat/completions'),
  LLM_MODEL: z.string().default('glm-4-flash'),

  // Note search provider (MCP server, already logged in)
  NOTE_SEARCH_MCP_URL: z.string().url().default('http://localhost:18060/mcp'),
  NOTE_URL_BASE: z.string().url().default('https://www.xiaohongshu.com/explore'),

  // Pipeline settings
  ANALYSIS_CONCURRENCY: z.coerce.number().int().min(1).max(50).default(5),
  PROGRESS_INTERVAL: z.coerce.number().int().min(1).default(5),
  REFINE_TIMEOUT_MS: z.coerce.number().int().positive().default(30 * 1000),
  SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(2 * 60 * 1000),
  CLASSIFY_TIMEOUT_MS: z.coerce.number().int().positive().default(60 * 1000),

  // Streaming
  SUBSCRIBER_BUFFER_SIZE: z.coerce.number().int().min(1).default(256),
  SUBSCRIPTION_GRACE_MS: z.coerce.number().int().min(0).default(30 * 1000),
  SSE_HEARTBEAT_MS: z.coerce.number().int().positive().default(30 * 1000),

  // Application settings
  TASK_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000), // 1 hour
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error('Environment validation failed:');
    result.error.issues.forEach(issue => {
      console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
    });
    throw new Error('Invalid environment configuration');
  }

  return result.data;
}

let cached: Env | null = null;

/**
 * Environment of the running process, validated once
 */
export function getEnv(): Env {
  if (!cached) {
    cached = loadEnv();
  }
  return cached;
}
