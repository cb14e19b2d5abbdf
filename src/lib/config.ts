// Configuration for liftlog, read from environment variables

import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const DEFAULT_STATE_PATH = join(homedir(), '.liftlog', 'state.json');

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const sheetSchema = z.object({
  SHEET_WEBAPP_URL: z.string({ required_error: 'required' }).url('must be a URL'),
  SHEET_SECRET: z.string({ required_error: 'required' }),
  LIFTLOG_FETCH_LIMIT: positiveInt(100),
  LIFTLOG_HTTP_TIMEOUT_MS: positiveInt(20000)
});

const llmSchema = z.object({
  LIFTLOG_LLM_PROVIDER: z.enum(['openai', 'ollama']).default('openai'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-5-nano'),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  OLLAMA_URL: z.string().url().default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().default('qwen2.5:3b'),
  LIFTLOG_LLM_TIMEOUT_MS: positiveInt(120000)
}).superRefine((env, ctx) => {
  if (env.LIFTLOG_LLM_PROVIDER === 'openai' && !env.OPENAI_API_KEY) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['OPENAI_API_KEY'],
      message: 'required when LIFTLOG_LLM_PROVIDER=openai'
    });
  }
});

export type LlmConfig =
  | { provider: 'openai'; apiKey: string; model: string; baseUrl: string; timeoutMs: number }
  | { provider: 'ollama'; url: string; model: string; timeoutMs: number };

export interface SheetConfig {
  url: string;
  secret: string;
  timeoutMs: number;
}

export interface Config {
  sheet: SheetConfig;
  llm: LlmConfig;
  fetchLimit: number;
}

type Env = Record<string, string | undefined>;

// Empty strings count as unset so `FOO=` in a shell does not satisfy a requirement
function compact(env: Env): Env {
  const result: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') result[key] = value.trim();
  }
  return result;
}

function fail(issues: z.ZodIssue[]): never {
  const problems = issues.map(i => `  - ${i.path.join('.')}: ${i.message}`).join('\n');
  throw new ConfigError(`Invalid configuration:\n${problems}`);
}

type SheetEnv = z.infer<typeof sheetSchema>;
type LlmEnv = z.infer<typeof llmSchema>;

function toSheetConfig(e: SheetEnv): SheetConfig {
  return {
    url: e.SHEET_WEBAPP_URL,
    secret: e.SHEET_SECRET,
    timeoutMs: e.LIFTLOG_HTTP_TIMEOUT_MS
  };
}

function toLlmConfig(e: LlmEnv): LlmConfig {
  return e.LIFTLOG_LLM_PROVIDER === 'openai'
    ? {
        provider: 'openai',
        apiKey: e.OPENAI_API_KEY ?? '',
        model: e.OPENAI_MODEL,
        baseUrl: e.OPENAI_BASE_URL.replace(/\/+$/, ''),
        timeoutMs: e.LIFTLOG_LLM_TIMEOUT_MS
      }
    : {
        provider: 'ollama',
        url: e.OLLAMA_URL.replace(/\/+$/, ''),
        model: e.OLLAMA_MODEL,
        timeoutMs: e.LIFTLOG_LLM_TIMEOUT_MS
      };
}

/**
 * Store settings only, for commands that never call the model (`add`).
 */
export function loadSheetConfig(env: Env = process.env): SheetConfig {
  const parsed = sheetSchema.safeParse(compact(env));
  if (!parsed.success) fail(parsed.error.issues);
  return toSheetConfig(parsed.data);
}

/**
 * Validate the environment for a pipeline run. Every problem is reported in one ConfigError.
 */
export function loadConfig(env: Env = process.env): Config {
  const values = compact(env);
  const sheet = sheetSchema.safeParse(values);
  const llm = llmSchema.safeParse(values);
  if (!sheet.success || !llm.success) {
    fail([...(sheet.error?.issues ?? []), ...(llm.error?.issues ?? [])]);
  }

  return {
    sheet: toSheetConfig(sheet.data),
    llm: toLlmConfig(llm.data),
    fetchLimit: sheet.data.LIFTLOG_FETCH_LIMIT
  };
}

// Local-only settings never fail: commands like `checkpoint` work without credentials
export function getStatePath(env: Env = process.env): string {
  return compact(env).LIFTLOG_STATE_PATH ?? DEFAULT_STATE_PATH;
}

export function getLogPath(env: Env = process.env): string | undefined {
  return compact(env).LIFTLOG_LOG_PATH;
}
