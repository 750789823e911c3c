import { z } from 'zod';

const configSchema = z.object({
  LLM_API_KEY: z.string().min(1, 'LLM_API_KEY is required'),
  LLM_BASE_URL: z.string().url().default('https://api.together.xyz/v1'),
  LLM_MODEL: z.string().min(1).default('meta-llama/Meta-Llama-3.1-8B-Instruct-Turbo'),
  SEARCH_URL: z
    .string()
    .url()
    .default('https://search.genie.stanford.edu/stanford_computer_science_106B'),
  CORPUS_PATH: z.string().min(1).default('Bejerano_Sun_224V_Updated.jsonl'),
  PORT: z.coerce.number().int().positive().default(4000),
  SESSION_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
  MAX_SESSIONS: z.coerce.number().int().positive().default(1000),
});

export type AppConfig = {
  llm: {
    apiKey: string;
    baseUrl: string;
    model: string;
  };
  searchUrl: string;
  corpusPath: string;
  port: number;
  sessions: {
    idleTimeoutMs: number;
    maxSessions: number;
  };
};

/**
 * Validate an environment map into the application config.
 * Throws a ZodError listing every invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = configSchema.parse(env);
  return {
    llm: {
      apiKey: parsed.LLM_API_KEY,
      baseUrl: parsed.LLM_BASE_URL,
      model: parsed.LLM_MODEL,
    },
    searchUrl: parsed.SEARCH_URL,
    corpusPath: parsed.CORPUS_PATH,
    port: parsed.PORT,
    sessions: {
      idleTimeoutMs: parsed.SESSION_IDLE_TIMEOUT_MS,
      maxSessions: parsed.MAX_SESSIONS,
    },
  };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig(process.env);
  }
  return cached;
}
