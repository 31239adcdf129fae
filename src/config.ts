export type Config = {
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  openaiModel: string;
  // 0 disables the reasoning-budget hint entirely
  thinkingBudgetTokens: number;
  llmMaxAttempts: number;
  llmTimeoutMs: number;
  maxResultChars: number;
  scriptOutputPreviewChars: number;
  r2Path: string;
  scriptTimeoutMs: number;
};

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 ? Math.floor(n) : fallback;
}

export function loadConfig(): Config {
  return {
    openaiApiKey: process.env.OPENAI_API_KEY,
    openaiBaseUrl: process.env.OPENAI_BASE_URL,
    openaiModel: process.env.OPENAI_MODEL ?? 'gpt-4',
    thinkingBudgetTokens: intFromEnv('THINKING_BUDGET_TOKENS', 8192),
    llmMaxAttempts: Math.max(1, intFromEnv('LLM_MAX_ATTEMPTS', 3)),
    llmTimeoutMs: intFromEnv('LLM_TIMEOUT_MS', 60_000),
    maxResultChars: intFromEnv('MAX_RESULT_CHARS', 30_000),
    scriptOutputPreviewChars: intFromEnv('SCRIPT_OUTPUT_PREVIEW_CHARS', 5000),
    r2Path: process.env.R2_PATH ?? 'r2',
    scriptTimeoutMs: intFromEnv('SCRIPT_TIMEOUT_MS', 10_000)
  };
}

// Centralized config with sensible defaults; all values can be overridden via env.
// The CLI loads .env before this module is first imported.
export const config: Config = loadConfig();
