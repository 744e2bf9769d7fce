import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const configSchema = z.object({
  // Anthropic (required only by `journal summary`)
  anthropicApiKey: z.string().min(1).optional(),
  llmSummaryModel: z.string().default('claude-sonnet-4-5'),
  llmSummaryMaxTokens: z.coerce.number().int().positive().default(4000),

  // Storage
  databasePath: z.string().default('data/journal.db'),
  reportsDir: z.string().optional(),

  // App
  timezone: z
    .string()
    .refine(isKnownTimeZone, { message: 'Unknown IANA time zone' })
    .default('UTC'),
});

export type Config = z.infer<typeof configSchema>;

function isKnownTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    anthropicApiKey: env('ANTHROPIC_API_KEY'),
    llmSummaryModel: env('LLM_SUMMARY_MODEL'),
    llmSummaryMaxTokens: env('LLM_SUMMARY_MAX_TOKENS'),
    databasePath: env('DATABASE_PATH'),
    reportsDir: env('REPORTS_DIR'),
    timezone: env('TIMEZONE'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`);
  }
  return result.data;
}

/** The credential is checked here, at command start, so capture commands never need it. */
export function requireAnthropicApiKey(config: Config): string {
  if (!config.anthropicApiKey) {
    throw new ConfigError('ANTHROPIC_API_KEY is not set; it is required for monthly summaries');
  }
  return config.anthropicApiKey;
}
