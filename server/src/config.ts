import path from 'node:path';
import { z } from 'zod';

export const DEFAULT_ANALYSIS_MODEL = 'claude-sonnet-4-20250514';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  HOST: z.string().min(1).default('0.0.0.0'),
  DATA_FILE: z.string().min(1).default('data.json'),
  STATIC_DIR: z.string().min(1).default('../frontend/dist'),
  // Empty string counts as unset so `.env` templates can leave it blank
  ANTHROPIC_API_KEY: z
    .string()
    .optional()
    .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined)),
  ANALYSIS_MODEL: z.string().min(1).default(DEFAULT_ANALYSIS_MODEL),
  CORS_ORIGIN: z.string().optional(),
});

export interface ServerConfig {
  port: number;
  host: string;
  dataFile: string;
  staticDir: string;
  anthropicApiKey: string | undefined;
  analysisModel: string;
  corsOrigin: string | undefined;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Validate environment variables. Relative paths resolve against `cwd`.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): ServerConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    dataFile: path.resolve(cwd, parsed.DATA_FILE),
    staticDir: path.resolve(cwd, parsed.STATIC_DIR),
    anthropicApiKey: parsed.ANTHROPIC_API_KEY,
    analysisModel: parsed.ANALYSIS_MODEL,
    corsOrigin: parsed.CORS_ORIGIN,
  };
}
