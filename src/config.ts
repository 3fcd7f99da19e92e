import { z } from 'zod';
import dotenv from 'dotenv';
import { PlankaError, PlankaErrorType } from './errors.js';

// Keep stdout clean for --json output
process.env.DOTENV_CONFIG_QUIET = '1';
dotenv.config();

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

// Zod schema for environment variables
const EnvSchema = z.object({
  PLANKA_URL: z
    .string()
    .url('PLANKA_URL must be a valid URL')
    .optional()
    .describe('Planka server URL, overrides the stored one'),

  PLANKA_TOKEN: z
    .string()
    .min(1, 'PLANKA_TOKEN must not be empty')
    .optional()
    .describe('Bearer token, overrides the stored one'),

  PLANKA_CONFIG_DIR: z
    .string()
    .min(1)
    .optional()
    .describe('Directory holding config.json'),

  PLANKA_REQUEST_TIMEOUT_MS: z
    .string()
    .optional()
    .default(String(DEFAULT_REQUEST_TIMEOUT_MS))
    .transform((val) => parseInt(val, 10))
    .refine(
      (val) => !isNaN(val) && val > 0 && val <= 300000,
      'PLANKA_REQUEST_TIMEOUT_MS must be between 1 and 300000'
    )
    .describe('Request timeout in milliseconds'),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

// Empty strings count as unset, so `PLANKA_URL= planka ...` falls back to the stored URL
function readVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = EnvSchema.safeParse({
    PLANKA_URL: readVar(env, 'PLANKA_URL'),
    PLANKA_TOKEN: readVar(env, 'PLANKA_TOKEN'),
    PLANKA_CONFIG_DIR: readVar(env, 'PLANKA_CONFIG_DIR'),
    PLANKA_REQUEST_TIMEOUT_MS: readVar(env, 'PLANKA_REQUEST_TIMEOUT_MS'),
  });

  if (!result.success) {
    const errors = result.error.errors.map(
      (err) => `  - ${err.path.join('.')}: ${err.message}`
    );
    throw new PlankaError(
      PlankaErrorType.CONFIG_INVALID,
      `Invalid environment configuration:\n${errors.join('\n')}`,
      { hint: 'Check your shell environment and .env file' }
    );
  }

  return result.data;
}

// Redact bearer credentials before anything reaches a log line
export function redactSecrets(text: string, token?: string): string {
  if (!text) return text;

  let redacted = text;
  if (token) {
    redacted = redacted.split(token).join('***REDACTED_TOKEN***');
  }

  return redacted.replace(/Bearer\s+[\w\-.~+/]+=*/gi, 'Bearer ***REDACTED_TOKEN***');
}
