import { z } from 'zod';

export const DEFAULT_API_URL = 'https://api.exaroton.com/v1/';

/**
 * Zod schema for the client's environment variables.
 * Validation fails fast if the token is missing or a value is malformed.
 */
const envSchema = z.object({
  EXAROTON_API_TOKEN: z.string().min(1),
  EXAROTON_API_URL: z.string().url().default(DEFAULT_API_URL),
  EXAROTON_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
  EXAROTON_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
});

export type Env = z.infer<typeof envSchema>;

export type LogLevel = Env['EXAROTON_LOG_LEVEL'];

/**
 * Parse and validate environment variables.
 * Throws an Error listing every invalid variable.
 */
export function parseEnv(raw: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Invalid exaroton client configuration:\n${errors}`);
  }

  return result.data;
}
