import { z } from 'zod';
import type { NuclinoClientProps } from './core/client.js';
import { ConfigurationError } from './error/configurationError.js';
import { createLogger, logLevelSchema } from './utils/logger.js';
import type { SafeWrap } from './utils/wrap.js';

/**
 * Environment variables read by {@link loadConfig}.
 */
const envSchema = z.object({
  NUCLINO_API_KEY: z.string({ message: 'NUCLINO_API_KEY is required' }).min(1, 'NUCLINO_API_KEY cannot be empty'),
  NUCLINO_BASE_URL: z.string().url().optional(),
  NUCLINO_REQUESTS_PER_MINUTE: z.coerce.number().int().min(1).optional(),
  NUCLINO_TIMEOUT_MS: z.coerce.number().int().min(1).optional(),
  NUCLINO_LOG_LEVEL: logLevelSchema.default('warn'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Builds client options from environment variables.
 *
 * @example
 * const [err, props] = loadConfig();
 * if (err) throw err;
 * const client = new Nuclino(props);
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SafeWrap<ConfigurationError, NuclinoClientProps> {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    return [new ConfigurationError(`error invalid environment configuration: ${issues}`, { cause: result.error }), null];
  }

  const parsed = result.data;
  return [
    null,
    {
      apiKey: parsed.NUCLINO_API_KEY,
      ...(parsed.NUCLINO_BASE_URL !== undefined && { baseUrl: parsed.NUCLINO_BASE_URL }),
      ...(parsed.NUCLINO_REQUESTS_PER_MINUTE !== undefined && {
        requestsPerMinute: parsed.NUCLINO_REQUESTS_PER_MINUTE,
      }),
      ...(parsed.NUCLINO_TIMEOUT_MS !== undefined && { timeout: parsed.NUCLINO_TIMEOUT_MS }),
      logger: createLogger(parsed.NUCLINO_LOG_LEVEL),
    },
  ];
}
