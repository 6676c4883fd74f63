import { type Logger, pino } from 'pino';
import { z } from 'zod';

/** Log levels accepted by {@link createLogger}, `silent` disables output. */
export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Creates the library's pino logger. The level defaults to
 * `NUCLINO_LOG_LEVEL`, falling back to `warn` when that is unset or not a
 * known level; `loadConfig` is where an unknown level gets reported.
 */
export function createLogger(level?: LogLevel): Logger {
  const fromEnv = logLevelSchema.safeParse(process.env.NUCLINO_LOG_LEVEL);

  return pino({
    name: 'nuclino',
    level: level ?? (fromEnv.success ? fromEnv.data : 'warn'),
  });
}

/** Shared logger used by clients that were not handed one. */
export const logger: Logger = createLogger();
