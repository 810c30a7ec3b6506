import { destination, pino, stdTimeFunctions } from 'pino';
import type { LevelWithSilent, Logger as PinoLogger } from 'pino';

export interface CreateLoggerOptions {
  /** Minimum level written. Default: `'warn'`. */
  readonly level?: LevelWithSilent;
  /** File descriptor to write to. Default: `2` (stderr), keeping stdout free for command output. */
  readonly fd?: number;
}

/** Create the pino logger used by the uploader. */
export function createLogger(options?: CreateLoggerOptions): PinoLogger {
  return pino(
    {
      level: options?.level ?? 'warn',
      base: undefined,
      timestamp: stdTimeFunctions.isoTime,
    },
    destination({ fd: options?.fd ?? 2, sync: true }),
  );
}
