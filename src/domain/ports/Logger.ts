/**
 * Port for diagnostic logging.
 *
 * Shaped after pino's `(mergingObject, message)` call form so that a pino
 * logger can be passed straight in.
 */
export interface Logger {
  debug(context: Record<string, unknown>, message: string): void;
  info(context: Record<string, unknown>, message: string): void;
  warn(context: Record<string, unknown>, message: string): void;
  error(context: Record<string, unknown>, message: string): void;
}
