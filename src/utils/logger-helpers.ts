/**
 * Logger helpers
 *
 * Log context for debug-level traffic (every JSON-RPC frame) is only built
 * when the level is enabled.
 */

import type { Level, Logger } from 'pino';

type LogContext = Record<string, unknown>;

/**
 * Log `message` with a context produced on demand.
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ request, id }), 'Sent JSON-RPC request');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: Level,
  buildContext: () => LogContext,
  message: string
): void {
  if (!logger?.isLevelEnabled(level)) {
    return;
  }
  logger[level](buildContext(), message);
}

/**
 * Plain error summary for structured logs and operator messages.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
