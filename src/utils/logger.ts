/**
 * Logger factory
 *
 * Every logger writes JSON lines to stderr. Stdout is reserved for the
 * worker result document and for the console report.
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';
import { getConfig } from '../config/loader.js';

const destination = pino.destination({ dest: 2, sync: true });

/**
 * Create a named logger. The level defaults to `logging.level` from the
 * runtime config.
 */
export function createLogger(name: string, level?: LevelWithSilent): Logger {
  return pino(
    {
      name,
      level: level ?? getConfig().logging.level,
    },
    destination
  );
}
