import path from 'path';
import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

export const DEFAULT_LOG_FILE = 'setup.log';

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
type LogLevel = (typeof LEVELS)[number];
const KNOWN_LEVELS: ReadonlySet<string> = new Set(LEVELS);

function isLogLevel(value: string): value is LogLevel {
  return KNOWN_LEVELS.has(value);
}

export function resolveLogLevel(raw: string | undefined): LogLevel {
  const lc = (raw || '').trim().toLowerCase();
  return isLogLevel(lc) ? lc : 'info';
}

/**
 * File logger for a single CLI run. Writes are synchronous so nothing is lost
 * when the process exits right after the last line.
 */
export function createLogger(logFile: string = DEFAULT_LOG_FILE, level?: string): Logger {
  const dest = pino.destination({ dest: path.resolve(logFile), sync: true, mkdir: true });
  return pino(
    {
      level: resolveLogLevel(level ?? process.env.LOG_LEVEL),
      timestamp: pino.stdTimeFunctions.isoTime,
      base: null,
    },
    dest,
  );
}
