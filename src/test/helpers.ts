import fs from 'fs';
import os from 'os';
import path from 'path';
import pino, { type Logger } from 'pino';
import { PromptError } from '../lib/errors.js';

export interface LogRecord {
  level: number;
  msg?: string;
  [key: string]: unknown;
}

export interface MemoryLogger {
  logger: Logger;
  records: () => LogRecord[];
}

/** pino logger that keeps every line in memory instead of writing a file. */
export function createMemoryLogger(level = 'debug'): MemoryLogger {
  const chunks: string[] = [];
  const logger = pino({ level, base: null }, { write: (msg: string) => { chunks.push(msg); } });
  return {
    logger,
    records: () => chunks.map((c): LogRecord => JSON.parse(c)),
  };
}

const tempDirs: string[] = [];

export function makeTempDir(prefix = 'bedrock-prompt-'): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

/** Removes every directory handed out by `makeTempDir`. */
export function removeTempDirs(): void {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

export function captureError(fn: () => unknown): PromptError {
  try {
    fn();
  } catch (e) {
    if (e instanceof PromptError) return e;
    throw e;
  }
  throw new Error('expected a PromptError to be thrown');
}

export async function captureAsyncError(fn: () => Promise<unknown>): Promise<PromptError> {
  try {
    await fn();
  } catch (e) {
    if (e instanceof PromptError) return e;
    throw e;
  }
  throw new Error('expected a PromptError to be thrown');
}
