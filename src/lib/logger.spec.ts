import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { createLogger, resolveLogLevel } from './logger.js';
import { makeTempDir, removeTempDirs } from '../test/helpers.js';

describe('logger', () => {
  afterEach(() => {
    removeTempDirs();
  });

  describe('resolveLogLevel', () => {
    it('accepts known levels case-insensitively', () => {
      expect(resolveLogLevel('DEBUG')).toBe('debug');
      expect(resolveLogLevel(' warn ')).toBe('warn');
    });

    it('falls back to info', () => {
      expect(resolveLogLevel(undefined)).toBe('info');
      expect(resolveLogLevel('verbose')).toBe('info');
    });
  });

  describe('createLogger', () => {
    it('writes JSON lines to the log file, creating parent directories', () => {
      const file = path.join(makeTempDir(), 'logs', 'run.log');
      const logger = createLogger(file, 'info');

      logger.info({ provider: 'meta' }, 'Using provider');
      logger.debug('hidden at info level');

      const lines = fs.readFileSync(file, 'utf8').trim().split('\n');
      expect(lines).toHaveLength(1);
      const record = JSON.parse(lines[0]);
      expect(record).toMatchObject({ level: 30, provider: 'meta', msg: 'Using provider' });
      expect(typeof record.time).toBe('string');
      expect(record.pid).toBeUndefined();
    });
  });
});
