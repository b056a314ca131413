import fs from 'fs';
import path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { PromptError } from './errors.js';
import type { Logger } from './logger.js';

export type Env = Record<string, string | undefined>;

export interface AppConfig {
  region: string;
  modelId: string;
  stopSequences: string[];
}

const envSchema = z.object({
  AWS_REGION: z.string({ required_error: 'AWS_REGION not found in the environment variables.' })
    .trim()
    .min(1, 'AWS_REGION not found in the environment variables.'),
  MODEL_ID: z.string({ required_error: 'MODEL_ID not found in the environment variables.' })
    .trim()
    .min(1, 'MODEL_ID not found in the environment variables.'),
  STOP_SEQUENCES: z.string().optional(),
});

const stopSequencesSchema = z.array(z.string());

/**
 * Seeds `env` from a .env file. Variables already present in `env` win.
 *
 * Looks in `executionDir`, then `EXECUTION_DIR`, then `cwd`. A directory that was named
 * explicitly must contain a .env file; the working-directory fallback is optional.
 */
export function loadEnvironment(opts: { executionDir?: string; cwd: string; env: Env; logger: Logger }): string | undefined {
  const { env, logger } = opts;
  const namedDir = opts.executionDir || env.EXECUTION_DIR || '';

  if (namedDir) {
    const dotenvPath = path.join(namedDir, '.env');
    if (!fs.existsSync(dotenvPath)) {
      throw new PromptError('MissingConfiguration', `.env file not found at ${dotenvPath}.`);
    }
    applyDotenv(dotenvPath, env);
    logger.info({ path: dotenvPath }, 'Loaded .env');
    return dotenvPath;
  }

  const dotenvPath = path.join(opts.cwd, '.env');
  if (!fs.existsSync(dotenvPath)) {
    logger.warn('EXECUTION_DIR not set and no .env in the current directory; using process environment');
    return undefined;
  }
  applyDotenv(dotenvPath, env);
  logger.info({ path: dotenvPath }, 'Loaded .env from current directory');
  return dotenvPath;
}

function applyDotenv(dotenvPath: string, env: Env): void {
  const target: dotenv.DotenvPopulateInput = {};
  const result = dotenv.config({ path: dotenvPath, processEnv: target });
  if (result.error) {
    throw new PromptError('InvalidConfiguration', `Failed to read ${dotenvPath}: ${result.error.message}`, { cause: result.error });
  }
  for (const [k, v] of Object.entries(target)) {
    if (env[k] === undefined) env[k] = v;
  }
}

export function parseStopSequences(raw: string | undefined): string[] {
  if (raw === undefined || raw.trim() === '') return [];
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (e) {
    throw new PromptError('InvalidConfiguration', 'STOP_SEQUENCES must be a valid JSON list.', { cause: e });
  }
  const parsed = stopSequencesSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new PromptError('InvalidConfiguration', 'STOP_SEQUENCES must be a valid JSON list of strings.');
  }
  return parsed.data;
}

export function loadConfig(env: Env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new PromptError('MissingConfiguration', first?.message || 'Missing configuration');
  }
  return {
    region: parsed.data.AWS_REGION,
    modelId: parsed.data.MODEL_ID,
    stopSequences: parseStopSequences(parsed.data.STOP_SEQUENCES),
  };
}
