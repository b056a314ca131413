import type { CliArgs } from '../lib/args.js';
import { createBedrockInvoker, type InvokeModelFn } from '../lib/bedrockClient.js';
import { loadConfig, loadEnvironment, type Env } from '../lib/config.js';
import { PromptError, describeError, exitCodeFor, isPromptError } from '../lib/errors.js';
import { loadGenerationOverrides } from '../lib/generationParams.js';
import { invokeModel } from '../lib/invokeModel.js';
import { resolveLogLevel, type Logger } from '../lib/logger.js';
import { resolveProfile } from '../lib/modelProfiles.js';

export interface PromptRunnerDeps {
  logger: Logger;
  env: Env;
  cwd: string;
  createInvoker?: (region: string) => InvokeModelFn;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

export interface PromptOutcome {
  modelId: string;
  prompt: string;
  text: string;
}

export function formatOutcome(outcome: PromptOutcome): string[] {
  return [
    `Model ID: ${outcome.modelId}`,
    `Prompt: ${outcome.prompt}`,
    `Response: ${outcome.text}`,
  ];
}

export async function executePrompt(args: CliArgs, deps: PromptRunnerDeps): Promise<PromptOutcome> {
  const { logger, env, cwd } = deps;

  loadEnvironment({ executionDir: args.executionDir, cwd, env, logger });
  // LOG_LEVEL may only be known once .env is loaded.
  if (env.LOG_LEVEL) logger.level = resolveLogLevel(env.LOG_LEVEL);
  const config = loadConfig(env);

  const prompt = args.prompt.trim();
  if (!prompt) {
    throw new PromptError('InvalidConfiguration', 'Prompt is empty. Please provide a valid prompt.');
  }

  const profile = resolveProfile(config.modelId);
  if (!profile) {
    throw new PromptError('UnsupportedModel', `Unsupported model_id: ${config.modelId}.`);
  }
  logger.info({ provider: profile.provider }, 'Using provider');

  const params = loadGenerationOverrides(args.paramsFile, cwd);

  const createInvoker = deps.createInvoker ?? ((region: string) => createBedrockInvoker(region));
  const invoke = createInvoker(config.region);
  logger.info({ region: config.region }, 'Initialized Bedrock client');

  const { text } = await invokeModel({
    invoke,
    profile,
    modelId: config.modelId,
    prompt,
    stopSequences: config.stopSequences,
    params,
    logger,
  });
  return { modelId: config.modelId, prompt, text };
}

/** Runs one prompt end to end and returns the process exit code. */
export async function runPrompt(args: CliArgs, deps: PromptRunnerDeps): Promise<number> {
  const stdout = deps.stdout ?? ((line: string) => console.log(line));
  const stderr = deps.stderr ?? ((line: string) => console.error(line));

  try {
    const outcome = await executePrompt(args, deps);
    for (const line of formatOutcome(outcome)) {
      stdout(line);
      deps.logger.info(line);
    }
    return 0;
  } catch (err) {
    if (isPromptError(err)) {
      deps.logger.error({ kind: err.kind, err: err.cause }, err.message);
      stderr(`Error: ${err.message}`);
      return exitCodeFor(err.kind);
    }
    deps.logger.error({ err }, 'An unexpected error occurred');
    stderr(`Error: ${describeError(err)}`);
    return 1;
  }
}
