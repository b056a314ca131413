export { DEFAULT_PROMPT, parseArgs, USAGE } from './lib/args.js';
export type { CliArgs, ParsedArgs } from './lib/args.js';
export { createBedrockClient, createBedrockInvoker } from './lib/bedrockClient.js';
export type { InvokeModelFn, InvokeModelParams } from './lib/bedrockClient.js';
export { loadConfig, loadEnvironment, parseStopSequences } from './lib/config.js';
export type { AppConfig, Env } from './lib/config.js';
export { PromptError, exitCodeFor, isPromptError } from './lib/errors.js';
export type { PromptErrorKind } from './lib/errors.js';
export { loadGenerationOverrides } from './lib/generationParams.js';
export { decodeResponseBody, invokeModel } from './lib/invokeModel.js';
export type { InvocationRequest, InvocationResult } from './lib/invokeModel.js';
export { createLogger } from './lib/logger.js';
export {
  MODEL_PROFILES,
  buildRequest,
  extractText,
  resolveParams,
  resolveProfile,
} from './lib/modelProfiles.js';
export type { GenerationOverrides, GenerationParams, ModelProfile, Provider, RequestBody } from './lib/modelProfiles.js';
export { executePrompt, formatOutcome, runPrompt } from './services/promptRunner.js';
export type { PromptOutcome, PromptRunnerDeps } from './services/promptRunner.js';
