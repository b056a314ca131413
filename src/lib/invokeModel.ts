import type { InvokeModelFn } from './bedrockClient.js';
import { PromptError } from './errors.js';
import type { Logger } from './logger.js';
import { buildRequest, extractText, type GenerationOverrides, type ModelProfile, type RequestBody } from './modelProfiles.js';

export interface InvocationRequest {
  modelId: string;
  requestBody: RequestBody;
}

export interface InvocationResult {
  text: string;
}

export interface InvokeOptions {
  invoke: InvokeModelFn;
  profile: ModelProfile;
  modelId: string;
  prompt: string;
  stopSequences?: readonly string[];
  params?: GenerationOverrides;
  logger: Logger;
}

export function decodeResponseBody(bytes: Uint8Array): unknown {
  const text = new TextDecoder().decode(bytes);
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new PromptError('ResponseParseFailure', 'Failed to decode the response body as JSON.', { cause: e });
  }
}

export async function invokeModel(opts: InvokeOptions): Promise<InvocationResult> {
  const { invoke, profile, modelId, prompt, logger } = opts;
  const request: InvocationRequest = {
    modelId,
    requestBody: buildRequest(profile, prompt, opts.stopSequences ?? [], opts.params),
  };
  const body = JSON.stringify(request.requestBody);
  logger.info({ provider: profile.provider, payload: request.requestBody }, 'Configuration payload');

  const bytes = await invoke({
    modelId: request.modelId,
    body,
    accept: 'application/json',
    contentType: 'application/json',
  });

  const responseBody = decodeResponseBody(bytes);
  const text = extractText(profile, responseBody);
  if (!text) {
    logger.debug({ responseBody }, 'Response without generation');
    throw new PromptError('ResponseParseFailure', 'No generation found in the response.');
  }
  return { text };
}
