export type Provider = 'mistral' | 'amazon' | 'meta' | 'anthropic-messages' | 'anthropic';

export interface GenerationParams {
  maxTokens: number;
  temperature: number;
  topP?: number;
  topK?: number;
}

export type GenerationOverrides = Partial<GenerationParams>;

export type RequestBody = Record<string, unknown>;

export interface ModelProfile {
  readonly provider: Provider;
  readonly matchPatterns: readonly RegExp[];
  readonly defaults: Readonly<GenerationParams>;
  readonly requestBuilder: (prompt: string, stopSequences: readonly string[], params: GenerationParams) => RequestBody;
  readonly responseExtractor: (responseBody: unknown) => string;
}

// Cross-region inference profiles prefix the model id with a geography, e.g. "us.meta.llama3-2-...".
const GEO = '(?:(?:us|eu|apac|jp|au|global)\\.)?';

const prefixed = (source: string): RegExp => new RegExp(`^${GEO}${source}`);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstRecord(value: unknown): Record<string, unknown> | undefined {
  if (!Array.isArray(value) || value.length === 0) return undefined;
  const head: unknown = value[0];
  return isRecord(head) ? head : undefined;
}

function stringAt(obj: Record<string, unknown> | undefined, key: string): string {
  const v = obj?.[key];
  return typeof v === 'string' ? v : '';
}

const mistral: ModelProfile = {
  provider: 'mistral',
  matchPatterns: [prefixed('mistral')],
  defaults: { maxTokens: 256, temperature: 0.7, topP: 0.95, topK: 40 },
  requestBuilder: (prompt, stopSequences, p) => ({
    prompt,
    max_tokens: p.maxTokens,
    stop: [...stopSequences],
    temperature: p.temperature,
    ...(p.topP !== undefined ? { top_p: p.topP } : {}),
    ...(p.topK !== undefined ? { top_k: p.topK } : {}),
  }),
  responseExtractor: (body) => {
    if (!isRecord(body)) return '';
    if (typeof body.outputs === 'string') return body.outputs;
    return stringAt(firstRecord(body.outputs), 'text');
  },
};

const amazon: ModelProfile = {
  provider: 'amazon',
  matchPatterns: [prefixed('amazon')],
  defaults: { maxTokens: 150, temperature: 0.6, topP: 0.95 },
  requestBuilder: (prompt, stopSequences, p) => ({
    inputText: prompt,
    textGenerationConfig: {
      temperature: p.temperature,
      ...(p.topP !== undefined ? { topP: p.topP } : {}),
      maxTokenCount: p.maxTokens,
      stopSequences: [...stopSequences],
    },
  }),
  responseExtractor: (body) => (isRecord(body) ? stringAt(firstRecord(body.results), 'outputText') : ''),
};

// Llama models take no stop sequences.
const meta: ModelProfile = {
  provider: 'meta',
  matchPatterns: [prefixed('meta')],
  defaults: { maxTokens: 512, temperature: 0.4, topP: 0.9 },
  requestBuilder: (prompt, _stopSequences, p) => ({
    prompt,
    max_gen_len: p.maxTokens,
    temperature: p.temperature,
    ...(p.topP !== undefined ? { top_p: p.topP } : {}),
  }),
  responseExtractor: (body) => (isRecord(body) ? stringAt(body, 'generation') : ''),
};

// Claude 3 and later only accept the Messages API schema. Newer Claude models reject
// temperature and top_p together, so top_p is only sent when overridden.
const anthropicMessages: ModelProfile = {
  provider: 'anthropic-messages',
  matchPatterns: [prefixed('anthropic\\.claude-(?:3|sonnet-4|opus-4|haiku-4)')],
  defaults: { maxTokens: 1024, temperature: 0.3 },
  requestBuilder: (prompt, stopSequences, p) => ({
    anthropic_version: 'bedrock-2023-05-31',
    max_tokens: p.maxTokens,
    temperature: p.temperature,
    ...(p.topP !== undefined ? { top_p: p.topP } : {}),
    ...(p.topK !== undefined ? { top_k: p.topK } : {}),
    stop_sequences: [...stopSequences],
    messages: [{ role: 'user', content: [{ type: 'text', text: prompt }] }],
  }),
  responseExtractor: (body) => {
    if (!isRecord(body) || !Array.isArray(body.content)) return '';
    const blocks: unknown[] = body.content;
    return blocks
      .filter(isRecord)
      .filter(b => b.type === 'text')
      .map(b => stringAt(b, 'text'))
      .join('')
      .trim();
  },
};

const anthropic: ModelProfile = {
  provider: 'anthropic',
  matchPatterns: [prefixed('anthropic')],
  defaults: { maxTokens: 200, temperature: 0.7, topP: 0.9, topK: 50 },
  requestBuilder: (prompt, stopSequences, p) => ({
    prompt: `\n\nHuman:${prompt}\n\nAssistant:`,
    temperature: p.temperature,
    ...(p.topP !== undefined ? { top_p: p.topP } : {}),
    ...(p.topK !== undefined ? { top_k: p.topK } : {}),
    max_tokens_to_sample: p.maxTokens,
    stop_sequences: [...stopSequences],
  }),
  responseExtractor: (body) => (isRecord(body) ? stringAt(body, 'completion').trim() : ''),
};

/** Dispatch table, matched in order. `anthropic-messages` must stay ahead of `anthropic`. */
export const MODEL_PROFILES: readonly ModelProfile[] = Object.freeze(
  [mistral, amazon, meta, anthropicMessages, anthropic].map(p => Object.freeze(p)),
);

export function resolveProfile(modelId: string, profiles: readonly ModelProfile[] = MODEL_PROFILES): ModelProfile | undefined {
  return profiles.find(p => p.matchPatterns.some(re => re.test(modelId)));
}

export function resolveParams(profile: ModelProfile, overrides: GenerationOverrides = {}): GenerationParams {
  const merged: GenerationParams = { ...profile.defaults };
  if (overrides.maxTokens !== undefined) merged.maxTokens = overrides.maxTokens;
  if (overrides.temperature !== undefined) merged.temperature = overrides.temperature;
  if (overrides.topP !== undefined) merged.topP = overrides.topP;
  if (overrides.topK !== undefined) merged.topK = overrides.topK;
  return merged;
}

export function buildRequest(
  profile: ModelProfile,
  prompt: string,
  stopSequences: readonly string[] = [],
  overrides?: GenerationOverrides,
): RequestBody {
  return profile.requestBuilder(prompt, stopSequences, resolveParams(profile, overrides));
}

export function extractText(profile: ModelProfile, responseBody: unknown): string {
  return profile.responseExtractor(responseBody);
}
