import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { PromptError, describeError } from './errors.js';
import type { GenerationOverrides } from './modelProfiles.js';

export const generationOverridesSchema = z.object({
  maxTokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(1).optional(),
  topP: z.number().min(0).max(1).optional(),
  topK: z.number().int().positive().optional(),
}).strict();

/**
 * Reads sampling overrides from a YAML or JSON file. Without a file every
 * provider keeps its built-in defaults.
 */
export function loadGenerationOverrides(file: string | undefined, cwd: string = process.cwd()): GenerationOverrides {
  if (!file) return {};
  const abs = path.isAbsolute(file) ? file : path.join(cwd, file);
  if (!fs.existsSync(abs)) {
    throw new PromptError('InvalidConfiguration', `Generation params file not found: ${abs}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(abs, 'utf8'));
  } catch (e) {
    throw new PromptError('InvalidConfiguration', `Failed to parse ${abs}: ${describeError(e)}`, { cause: e });
  }
  if (raw === undefined || raw === null) return {};

  const parsed = generationOverridesSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new PromptError('InvalidConfiguration', `Invalid generation params in ${abs}: ${detail}`);
  }
  return parsed.data;
}
