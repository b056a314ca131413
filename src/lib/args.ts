import { DEFAULT_LOG_FILE } from './logger.js';

export const DEFAULT_PROMPT = 'Siapa presiden ke-4 Indonesia?';

export interface CliArgs {
  prompt: string;
  logFile: string;
  executionDir?: string;
  paramsFile?: string;
}

export type ParsedArgs =
  | { kind: 'run'; args: CliArgs }
  | { kind: 'help' }
  | { kind: 'usage_error'; message: string };

export const USAGE = [
  'Usage: bedrock-prompt [--prompt TEXT] [--log FILE] [--execution_dir DIR] [--params FILE]',
  '',
  '  --prompt         Prompt text to send to the model',
  `  --log            Path to the log file (default: ${DEFAULT_LOG_FILE})`,
  '  --execution_dir  Directory containing the .env file',
  '  --params         YAML or JSON file overriding generation parameters',
  '',
  'Environment: AWS_REGION, MODEL_ID, STOP_SEQUENCES (JSON array), EXECUTION_DIR',
].join('\n');

type FlagKey = 'prompt' | 'logFile' | 'executionDir' | 'paramsFile';

const FLAGS = new Map<string, FlagKey>([
  ['--prompt', 'prompt'],
  ['--log', 'logFile'],
  ['--execution_dir', 'executionDir'],
  ['--params', 'paramsFile'],
]);

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const values: Partial<Record<FlagKey, string>> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') return { kind: 'help' };

    const eq = arg.indexOf('=');
    const name = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg;
    const key = FLAGS.get(name);
    if (!key) return { kind: 'usage_error', message: `Unknown argument: ${arg}` };

    let value: string | undefined;
    if (name !== arg) {
      value = arg.slice(eq + 1);
    } else if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined) return { kind: 'usage_error', message: `Missing value for ${name}` };
    values[key] = value;
  }

  return {
    kind: 'run',
    args: {
      prompt: values.prompt ?? DEFAULT_PROMPT,
      logFile: values.logFile || DEFAULT_LOG_FILE,
      ...(values.executionDir ? { executionDir: values.executionDir } : {}),
      ...(values.paramsFile ? { paramsFile: values.paramsFile } : {}),
    },
  };
}
