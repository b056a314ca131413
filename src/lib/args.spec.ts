import { describe, it, expect } from 'vitest';
import { DEFAULT_PROMPT, parseArgs } from './args.js';

describe('parseArgs', () => {
  it('falls back to defaults with no arguments', () => {
    expect(parseArgs([])).toEqual({
      kind: 'run',
      args: { prompt: DEFAULT_PROMPT, logFile: 'setup.log' },
    });
  });

  it('reads space-separated flag values', () => {
    const parsed = parseArgs(['--prompt', 'Hello there', '--log', 'out/run.log', '--execution_dir', '/tmp/project']);
    expect(parsed).toEqual({
      kind: 'run',
      args: { prompt: 'Hello there', logFile: 'out/run.log', executionDir: '/tmp/project' },
    });
  });

  it('reads --flag=value form', () => {
    const parsed = parseArgs(['--prompt=a=b', '--params=params.yaml']);
    expect(parsed).toEqual({
      kind: 'run',
      args: { prompt: 'a=b', logFile: 'setup.log', paramsFile: 'params.yaml' },
    });
  });

  it('keeps an explicitly empty prompt so it can be rejected later', () => {
    const parsed = parseArgs(['--prompt=']);
    expect(parsed.kind === 'run' && parsed.args.prompt).toBe('');
  });

  it('returns help for --help and -h', () => {
    expect(parseArgs(['--help'])).toEqual({ kind: 'help' });
    expect(parseArgs(['--prompt', 'x', '-h'])).toEqual({ kind: 'help' });
  });

  it('rejects unknown arguments', () => {
    expect(parseArgs(['--model', 'x'])).toEqual({ kind: 'usage_error', message: 'Unknown argument: --model' });
    expect(parseArgs(['stray'])).toEqual({ kind: 'usage_error', message: 'Unknown argument: stray' });
  });

  it('rejects a flag without a value', () => {
    expect(parseArgs(['--log'])).toEqual({ kind: 'usage_error', message: 'Missing value for --log' });
    expect(parseArgs(['--prompt', '--log', 'x.log'])).toEqual({ kind: 'usage_error', message: 'Missing value for --prompt' });
  });
});
