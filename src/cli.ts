#!/usr/bin/env node
import { USAGE, parseArgs } from './lib/args.js';
import { createLogger } from './lib/logger.js';
import { runPrompt } from './services/promptRunner.js';

async function main() {
  const parsed = parseArgs(process.argv.slice(2));
  if (parsed.kind === 'help') {
    console.log(USAGE);
    process.exit(0);
  }
  if (parsed.kind === 'usage_error') {
    console.error(parsed.message);
    console.error(USAGE);
    process.exit(1);
  }

  const logger = createLogger(parsed.args.logFile);
  const code = await runPrompt(parsed.args, {
    logger,
    env: process.env,
    cwd: process.cwd(),
  });
  process.exit(code);
}

main().catch((err) => {
  console.error('Error:', err?.message || err);
  process.exit(1);
});
