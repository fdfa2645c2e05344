#!/usr/bin/env node

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { CLIError } from './helpers.js';
import { registerAskCommand } from './ask.js';
import { registerProvidersCommand } from './providers.js';
import { registerRunsCommand } from './runs.js';

const program = new Command();

const pkg: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string' ? pkg.version : '0.0.0';

program
  .name('dialectic')
  .description('Ask several models, debate their discrepancies, synthesize one answer')
  .version(version);

registerAskCommand(program);
registerProvidersCommand(program);
registerRunsCommand(program);

// Exit once the command is done so no stray handle keeps the process alive
program.hook('postAction', () => {
  process.exit(0);
});

program.parseAsync(process.argv).catch((err) => {
  if (err instanceof CLIError) {
    if (err.message) console.error(err.message);
    process.exit(err.exitCode);
  }
  throw err;
});
