import type { Command } from 'commander';
import chalk from 'chalk';
import { join } from 'node:path';
import { findConfigPath, loadConfig } from '../config.js';
import { DEFAULT_RUNS_DIR, listRuns, readRun } from '../session.js';
import { CLIError, asCLIError } from './helpers.js';
import { formatDiscrepancies, printRun } from './render.js';

async function runsDir(): Promise<string> {
  try {
    const config = await loadConfig(findConfigPath());
    return config.sessionDir ?? DEFAULT_RUNS_DIR;
  } catch (err) {
    throw asCLIError(err);
  }
}

const STATE_COLORS: Record<string, (s: string) => string> = {
  Done: chalk.green,
  Failed: chalk.red,
};

export function registerRunsCommand(program: Command): void {
  const runsCmd = program.command('runs').description('Inspect saved pipeline runs');

  runsCmd
    .command('list')
    .description('List saved runs, newest first')
    .option('-n, --limit <n>', 'Show at most n runs', '20')
    .action(async (opts: { limit: string }) => {
      const runs = await listRuns(await runsDir());
      if (runs.length === 0) {
        console.log(chalk.dim('No runs found.'));
        return;
      }
      const limit = Math.max(1, parseInt(opts.limit, 10) || 20);
      for (const r of runs.slice(0, limit)) {
        const color = STATE_COLORS[r.state] ?? chalk.yellow;
        const date = new Date(r.startedAt).toISOString().replace('T', ' ').slice(0, 19);
        const prompt = r.prompt.length > 60 ? `${r.prompt.slice(0, 57)}...` : r.prompt;
        console.log(`  ${chalk.dim(date)}  ${r.id.slice(0, 8)}  ${color(r.state.padEnd(10))} ${prompt}`);
      }
    });

  runsCmd
    .command('show <id>')
    .description('Show a saved run ("last" for the newest)')
    .option('--json', 'Print the stored run as JSON')
    .option('-v, --verbose', 'Include discrepancies and per-model debate outcome')
    .action(async (id: string, opts: { json?: boolean; verbose?: boolean }) => {
      const dir = await runsDir();
      let runId = id;
      if (id !== 'last' && id.length < 36) {
        // Allow the 8-char prefix printed by `runs list`
        const match = (await listRuns(dir)).find((r) => r.id.startsWith(id));
        if (match) runId = match.id;
      }
      const run = await readRun(runId, dir);
      if (!run) throw new CLIError(chalk.red(`Run not found or unreadable: ${id}`));

      if (opts.json) {
        console.log(JSON.stringify(run, null, 2));
        return;
      }
      console.log('');
      console.log(chalk.bold('Prompt: ') + run.prompt);
      console.log(chalk.dim(`Roster: ${run.roster.join(', ')}`));
      if (opts.verbose && run.discrepancies) {
        console.log(chalk.bold('\nDiscrepancies:'));
        for (const line of formatDiscrepancies(run.discrepancies)) console.log(`  ${line}`);
      }
      printRun(run, { verbose: opts.verbose ?? false, path: join(dir, run.id) });
    });
}
