import chalk from 'chalk';
import type { PipelineEventArgs, StageName } from '../pipeline.js';
import type { DiscrepancySet, PipelineFailure, PipelineRun } from '../types.js';
import { formatDuration } from './helpers.js';

const STAGE_LABELS: Record<StageName, string> = {
  fetch: 'FETCH',
  critique: 'CRITIQUE',
  debate: 'DEBATE',
  synthesis: 'SYNTHESIZE',
};

const RAW_PREVIEW_CHARS = 500;

export function formatFailure(failure: PipelineFailure): string {
  const lines = [`Run failed at ${failure.stage} (${failure.kind}): ${failure.message}`];
  if (failure.raw !== undefined) {
    const preview = failure.raw.slice(0, RAW_PREVIEW_CHARS);
    const more = failure.raw.length > RAW_PREVIEW_CHARS ? ` … (${failure.raw.length} chars)` : '';
    lines.push(`Critic output${more}:`, preview);
  }
  return lines.join('\n');
}

export function formatDiscrepancies(set: DiscrepancySet): string[] {
  if (set.discrepancies.length === 0) return ['No discrepancies — models agree.'];
  return set.discrepancies.map((d) => {
    const missing = d.modelsMissingClaim ? ` | missing: ${d.modelsMissingClaim.join(', ')}` : '';
    return `[${d.claimId}] ${d.claim} (with: ${d.modelsWithClaim.join(', ')}${missing})`;
  });
}

/**
 * Progress printer for pipeline events. Returns the handler and a getter for
 * the run directory reported at the end.
 */
export function createProgressRenderer(verbose: boolean): {
  onEvent: (...args: PipelineEventArgs) => void;
  runPath: () => string | null;
} {
  let path: string | null = null;

  const onEvent: (...args: PipelineEventArgs) => void = (event, data) => {
    switch (event) {
      case 'state':
        if (verbose) console.log(chalk.dim(`  · ${data.state}`));
        break;
      case 'stage':
        process.stdout.write(chalk.bold(`  ▸ ${STAGE_LABELS[data.stage]} `));
        if (data.stage === 'critique' || data.stage === 'synthesis') {
          process.stdout.write(chalk.dim(`${data.models.join(', ')} `));
        }
        break;
      case 'response': {
        const mark = data.ok ? chalk.green('✓') : chalk.red('✗');
        process.stdout.write(`${mark}${chalk.dim(data.model)} `);
        break;
      }
      case 'stage:done':
        console.log(chalk.dim(`(${formatDuration(data.durationMs)})`));
        break;
      case 'critique':
        if (data.degraded) {
          console.log(chalk.yellow(`  ⚠ Critic failed: ${data.degraded.message}`));
        } else if (verbose) {
          for (const line of formatDiscrepancies(data.discrepancies)) console.log(chalk.dim(`    ${line}`));
        } else {
          const n = data.discrepancies.discrepancies.length;
          console.log(chalk.dim(`    ${n === 0 ? 'consensus' : `${n} discrepanc${n === 1 ? 'y' : 'ies'}`}`));
        }
        break;
      case 'warn':
        console.log(chalk.yellow(`  ⚠ ${data.message}`));
        break;
      case 'complete':
      case 'failed':
        path = data.path;
        break;
    }
  };

  return { onEvent, runPath: () => path };
}

/** Full human-readable view of a finished run. */
export function printRun(run: PipelineRun, options: { verbose?: boolean; path?: string | null } = {}): void {
  console.log('');
  console.log(chalk.bold.green('━'.repeat(60)));
  console.log('');

  if (run.answer !== null) {
    console.log(run.answer);
  } else if (run.failure) {
    console.log(chalk.red(formatFailure(run.failure)));
  }

  if (options.verbose && run.debate) {
    console.log('');
    console.log(chalk.bold('── Debate ──'));
    for (const model of run.roster) {
      const claims = run.debate.assignments[model];
      const response = run.debate.responses[model];
      const origin = response ? response.origin : 'omitted';
      const counts = claims ? ` missed ${claims.missed.length}, contested ${claims.contested.length}` : '';
      console.log(chalk.dim(`  ${model}: ${origin}${counts}`));
    }
  }

  console.log('');
  console.log(chalk.bold.green('━'.repeat(60)));
  const elapsed = run.finishedAt > 0 ? formatDuration(run.finishedAt - run.startedAt) : '?';
  const meta = [
    `State: ${run.state}`,
    `Critic: ${run.criticModel}`,
    `Synthesized by: ${run.synthesizerModel}`,
    `Discrepancies: ${run.discrepancies ? run.discrepancies.discrepancies.length : '-'}`,
    `Duration: ${elapsed}`,
  ].join(' | ');
  console.log(chalk.dim(meta));
  if (options.path) console.log(chalk.dim(`Run: ${options.path}`));
  console.log('');
}
