import type { Command } from 'commander';
import chalk from 'chalk';
import { applyDefaults, loadConfig, resolvePipelineConfig } from '../config.js';
import { ProviderGateway } from '../gateway.js';
import { DebatePipeline } from '../pipeline.js';
import { createProvider } from '../providers/base.js';
import type { CriticFailurePolicy, DialecticConfig, PipelineConfig } from '../types.js';
import { CLIError, asCLIError, parseList, parseSeconds, readStdin } from './helpers.js';
import { createProgressRenderer, formatFailure, printRun } from './render.js';

interface AskOptions {
  models?: string;
  critic?: string;
  synthesizer?: string;
  agreement?: string;
  timeout?: string;
  onCriticFailure?: string;
  config?: string;
  json?: boolean;
  verbose?: boolean;
  save: boolean;
}

function parsePolicy(value: string | undefined): CriticFailurePolicy | undefined {
  if (value === undefined) return undefined;
  if (value === 'abort' || value === 'empty') return value;
  throw new CLIError(chalk.red(`Invalid --on-critic-failure "${value}". Use abort or empty.`));
}

/** Models the run actually calls; only these need adapters. */
function modelsInUse(config: PipelineConfig): Set<string> {
  const used = new Set([...config.roster, config.criticModel, config.synthesizerModel]);
  if (config.agreementModel) used.add(config.agreementModel);
  return used;
}

export function registerAskCommand(program: Command): void {
  program
    .command('ask')
    .description('Ask every model, debate the discrepancies, and synthesize one answer')
    .argument('[prompt]', 'Question to ask (or pipe via stdin)')
    .option('-m, --models <ids>', 'Comma-separated roster of model ids')
    .option('--critic <id>', 'Model that lists discrepancies')
    .option('--synthesizer <id>', 'Model that writes the final answer')
    .option('--agreement <id>', 'Fast model that flags debate replies which only restate agreement')
    .option('--timeout <seconds>', 'Per-call deadline in seconds')
    .option('--on-critic-failure <policy>', 'abort (default) or empty')
    .option('-c, --config <path>', 'Config file (default ./dialectic.yaml or ~/.dialectic/config.yaml)')
    .option('--json', 'Print the full run as JSON')
    .option('-v, --verbose', 'Show per-model detail and the discrepancy list')
    .option('--no-save', 'Do not write a run log')
    .action(async (promptArg: string | undefined, opts: AskOptions) => {
      let prompt = promptArg;
      if (!prompt) {
        if (process.stdin.isTTY) {
          throw new CLIError(
            chalk.red('No prompt provided. Usage: dialectic ask "your question"') +
              '\n' +
              chalk.dim('Or pipe: echo "question" | dialectic ask'),
          );
        }
        prompt = await readStdin();
      }
      prompt = prompt.trim();
      if (!prompt) throw new CLIError(chalk.red('Empty input.'));

      let config: DialecticConfig;
      let pipelineConfig: PipelineConfig;
      try {
        config = applyDefaults(await loadConfig(opts.config));
        pipelineConfig = resolvePipelineConfig(config, {
          ...(opts.models ? { models: parseList(opts.models) } : {}),
          ...(opts.critic ? { critic: opts.critic } : {}),
          ...(opts.synthesizer ? { synthesizer: opts.synthesizer } : {}),
          ...(opts.agreement ? { agreementModel: opts.agreement } : {}),
          ...(opts.timeout ? { timeout: parseSeconds(opts.timeout) } : {}),
          onCriticFailure: parsePolicy(opts.onCriticFailure),
        });
      } catch (err) {
        throw asCLIError(err);
      }

      const used = modelsInUse(pipelineConfig);
      const gateway = new ProviderGateway(config.providers.filter((p) => used.has(p.name)).map(createProvider));

      const renderer = createProgressRenderer(opts.verbose ?? false);
      const pipeline = new DebatePipeline(gateway, pipelineConfig, {
        ...(opts.json ? {} : { onEvent: renderer.onEvent }),
        ...(config.sessionDir ? { sessionDir: config.sessionDir } : {}),
        save: opts.save,
      });

      if (!opts.json) {
        console.log('');
        console.log(chalk.dim(`  Roster: ${pipelineConfig.roster.join(', ')}`));
      }

      const run = await pipeline.run(prompt);

      if (opts.json) {
        console.log(JSON.stringify(run, null, 2));
        if (run.failure) throw new CLIError('', 2);
        return;
      }

      if (run.failure) throw new CLIError(chalk.red(`\n${formatFailure(run.failure)}`), 2);
      printRun(run, { verbose: opts.verbose ?? false, path: renderer.runPath() });
    });
}
