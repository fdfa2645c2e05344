import { existsSync } from 'node:fs';
import type { Command } from 'commander';
import chalk from 'chalk';
import { applyDefaults, detectProviders, findConfigPath, loadConfig, saveConfig, CONFIG_PATH } from '../config.js';
import { describeAuth } from '../auth.js';
import { DEFAULT_TIMEOUT_MS, ProviderGateway } from '../gateway.js';
import { createProvider } from '../providers/base.js';
import { asCLIError, formatDuration, parseSeconds } from './helpers.js';
import type { DialecticConfig } from '../types.js';

async function loadOrExplain(): Promise<DialecticConfig> {
  try {
    return applyDefaults(await loadConfig());
  } catch (err) {
    throw asCLIError(err);
  }
}

export function registerProvidersCommand(program: Command): void {
  const providersCmd = program.command('providers').description('Manage model providers');

  providersCmd
    .command('list')
    .description('List configured providers and the roles they play')
    .action(async () => {
      const config = await loadOrExplain();
      if (config.providers.length === 0) {
        console.log(chalk.dim('No providers. Run: dialectic providers detect --save'));
        return;
      }
      const roster = new Set(config.roster ?? config.providers.map((p) => p.name));
      for (const p of config.providers) {
        const roles = [
          roster.has(p.name) ? 'roster' : null,
          config.critic === p.name ? 'critic' : null,
          config.synthesizer === p.name ? 'synthesizer' : null,
          config.agreementModel === p.name ? 'agreement' : null,
        ].filter(Boolean);
        const roleText = roles.length > 0 ? chalk.cyan(` [${roles.join(', ')}]`) : '';
        console.log(`  ${chalk.bold(p.name)} — ${p.provider}/${p.model} (${describeAuth(p)})${roleText}`);
      }
      const source = findConfigPath();
      console.log(chalk.dim(`\n  ${source ? `Config: ${source}` : 'Using OpenRouter defaults (OPENROUTER_API_KEY)'}`));
    });

  providersCmd
    .command('detect')
    .description('Detect providers from API keys in the environment and a local Ollama')
    .option('--save', `Write detected providers to ${CONFIG_PATH}`)
    .option('-y, --yes', 'Save without asking')
    .action(async (opts: { save?: boolean; yes?: boolean }) => {
      console.log('Scanning for model providers...');
      const detected = await detectProviders();

      if (detected.length === 0) {
        console.log(chalk.yellow('\nNo providers detected.'));
        console.log(chalk.dim('Set OPENROUTER_API_KEY, or OPENAI_API_KEY, ANTHROPIC_API_KEY, GOOGLE_API_KEY, etc.'));
        return;
      }

      console.log(chalk.green(`\nFound ${detected.length} provider(s):`));
      for (const p of detected) {
        console.log(`  ${chalk.green('✓')} ${chalk.bold(p.name)} — ${p.provider}/${p.model}`);
      }

      if (!opts.save) return;
      if (!opts.yes && process.stdin.isTTY) {
        const { confirm } = await import('@inquirer/prompts');
        const ok = await confirm({ message: `Save to ${CONFIG_PATH}?`, default: true });
        if (!ok) return;
      }

      let config: DialecticConfig;
      try {
        config = await loadConfig(existsSync(CONFIG_PATH) ? CONFIG_PATH : null);
      } catch (err) {
        throw asCLIError(err);
      }
      const detectedNames = new Set(detected.map((p) => p.name));
      config.providers = [...config.providers.filter((p) => !detectedNames.has(p.name)), ...detected];
      await saveConfig(config);
      console.log(chalk.green(`\n✓ Saved ${detected.length} provider(s) to ${CONFIG_PATH}`));
    });

  providersCmd
    .command('test')
    .description('Send a one-word prompt to every configured provider')
    .option('--timeout <seconds>', 'Per-call deadline in seconds')
    .action(async (opts: { timeout?: string }) => {
      const config = await loadOrExplain();
      const gateway = new ProviderGateway(config.providers.map(createProvider), {
        systemPrompt: 'You are a helpful assistant. Reply concisely.',
      });
      const timeoutMs = opts.timeout ? parseSeconds(opts.timeout) * 1000 : DEFAULT_TIMEOUT_MS;
      const results = await Promise.all(
        gateway.models.map(async (model) => [model, await gateway.complete(model, 'Say "OK" in one word.', timeoutMs)] as const),
      );
      for (const [model, result] of results) {
        if (result.ok) {
          console.log(`  ${model}... ${chalk.green(`✓ "${result.text.slice(0, 50)}"`)} ${chalk.dim(formatDuration(result.elapsedMs))}`);
        } else {
          console.log(`  ${model}... ${chalk.red(`✗ ${result.error.kind}: ${result.error.message.slice(0, 80)}`)}`);
        }
      }
    });
}
