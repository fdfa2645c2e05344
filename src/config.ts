import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import { getModels } from '@mariozechner/pi-ai';
import type { KnownProvider } from '@mariozechner/pi-ai';
import { ConfigSchema } from './config-schema.js';
import { ConfigError } from './errors.js';
import type { CriticFailurePolicy, DialecticConfig, PipelineConfig, ProviderConfig } from './types.js';

const CONFIG_DIR = join(homedir(), '.dialectic');
const CONFIG_PATH = join(CONFIG_DIR, 'config.yaml');
const LOCAL_CONFIG = 'dialectic.yaml';

const DEFAULT_CONFIG: DialecticConfig = {
  providers: [],
  timeout: 30,
  onCriticFailure: 'abort',
};

/** Parse and validate YAML config text. */
export function parseConfig(raw: string, source = 'config'): DialecticConfig {
  let doc: unknown;
  try {
    doc = parse(raw);
  } catch (err) {
    throw new ConfigError(`${source}: invalid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (doc === null || doc === undefined) return { ...DEFAULT_CONFIG };

  const result = ConfigSchema.safeParse(doc);
  if (!result.success) {
    throw new ConfigError(
      `${source}: invalid configuration`,
      result.error.issues.map((i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`),
    );
  }
  return result.data;
}

/** Project-local dialectic.yaml wins over ~/.dialectic/config.yaml. */
export function findConfigPath(cwd: string = process.cwd()): string | null {
  const local = join(cwd, LOCAL_CONFIG);
  if (existsSync(local)) return local;
  if (existsSync(CONFIG_PATH)) return CONFIG_PATH;
  return null;
}

export async function loadConfig(path: string | null = findConfigPath()): Promise<DialecticConfig> {
  if (!path) return { ...DEFAULT_CONFIG };
  if (!existsSync(path)) throw new ConfigError(`Config file not found: ${path}`);
  return parseConfig(await readFile(path, 'utf-8'), path);
}

export async function saveConfig(config: DialecticConfig, path: string = CONFIG_PATH): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, stringify(config), { encoding: 'utf-8', mode: 0o600 });
}

/**
 * Roster served through OpenRouter with a single key: three fast answerers,
 * DeepSeek as critic and synthesizer, and the OpenAI model doubling as the
 * agreement classifier.
 */
export function openRouterDefaults(envVar = 'OPENROUTER_API_KEY'): DialecticConfig {
  const auth = { method: 'env' as const, envVar };
  const providers: ProviderConfig[] = [
    { name: 'gemini-flash-lite', provider: 'openrouter', model: 'google/gemini-2.5-flash-lite', auth },
    { name: 'claude-haiku', provider: 'openrouter', model: 'anthropic/claude-3-haiku', auth },
    { name: 'gpt-4o-mini', provider: 'openrouter', model: 'openai/gpt-4o-mini', auth },
    { name: 'deepseek', provider: 'openrouter', model: 'deepseek/deepseek-v3.2', auth },
  ];
  return {
    providers,
    roster: ['gemini-flash-lite', 'claude-haiku', 'gpt-4o-mini'],
    critic: 'deepseek',
    synthesizer: 'deepseek',
    agreementModel: 'gpt-4o-mini',
    timeout: 30,
    onCriticFailure: 'abort',
  };
}

/**
 * With no providers configured and OPENROUTER_API_KEY set, fall back to the
 * OpenRouter roster; settings from the file are kept.
 */
export function applyDefaults(config: DialecticConfig, env: NodeJS.ProcessEnv = process.env): DialecticConfig {
  if (config.providers.length > 0 || !env.OPENROUTER_API_KEY) return config;
  const defaults = openRouterDefaults();
  return {
    ...defaults,
    timeout: config.timeout,
    onCriticFailure: config.onCriticFailure,
    ...(config.sessionDir ? { sessionDir: config.sessionDir } : {}),
  };
}

interface EnvCheck {
  env: string;
  name: string;
  provider: ProviderConfig['provider'];
  preferredModels: string[];
}

const ENV_CHECKS: EnvCheck[] = [
  { env: 'OPENAI_API_KEY', name: 'openai', provider: 'openai', preferredModels: ['gpt-4o-mini', 'gpt-4o', 'gpt-4.1-mini'] },
  {
    env: 'ANTHROPIC_API_KEY',
    name: 'claude',
    provider: 'anthropic',
    preferredModels: ['claude-3-5-haiku-latest', 'claude-sonnet-4-20250514'],
  },
  { env: 'GOOGLE_API_KEY', name: 'gemini', provider: 'google', preferredModels: ['gemini-2.5-flash', 'gemini-2.0-flash'] },
  { env: 'MISTRAL_API_KEY', name: 'mistral', provider: 'mistral', preferredModels: ['mistral-small-latest', 'mistral-large-latest'] },
  { env: 'DEEPSEEK_API_KEY', name: 'deepseek', provider: 'deepseek', preferredModels: ['deepseek-chat'] },
  { env: 'GROQ_API_KEY', name: 'groq', provider: 'groq', preferredModels: ['llama-3.3-70b-versatile'] },
  { env: 'XAI_API_KEY', name: 'grok', provider: 'xai', preferredModels: ['grok-3-mini', 'grok-3'] },
];

/** First preferred model pi-ai knows for the provider, else the first preference. */
function pickModel(check: EnvCheck): string {
  const fallback = check.preferredModels[0];
  if (check.provider === 'deepseek') return fallback;
  try {
    const models = getModels(check.provider as KnownProvider);
    if (models.length === 0) return fallback;
    return check.preferredModels.find((pref) => models.some((m) => m.id === pref)) ?? models[0].id;
  } catch {
    // Provider not in pi-ai registry
    return fallback;
  }
}

const OllamaTagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).optional(),
});

export interface DetectOptions {
  env?: NodeJS.ProcessEnv;
  /** Probe a local Ollama daemon (default true) */
  probeLocal?: boolean;
}

/**
 * Auto-detect available providers from environment keys and a local Ollama.
 * OPENROUTER_API_KEY alone yields the default OpenRouter roster.
 */
export async function detectProviders(options: DetectOptions = {}): Promise<ProviderConfig[]> {
  const env = options.env ?? process.env;
  const found: ProviderConfig[] = [];

  for (const check of ENV_CHECKS) {
    if (!env[check.env]) continue;
    found.push({
      name: check.name,
      provider: check.provider,
      model: pickModel(check),
      auth: { method: 'env', envVar: check.env },
    });
  }

  if (env.OPENROUTER_API_KEY) {
    const taken = new Set(found.map((p) => p.name));
    found.push(...openRouterDefaults().providers.filter((p) => !taken.has(p.name)));
  }

  if (options.probeLocal ?? true) {
    try {
      const resp = await fetch('http://localhost:11434/api/tags', { signal: AbortSignal.timeout(2000) });
      const data = resp.ok ? OllamaTagsSchema.safeParse(await resp.json()) : null;
      if (data?.success) {
        const embed = /embed|nomic|bge|e5-|gte-|all-minilm/i;
        const chat = (data.data.models ?? []).filter((m) => !embed.test(m.name));
        if (chat.length > 0) {
          found.push({ name: 'ollama', provider: 'ollama', model: chat[0].name, auth: { method: 'none' } });
        }
      }
    } catch {
      // Ollama not running
    }
  }

  return found;
}

export interface PipelineOverrides {
  models?: string[];
  critic?: string;
  synthesizer?: string;
  agreementModel?: string;
  /** Seconds */
  timeout?: number;
  onCriticFailure?: CriticFailurePolicy;
}

/**
 * Merge file config and CLI overrides into a PipelineConfig.
 * Every model named must be a configured provider.
 */
export function resolvePipelineConfig(config: DialecticConfig, overrides: PipelineOverrides = {}): PipelineConfig {
  const names = new Set(config.providers.map((p) => p.name));
  if (names.size === 0) {
    throw new ConfigError('No providers configured. Run `dialectic providers detect` or set OPENROUTER_API_KEY.');
  }

  const roster = overrides.models ?? config.roster ?? config.providers.map((p) => p.name);
  const criticModel = overrides.critic ?? config.critic ?? roster[0];
  const synthesizerModel = overrides.synthesizer ?? config.synthesizer ?? roster[0];
  const agreementModel = overrides.agreementModel ?? config.agreementModel;
  const timeout = overrides.timeout ?? config.timeout;

  const issues: string[] = [];
  if (roster.length === 0) issues.push('roster: at least one model is required');
  const seen = new Set<string>();
  for (const m of roster) {
    if (!names.has(m)) issues.push(`roster: unknown model "${m}"`);
    if (seen.has(m)) issues.push(`roster: duplicate model "${m}"`);
    seen.add(m);
  }
  if (criticModel && !names.has(criticModel)) issues.push(`critic: unknown model "${criticModel}"`);
  if (synthesizerModel && !names.has(synthesizerModel)) issues.push(`synthesizer: unknown model "${synthesizerModel}"`);
  if (agreementModel && !names.has(agreementModel)) issues.push(`agreementModel: unknown model "${agreementModel}"`);
  if (!(timeout > 0)) issues.push(`timeout: must be a positive number of seconds`);
  if (issues.length > 0) throw new ConfigError('Invalid pipeline configuration', issues);

  return {
    roster,
    criticModel,
    synthesizerModel,
    ...(agreementModel ? { agreementModel } : {}),
    timeoutMs: Math.round(timeout * 1000),
    onCriticFailure: overrides.onCriticFailure ?? config.onCriticFailure,
  };
}

export { CONFIG_DIR, CONFIG_PATH };
