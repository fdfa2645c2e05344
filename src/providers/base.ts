import type { ProviderAdapter, ProviderConfig } from '../types.js';
import { resolveCredential } from '../auth.js';
import { completeSimple, getModels } from '@mariozechner/pi-ai';
import type { Api, AssistantMessage, Model, SimpleStreamOptions, KnownProvider } from '@mariozechner/pi-ai';

// ============================================================================
// Pi-ai model resolution
// ============================================================================

/**
 * Map our provider config to a pi-ai Model descriptor.
 * If the model exists in pi-ai's registry, use that. Otherwise build one.
 */
export function resolveModel(config: ProviderConfig): Model<Api> {
  const piProvider = mapProvider(config.provider);
  if (piProvider) {
    try {
      const registered = getModels(piProvider as KnownProvider).find((m) => m.id === config.model);
      if (registered) {
        return { ...registered, baseUrl: config.baseUrl || registered.baseUrl } as Model<Api>;
      }
    } catch {
      // Provider not in registry, build manually
    }
  }

  const { api, provider, baseUrl } = resolveApiDetails(config);
  return {
    id: config.model,
    name: config.name,
    api,
    provider,
    baseUrl,
    reasoning: false,
    input: ['text'] as ('text' | 'image')[],
    cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0 },
    contextWindow: 128000,
    maxTokens: config.maxTokens ?? 4096,
    headers: {},
  } as Model<Api>;
}

/**
 * Map Dialectic provider kinds to pi-ai provider keys.
 * Returns null for kinds pi-ai has no registry entry for.
 */
function mapProvider(p: ProviderConfig['provider']): string | null {
  switch (p) {
    case 'deepseek':
    case 'ollama':
    case 'custom':
      return null;
    default:
      return p;
  }
}

/**
 * Resolve API type + provider + baseUrl for a model not found in pi-ai's registry.
 * OpenRouter model ids ("openai/gpt-4o-mini") usually land here when pi-ai's
 * registry lags behind the router's catalogue.
 */
function resolveApiDetails(config: ProviderConfig): {
  api: Api;
  provider: string;
  baseUrl: string;
} {
  switch (config.provider) {
    case 'openrouter':
      return {
        api: 'openai-completions',
        provider: 'openrouter',
        baseUrl: config.baseUrl || 'https://openrouter.ai/api/v1',
      };
    case 'deepseek':
      return {
        api: 'openai-completions',
        provider: 'openai',
        baseUrl: config.baseUrl || 'https://api.deepseek.com/v1',
      };
    case 'ollama':
      return {
        api: 'openai-completions',
        provider: 'openai',
        baseUrl: config.baseUrl || 'http://localhost:11434/v1',
      };
    case 'custom':
      return { api: 'openai-completions', provider: 'openai', baseUrl: config.baseUrl || '' };
  }

  // Delegate to pi-ai: infer api/baseUrl from a registered model for this provider.
  try {
    const models = getModels(config.provider as KnownProvider);
    const ref = models[0];
    if (ref) {
      return { api: ref.api, provider: ref.provider, baseUrl: config.baseUrl || ref.baseUrl };
    }
  } catch {
    // Not a known pi-ai provider; fall through to default
  }

  return {
    api: 'openai-completions',
    provider: config.provider,
    baseUrl: config.baseUrl || '',
  };
}

// ============================================================================
// Provider creation
// ============================================================================

/**
 * Resolve the API key for a provider.
 * Priority: explicit auth config → <PROVIDER>_API_KEY env var → local placeholder
 */
export function resolveApiKey(config: ProviderConfig, env: NodeJS.ProcessEnv = process.env): string {
  const credential = resolveCredential(config, env);
  if (credential) return credential;

  const envKey = env[`${config.provider.toUpperCase()}_API_KEY`];
  if (envKey) return envKey;

  if (config.provider === 'google' && env.GEMINI_API_KEY) return env.GEMINI_API_KEY;

  // Local providers don't need a key
  if (config.provider === 'ollama' || config.provider === 'custom') {
    return 'ollama'; // placeholder, not validated
  }

  return '';
}

/** First text block of an assistant message; surfaces provider-side errors. */
export function extractText(config: ProviderConfig, result: AssistantMessage): string {
  if (result.errorMessage) {
    throw new Error(`${config.provider}/${config.model}: ${result.errorMessage.slice(0, 200)}`);
  }
  for (const block of result.content) {
    if (block.type === 'text' && block.text) return block.text;
  }
  return '';
}

/**
 * Create a provider adapter from config. Every provider goes through
 * pi-ai's unified API; deadlines are the gateway's concern.
 */
export function createProvider(config: ProviderConfig): ProviderAdapter {
  const apiKey = resolveApiKey(config);
  const model = resolveModel(config);

  const buildOpts = (): SimpleStreamOptions => ({
    apiKey,
    maxTokens: config.maxTokens ?? 4096,
  });

  return {
    name: config.name,
    config,
    async generate(prompt: string, systemPrompt?: string) {
      const result = await completeSimple(
        model,
        {
          systemPrompt,
          messages: [
            {
              role: 'user' as const,
              content: [{ type: 'text' as const, text: prompt }],
              timestamp: Date.now(),
            },
          ],
        },
        buildOpts(),
      );
      return extractText(config, result);
    },
  };
}
