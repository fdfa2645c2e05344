/**
 * Auth layer. API keys inline in config or read from the environment.
 */

import type { ProviderConfig } from './types.js';

/**
 * Resolve the API key/token for a provider config.
 * Returns null when the config names no usable credential.
 */
export function resolveCredential(
  config: ProviderConfig,
  env: NodeJS.ProcessEnv = process.env,
): string | null {
  const auth = config.auth;
  if (!auth) return null;

  switch (auth.method) {
    case 'api_key':
      return auth.apiKey || null;
    case 'env':
      return env[auth.envVar] || null;
    case 'none':
      return null;
  }
}

/** Short human description of where a provider's key comes from. */
export function describeAuth(config: ProviderConfig): string {
  const auth = config.auth;
  if (!auth) return `env:${config.provider.toUpperCase()}_API_KEY`;
  switch (auth.method) {
    case 'api_key':
      return 'api_key';
    case 'env':
      return `env:${auth.envVar}`;
    case 'none':
      return 'none';
  }
}
