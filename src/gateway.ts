/**
 * Model gateway, the one place a model call is issued.
 *
 * Every call carries its own deadline. Failures come back as values
 * (timeout, transport, empty) so a stage can join its calls without
 * one model's outcome affecting another's.
 */

import type { GatewayResult, ModelGateway, ProviderAdapter } from './types.js';

export const DEFAULT_TIMEOUT_MS = 30_000;

class DeadlineExceeded extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs / 1000}s`);
    this.name = 'DeadlineExceeded';
  }
}

/**
 * Race a promise against a deadline. The timer is always cleared, so a
 * settled call never keeps the process alive.
 */
export async function withDeadline<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new DeadlineExceeded(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Gateway over provider adapters keyed by model id.
 */
export class ProviderGateway implements ModelGateway {
  private adapters: Map<string, ProviderAdapter>;
  private systemPrompt?: string;

  constructor(adapters: Iterable<ProviderAdapter>, options?: { systemPrompt?: string }) {
    this.adapters = new Map();
    for (const adapter of adapters) {
      if (this.adapters.has(adapter.name)) {
        throw new Error(`Duplicate model id: ${adapter.name}`);
      }
      this.adapters.set(adapter.name, adapter);
    }
    this.systemPrompt = options?.systemPrompt;
  }

  get models(): string[] {
    return [...this.adapters.keys()];
  }

  async complete(modelId: string, prompt: string, timeoutMs: number): Promise<GatewayResult> {
    const start = Date.now();
    const adapter = this.adapters.get(modelId);
    if (!adapter) {
      return {
        ok: false,
        error: { kind: 'transport', message: `No provider configured for model "${modelId}"` },
        elapsedMs: 0,
      };
    }

    try {
      const text = await withDeadline(adapter.generate(prompt, this.systemPrompt), timeoutMs, modelId);
      const elapsedMs = Date.now() - start;
      if (!text || text.trim().length === 0) {
        return { ok: false, error: { kind: 'empty', message: `${modelId} returned an empty response` }, elapsedMs };
      }
      return { ok: true, text, elapsedMs };
    } catch (err) {
      const elapsedMs = Date.now() - start;
      if (err instanceof DeadlineExceeded) {
        return { ok: false, error: { kind: 'timeout', message: err.message }, elapsedMs };
      }
      return {
        ok: false,
        error: { kind: 'transport', message: err instanceof Error ? err.message : String(err) },
        elapsedMs,
      };
    }
  }
}
