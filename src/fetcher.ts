/**
 * Initial response fetcher. The prompt goes to every model at once.
 */

import { RosterError } from './errors.js';
import { DEFAULT_TIMEOUT_MS } from './gateway.js';
import type { InitialResponse, InitialResponses, ModelGateway, ModelResponse, Stage } from './types.js';

export interface FetchOptions {
  timeoutMs?: number;
  onResponse?: (response: InitialResponse) => void;
}

/** Throws unless the roster is non-empty and free of duplicates. */
export function assertRoster(models: readonly string[]): void {
  if (models.length === 0) {
    throw new RosterError('At least one model is required');
  }
  const seen = new Set<string>();
  for (const m of models) {
    if (seen.has(m)) throw new RosterError(`Duplicate model in roster: ${m}`);
    seen.add(m);
  }
}

/** One gateway call turned into an immutable stage response. */
export async function queryModel<S extends Stage>(
  gateway: ModelGateway,
  stage: S,
  model: string,
  prompt: string,
  timeoutMs: number,
): Promise<ModelResponse<S>> {
  const result = await gateway.complete(model, prompt, timeoutMs);
  return Object.freeze(
    result.ok
      ? { model, stage, ok: true as const, text: result.text, elapsedMs: result.elapsedMs }
      : { model, stage, ok: false as const, error: result.error, elapsedMs: result.elapsedMs },
  );
}

/**
 * Query every model concurrently and wait for all of them.
 * The result has exactly one entry per requested model; a failed call is a
 * failed entry and never aborts the batch.
 */
export async function fetchInitialResponses(
  gateway: ModelGateway,
  prompt: string,
  models: readonly string[],
  options: FetchOptions = {},
): Promise<InitialResponses> {
  assertRoster(models);
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  const results = await Promise.all(
    models.map(async (model) => {
      const response = await queryModel(gateway, 'initial', model, prompt, timeoutMs);
      options.onResponse?.(response);
      return [model, response] as const;
    }),
  );
  return Object.fromEntries(results);
}

/** Successful entries only, as model → text. */
export function successfulTexts(responses: Readonly<Record<string, ModelResponse>>): Record<string, string> {
  return Object.fromEntries(
    Object.entries(responses).flatMap(([model, r]) => (r.ok ? [[model, r.text] as const] : [])),
  );
}
