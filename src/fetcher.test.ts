import { describe, it, expect } from 'vitest';
import { fetchInitialResponses, successfulTexts } from './fetcher.js';
import { RosterError } from './errors.js';
import type { InitialResponse } from './types.js';
import { ScriptedGateway, fail } from '../tests/scripted-gateway.js';

describe('fetchInitialResponses', () => {
  it('returns exactly one entry per requested model, in roster order', async () => {
    const gateway = new ScriptedGateway({ a: 'alpha', b: fail('timeout', 'b timed out after 1s'), c: 'gamma' });

    const responses = await fetchInitialResponses(gateway, 'Q', ['c', 'a', 'b'], { timeoutMs: 1000 });

    expect(Object.keys(responses)).toEqual(['c', 'a', 'b']);
    expect(responses.a).toEqual({ model: 'a', stage: 'initial', ok: true, text: 'alpha', elapsedMs: 5 });
    expect(responses.b).toEqual({
      model: 'b',
      stage: 'initial',
      ok: false,
      error: { kind: 'timeout', message: 'b timed out after 1s' },
      elapsedMs: 5,
    });
  });

  it('sends the same prompt and deadline to every model', async () => {
    const gateway = new ScriptedGateway({ a: 'x', b: 'y' });
    await fetchInitialResponses(gateway, 'What is 2+2?', ['a', 'b'], { timeoutMs: 750 });
    expect(gateway.calls).toEqual([
      { model: 'a', prompt: 'What is 2+2?', timeoutMs: 750 },
      { model: 'b', prompt: 'What is 2+2?', timeoutMs: 750 },
    ]);
  });

  it('returns frozen entries', async () => {
    const gateway = new ScriptedGateway({ a: 'x' });
    const responses = await fetchInitialResponses(gateway, 'Q', ['a']);
    expect(Object.isFrozen(responses.a)).toBe(true);
  });

  it('reports each response as it lands', async () => {
    const gateway = new ScriptedGateway({ a: 'x', b: fail('transport') });
    const seen: InitialResponse[] = [];
    await fetchInitialResponses(gateway, 'Q', ['a', 'b'], { onResponse: (r) => seen.push(r) });
    expect(seen.map((r) => [r.model, r.ok])).toEqual([
      ['a', true],
      ['b', false],
    ]);
  });

  it('keeps every entry when all calls fail', async () => {
    const gateway = new ScriptedGateway();
    const responses = await fetchInitialResponses(gateway, 'Q', ['a', 'b']);
    expect(Object.values(responses).map((r) => r.ok)).toEqual([false, false]);
  });

  it('rejects an empty roster', async () => {
    await expect(fetchInitialResponses(new ScriptedGateway(), 'Q', [])).rejects.toThrow(RosterError);
  });

  it('rejects a roster that repeats a model', async () => {
    await expect(fetchInitialResponses(new ScriptedGateway(), 'Q', ['a', 'b', 'a'])).rejects.toThrow(
      'Duplicate model in roster: a',
    );
  });
});

describe('successfulTexts', () => {
  it('keeps only successful entries', async () => {
    const gateway = new ScriptedGateway({ a: 'x', c: 'z' });
    const responses = await fetchInitialResponses(gateway, 'Q', ['a', 'b', 'c']);
    expect(successfulTexts(responses)).toEqual({ a: 'x', c: 'z' });
  });

  it('keeps a model named __proto__ as its own entry', async () => {
    const gateway = new ScriptedGateway().script('__proto__', 'p');
    const responses = await fetchInitialResponses(gateway, 'Q', ['__proto__']);
    const texts = successfulTexts(responses);
    expect(Object.keys(texts)).toEqual(['__proto__']);
    expect(Object.getOwnPropertyDescriptor(texts, '__proto__')?.value).toBe('p');
  });
});
