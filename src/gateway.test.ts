import { describe, it, expect, vi, afterEach } from 'vitest';
import { ProviderGateway, withDeadline } from './gateway.js';
import type { ProviderAdapter } from './types.js';

function makeAdapter(name: string, generate: ProviderAdapter['generate']): ProviderAdapter {
  return { name, generate };
}

afterEach(() => {
  vi.useRealTimers();
});

describe('ProviderGateway', () => {
  it('returns the adapter text', async () => {
    const gateway = new ProviderGateway([makeAdapter('alice', async () => 'hello')]);
    const result = await gateway.complete('alice', 'hi', 1000);
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.text).toBe('hello');
  });

  it('passes the system prompt to every adapter', async () => {
    const generate = vi.fn(async () => 'ok');
    const gateway = new ProviderGateway([makeAdapter('alice', generate)], { systemPrompt: 'Be brief.' });
    await gateway.complete('alice', 'question', 1000);
    expect(generate).toHaveBeenCalledWith('question', 'Be brief.');
  });

  it('reports an unknown model as a transport failure without calling anything', async () => {
    const gateway = new ProviderGateway([]);
    const result = await gateway.complete('ghost', 'hi', 1000);
    expect(result).toEqual({
      ok: false,
      error: { kind: 'transport', message: 'No provider configured for model "ghost"' },
      elapsedMs: 0,
    });
  });

  it('classifies whitespace-only text as empty', async () => {
    const gateway = new ProviderGateway([makeAdapter('alice', async () => '  \n ')]);
    const result = await gateway.complete('alice', 'hi', 1000);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toEqual({ kind: 'empty', message: 'alice returned an empty response' });
    }
  });

  it('turns a thrown error into a transport failure', async () => {
    const gateway = new ProviderGateway([
      makeAdapter('alice', async () => {
        throw new Error('401 Unauthorized');
      }),
    ]);
    const result = await gateway.complete('alice', 'hi', 1000);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toEqual({ kind: 'transport', message: '401 Unauthorized' });
  });

  it('times out a call that never settles', async () => {
    vi.useFakeTimers();
    const gateway = new ProviderGateway([makeAdapter('slow', () => new Promise<string>(() => {}))]);

    const pending = gateway.complete('slow', 'hi', 2000);
    await vi.advanceTimersByTimeAsync(2000);
    const result = await pending;

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toEqual({ kind: 'timeout', message: 'slow timed out after 2s' });
      expect(result.elapsedMs).toBe(2000);
    }
  });

  it('does not let one slow model hold up another', async () => {
    vi.useFakeTimers();
    const gateway = new ProviderGateway([
      makeAdapter('slow', () => new Promise<string>(() => {})),
      makeAdapter('fast', async () => 'done'),
    ]);

    const both = Promise.all([gateway.complete('slow', 'hi', 500), gateway.complete('fast', 'hi', 500)]);
    await vi.advanceTimersByTimeAsync(500);
    const [slow, fast] = await both;

    expect(slow.ok).toBe(false);
    expect(fast.ok).toBe(true);
  });

  it('rejects duplicate adapter names', () => {
    expect(
      () => new ProviderGateway([makeAdapter('alice', async () => 'a'), makeAdapter('alice', async () => 'b')]),
    ).toThrow('Duplicate model id: alice');
  });

  it('lists model ids in registration order', () => {
    const gateway = new ProviderGateway([makeAdapter('b', async () => ''), makeAdapter('a', async () => '')]);
    expect(gateway.models).toEqual(['b', 'a']);
  });
});

describe('withDeadline', () => {
  it('clears its timer once the promise settles', async () => {
    vi.useFakeTimers();
    await expect(withDeadline(Promise.resolve(42), 10_000, 'x')).resolves.toBe(42);
    expect(vi.getTimerCount()).toBe(0);
  });
});
