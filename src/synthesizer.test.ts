import { describe, it, expect, expectTypeOf } from 'vitest';
import { buildSynthesisPrompt, synthesize, type SynthesisOptions } from './synthesizer.js';
import type { DebateResponse, InitialResponse } from './types.js';
import { ScriptedGateway, fail } from '../tests/scripted-gateway.js';

const debated = (model: string, text: string): DebateResponse => ({
  model,
  stage: 'debate',
  ok: true,
  text,
  elapsedMs: 1,
  origin: 'revised',
});

describe('synthesize', () => {
  it('only accepts debate-stage responses', () => {
    expectTypeOf<SynthesisOptions['responses'][string]>().toEqualTypeOf<DebateResponse>();
    expectTypeOf<InitialResponse>().not.toMatchTypeOf<DebateResponse>();
  });

  it('merges the post-debate answers with one call', async () => {
    const gateway = new ScriptedGateway({ judge: '  Final answer.\n' });

    const outcome = await synthesize(gateway, {
      prompt: 'Q?',
      responses: { a: debated('a', 'first'), b: debated('b', 'second') },
      synthesizerModel: 'judge',
      timeoutMs: 900,
    });

    expect(outcome).toEqual({ ok: true, answer: 'Final answer.', model: 'judge', elapsedMs: 5 });
    expect(gateway.calls).toHaveLength(1);
    expect(gateway.calls[0].timeoutMs).toBe(900);
    expect(gateway.calls[0].prompt).toContain('**a**:\nfirst\n\n**b**:\nsecond');
  });

  it('refuses an empty input without calling the model', async () => {
    const gateway = new ScriptedGateway({ judge: 'x' });

    const outcome = await synthesize(gateway, { prompt: 'Q?', responses: {}, synthesizerModel: 'judge' });

    expect(outcome).toEqual({
      ok: false,
      error: { kind: 'no_responses', message: 'No post-debate response to synthesize' },
      elapsedMs: 0,
    });
    expect(gateway.calls).toHaveLength(0);
  });

  it('keeps the failure kind of the synthesizer call', async () => {
    const gateway = new ScriptedGateway({ judge: fail('timeout', 'judge timed out after 30s') });

    const outcome = await synthesize(gateway, {
      prompt: 'Q?',
      responses: { a: debated('a', 'first') },
      synthesizerModel: 'judge',
    });

    expect(outcome).toEqual({
      ok: false,
      error: { kind: 'timeout', message: 'Synthesis failed: judge timed out after 30s' },
      elapsedMs: 5,
    });
  });
});

describe('buildSynthesisPrompt', () => {
  it('embeds the question and every answer', () => {
    const prompt = buildSynthesisPrompt('Why?', { a: debated('a', 'Because.') });
    expect(prompt).toContain('Original Question:\nWhy?');
    expect(prompt).toContain('**a**:\nBecause.');
    expect(prompt.endsWith('Provide the final answer:')).toBe(true);
  });
});
