import { describe, it, expect } from 'vitest';
import {
  analyzeDiscrepancies,
  buildCriticPrompt,
  generateClaimId,
  parseCriticOutput,
  stripCodeFences,
} from './critic.js';
import { fetchInitialResponses } from './fetcher.js';
import { ScriptedGateway, fail } from '../tests/scripted-gateway.js';

const MODELS = ['alpha', 'beta', 'gamma'];

const DOCUMENT = JSON.stringify({
  consensus_reached: false,
  discrepancies: [
    {
      claim_id: 'altitude',
      claim: 'Boiling point drops with altitude',
      models_with_claim: ['alpha'],
      models_missing_claim: ['beta'],
      confidence: 0.9,
    },
    { claim: 'Use a pressure cooker above 3000 m', models_with_claim: ['beta', 'gamma'] },
  ],
});

describe('stripCodeFences', () => {
  it('removes a json fence', () => {
    expect(stripCodeFences('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it('removes a bare fence and surrounding whitespace', () => {
    expect(stripCodeFences('  ```\n[]\n```  \n')).toBe('[]');
  });

  it('leaves unfenced text alone apart from trimming', () => {
    expect(stripCodeFences('\n {"a": 1} \n')).toBe('{"a": 1}');
  });
});

describe('generateClaimId', () => {
  it('lowercases, drops punctuation and hyphenates', () => {
    expect(generateClaimId('Water boils at 100°C at sea level!')).toBe('water-boils-at-100c-at-sea-level');
  });

  it('caps the id at 40 characters without a trailing hyphen', () => {
    expect(generateClaimId('The quick brown fox jumps over the lazy dog again')).toBe(
      'the-quick-brown-fox-jumps-over-the-lazy',
    );
  });

  it('keeps letters outside the Latin alphabet', () => {
    expect(generateClaimId('Вода кипит при 100 градусах!')).toBe('вода-кипит-при-100-градусах');
  });
});

describe('parseCriticOutput', () => {
  it('reads the document form and carries the optional fields through', () => {
    const result = parseCriticOutput(DOCUMENT, MODELS);
    expect(result).toEqual({
      ok: true,
      discrepancies: {
        consensusReached: false,
        discrepancies: [
          {
            claimId: 'altitude',
            claim: 'Boiling point drops with altitude',
            modelsWithClaim: ['alpha'],
            modelsMissingClaim: ['beta'],
            confidence: 0.9,
          },
          {
            claimId: 'use-a-pressure-cooker-above-3000-m',
            claim: 'Use a pressure cooker above 3000 m',
            modelsWithClaim: ['beta', 'gamma'],
          },
        ],
      },
    });
  });

  it('gives the same set for fenced and unfenced input', () => {
    const plain = parseCriticOutput(DOCUMENT, MODELS);
    const fenced = parseCriticOutput('```json\n' + DOCUMENT + '\n```', MODELS);
    expect(fenced).toEqual(plain);
  });

  it('accepts a bare list of discrepancies', () => {
    const list = JSON.stringify([{ claim: 'x', models_with_claim: ['gamma'] }]);
    const result = parseCriticOutput(list, MODELS);
    expect(result.ok && result.discrepancies.discrepancies.map((d) => d.claimId)).toEqual(['x']);
  });

  it('reports consensus for an empty list', () => {
    expect(parseCriticOutput('{"consensus_reached": true, "discrepancies": []}', MODELS)).toEqual({
      ok: true,
      discrepancies: { consensusReached: true, discrepancies: [] },
    });
  });

  it('fails to parse empty output', () => {
    const result = parseCriticOutput('```json\n```', MODELS);
    expect(result).toEqual({
      ok: false,
      error: { kind: 'parse', message: 'Critic output is empty', raw: '```json\n```' },
    });
  });

  it('fails to parse text that is not JSON', () => {
    const result = parseCriticOutput('The models mostly agree.', MODELS);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('parse');
      expect(result.error.message).toMatch(/^Critic output is not valid JSON: /);
      expect(result.error.raw).toBe('The models mostly agree.');
    }
  });

  it('rejects entries that do not match the schema', () => {
    const result = parseCriticOutput('{"discrepancies": [{"models_with_claim": ["alpha"]}]}', MODELS);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('validation');
      expect(result.error.issues).toEqual(['discrepancies.0.claim: Required']);
    }
  });

  it('rejects a model id the critic was not shown', () => {
    const raw = JSON.stringify({ discrepancies: [{ claim: 'x', models_with_claim: ['alpha', 'delta'] }] });
    const result = parseCriticOutput(raw, MODELS);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('validation');
      expect(result.error.issues).toEqual(['discrepancies.0.models_with_claim: unknown model "delta"']);
    }
  });

  it('rejects a model listed as both asserting and lacking a claim', () => {
    const raw = JSON.stringify([{ claim: 'x', models_with_claim: ['alpha'], models_missing_claim: ['alpha'] }]);
    const result = parseCriticOutput(raw, MODELS);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.issues).toEqual(['discrepancies.0: model "alpha" both asserts and lacks the claim']);
    }
  });

  it('rejects an explicit missing list that names nobody', () => {
    const raw = JSON.stringify({ discrepancies: [{ claim: 'x', models_with_claim: ['alpha'], models_missing_claim: [] }] });
    const result = parseCriticOutput(raw, MODELS);
    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'validation',
        message: 'Critic output does not match the discrepancy schema',
        raw,
        issues: ['discrepancies.0.models_missing_claim: must name at least one model'],
      },
    });
  });

  it('rejects a claim every model asserts', () => {
    const raw = JSON.stringify([{ claim: 'x', models_with_claim: ['gamma', 'alpha', 'beta'] }]);
    const result = parseCriticOutput(raw, MODELS);
    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'validation',
        message: 'Critic output lists claims no model disputes',
        raw,
        issues: ['discrepancies.0: every model asserts the claim'],
      },
    });
  });

  it('numbers a claim whose text leaves no usable id', () => {
    const raw = JSON.stringify([
      { claim: 'first', models_with_claim: ['alpha'] },
      { claim: '?!', models_with_claim: ['beta'] },
    ]);
    const result = parseCriticOutput(raw, MODELS);
    expect(result.ok && result.discrepancies.discrepancies.map((d) => d.claimId)).toEqual(['first', 'claim-2']);
  });

  it('rejects a whole reply when a single entry is bad', () => {
    const raw = JSON.stringify([
      { claim: 'good', models_with_claim: ['alpha'] },
      { claim: 'bad', models_with_claim: ['alpha'], confidence: 3 },
    ]);
    const result = parseCriticOutput(raw, MODELS);
    expect(result.ok).toBe(false);
  });
});

describe('buildCriticPrompt', () => {
  it('shows every answer and the closed list of model ids', () => {
    const prompt = buildCriticPrompt('Why is the sky blue?', { alpha: 'Rayleigh scattering', beta: 'Ocean reflection' });
    expect(prompt).toContain('## Question\nWhy is the sky blue?');
    expect(prompt).toContain('**alpha**:\nRayleigh scattering');
    expect(prompt).toContain('**beta**:\nOcean reflection');
    expect(prompt).toContain('Model ids you may use: ["alpha","beta"]');
  });
});

describe('analyzeDiscrepancies', () => {
  it('returns no_responses without calling the critic when every initial call failed', async () => {
    const gateway = new ScriptedGateway({ critic: '[]' });
    const initial = await fetchInitialResponses(gateway, 'Q', ['alpha', 'beta']);

    const outcome = await analyzeDiscrepancies(gateway, initial, { criticModel: 'critic', prompt: 'Q' });

    expect(outcome).toEqual({
      ok: false,
      error: { kind: 'no_responses', message: 'No initial response succeeded; nothing to critique' },
      elapsedMs: 0,
    });
    expect(gateway.callsTo('critic')).toHaveLength(0);
  });

  it('shows the critic only the successful answers', async () => {
    const gateway = new ScriptedGateway({ alpha: 'A says so', beta: fail('transport'), critic: '[]' });
    const initial = await fetchInitialResponses(gateway, 'Q', ['alpha', 'beta']);

    await analyzeDiscrepancies(gateway, initial, { criticModel: 'critic', prompt: 'Q' });

    const [call] = gateway.callsTo('critic');
    expect(call.prompt).toContain('**alpha**:\nA says so');
    expect(call.prompt).not.toContain('**beta**');
  });

  it('treats a failed model named by the critic as unknown', async () => {
    const gateway = new ScriptedGateway({
      alpha: 'a',
      beta: fail('timeout'),
      critic: JSON.stringify([{ claim: 'x', models_with_claim: ['beta'] }]),
    });
    const initial = await fetchInitialResponses(gateway, 'Q', ['alpha', 'beta']);

    const outcome = await analyzeDiscrepancies(gateway, initial, { criticModel: 'critic', prompt: 'Q' });

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error.kind).toBe('validation');
  });

  it('wraps a critic transport failure', async () => {
    const gateway = new ScriptedGateway({ alpha: 'a', critic: fail('timeout', 'critic timed out after 30s') });
    const initial = await fetchInitialResponses(gateway, 'Q', ['alpha']);

    const outcome = await analyzeDiscrepancies(gateway, initial, { criticModel: 'critic', prompt: 'Q' });

    expect(outcome).toEqual({
      ok: false,
      error: { kind: 'transport', message: 'Critic call failed (timeout): critic timed out after 30s' },
      elapsedMs: 5,
    });
  });

  it('returns the parsed set with the raw reply', async () => {
    const raw = '```json\n[{"claim": "x", "models_with_claim": ["alpha"], "models_missing_claim": ["beta"]}]\n```';
    const gateway = new ScriptedGateway({ alpha: 'a', beta: 'b', critic: raw });
    const initial = await fetchInitialResponses(gateway, 'Q', ['alpha', 'beta']);

    const outcome = await analyzeDiscrepancies(gateway, initial, { criticModel: 'critic', prompt: 'Q' });

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.raw).toBe(raw);
      expect(outcome.discrepancies.discrepancies).toHaveLength(1);
    }
  });
});
