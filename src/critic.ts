/**
 * Critic analyzer. One call to a fast model that breaks the initial answers
 * down into claims and says which models asserted each one.
 *
 * The critic's reply is the one structured-output boundary of the pipeline:
 * it is fence-stripped, parsed and validated against a closed set of model
 * ids before anything downstream sees it. One bad entry rejects the reply.
 */

import { z } from 'zod';
import { DEFAULT_TIMEOUT_MS } from './gateway.js';
import { successfulTexts } from './fetcher.js';
import type {
  CritiqueError,
  CritiqueOutcome,
  Discrepancy,
  DiscrepancySet,
  InitialResponses,
  ModelGateway,
} from './types.js';

export interface CriticOptions {
  criticModel: string;
  /** The user's original question, shown to the critic for context */
  prompt: string;
  timeoutMs?: number;
}

const DiscrepancySchema = z.object({
  claim_id: z.string().min(1).optional(),
  claim: z.string().trim().min(1),
  models_with_claim: z.array(z.string()).min(1),
  models_missing_claim: z.array(z.string()).min(1, 'must name at least one model').optional(),
  confidence: z.number().min(0).max(1).optional(),
});

const CriticDocumentSchema = z.object({
  consensus_reached: z.boolean().optional(),
  discrepancies: z.array(DiscrepancySchema),
});

/** A bare array is read as the discrepancies list. */
const BareListSchema = z.array(DiscrepancySchema);

type RawDiscrepancy = z.infer<typeof DiscrepancySchema>;

export type ParseResult =
  | { ok: true; discrepancies: DiscrepancySet }
  | { ok: false; error: CritiqueError };

/**
 * Remove a surrounding markdown code fence (```json ... ``` or ``` ... ```).
 * Text without a fence is returned trimmed.
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const match = trimmed.match(/^```[\w-]*[ \t]*\r?\n?([\s\S]*?)\r?\n?```$/);
  return (match ? match[1] : trimmed).trim();
}

/** Stable, lowercase, hyphenated id from the claim text. Letters of any script are kept. */
export function generateClaimId(claim: string, maxLen = 40): string {
  return claim
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/\s+/g, '-')
    .slice(0, maxLen)
    .replace(/^-+|-+$/g, '');
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

/** Model-id checks zod cannot express without knowing the run's roster. */
function checkModelIds(entries: RawDiscrepancy[], known: ReadonlySet<string>): string[] {
  const issues: string[] = [];
  entries.forEach((d, i) => {
    const withClaim = new Set(d.models_with_claim);
    for (const m of d.models_with_claim) {
      if (!known.has(m)) issues.push(`discrepancies.${i}.models_with_claim: unknown model "${m}"`);
    }
    if (withClaim.size !== d.models_with_claim.length) {
      issues.push(`discrepancies.${i}.models_with_claim: duplicate model id`);
    }
    const missing = d.models_missing_claim ?? [];
    for (const m of missing) {
      if (!known.has(m)) issues.push(`discrepancies.${i}.models_missing_claim: unknown model "${m}"`);
      if (withClaim.has(m)) {
        issues.push(`discrepancies.${i}: model "${m}" both asserts and lacks the claim`);
      }
    }
    if (new Set(missing).size !== missing.length) {
      issues.push(`discrepancies.${i}.models_missing_claim: duplicate model id`);
    }
  });
  return issues;
}

/** An entry every shown model asserts has nobody left to dispute it. */
function checkDisputed(entries: RawDiscrepancy[], known: ReadonlySet<string>): string[] {
  const issues: string[] = [];
  entries.forEach((d, i) => {
    if (d.models_missing_claim) return;
    const withClaim = new Set(d.models_with_claim);
    if ([...known].every((m) => withClaim.has(m))) {
      issues.push(`discrepancies.${i}: every model asserts the claim`);
    }
  });
  return issues;
}

/**
 * Turn raw critic text into a validated DiscrepancySet.
 * `knownModels` is the closed set of ids the critic was shown.
 */
export function parseCriticOutput(raw: string, knownModels: Iterable<string>): ParseResult {
  const cleaned = stripCodeFences(raw);
  if (!cleaned) {
    return { ok: false, error: { kind: 'parse', message: 'Critic output is empty', raw } };
  }

  let json: unknown;
  try {
    json = JSON.parse(cleaned);
  } catch (err) {
    return {
      ok: false,
      error: {
        kind: 'parse',
        message: `Critic output is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        raw,
      },
    };
  }

  const parsed = Array.isArray(json)
    ? BareListSchema.transform((discrepancies) => ({ discrepancies })).safeParse(json)
    : CriticDocumentSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(formatIssue);
    return {
      ok: false,
      error: { kind: 'validation', message: 'Critic output does not match the discrepancy schema', raw, issues },
    };
  }

  const entries = parsed.data.discrepancies;
  const known = new Set(knownModels);
  const idIssues = checkModelIds(entries, known);
  if (idIssues.length > 0) {
    return {
      ok: false,
      error: { kind: 'validation', message: 'Critic output references models it was not shown', raw, issues: idIssues },
    };
  }
  const undisputed = checkDisputed(entries, known);
  if (undisputed.length > 0) {
    return {
      ok: false,
      error: { kind: 'validation', message: 'Critic output lists claims no model disputes', raw, issues: undisputed },
    };
  }

  const discrepancies: Discrepancy[] = entries.map((d, i) => ({
    claimId: d.claim_id ?? (generateClaimId(d.claim) || `claim-${i + 1}`),
    claim: d.claim,
    modelsWithClaim: d.models_with_claim,
    ...(d.models_missing_claim ? { modelsMissingClaim: d.models_missing_claim } : {}),
    ...(d.confidence !== undefined ? { confidence: d.confidence } : {}),
  }));

  return {
    ok: true,
    discrepancies: { consensusReached: discrepancies.length === 0, discrepancies },
  };
}

export function buildCriticPrompt(question: string, responses: Record<string, string>): string {
  const models = Object.keys(responses);
  const responsesText = Object.entries(responses)
    .map(([model, text]) => `**${model}**:\n${text}`)
    .join('\n\n');

  return [
    `You are a technical auditor for a multi-model answering system.`,
    `${models.length} models answered the same question. Identify MATERIAL and FACTUAL discrepancies between their answers.`,
    ``,
    `A discrepancy is:`,
    `- a direct contradiction in facts, math or logic;`,
    `- conflicting code or procedures that would behave differently;`,
    `- a critical omission that compromises accuracy, safety or completeness.`,
    ``,
    `Ignore style, tone, verbosity, formatting, naming, and harmless additive detail.`,
    ``,
    `## Question`,
    question,
    ``,
    `## Answers`,
    responsesText,
    ``,
    `## Output`,
    `Model ids you may use: ${JSON.stringify(models)}`,
    `Reply with a single raw JSON object and nothing else:`,
    '```json',
    `{`,
    `  "consensus_reached": false,`,
    `  "discrepancies": [`,
    `    {`,
    `      "claim": "The specific fact or step in question",`,
    `      "models_with_claim": ["model ids that assert it"],`,
    `      "models_missing_claim": ["model ids that omit or contradict it"],`,
    `      "confidence": 0.8`,
    `    }`,
    `  ]`,
    `}`,
    '```',
    `Use only the model ids listed above. "models_missing_claim" must not be empty; if every model agrees it is not a discrepancy.`,
    `If there are no discrepancies, return {"consensus_reached": true, "discrepancies": []}.`,
  ].join('\n');
}

/**
 * Run the critic over the initial responses. Failed entries are left out;
 * with no successful entry at all the gateway is not called.
 */
export async function analyzeDiscrepancies(
  gateway: ModelGateway,
  initial: InitialResponses,
  options: CriticOptions,
): Promise<CritiqueOutcome> {
  const responses = successfulTexts(initial);
  const models = Object.keys(responses);
  if (models.length === 0) {
    return {
      ok: false,
      error: { kind: 'no_responses', message: 'No initial response succeeded; nothing to critique' },
      elapsedMs: 0,
    };
  }

  const result = await gateway.complete(
    options.criticModel,
    buildCriticPrompt(options.prompt, responses),
    options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
  );
  if (!result.ok) {
    return {
      ok: false,
      error: { kind: 'transport', message: `Critic call failed (${result.error.kind}): ${result.error.message}` },
      elapsedMs: result.elapsedMs,
    };
  }

  const parsed = parseCriticOutput(result.text, models);
  if (!parsed.ok) return { ok: false, error: parsed.error, elapsedMs: result.elapsedMs };
  return { ok: true, discrepancies: parsed.discrepancies, raw: result.text, elapsedMs: result.elapsedMs };
}
