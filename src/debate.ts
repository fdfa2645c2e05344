/**
 * Debate orchestrator: each model is re-asked with only the claims it
 * missed or holds against the others, then all re-queries are joined.
 *
 * Which models dispute a claim:
 *   - the critic listed `models_missing_claim` → exactly those;
 *   - otherwise → every critiqued model not asserting it (set difference).
 * A disputing model has missed the claim. An asserting model is contested
 * when the disputing models outnumber the asserting ones.
 */

import { DEFAULT_TIMEOUT_MS } from './gateway.js';
import { queryModel } from './fetcher.js';
import type {
  ClaimAssignment,
  DebateAttempt,
  DebateOutcome,
  DebateResponse,
  Discrepancy,
  DiscrepancySet,
  InitialResponse,
  InitialResponses,
  ModelGateway,
} from './types.js';

export interface DebateOptions {
  /** The user's original question */
  prompt: string;
  initial: InitialResponses;
  discrepancies: DiscrepancySet;
  timeoutMs?: number;
  /** Fast classifier model; when set, replies that only restate agreement keep the initial text */
  agreementModel?: string;
  onAttempt?: (attempt: DebateAttempt) => void;
}

function disputingModels(d: Discrepancy, critiqued: readonly string[]): readonly string[] {
  return d.modelsMissingClaim ?? critiqued.filter((m) => !d.modelsWithClaim.includes(m));
}

/**
 * Claims to put in front of one model. `critiqued` holds the models whose
 * initial answers the critic saw; any other model gets every claim the
 * others asserted.
 */
export function assignClaims(model: string, set: DiscrepancySet, critiqued: readonly string[]): ClaimAssignment {
  const missed: string[] = [];
  const contested: string[] = [];
  for (const d of set.discrepancies) {
    const asserts = d.modelsWithClaim.includes(model);
    if (!critiqued.includes(model)) {
      if (!asserts) missed.push(d.claim);
      continue;
    }
    const disputing = disputingModels(d, critiqued);
    if (disputing.includes(model)) missed.push(d.claim);
    else if (asserts && disputing.length > d.modelsWithClaim.length) contested.push(d.claim);
  }
  return { missed, contested };
}

const bullets = (items: string[]) => items.map((c) => `- ${c}`).join('\n');

export function buildDebatePrompt(question: string, initial: InitialResponse, claims: ClaimAssignment): string {
  if (!initial.ok) {
    const context =
      claims.missed.length > 0
        ? `\n\nOther models answering this question raised the following points:\n${bullets(claims.missed)}\n\nTake these points into account where they are correct.`
        : '';
    return `Original Question: ${question}${context}\n\nPlease provide your answer.`;
  }

  const header = `Original Question: ${question}\n\nYour Initial Response:\n${initial.text}`;

  if (claims.missed.length === 0 && claims.contested.length === 0) {
    return (
      `${header}\n\n` +
      `A parallel review found no significant discrepancies in your response. ` +
      `Please review your answer one more time and confirm or refine it if needed.`
    );
  }

  const sections: string[] = [header];
  if (claims.missed.length > 0) {
    sections.push(
      `In a parallel review, other models mentioned the following claims/points that you did not include:\n${bullets(claims.missed)}`,
    );
  }
  if (claims.contested.length > 0) {
    sections.push(
      `You made the following claims/points that most other models did not make or contradicted:\n${bullets(claims.contested)}`,
    );
  }
  sections.push(
    `Does this information change your reasoning? If so, why? ` +
      `Please re-evaluate your original response and provide an updated answer.`,
  );
  return sections.join('\n\n');
}

export function buildAgreementPrompt(response: string): string {
  return [
    `You are a text classification model. Decide whether the following text is a simple agreement with a previous statement.`,
    `A simple agreement adds no new information or claims; it only confirms that the previous response was right.`,
    `Respond with "true" if it is a simple agreement and "false" otherwise.`,
    ``,
    `---`,
    ``,
    `Text:`,
    response,
    ``,
    `---`,
    ``,
    `Is this a simple agreement? (true/false)`,
  ].join('\n');
}

async function isSimpleAgreement(
  gateway: ModelGateway,
  model: string,
  text: string,
  timeoutMs: number,
): Promise<boolean> {
  const result = await gateway.complete(model, buildAgreementPrompt(text), timeoutMs);
  if (!result.ok) return false;
  return result.text.trim().toLowerCase().replace(/[."']/g, '') === 'true';
}

/**
 * Re-query every model of the initial mapping concurrently.
 * A failed re-query falls back to the model's initial text; a model with
 * neither is left out of the post-debate responses.
 */
export async function runDebate(gateway: ModelGateway, options: DebateOptions): Promise<DebateOutcome> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const models = Object.keys(options.initial);
  const critiqued = models.filter((m) => options.initial[m].ok);

  const results = await Promise.all(
    models.map(async (model) => {
      const initial = options.initial[model];
      const claims = assignClaims(model, options.discrepancies, critiqued);
      const prompt = buildDebatePrompt(options.prompt, initial, claims);
      const attempt = await queryModel(gateway, 'debate', model, prompt, timeoutMs);
      options.onAttempt?.(attempt);

      let response: DebateResponse | null = null;
      if (attempt.ok) {
        const agreed =
          options.agreementModel !== undefined &&
          initial.ok &&
          (await isSimpleAgreement(gateway, options.agreementModel, attempt.text, timeoutMs));
        response = {
          model,
          stage: 'debate',
          ok: true,
          text: agreed && initial.ok ? initial.text : attempt.text,
          elapsedMs: attempt.elapsedMs,
          origin: agreed ? 'agreement' : 'revised',
        };
      } else if (initial.ok) {
        response = {
          model,
          stage: 'debate',
          ok: true,
          text: initial.text,
          elapsedMs: attempt.elapsedMs,
          origin: 'initial',
        };
      }
      return { model, claims, attempt, response };
    }),
  );

  return {
    attempts: Object.fromEntries(results.map((r) => [r.model, r.attempt] as const)),
    responses: Object.fromEntries(
      results.flatMap((r) => (r.response ? [[r.model, Object.freeze(r.response)] as const] : [])),
    ),
    assignments: Object.fromEntries(results.map((r) => [r.model, r.claims] as const)),
  };
}
