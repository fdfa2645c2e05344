/**
 * Synthesizer: merges the post-debate answers into one final answer.
 * Initial answers never reach this stage; the input type only admits
 * debate-stage responses.
 */

import { DEFAULT_TIMEOUT_MS } from './gateway.js';
import type { ModelGateway, SynthesisInput, SynthesisOutcome } from './types.js';

export interface SynthesisOptions {
  prompt: string;
  responses: SynthesisInput;
  synthesizerModel: string;
  timeoutMs?: number;
}

export function buildSynthesisPrompt(question: string, responses: SynthesisInput): string {
  const responsesText = Object.values(responses)
    .map((r) => `**${r.model}**:\n${r.text}`)
    .join('\n\n');

  return `You are an expert synthesizer creating the definitive answer to a question.

Original Question:
${question}

Below are responses from several AI models after a debate round in which they:
1. Gave initial answers
2. Were shown the claims other models made that they had left out
3. Re-evaluated their positions

These are their refined responses:

${responsesText}

Your task:
1. Analyze all the responses carefully
2. Identify the most accurate, complete and well-reasoned points
3. Merge them into a single authoritative answer
4. Keep the answer clear and concise

Provide the final answer:`;
}

export async function synthesize(gateway: ModelGateway, options: SynthesisOptions): Promise<SynthesisOutcome> {
  if (Object.keys(options.responses).length === 0) {
    return {
      ok: false,
      error: { kind: 'no_responses', message: 'No post-debate response to synthesize' },
      elapsedMs: 0,
    };
  }

  const result = await gateway.complete(
    options.synthesizerModel,
    buildSynthesisPrompt(options.prompt, options.responses),
    options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
  );
  if (!result.ok) {
    return {
      ok: false,
      error: { kind: result.error.kind, message: `Synthesis failed: ${result.error.message}` },
      elapsedMs: result.elapsedMs,
    };
  }
  return { ok: true, answer: result.text.trim(), model: options.synthesizerModel, elapsedMs: result.elapsedMs };
}
