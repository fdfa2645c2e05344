/**
 * Core types for Dialectic
 */

// --- Provider ---

export type ProviderKind =
  | 'openai'
  | 'anthropic'
  | 'google'
  | 'openrouter'
  | 'mistral'
  | 'deepseek'
  | 'groq'
  | 'xai'
  | 'ollama'
  | 'custom';

export interface ProviderConfig {
  name: string;
  provider: ProviderKind;
  model: string;
  auth?: AuthConfig;
  baseUrl?: string;
  /** Output token cap per call (default 4096) */
  maxTokens?: number;
}

export type AuthConfig =
  | { method: 'api_key'; apiKey: string }
  | { method: 'env'; envVar: string }          // reads key from env at runtime
  | { method: 'none' };                        // local models (Ollama, LM Studio)

export interface ProviderAdapter {
  name: string;
  config?: ProviderConfig;
  generate(prompt: string, systemPrompt?: string): Promise<string>;
}

// --- Gateway ---

export type GatewayErrorKind = 'timeout' | 'transport' | 'empty';

export interface GatewayError {
  kind: GatewayErrorKind;
  message: string;
}

export type GatewayResult =
  | { ok: true; text: string; elapsedMs: number }
  | { ok: false; error: GatewayError; elapsedMs: number };

/**
 * The single boundary through which every model call is issued.
 * Implementations enforce the deadline themselves and never reject.
 */
export interface ModelGateway {
  complete(modelId: string, prompt: string, timeoutMs: number): Promise<GatewayResult>;
}

// --- Stage outputs ---

export type Stage = 'initial' | 'debate';

interface ResponseBase<S extends Stage> {
  readonly model: string;
  readonly stage: S;
  readonly elapsedMs: number;
}

export type ModelResponse<S extends Stage = Stage> =
  | (ResponseBase<S> & { readonly ok: true; readonly text: string })
  | (ResponseBase<S> & { readonly ok: false; readonly error: GatewayError });

export type InitialResponse = ModelResponse<'initial'>;
export type DebateAttempt = ModelResponse<'debate'>;

/** Where a post-debate answer's text came from. */
export type DebateOrigin = 'revised' | 'initial' | 'agreement';

/** A usable post-debate answer. Only these reach the synthesizer. */
export interface DebateResponse {
  readonly model: string;
  readonly stage: 'debate';
  readonly ok: true;
  readonly text: string;
  readonly elapsedMs: number;
  readonly origin: DebateOrigin;
}

export type InitialResponses = Readonly<Record<string, InitialResponse>>;
export type SynthesisInput = Readonly<Record<string, DebateResponse>>;

// --- Critique ---

export interface Discrepancy {
  readonly claimId: string;
  readonly claim: string;
  readonly modelsWithClaim: readonly string[];
  /** Present only when the critic listed the disputing models explicitly */
  readonly modelsMissingClaim?: readonly string[];
  readonly confidence?: number;
}

export interface DiscrepancySet {
  readonly consensusReached: boolean;
  readonly discrepancies: readonly Discrepancy[];
}

export type CritiqueErrorKind = 'transport' | 'parse' | 'validation' | 'no_responses';

export interface CritiqueError {
  kind: CritiqueErrorKind;
  message: string;
  /** Unparsed critic text, for diagnostics */
  raw?: string;
  /** Schema issues, for validation failures */
  issues?: string[];
}

export type CritiqueOutcome =
  | { ok: true; discrepancies: DiscrepancySet; raw: string; elapsedMs: number }
  | { ok: false; error: CritiqueError; elapsedMs: number };

// --- Debate ---

export interface ClaimAssignment {
  /** Claims others asserted that this model left out */
  missed: string[];
  /** Claims this model asserted against a majority */
  contested: string[];
}

export interface DebateOutcome {
  /** Exactly one debate-stage entry per model, success or failure */
  attempts: Readonly<Record<string, DebateAttempt>>;
  /** Post-debate answers; omits models with no usable text */
  responses: SynthesisInput;
  assignments: Readonly<Record<string, ClaimAssignment>>;
}

// --- Synthesis ---

export type SynthesisErrorKind = 'timeout' | 'transport' | 'empty' | 'no_responses';

export interface SynthesisError {
  kind: SynthesisErrorKind;
  message: string;
}

export type SynthesisOutcome =
  | { ok: true; answer: string; model: string; elapsedMs: number }
  | { ok: false; error: SynthesisError; elapsedMs: number };

// --- Pipeline ---

export type PipelineState =
  | 'Fetching'
  | 'Critiquing'
  | 'Debating'
  | 'Synthesizing'
  | 'Done'
  | 'Failed';

export type CriticFailurePolicy = 'abort' | 'empty';

export interface PipelineConfig {
  /** Ordered, distinct model ids queried in the initial and debate stages */
  roster: string[];
  criticModel: string;
  synthesizerModel: string;
  /** Optional fast classifier that flags debate replies which only restate agreement */
  agreementModel?: string;
  /** Per-call deadline in milliseconds */
  timeoutMs: number;
  onCriticFailure: CriticFailurePolicy;
}

export interface StageTiming {
  startedAt: number;
  durationMs: number;
}

export interface PipelineFailure {
  stage: 'Critiquing' | 'Synthesizing';
  kind: CritiqueErrorKind | SynthesisErrorKind;
  message: string;
  raw?: string;
}

export interface PipelineRun {
  id: string;
  prompt: string;
  roster: string[];
  criticModel: string;
  synthesizerModel: string;
  state: PipelineState;
  timings: Partial<Record<'fetch' | 'critique' | 'debate' | 'synthesis', StageTiming>>;
  initial: InitialResponses;
  discrepancies: DiscrepancySet | null;
  /** Set when the critic failed and the run continued with an empty set */
  critiqueDegraded?: CritiqueError;
  debate: DebateOutcome | null;
  answer: string | null;
  failure: PipelineFailure | null;
  startedAt: number;
  finishedAt: number;
}

// --- Config ---

export interface DialecticConfig {
  providers: ProviderConfig[];
  roster?: string[];
  critic?: string;
  synthesizer?: string;
  agreementModel?: string;
  /** Per-call deadline in seconds */
  timeout: number;
  onCriticFailure: CriticFailurePolicy;
  sessionDir?: string;
}
