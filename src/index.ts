export { DebatePipeline } from './pipeline.js';
export type { PipelineEvents, PipelineEventArgs, PipelineOptions, StageName } from './pipeline.js';
export { ProviderGateway, withDeadline, DEFAULT_TIMEOUT_MS } from './gateway.js';
export { fetchInitialResponses, queryModel, successfulTexts } from './fetcher.js';
export { analyzeDiscrepancies, parseCriticOutput, stripCodeFences, generateClaimId } from './critic.js';
export { runDebate, assignClaims, buildDebatePrompt } from './debate.js';
export { synthesize, buildSynthesisPrompt } from './synthesizer.js';
export { RunStore, listRuns, readRun } from './session.js';
export { loadConfig, parseConfig, resolvePipelineConfig, detectProviders, openRouterDefaults } from './config.js';
export { createProvider } from './providers/base.js';
export { RosterError, ConfigError } from './errors.js';
export type * from './types.js';
