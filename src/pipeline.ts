/**
 * Debate pipeline: fetch → critique → debate → synthesize.
 *
 * Each stage's calls run concurrently and are joined before the next stage
 * builds a single prompt. Stage outputs are written to a RunStore as they
 * land; progress goes out through onEvent and the core never prints.
 */

import { randomUUID } from 'node:crypto';
import { analyzeDiscrepancies } from './critic.js';
import { runDebate } from './debate.js';
import { assertRoster, fetchInitialResponses } from './fetcher.js';
import { RunStore } from './session.js';
import { synthesize } from './synthesizer.js';
import type {
  CritiqueError,
  DiscrepancySet,
  GatewayError,
  ModelGateway,
  ModelResponse,
  PipelineConfig,
  PipelineFailure,
  PipelineRun,
  PipelineState,
  Stage,
  StageTiming,
} from './types.js';

export type StageName = 'fetch' | 'critique' | 'debate' | 'synthesis';

export interface PipelineEvents {
  state: { runId: string; state: PipelineState };
  stage: { stage: StageName; models: string[] };
  'stage:done': { stage: StageName; durationMs: number };
  response: { stage: Stage; model: string; ok: boolean; elapsedMs: number; error?: GatewayError };
  critique: { discrepancies: DiscrepancySet; degraded?: CritiqueError };
  warn: { message: string };
  complete: { run: PipelineRun; path: string | null };
  failed: { run: PipelineRun; path: string | null };
}

/** `[event, data]` pairs; handlers can switch on the event name and get the matching data type. */
export type PipelineEventArgs = {
  [K in keyof PipelineEvents]: [event: K, data: PipelineEvents[K]];
}[keyof PipelineEvents];

export interface PipelineOptions {
  onEvent?: (...args: PipelineEventArgs) => void;
  /** Base directory for run logs (default ~/.dialectic/runs) */
  sessionDir?: string;
  /** Write run logs; default true */
  save?: boolean;
}

const EMPTY_SET: DiscrepancySet = Object.freeze({ consensusReached: true, discrepancies: [] });

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

export class DebatePipeline {
  private gateway: ModelGateway;
  private config: PipelineConfig;
  private emit: (...args: PipelineEventArgs) => void;
  private sessionDir?: string;
  private save: boolean;

  constructor(gateway: ModelGateway, config: PipelineConfig, options?: PipelineOptions) {
    assertRoster(config.roster);
    if (!config.criticModel) throw new Error('A critic model is required');
    if (!config.synthesizerModel) throw new Error('A synthesizer model is required');
    this.gateway = gateway;
    this.config = config;
    this.emit = options?.onEvent ?? (() => {});
    this.sessionDir = options?.sessionDir;
    this.save = options?.save ?? true;
  }

  async run(prompt: string): Promise<PipelineRun> {
    const { roster, criticModel, synthesizerModel, timeoutMs } = this.config;
    const run: PipelineRun = {
      id: randomUUID(),
      prompt,
      roster: [...roster],
      criticModel,
      synthesizerModel,
      state: 'Fetching',
      timings: {},
      initial: {},
      discrepancies: null,
      debate: null,
      answer: null,
      failure: null,
      startedAt: Date.now(),
      finishedAt: 0,
    };
    const store = this.save ? new RunStore(run.id, this.sessionDir) : null;

    await this.persist('run directory', async () => {
      if (!store) return;
      await store.init();
      await store.writeMeta({ id: run.id, prompt, roster: run.roster, criticModel, synthesizerModel, startedAt: run.startedAt });
    });

    // Fetching
    this.transition(run, 'Fetching');
    run.initial = await this.stage(run, 'fetch', roster, () =>
      fetchInitialResponses(this.gateway, prompt, roster, {
        timeoutMs,
        onResponse: (r) => this.emitResponse(r),
      }),
    );
    await this.persist('initial responses', async () => store?.writeStage('01-initial', run.initial));

    // Critiquing
    this.transition(run, 'Critiquing');
    const critique = await this.stage(run, 'critique', [criticModel], () =>
      analyzeDiscrepancies(this.gateway, run.initial, { criticModel, prompt, timeoutMs }),
    );
    await this.persist('critique', async () => store?.writeStage('02-critique', critique));

    let found: DiscrepancySet;
    if (critique.ok) {
      found = critique.discrepancies;
    } else if (critique.error.kind !== 'no_responses' && this.config.onCriticFailure === 'empty') {
      found = EMPTY_SET;
      run.critiqueDegraded = critique.error;
      this.emit('warn', { message: `Critic failed (${critique.error.kind}); continuing without discrepancies` });
    } else {
      return this.fail(run, store, {
        stage: 'Critiquing',
        kind: critique.error.kind,
        message: critique.error.message,
        ...(critique.error.raw !== undefined ? { raw: critique.error.raw } : {}),
      });
    }
    const discrepancies = found;
    run.discrepancies = discrepancies;
    this.emit('critique', {
      discrepancies,
      ...(run.critiqueDegraded ? { degraded: run.critiqueDegraded } : {}),
    });

    // Debating
    this.transition(run, 'Debating');
    const debate = await this.stage(run, 'debate', roster, () =>
      runDebate(this.gateway, {
        prompt,
        initial: run.initial,
        discrepancies,
        timeoutMs,
        ...(this.config.agreementModel ? { agreementModel: this.config.agreementModel } : {}),
        onAttempt: (a) => this.emitResponse(a),
      }),
    );
    run.debate = debate;
    await this.persist('debate', async () => store?.writeStage('03-debate', debate));

    // Synthesizing
    this.transition(run, 'Synthesizing');
    const synthesis = await this.stage(run, 'synthesis', [synthesizerModel], () =>
      synthesize(this.gateway, { prompt, responses: debate.responses, synthesizerModel, timeoutMs }),
    );
    await this.persist('synthesis', async () => store?.writeStage('04-synthesis', synthesis));

    if (!synthesis.ok) {
      return this.fail(run, store, { stage: 'Synthesizing', kind: synthesis.error.kind, message: synthesis.error.message });
    }

    run.answer = synthesis.answer;
    run.finishedAt = Date.now();
    this.transition(run, 'Done');
    await this.persist('run', async () => store?.writeRun(run));
    this.emit('complete', { run, path: store?.path ?? null });
    return run;
  }

  private transition(run: PipelineRun, state: PipelineState): void {
    run.state = state;
    this.emit('state', { runId: run.id, state });
  }

  private async stage<T>(run: PipelineRun, name: StageName, models: string[], fn: () => Promise<T>): Promise<T> {
    this.emit('stage', { stage: name, models });
    const timing: StageTiming = { startedAt: Date.now(), durationMs: 0 };
    const result = await fn();
    timing.durationMs = Date.now() - timing.startedAt;
    run.timings[name] = timing;
    this.emit('stage:done', { stage: name, durationMs: timing.durationMs });
    return result;
  }

  private emitResponse(r: ModelResponse): void {
    this.emit('response', {
      stage: r.stage,
      model: r.model,
      ok: r.ok,
      elapsedMs: r.elapsedMs,
      ...(r.ok ? {} : { error: r.error }),
    });
  }

  private async fail(run: PipelineRun, store: RunStore | null, failure: PipelineFailure): Promise<PipelineRun> {
    run.failure = failure;
    run.finishedAt = Date.now();
    this.transition(run, 'Failed');
    await this.persist('run', async () => store?.writeRun(run));
    this.emit('failed', { run, path: store?.path ?? null });
    return run;
  }

  /** Run log writes never fail the run. */
  private async persist(what: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      this.emit('warn', { message: `Failed to write ${what}: ${errorMessage(err)}` });
    }
  }
}
