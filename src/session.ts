/**
 * Run store: persists each stage's output of a pipeline run to disk.
 * One directory per run, one JSON file per stage.
 */

import { readFile, writeFile, mkdir, readdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import type { PipelineRun, Stage } from './types.js';

export const DEFAULT_RUNS_DIR = join(homedir(), '.dialectic', 'runs');

export type StageFile = '01-initial' | '02-critique' | '03-debate' | '04-synthesis';

export interface RunMeta {
  id: string;
  prompt: string;
  roster: string[];
  criticModel: string;
  synthesizerModel: string;
  startedAt: number;
}

export interface RunSummary {
  id: string;
  prompt: string;
  /** Final state, or 'incomplete' when the run never wrote run.json */
  state: string;
  startedAt: number;
  path: string;
}

const MetaSchema = z
  .object({
    id: z.string(),
    prompt: z.string(),
    startedAt: z.number(),
  })
  .passthrough();

const RunStateSchema = z.object({ state: z.string() }).passthrough();

const GatewayErrorSchema = z.object({
  kind: z.enum(['timeout', 'transport', 'empty']),
  message: z.string(),
});

const responseSchema = <S extends Stage>(stage: S) =>
  z.discriminatedUnion('ok', [
    z.object({ model: z.string(), stage: z.literal(stage), elapsedMs: z.number(), ok: z.literal(true), text: z.string() }),
    z.object({
      model: z.string(),
      stage: z.literal(stage),
      elapsedMs: z.number(),
      ok: z.literal(false),
      error: GatewayErrorSchema,
    }),
  ]);

const DiscrepancySetSchema = z.object({
  consensusReached: z.boolean(),
  discrepancies: z.array(
    z.object({
      claimId: z.string(),
      claim: z.string(),
      modelsWithClaim: z.array(z.string()),
      modelsMissingClaim: z.array(z.string()).optional(),
      confidence: z.number().optional(),
    }),
  ),
});

const CritiqueErrorSchema = z.object({
  kind: z.enum(['transport', 'parse', 'validation', 'no_responses']),
  message: z.string(),
  raw: z.string().optional(),
  issues: z.array(z.string()).optional(),
});

const TimingSchema = z.object({ startedAt: z.number(), durationMs: z.number() });

/** Shape of a stored run.json; anything else is treated as unreadable. */
const RunSchema = z.object({
  id: z.string(),
  prompt: z.string(),
  roster: z.array(z.string()),
  criticModel: z.string(),
  synthesizerModel: z.string(),
  state: z.enum(['Fetching', 'Critiquing', 'Debating', 'Synthesizing', 'Done', 'Failed']),
  timings: z.object({
    fetch: TimingSchema.optional(),
    critique: TimingSchema.optional(),
    debate: TimingSchema.optional(),
    synthesis: TimingSchema.optional(),
  }),
  initial: z.record(z.string(), responseSchema('initial')),
  discrepancies: DiscrepancySetSchema.nullable(),
  critiqueDegraded: CritiqueErrorSchema.optional(),
  debate: z
    .object({
      attempts: z.record(z.string(), responseSchema('debate')),
      responses: z.record(
        z.string(),
        z.object({
          model: z.string(),
          stage: z.literal('debate'),
          ok: z.literal(true),
          text: z.string(),
          elapsedMs: z.number(),
          origin: z.enum(['revised', 'initial', 'agreement']),
        }),
      ),
      assignments: z.record(z.string(), z.object({ missed: z.array(z.string()), contested: z.array(z.string()) })),
    })
    .nullable(),
  answer: z.string().nullable(),
  failure: z
    .object({
      stage: z.enum(['Critiquing', 'Synthesizing']),
      kind: z.enum(['transport', 'parse', 'validation', 'no_responses', 'timeout', 'empty']),
      message: z.string(),
      raw: z.string().optional(),
    })
    .nullable(),
  startedAt: z.number(),
  finishedAt: z.number(),
});

export class RunStore {
  private dir: string;

  constructor(runId: string, baseDir?: string) {
    this.dir = join(baseDir ?? DEFAULT_RUNS_DIR, runId);
  }

  get path(): string {
    return this.dir;
  }

  async init(): Promise<void> {
    await mkdir(this.dir, { recursive: true });
  }

  async writeMeta(meta: RunMeta): Promise<void> {
    await this.writeJson('meta', meta);
  }

  async writeStage(stage: StageFile, data: unknown): Promise<void> {
    await this.writeJson(stage, data);
  }

  async writeRun(run: PipelineRun): Promise<void> {
    await this.writeJson('run', run);
  }

  private async writeJson(name: string, data: unknown): Promise<void> {
    await writeFile(join(this.dir, `${name}.json`), JSON.stringify(data, null, 2), 'utf-8');
  }
}

async function readJson(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, 'utf-8'));
}

/** Runs under baseDir, newest first. Directories without a readable meta.json are skipped. */
export async function listRuns(baseDir: string = DEFAULT_RUNS_DIR): Promise<RunSummary[]> {
  if (!existsSync(baseDir)) return [];
  const entries = await readdir(baseDir, { withFileTypes: true });
  const runs: RunSummary[] = [];

  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const dir = join(baseDir, entry.name);
    const metaPath = join(dir, 'meta.json');
    if (!existsSync(metaPath)) continue;

    const meta = MetaSchema.safeParse(await readJson(metaPath).catch(() => null));
    if (!meta.success) continue;

    let state = 'incomplete';
    const runPath = join(dir, 'run.json');
    if (existsSync(runPath)) {
      const stored = RunStateSchema.safeParse(await readJson(runPath).catch(() => null));
      if (stored.success) state = stored.data.state;
    }
    runs.push({ id: meta.data.id, prompt: meta.data.prompt, state, startedAt: meta.data.startedAt, path: dir });
  }

  return runs.sort((a, b) => b.startedAt - a.startedAt);
}

/** Load a finished run by id, or the newest one for 'last'. A run.json that fails the schema reads as null. */
export async function readRun(id: string, baseDir: string = DEFAULT_RUNS_DIR): Promise<PipelineRun | null> {
  let runId = id;
  if (id === 'last') {
    const [latest] = await listRuns(baseDir);
    if (!latest) return null;
    runId = latest.id;
  }
  const p = join(baseDir, runId, 'run.json');
  if (!existsSync(p)) return null;
  const stored = RunSchema.safeParse(await readJson(p).catch(() => null));
  return stored.success ? stored.data : null;
}
