import { ConfigError, ToolLaunchError } from '../shared/errors.js';
import { generateRunId } from '../shared/ids.js';
import { logger } from '../shared/logger.js';
import type { RunHistory } from '../workspace/db.js';
import type { PipelineConfig } from '../workspace/types.js';
import type { ArtifactStore } from './artifact-store.js';
import type { EphemeralResourceGuard } from './resource-guard.js';
import { LAUNCH_FAILURE_EXIT_CODE, type ToolInvoker } from './tool-invoker.js';
import type {
  ArtifactRef,
  PipelineRun,
  RunState,
  StageCleanup,
  StageContext,
  StageDescriptor,
  StageOutcome,
  StageResult,
  ToggleMap,
} from './types.js';

export interface ExecutorDeps {
  config: PipelineConfig;
  invoker: ToolInvoker;
  store: ArtifactStore;
  guard: EphemeralResourceGuard;
  history?: RunHistory;
  now?: () => Date;
}

interface PendingCleanup {
  owner: string;
  after: string;
  run: StageCleanup;
  ctx: StageContext;
}

export function isStageEnabled(descriptor: StageDescriptor, toggles: ToggleMap): boolean {
  if (descriptor.enablement.kind === 'always') return true;
  return toggles[descriptor.enablement.toggle] === true;
}

export function classify(exitCode: number, fatal: boolean): StageOutcome {
  if (exitCode === 0) return 'OK';
  return fatal ? 'HARD_FAIL' : 'SOFT_FAIL';
}

/**
 * Drives one pipeline run over a declarative stage table: stages run strictly in
 * declaration order, soft failures are recorded and the run moves on, a hard
 * failure stops the loop. Pending cleanups always run before run() returns.
 */
export class StageGraphExecutor {
  private descriptors: readonly StageDescriptor[] = [];
  private toggles: Record<string, boolean> = {};

  constructor(private readonly deps: ExecutorDeps) {}

  configure(descriptors: readonly StageDescriptor[], toggles: ToggleMap): this {
    const seen = new Map<string, number>();
    descriptors.forEach((d, i) => {
      if (seen.has(d.name)) throw new ConfigError(`Duplicate stage name: ${d.name}`);
      seen.set(d.name, i);
    });
    descriptors.forEach((d, i) => {
      const after = d.cleanup?.after;
      if (after === undefined) return;
      const at = seen.get(after);
      if (at === undefined) {
        throw new ConfigError(`Stage ${d.name} holds its cleanup until unknown stage ${after}`);
      }
      if (at < i) {
        throw new ConfigError(`Stage ${d.name} holds its cleanup until ${after}, which runs before it`);
      }
    });

    this.descriptors = [...descriptors];
    this.toggles = {};
    for (const [name, value] of Object.entries(toggles)) {
      if (value !== undefined) this.toggles[name] = value;
    }
    return this;
  }

  async run(signal: AbortSignal = new AbortController().signal): Promise<PipelineRun> {
    const now = this.deps.now ?? (() => new Date());
    const started = now();
    const run: PipelineRun = {
      id: generateRunId(started),
      startedAt: started.toISOString(),
      endedAt: null,
      toggles: { ...this.toggles },
      results: [],
      cleanups: [],
      outcome: null,
      cancelled: false,
    };
    const log = logger.child({ run_id: run.id });
    const state: RunState = { results: run.results };
    const pending: PendingCleanup[] = [];
    let hardFailed = false;

    log.info('Run started', { stages: this.descriptors.length, toggles: run.toggles });
    this.deps.history?.startRun(run);

    try {
      for (const descriptor of this.descriptors) {
        if (signal.aborted) {
          run.cancelled = true;
          log.warn('Run cancelled – remaining stages not started', { next_stage: descriptor.name });
          break;
        }

        if (!isStageEnabled(descriptor, this.toggles)) {
          const skipped = freezeResult({
            name: descriptor.name,
            enabled: false,
            exitCode: 'skipped',
            artifacts: [],
            outcome: 'SKIPPED',
            durationMs: 0,
          });
          run.results.push(skipped);
          this.deps.history?.recordStage(run.id, run.results.length - 1, skipped);
          log.info('Stage skipped', { stage: descriptor.name });
          await this.flushCleanups(pending, descriptor.name, run);
          continue;
        }

        const ctx = this.contextFor(descriptor, run.id, state, signal);
        if (descriptor.cleanup) {
          pending.push({
            owner: descriptor.name,
            after: descriptor.cleanup.after ?? descriptor.name,
            run: descriptor.cleanup.run,
            ctx,
          });
        }

        const result = await this.executeStage(descriptor, ctx);
        run.results.push(result);
        this.deps.history?.recordStage(run.id, run.results.length - 1, result);
        await this.flushCleanups(pending, descriptor.name, run);

        if (result.outcome === 'HARD_FAIL') {
          hardFailed = true;
          log.error('Fatal stage failed – halting run', { stage: descriptor.name, exit_code: result.exitCode });
          break;
        }
      }
      if (signal.aborted) run.cancelled = true;
    } finally {
      for (const cleanup of pending.splice(0).reverse()) {
        await this.runCleanup(cleanup, run);
      }
      run.version = state.version;
      run.link = state.link;
      run.outcome = hardFailed || run.cancelled ? 'FAILURE' : 'SUCCESS';
      run.endedAt = now().toISOString();
      this.deps.history?.finishRun(run);
      log.info('Run completed', {
        outcome: run.outcome,
        cancelled: run.cancelled,
        soft_failures: run.results.filter((r) => r.outcome === 'SOFT_FAIL').map((r) => r.name),
      });
    }

    return run;
  }

  private contextFor(
    descriptor: StageDescriptor,
    runId: string,
    state: RunState,
    signal: AbortSignal,
  ): StageContext {
    const { config } = this.deps;
    return {
      runId,
      stage: descriptor.name,
      config,
      invoker: this.deps.invoker,
      store: this.deps.store,
      guard: this.deps.guard,
      state,
      signal,
      timeoutMs: config.timeouts.stages[descriptor.name] ?? descriptor.timeoutMs ?? config.timeouts.defaultMs,
    };
  }

  private async executeStage(descriptor: StageDescriptor, ctx: StageContext): Promise<StageResult> {
    const log = logger.child({ run_id: ctx.runId, stage: descriptor.name });
    log.info('Stage started', { fatal: descriptor.fatal });
    const startedAt = Date.now();

    let exitCode: number;
    let artifacts: ArtifactRef[] = [];
    let error: string | undefined;
    try {
      const res = await descriptor.action(ctx);
      exitCode = res.exitCode;
      artifacts = res.artifacts ?? [];
      error = res.error;
    } catch (err) {
      exitCode = err instanceof ToolLaunchError ? LAUNCH_FAILURE_EXIT_CODE : 1;
      error = (err as Error).message;
    }

    const outcome = classify(exitCode, descriptor.fatal);
    const result = freezeResult({
      name: descriptor.name,
      enabled: true,
      exitCode,
      artifacts,
      outcome,
      ...(error !== undefined ? { error } : {}),
      durationMs: Date.now() - startedAt,
    });

    if (outcome === 'OK') {
      log.info('Stage finished', { outcome, exit_code: exitCode, duration_ms: result.durationMs });
    } else {
      log.warn('Stage failed', { outcome, exit_code: exitCode, error, duration_ms: result.durationMs });
    }
    return result;
  }

  private async flushCleanups(pending: PendingCleanup[], finishedStage: string, run: PipelineRun): Promise<void> {
    const due = pending.filter((p) => p.after === finishedStage);
    for (const cleanup of due.reverse()) {
      pending.splice(pending.indexOf(cleanup), 1);
      await this.runCleanup(cleanup, run);
    }
  }

  private async runCleanup(cleanup: PendingCleanup, run: PipelineRun): Promise<void> {
    try {
      await cleanup.run(cleanup.ctx);
      run.cleanups.push({ stage: cleanup.owner, ok: true });
      logger.debug('Cleanup finished', { run_id: run.id, stage: cleanup.owner });
    } catch (err) {
      const message = (err as Error).message;
      run.cleanups.push({ stage: cleanup.owner, ok: false, error: message });
      logger.error('Cleanup failed', { run_id: run.id, stage: cleanup.owner, error: message });
    }
  }
}

function freezeResult(result: StageResult): StageResult {
  return Object.freeze({ ...result, artifacts: Object.freeze([...result.artifacts]) });
}
