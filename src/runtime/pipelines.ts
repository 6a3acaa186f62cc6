import type { spawn } from 'node:child_process';
import type { RunHistory } from '../workspace/db.js';
import { getReportPaths } from '../workspace/paths.js';
import type { PipelineConfig } from '../workspace/types.js';
import { ArtifactStore } from './artifact-store.js';
import { EphemeralResourceGuard } from './resource-guard.js';
import { StageGraphExecutor } from './runner.js';
import { createDevSecOpsPipeline, type ReportingServices } from './stages/index.js';
import { ProcessToolInvoker } from './tool-invoker.js';
import type { PipelineRun, StageDescriptor } from './types.js';

export interface RunPipelineOptions extends ReportingServices {
  signal?: AbortSignal;
  history?: RunHistory;
  /** Process launcher; tests pass a scripted stand-in. */
  spawn?: typeof spawn;
  /** Replaces the built-in DevSecOps stage table. */
  stages?: StageDescriptor[];
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Wire the collaborators for one run and execute it. Live ephemeral resources
 * are released in the finalizer whatever happens inside the executor.
 */
export async function runDevSecOpsPipeline(
  config: PipelineConfig,
  opts: RunPipelineOptions = {},
): Promise<PipelineRun> {
  const store = new ArtifactStore(getReportPaths(config).dir);
  store.ensureDir();
  const invoker = new ProcessToolInvoker({ store, spawn: opts.spawn });
  const guard = new EphemeralResourceGuard({
    invoker,
    dockerBin: config.tools.docker,
    readinessTimeoutMs: config.dast.readinessTimeoutMs,
    pollIntervalMs: config.dast.pollIntervalMs,
    fixedDelayMs: config.dast.fixedDelayMs,
    fetch: opts.fetch,
    sleep: opts.sleep,
  });

  const executor = new StageGraphExecutor({
    config,
    invoker,
    store,
    guard,
    history: opts.history,
    now: opts.now,
  }).configure(opts.stages ?? createDevSecOpsPipeline(opts), config.toggles);

  try {
    return await executor.run(opts.signal);
  } finally {
    await guard.releaseAll();
  }
}
