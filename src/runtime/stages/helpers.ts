import { join } from 'node:path';
import { resolveProjectRoot } from '../../workspace/paths.js';
import type { InvocationRequest, InvocationResult } from '../tool-invoker.js';
import type { ArtifactRef, StageActionResult, StageContext, StageResult } from '../types.js';

export function projectRoot(ctx: StageContext): string {
  return resolveProjectRoot(ctx.config);
}

export function projectPath(ctx: StageContext, rel: string): string {
  return join(projectRoot(ctx), rel);
}

/** Invoke a tool from the project root with the stage's timeout and abort signal. */
export function invokeTool(
  ctx: StageContext,
  req: Omit<InvocationRequest, 'cwd' | 'timeoutMs' | 'signal'>,
): Promise<InvocationResult> {
  return ctx.invoker.invoke({
    ...req,
    cwd: projectRoot(ctx),
    timeoutMs: ctx.timeoutMs,
    signal: ctx.signal,
  });
}

export function toStageResult(result: InvocationResult, extra: ArtifactRef[] = []): StageActionResult {
  const artifacts = result.artifact ? [result.artifact, ...extra] : extra;
  if (result.exitCode === 0) return { exitCode: 0, artifacts };
  const tail = result.stderr.trim().split('\n').slice(-1)[0];
  return {
    exitCode: result.exitCode,
    artifacts,
    ...(tail ? { error: tail } : {}),
  };
}

/**
 * Files this run's stages left in the store, in stage order and without
 * duplicates. Whatever else sits in the report directory belongs to earlier runs.
 */
export function runArtifacts(results: readonly StageResult[]): ArtifactRef[] {
  const seen = new Set<string>();
  const refs: ArtifactRef[] = [];
  for (const result of results) {
    for (const artifact of result.artifacts) {
      if (artifact.exists && !seen.has(artifact.name)) {
        seen.add(artifact.name);
        refs.push(artifact);
      }
    }
  }
  return refs;
}
