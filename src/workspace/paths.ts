import { isAbsolute, join, resolve } from 'node:path';
import type { PipelineConfig, ReportPaths, StatePaths } from './types.js';

export function resolveProjectRoot(config: PipelineConfig, cwd: string = process.cwd()): string {
  return resolve(cwd, config.project.root);
}

function within(root: string, p: string): string {
  return isAbsolute(p) ? p : join(root, p);
}

export function getReportPaths(config: PipelineConfig, cwd?: string): ReportPaths {
  const root = resolveProjectRoot(config, cwd);
  const dir = within(root, config.project.reportDir);
  return {
    dir,
    versionFile: config.project.versionFile
      ? within(root, config.project.versionFile)
      : join(dir, 'version.txt'),
  };
}

export function getStatePaths(config: PipelineConfig, cwd?: string): StatePaths {
  const root = within(resolveProjectRoot(config, cwd), config.project.stateDir);
  return {
    root,
    stateDb: join(root, 'state.db'),
  };
}
