import { resolve } from 'node:path';
import { InvalidArgumentError } from 'commander';
import { loadPipelineConfig } from '../workspace/config.js';
import { splitList } from '../workspace/env.js';
import { getStatePaths, resolveProjectRoot } from '../workspace/paths.js';
import { openStateDb, RunHistory } from '../workspace/db.js';
import { ConfigError } from '../shared/errors.js';
import { isLogLevel, type LogLevel } from '../shared/logger.js';
import { TOGGLE_NAMES, type ToggleName } from '../runtime/types.js';
import type { PipelineConfig } from '../workspace/types.js';

export interface ConfigOptions {
  config?: string;
  cwd?: string;
  enable?: string;
  disable?: string;
  only?: string;
}

/** commander argument parser for --log-level. */
export function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError('Expected one of debug, info, warn, error.');
  }
  return value;
}

function isToggleName(value: string): value is ToggleName {
  return (TOGGLE_NAMES as readonly string[]).includes(value);
}

export function parseToggleList(value: string | undefined): ToggleName[] {
  if (!value) return [];
  return splitList(value).map((name) => {
    if (!isToggleName(name)) {
      throw new ConfigError(`Unknown toggle "${name}". Known toggles: ${TOGGLE_NAMES.join(', ')}`);
    }
    return name;
  });
}

/**
 * Toggle overrides from --only/--enable/--disable. --only turns every other
 * toggle off; --disable wins over --enable for the same name.
 */
export function toggleOverrides(opts: ConfigOptions): Record<string, boolean> {
  const overrides: Record<string, boolean> = {};
  const only = parseToggleList(opts.only);
  if (only.length > 0) {
    for (const name of TOGGLE_NAMES) overrides[name] = only.includes(name);
  }
  for (const name of parseToggleList(opts.enable)) overrides[name] = true;
  for (const name of parseToggleList(opts.disable)) overrides[name] = false;
  return overrides;
}

/**
 * Resolve the run configuration from the CLI options. The project root is
 * made absolute so every component agrees on where reports live.
 */
export function configFromOptions(opts: ConfigOptions): PipelineConfig {
  const cwd = resolve(opts.cwd ?? process.cwd());
  const config = loadPipelineConfig({ cwd, configPath: opts.config, toggles: toggleOverrides(opts) });
  return { ...config, project: { ...config.project, root: resolveProjectRoot(config, cwd) } };
}

export function openHistory(config: PipelineConfig): RunHistory {
  return new RunHistory(openStateDb(getStatePaths(config).stateDb));
}
