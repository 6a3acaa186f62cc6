import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import { load } from 'js-yaml';
import { ZodError } from 'zod';
import { PipelineConfigSchema } from '../shared/schemas.js';
import { ConfigError } from '../shared/errors.js';
import { readEnvOverlay } from './env.js';
import type { PipelineConfig, PipelineConfigInput } from './types.js';

export const DEFAULT_CONFIG_FILE = 'secpipe.yaml';

export interface LoadConfigOptions {
  cwd?: string;
  /** Explicit config path; when omitted, secpipe.yaml in cwd is used if present. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Toggle overrides from the command line, applied last. */
  toggles?: Record<string, boolean>;
}

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Section-wise merge: later layers replace individual keys inside each section. */
function mergeLayers(...layers: Section[]): Section {
  const merged: Section = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      const current = merged[key];
      merged[key] = isSection(current) && isSection(value) ? { ...current, ...value } : value;
    }
  }
  return merged;
}

export function readConfigFile(configPath: string): Section {
  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }
  let parsed: unknown;
  try {
    parsed = load(readFileSync(configPath, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Config file ${configPath} is not valid YAML: ${(err as Error).message}`);
  }
  if (parsed === undefined || parsed === null) return {};
  if (!isSection(parsed)) {
    throw new ConfigError(`Config file ${configPath} must contain a mapping at the top level`);
  }
  return parsed;
}

export function parsePipelineConfig(input: unknown): PipelineConfig {
  try {
    return PipelineConfigSchema.parse(input);
  } catch (err) {
    if (err instanceof ZodError) {
      const detail = err.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid pipeline config – ${detail}`);
    }
    throw err;
  }
}

/**
 * Build the run configuration: secpipe.yaml (optional), then the environment
 * overlay, then command-line toggles.
 */
export function loadPipelineConfig(opts: LoadConfigOptions = {}): PipelineConfig {
  const cwd = opts.cwd ?? process.cwd();
  let fileLayer: Section = {};
  if (opts.configPath) {
    fileLayer = readConfigFile(isAbsolute(opts.configPath) ? opts.configPath : join(cwd, opts.configPath));
  } else {
    const candidate = join(cwd, DEFAULT_CONFIG_FILE);
    if (existsSync(candidate)) fileLayer = readConfigFile(candidate);
  }

  const envLayer: PipelineConfigInput = readEnvOverlay(opts.env ?? process.env);
  const cliLayer: Section = opts.toggles ? { toggles: opts.toggles } : {};

  return parsePipelineConfig(mergeLayers(fileLayer, { ...envLayer }, cliLayer));
}
