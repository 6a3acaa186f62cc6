import type { z } from 'zod';
import type { PipelineConfigSchema } from '../shared/schemas.js';

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/** Raw, pre-default shape accepted from secpipe.yaml and env. */
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

export interface ReportPaths {
  dir: string;          // report/
  versionFile: string;  // report/version.txt
}

export interface StatePaths {
  root: string;     // .secpipe/
  stateDb: string;  // .secpipe/state.db
}
