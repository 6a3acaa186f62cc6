import type { PipelineConfig } from '../workspace/types.js';
import type { ArtifactStore } from './artifact-store.js';
import type { ToolInvoker } from './tool-invoker.js';
import type { EphemeralResourceGuard } from './resource-guard.js';
import type { ReportSummary } from './report.js';

export type RunOutcome = 'SUCCESS' | 'FAILURE';

export type StageOutcome = 'OK' | 'SOFT_FAIL' | 'HARD_FAIL' | 'SKIPPED';

export type ArtifactKind = 'html' | 'pdf' | 'text';

export type ReportStatus = 'PASS' | 'FAIL' | 'UNKNOWN';

export const TOGGLE_NAMES = [
  'sast',
  'dependencyScan',
  'envSetup',
  'unitTests',
  'imageBuild',
  'dastDeploy',
  'dastScan',
  'publishReport',
  'notify',
] as const;

export type ToggleName = (typeof TOGGLE_NAMES)[number];

export type ToggleMap = Partial<Record<string, boolean>>;

export interface ArtifactRef {
  name: string;
  path: string;
  kind: ArtifactKind;
  exists: boolean;
}

export interface VersionRecord {
  version: number;
  status: ReportStatus;
  timestamp: string;
}

export interface PublishedLink {
  url: string | null;
  fallbackUrl: string;
  resolved: boolean;
}

export interface PortMapping {
  host: number;
  container: number;
}

export interface EphemeralResource {
  name: string;
  network: string;
  image: string;
  containerId: string;
  ports: PortMapping[];
}

export type Enablement = { kind: 'always' } | { kind: 'toggle'; toggle: string };

/** What a stage action hands back to the executor. */
export interface StageActionResult {
  exitCode: number;
  artifacts?: ArtifactRef[];
  error?: string;
}

/**
 * Values stages hand to later stages. Only the stage that owns a field writes it.
 */
export interface RunState {
  version?: VersionRecord;
  summary?: ReportSummary;
  link?: PublishedLink;
  dastTarget?: EphemeralResource;
  /** Results recorded so far, in declaration order. */
  results: readonly StageResult[];
}

export interface StageContext {
  runId: string;
  stage: string;
  config: PipelineConfig;
  invoker: ToolInvoker;
  store: ArtifactStore;
  guard: EphemeralResourceGuard;
  state: RunState;
  signal: AbortSignal;
  timeoutMs: number;
}

export type StageAction = (ctx: StageContext) => Promise<StageActionResult>;
export type StageCleanup = (ctx: StageContext) => Promise<void>;

export interface StageDescriptor {
  readonly name: string;
  readonly description?: string;
  readonly enablement: Enablement;
  readonly fatal: boolean;
  readonly action: StageAction;
  readonly cleanup?: {
    readonly run: StageCleanup;
    /** Stage after which the resource is no longer needed. Defaults to the owning stage. */
    readonly after?: string;
  };
  readonly timeoutMs?: number;
}

export interface StageResult {
  readonly name: string;
  readonly enabled: boolean;
  readonly exitCode: number | 'skipped';
  readonly artifacts: readonly ArtifactRef[];
  readonly outcome: StageOutcome;
  readonly error?: string;
  readonly durationMs: number;
}

export interface CleanupResult {
  stage: string;
  ok: boolean;
  error?: string;
}

export interface PipelineRun {
  id: string;
  startedAt: string;
  endedAt: string | null;
  toggles: Record<string, boolean>;
  results: StageResult[];
  cleanups: CleanupResult[];
  outcome: RunOutcome | null;
  cancelled: boolean;
  version?: VersionRecord;
  link?: PublishedLink;
}
