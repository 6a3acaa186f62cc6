export { ArtifactStore, kindOf } from './runtime/artifact-store.js';
export {
  ProcessToolInvoker,
  TIMEOUT_EXIT_CODE,
  ABORT_EXIT_CODE,
  LAUNCH_FAILURE_EXIT_CODE,
  type ToolInvoker,
  type InvocationRequest,
  type InvocationResult,
} from './runtime/tool-invoker.js';
export { RunCorrelator, correlate, deriveStatus, nextVersion, artifactName, reportTitle } from './runtime/correlator.js';
export { StageGraphExecutor, classify, isStageEnabled } from './runtime/runner.js';
export { EphemeralResourceGuard, type ResourceSpec } from './runtime/resource-guard.js';
export { STAGE_OUTPUTS, generateReport, extractSummary, renderReportHtml, renderReportStorage } from './runtime/report.js';
export { runDevSecOpsPipeline, type RunPipelineOptions } from './runtime/pipelines.js';
export { createDevSecOpsPipeline } from './runtime/stages/index.js';
export { runDoctorChecks } from './runtime/doctor.js';
export { ConfluencePublisher } from './connector/confluence/publisher.js';
export { Notifier, createSmtpTransport, type MailTransport } from './connector/mail/notifier.js';
export { loadPipelineConfig, parsePipelineConfig } from './workspace/config.js';
export { RunHistory, openStateDb } from './workspace/db.js';
export * from './shared/errors.js';
export * from './runtime/types.js';
export type { PipelineConfig } from './workspace/types.js';
