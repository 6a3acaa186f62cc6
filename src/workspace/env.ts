import type { PipelineConfigInput } from './types.js';

/**
 * Map the pipeline's environment variables (SMTP, Confluence, image tag, report
 * locations) onto a config overlay. The process environment is read once here;
 * nothing downstream looks at process.env for settings.
 */
export function readEnvOverlay(env: NodeJS.ProcessEnv = process.env): PipelineConfigInput {
  const overlay: PipelineConfigInput = {};

  const smtp: NonNullable<PipelineConfigInput['smtp']> = {};
  if (env['SMTP_HOST']) smtp.host = env['SMTP_HOST'];
  if (env['SMTP_PORT']) {
    const port = parseInt(env['SMTP_PORT'], 10);
    if (Number.isFinite(port)) smtp.port = port;
  }
  if (env['SMTP_USER']) smtp.user = env['SMTP_USER'];
  if (env['SMTP_PASS']) smtp.pass = env['SMTP_PASS'];
  if (env['REPORT_FROM']) smtp.from = env['REPORT_FROM'];
  if (env['REPORT_TO']) smtp.to = splitList(env['REPORT_TO']);
  if (Object.keys(smtp).length > 0) overlay.smtp = smtp;

  const confluence: NonNullable<PipelineConfigInput['confluence']> = {};
  if (env['CONFLUENCE_BASE']) confluence.baseUrl = env['CONFLUENCE_BASE'].replace(/\/+$/, '');
  if (env['CONFLUENCE_USER']) confluence.user = env['CONFLUENCE_USER'];
  if (env['CONFLUENCE_TOKEN']) confluence.token = env['CONFLUENCE_TOKEN'];
  if (env['CONFLUENCE_SPACE']) confluence.spaceKey = env['CONFLUENCE_SPACE'];
  if (env['CONFLUENCE_TITLE']) confluence.titlePrefix = env['CONFLUENCE_TITLE'];
  if (Object.keys(confluence).length > 0) overlay.confluence = confluence;

  if (env['IMAGE_TAG']) overlay.image = { tag: env['IMAGE_TAG'] };

  const project: NonNullable<PipelineConfigInput['project']> = {};
  if (env['REPORT_DIR']) project.reportDir = env['REPORT_DIR'];
  if (env['VERSION_FILE']) project.versionFile = env['VERSION_FILE'];
  if (Object.keys(project).length > 0) overlay.project = project;

  return overlay;
}

export function splitList(value: string): string[] {
  return value
    .split(/[,;]/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
