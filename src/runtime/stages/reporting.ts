import { basename, dirname, resolve } from 'node:path';
import { ConfluencePublisher, type FetchLike } from '../../connector/confluence/publisher.js';
import { Notifier, createSmtpTransport, type MailTransport } from '../../connector/mail/notifier.js';
import { logger } from '../../shared/logger.js';
import { getReportPaths } from '../../workspace/paths.js';
import type { PipelineConfig } from '../../workspace/types.js';
import { RunCorrelator } from '../correlator.js';
import { STAGE_OUTPUTS, describeStage, escapeHtml, generateReport, renderReportStorage } from '../report.js';
import type { ArtifactRef, PublishedLink, StageDescriptor, StageResult, VersionRecord } from '../types.js';
import { runArtifacts } from './helpers.js';

export interface ReportingServices {
  fetch?: FetchLike;
  /** Defaults to an SMTP transport built from the config. */
  mailTransport?: MailTransport;
  now?: () => Date;
}

function publisherFor(config: PipelineConfig, services: ReportingServices): ConfluencePublisher {
  return new ConfluencePublisher(config.confluence, services.fetch);
}

export function reportStage(services: ReportingServices = {}): StageDescriptor {
  return {
    name: 'report',
    description: 'Stamp the run with a version and status and render the report',
    enablement: { kind: 'always' },
    fatal: false,
    async action(ctx) {
      const { report } = ctx.config;
      const available = new Set(runArtifacts(ctx.state.results).map((a) => a.name));
      const versionFile = getReportPaths(ctx.config).versionFile;
      const correlator = new RunCorrelator({
        store: ctx.store,
        versionFile,
        basename: report.basename,
        testOutput: available.has(STAGE_OUTPUTS.testOutput) ? ctx.store.read(STAGE_OUTPUTS.testOutput) : undefined,
        now: services.now,
      });
      const record = correlator.persist();
      ctx.state.version = record;

      const generated = await generateReport(
        ctx.store,
        { title: report.title, record, stages: ctx.state.results },
        { html: correlator.artifactName('html'), pdf: correlator.artifactName('pdf') },
        available,
      );
      ctx.state.summary = generated.summary;

      const artifacts: ArtifactRef[] = [generated.html, generated.pdf];
      if (resolve(dirname(versionFile)) === resolve(ctx.store.dir)) {
        artifacts.push(ctx.store.ref(basename(versionFile), 'text'));
      }
      return { exitCode: 0, artifacts };
    },
  };
}

export function publishStage(services: ReportingServices = {}): StageDescriptor {
  return {
    name: 'publish',
    description: 'Publish the report to Confluence and resolve its link',
    enablement: { kind: 'toggle', toggle: 'publishReport' },
    fatal: false,
    async action(ctx) {
      const record = ctx.state.version;
      const summary = ctx.state.summary;
      if (!record || !summary) return { exitCode: 1, error: 'No version record for this run' };

      const { confluence, report } = ctx.config;
      const publisher = publisherFor(ctx.config, services);
      if (!confluence.baseUrl || !confluence.user || !confluence.token) {
        ctx.state.link = { url: null, fallbackUrl: publisher.spaceRootUrl(), resolved: false };
        return { exitCode: 1, error: 'Confluence base URL or credentials not configured' };
      }

      const attachments = runArtifacts(ctx.state.results);
      const body = renderReportStorage(
        { title: report.title, record, summary, stages: ctx.state.results },
        attachments.map((a) => a.name),
      );
      try {
        await publisher.publishReport(record.version, record.status, body, attachments);
      } catch (err) {
        ctx.state.link = await publisher.resolveLink(record.version, record.status);
        return { exitCode: 1, error: (err as Error).message };
      }
      ctx.state.link = await publisher.resolveLink(record.version, record.status);
      return { exitCode: 0 };
    },
  };
}

export interface NotificationContent {
  subject: string;
  body: string;
}

export function composeNotification(
  title: string,
  record: VersionRecord,
  link: PublishedLink,
  stages: readonly StageResult[],
  attachmentNames: readonly string[],
): NotificationContent {
  const subject = `${title} v${record.version} (${record.status})`;
  const href = link.url ?? link.fallbackUrl;
  const stageItems = stages
    .map((s) => `<li>${escapeHtml(s.name)}: ${escapeHtml(describeStage(s))}</li>`)
    .join('');
  const fileItems = attachmentNames.map((n) => `<li>${escapeHtml(n)}</li>`).join('');
  const linkNote = link.resolved ? '' : ' (report page not resolved; space root)';
  const body = `<html>
<body style="font-family: Arial, sans-serif;">
  <h2>${escapeHtml(subject)}</h2>
  <p><b>Generated:</b> ${escapeHtml(record.timestamp)}</p>
  <p><b>Version:</b> ${record.version} &nbsp; <b>Status:</b> ${record.status}</p>
  <p><b>Report page:</b> <a href="${escapeHtml(href)}">${escapeHtml(href)}</a>${linkNote}</p>
  <p><b>Stages:</b></p>
  <ul>${stageItems}</ul>
  <p><b>Attached files:</b></p>
  <ul>${fileItems}</ul>
</body>
</html>
`;
  return { subject, body };
}

export function notifyStage(services: ReportingServices = {}): StageDescriptor {
  return {
    name: 'notify',
    description: 'Email the report summary, link and artifacts',
    enablement: { kind: 'toggle', toggle: 'notify' },
    fatal: false,
    async action(ctx) {
      const record = ctx.state.version;
      if (!record) return { exitCode: 1, error: 'No version record for this run' };

      const { smtp, report } = ctx.config;
      if (!smtp.host && !services.mailTransport) {
        return { exitCode: 1, error: 'SMTP host not configured' };
      }

      const attachments = runArtifacts(ctx.state.results);
      if (attachments.length === 0) {
        return { exitCode: 1, error: `No report files found in ${ctx.store.dir}` };
      }

      const link = ctx.state.link ?? {
        url: null,
        fallbackUrl: publisherFor(ctx.config, services).spaceRootUrl(),
        resolved: false,
      };
      const { subject, body } = composeNotification(
        report.title,
        record,
        link,
        ctx.state.results,
        attachments.map((a) => a.name),
      );

      const transport = services.mailTransport ?? createSmtpTransport(smtp);
      const notifier = new Notifier(transport, smtp.from);
      await notifier.send({
        recipients: smtp.to,
        subject,
        body,
        linkedReportUrl: link.url ?? link.fallbackUrl,
        attachments,
      });
      logger.info('Notification sent', { run_id: ctx.runId, subject });
      return { exitCode: 0 };
    },
  };
}
