/**
 * Consolidated test & security report for one run, rendered as HTML and PDF
 * under the run's versioned artifact names.
 */
import { createWriteStream } from 'node:fs';
import PDFDocument from 'pdfkit';
import type { ArtifactStore } from './artifact-store.js';
import type { ArtifactRef, StageResult, VersionRecord } from './types.js';

export interface ReportSummary {
  passed: number;
  failed: number;
  errors: number;
  skipped: number;
  /** Pass rate in percent, one decimal. */
  rate: number;
  banditFindings: number;
  dependencyIssues: number;
  trivyHigh: number;
  zapHigh: number;
}

/** Fixed names of the files the scanning stages leave in the report directory. */
export const STAGE_OUTPUTS = {
  testOutput: 'pytest_output.txt',
  testResultsHtml: 'report.html',
  banditHtml: 'bandit_report.html',
  dependencyVulns: 'dependency_vuln.txt',
  trivyText: 'trivy_report.txt',
  zapHtml: 'zap_dast_report.html',
} as const;

function firstCount(text: string, re: RegExp): number {
  const m = re.exec(text);
  return m?.[1] ? parseInt(m[1], 10) : 0;
}

function occurrences(text: string, re: RegExp): number {
  return text.match(re)?.length ?? 0;
}

export function summarizeTestOutput(output: string): Pick<ReportSummary, 'passed' | 'failed' | 'errors' | 'skipped' | 'rate'> {
  const passed = firstCount(output, /(\d+)\s+passed/);
  const failed = firstCount(output, /(\d+)\s+failed/);
  const errors = firstCount(output, /(\d+)\s+errors?/);
  const skipped = firstCount(output, /(\d+)\s+skipped/);
  const total = passed + failed + errors + skipped;
  const rate = total > 0 ? Math.round((passed / total) * 1000) / 10 : 0;
  return { passed, failed, errors, skipped, rate };
}

/**
 * Summarize the scanner outputs. With `available`, only the named files count;
 * anything else in the directory is treated as absent.
 */
export function extractSummary(store: ArtifactStore, available?: ReadonlySet<string>): ReportSummary {
  const read = (name: string) => (available && !available.has(name) ? '' : store.read(name) ?? '');
  return {
    ...summarizeTestOutput(read(STAGE_OUTPUTS.testOutput)),
    banditFindings: occurrences(read(STAGE_OUTPUTS.banditHtml), /<tr class="issue">/g),
    dependencyIssues: occurrences(read(STAGE_OUTPUTS.dependencyVulns), /\|/g),
    trivyHigh: occurrences(read(STAGE_OUTPUTS.trivyText), /High/g),
    zapHigh: occurrences(read(STAGE_OUTPUTS.zapHtml), /High/g),
  };
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function describeStage(result: StageResult): string {
  if (result.outcome === 'SKIPPED') return 'skipped';
  const base = `${result.outcome} (exit ${result.exitCode})`;
  return result.error ? `${base} – ${result.error}` : base;
}

export interface ReportInput {
  title: string;
  record: VersionRecord;
  summary: ReportSummary;
  stages: readonly StageResult[];
}

export function renderReportHtml(input: ReportInput): string {
  const { record, summary } = input;
  const heading = escapeHtml(`${input.title} v${record.version}`);
  const stageRows = input.stages
    .map((s) => `        <tr><td>${escapeHtml(s.name)}</td><td>${escapeHtml(describeStage(s))}</td></tr>`)
    .join('\n');

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="UTF-8">
  <title>${heading}</title>
  <style>
    body { font-family: Arial, sans-serif; margin: 20px; }
    h1, h2 { color: #007bff; }
    .summary { background-color: #f8f9fa; padding: 15px; border-radius: 8px; }
    .security { background-color: #eef7ff; border: 1px solid #007bff; padding: 15px; margin: 15px 0; }
    .pass { color: green; }
    .fail { color: red; }
    .unknown { color: #888; }
  </style>
</head>
<body>
  <h1>${heading}</h1>
  <p><b>Date:</b> ${escapeHtml(record.timestamp)}</p>
  <div class="summary">
    <h2>Test Summary</h2>
    <ul>
      <li>Passed: ${summary.passed}</li>
      <li>Failed: ${summary.failed}</li>
      <li>Errors: ${summary.errors}</li>
      <li>Skipped: ${summary.skipped}</li>
      <li>Pass Rate: ${summary.rate}%</li>
      <li>Status: <b class="${record.status.toLowerCase()}">${record.status}</b></li>
    </ul>
  </div>
  <div class="security">
    <h2>Security Summary</h2>
    <ul>
      <li><b>SAST (Bandit):</b> ${summary.banditFindings} findings</li>
      <li><b>Dependency Vulnerabilities:</b> ${summary.dependencyIssues} issues</li>
      <li><b>Container Scan (Trivy):</b> ${summary.trivyHigh} High vulnerabilities</li>
      <li><b>DAST (OWASP ZAP):</b> ${summary.zapHigh} High alerts</li>
    </ul>
  </div>
  <h2>Stages</h2>
  <table>
    <thead><tr><th>Stage</th><th>Result</th></tr></thead>
    <tbody>
${stageRows}
    </tbody>
  </table>
</body>
</html>
`;
}

/**
 * Confluence storage-format body for the report page: an XHTML fragment with
 * no document wrapper. The full HTML rendition goes up as an attachment.
 */
export function renderReportStorage(input: ReportInput, attachmentNames: readonly string[] = []): string {
  const { record, summary } = input;
  const stageRows = input.stages
    .map((s) => `<tr><td>${escapeHtml(s.name)}</td><td>${escapeHtml(describeStage(s))}</td></tr>`)
    .join('');
  const files = attachmentNames.map((n) => `<li>${escapeHtml(n)}</li>`).join('');
  return [
    `<h1>${escapeHtml(`${input.title} v${record.version}`)}</h1>`,
    `<p><strong>Version:</strong> ${record.version}<br/><strong>Status:</strong> ${record.status}<br/><strong>Date:</strong> ${escapeHtml(record.timestamp)}</p>`,
    '<h2>Test Summary</h2>',
    `<ul><li>Passed: ${summary.passed}</li><li>Failed: ${summary.failed}</li><li>Errors: ${summary.errors}</li><li>Skipped: ${summary.skipped}</li><li>Pass Rate: ${summary.rate}%</li></ul>`,
    '<h2>Security Summary</h2>',
    `<ul><li>SAST (Bandit): ${summary.banditFindings} findings</li><li>Dependency Vulnerabilities: ${summary.dependencyIssues} issues</li><li>Container Scan (Trivy): ${summary.trivyHigh} High vulnerabilities</li><li>DAST (OWASP ZAP): ${summary.zapHigh} High alerts</li></ul>`,
    '<h2>Stages</h2>',
    `<table><tbody><tr><th>Stage</th><th>Result</th></tr>${stageRows}</tbody></table>`,
    ...(files ? ['<h2>Attachments</h2>', `<ul>${files}</ul>`] : []),
  ].join('\n');
}

/** Writes the PDF rendition of the report and resolves once the file is flushed. */
export function writeReportPdf(input: ReportInput, path: string): Promise<void> {
  const { record, summary } = input;
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ size: 'A4', margin: 50, info: { Title: `${input.title} v${record.version}` } });
    const out = createWriteStream(path);
    out.on('finish', () => resolve());
    out.on('error', reject);
    doc.on('error', reject);
    doc.pipe(out);

    doc.fontSize(18).text(`${input.title} v${record.version}`);
    doc.moveDown(0.5).fontSize(10).text(`Date: ${record.timestamp}`);
    doc.text(`Status: ${record.status}`);

    doc.moveDown().fontSize(14).text('Test Summary');
    doc.fontSize(11);
    doc.text(`Passed: ${summary.passed}`);
    doc.text(`Failed: ${summary.failed}`);
    doc.text(`Errors: ${summary.errors}`);
    doc.text(`Skipped: ${summary.skipped}`);
    doc.text(`Pass Rate: ${summary.rate}%`);

    doc.moveDown().fontSize(14).text('Security Summary');
    doc.fontSize(11);
    doc.text(`SAST (Bandit): ${summary.banditFindings} findings`);
    doc.text(`Dependency Vulnerabilities: ${summary.dependencyIssues} issues`);
    doc.text(`Container Scan (Trivy): ${summary.trivyHigh} High vulnerabilities`);
    doc.text(`DAST (OWASP ZAP): ${summary.zapHigh} High alerts`);

    doc.moveDown().fontSize(14).text('Stages');
    doc.fontSize(11);
    for (const stage of input.stages) {
      doc.text(`${stage.name}: ${describeStage(stage)}`);
    }

    doc.end();
  });
}

export interface GeneratedReport {
  html: ArtifactRef;
  pdf: ArtifactRef;
  summary: ReportSummary;
}

export async function generateReport(
  store: ArtifactStore,
  input: Omit<ReportInput, 'summary'>,
  names: { html: string; pdf: string },
  available?: ReadonlySet<string>,
): Promise<GeneratedReport> {
  const summary = extractSummary(store, available);
  const full: ReportInput = { ...input, summary };
  const html = store.write(names.html, renderReportHtml(full), 'html');
  store.ensureDir();
  await writeReportPdf(full, store.pathOf(names.pdf));
  return { html, pdf: store.ref(names.pdf, 'pdf'), summary };
}
