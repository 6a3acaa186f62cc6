import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ArtifactStore } from '../runtime/artifact-store.js';
import {
  describeStage,
  escapeHtml,
  extractSummary,
  generateReport,
  renderReportHtml,
  renderReportStorage,
  summarizeTestOutput,
} from '../runtime/report.js';
import { composeNotification } from '../runtime/stages/reporting.js';
import type { StageResult, VersionRecord } from '../runtime/types.js';

const record: VersionRecord = { version: 3, status: 'FAIL', timestamp: '2026-10-19T08:00:00.000Z' };

const stages: StageResult[] = [
  { name: 'sast', enabled: false, exitCode: 'skipped', artifacts: [], outcome: 'SKIPPED', durationMs: 0 },
  {
    name: 'unit-tests',
    enabled: true,
    exitCode: 1,
    artifacts: [],
    outcome: 'SOFT_FAIL',
    error: 'assert <b> == 1',
    durationMs: 120,
  },
];

describe('report summary', () => {
  it('reads counts from the test runner summary line', () => {
    expect(summarizeTestOutput('=== 1 failed, 6 passed, 1 skipped, 2 errors in 3.1s ===')).toEqual({
      passed: 6,
      failed: 1,
      errors: 2,
      skipped: 1,
      rate: 60,
    });
  });

  it('rounds the pass rate to one decimal', () => {
    expect(summarizeTestOutput('2 passed, 1 failed').rate).toBe(66.7);
  });

  it('is all zero without output', () => {
    expect(summarizeTestOutput('')).toEqual({ passed: 0, failed: 0, errors: 0, skipped: 0, rate: 0 });
  });

  describe('from stored artifacts', () => {
    let dir: string;
    let store: ArtifactStore;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'secpipe-report-'));
      store = new ArtifactStore(dir);
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('counts scanner findings', () => {
      store.write('pytest_output.txt', '4 passed\n');
      store.write('bandit_report.html', '<tr class="issue">a</tr><tr class="issue">b</tr>');
      store.write('dependency_vuln.txt', '| flask | 1.0 |\n');
      store.write('trivy_report.txt', 'High\nCritical\nHigh\n');

      expect(extractSummary(store)).toEqual({
        passed: 4,
        failed: 0,
        errors: 0,
        skipped: 0,
        rate: 100,
        banditFindings: 2,
        dependencyIssues: 3,
        trivyHigh: 2,
        zapHigh: 0,
      });
    });

    it('counts only the files named as available', () => {
      store.write('pytest_output.txt', '1 failed, 1 passed\n');
      store.write('bandit_report.html', '<tr class="issue">a</tr>');

      const summary = extractSummary(store, new Set(['bandit_report.html']));

      expect(summary.failed).toBe(0);
      expect(summary.passed).toBe(0);
      expect(summary.banditFindings).toBe(1);
    });

    it('writes the HTML and PDF renditions under the versioned names', async () => {
      const generated = await generateReport(
        store,
        { title: 'Security Report', record, stages },
        { html: 'test_result_report_v3.html', pdf: 'test_result_report_v3.pdf' },
      );

      expect(generated.html.exists).toBe(true);
      expect(generated.pdf).toEqual({
        name: 'test_result_report_v3.pdf',
        path: join(dir, 'test_result_report_v3.pdf'),
        kind: 'pdf',
        exists: true,
      });
      expect(readFileSync(generated.pdf.path).subarray(0, 5).toString('latin1')).toBe('%PDF-');
    });
  });
});

describe('report rendering', () => {
  it('escapes markup', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
  });

  it('describes stages', () => {
    expect(stages.map(describeStage)).toEqual(['skipped', 'SOFT_FAIL (exit 1) – assert <b> == 1']);
  });

  it('renders the heading, status and stage table', () => {
    const html = renderReportHtml({
      title: 'Security Report',
      record,
      stages,
      summary: {
        passed: 1,
        failed: 1,
        errors: 0,
        skipped: 0,
        rate: 50,
        banditFindings: 0,
        dependencyIssues: 0,
        trivyHigh: 0,
        zapHigh: 0,
      },
    });

    expect(html).toContain('<title>Security Report v3</title>');
    expect(html).toContain('<b class="fail">FAIL</b>');
    expect(html).toContain('<tr><td>unit-tests</td><td>SOFT_FAIL (exit 1) – assert &lt;b&gt; == 1</td></tr>');
  });
});

describe('report page body', () => {
  const summary = {
    passed: 3,
    failed: 2,
    errors: 0,
    skipped: 0,
    rate: 60,
    banditFindings: 1,
    dependencyIssues: 0,
    trivyHigh: 0,
    zapHigh: 0,
  };

  it('is a storage-format fragment without a document wrapper', () => {
    const body = renderReportStorage({ title: 'Security Report', record, summary, stages }, [
      'test_result_report_v3.pdf',
    ]);

    expect(body.split('\n')).toEqual([
      '<h1>Security Report v3</h1>',
      '<p><strong>Version:</strong> 3<br/><strong>Status:</strong> FAIL<br/><strong>Date:</strong> 2026-10-19T08:00:00.000Z</p>',
      '<h2>Test Summary</h2>',
      '<ul><li>Passed: 3</li><li>Failed: 2</li><li>Errors: 0</li><li>Skipped: 0</li><li>Pass Rate: 60%</li></ul>',
      '<h2>Security Summary</h2>',
      '<ul><li>SAST (Bandit): 1 findings</li><li>Dependency Vulnerabilities: 0 issues</li><li>Container Scan (Trivy): 0 High vulnerabilities</li><li>DAST (OWASP ZAP): 0 High alerts</li></ul>',
      '<h2>Stages</h2>',
      '<table><tbody><tr><th>Stage</th><th>Result</th></tr><tr><td>sast</td><td>skipped</td></tr><tr><td>unit-tests</td><td>SOFT_FAIL (exit 1) – assert &lt;b&gt; == 1</td></tr></tbody></table>',
      '<h2>Attachments</h2>',
      '<ul><li>test_result_report_v3.pdf</li></ul>',
    ]);
  });

  it('leaves out the attachment list when nothing is attached', () => {
    const body = renderReportStorage({ title: 'Security Report', record, summary, stages: [] });
    expect(body).not.toContain('Attachments');
    expect(body.endsWith('<table><tbody><tr><th>Stage</th><th>Result</th></tr></tbody></table>')).toBe(true);
  });
});

describe('notification content', () => {
  it('links the resolved page', () => {
    const { subject, body } = composeNotification(
      'Security Report',
      record,
      { url: 'https://wiki.example.test/pages/1/T', fallbackUrl: 'https://wiki.example.test/spaces/DEMO/pages', resolved: true },
      stages,
      ['test_result_report_v3.pdf'],
    );

    expect(subject).toBe('Security Report v3 (FAIL)');
    expect(body).toContain(
      '<p><b>Report page:</b> <a href="https://wiki.example.test/pages/1/T">https://wiki.example.test/pages/1/T</a></p>',
    );
    expect(body).toContain('<li>test_result_report_v3.pdf</li>');
  });

  it('marks the space root fallback', () => {
    const { body } = composeNotification(
      'Security Report',
      record,
      { url: null, fallbackUrl: 'https://wiki.example.test/spaces/DEMO/pages', resolved: false },
      [],
      [],
    );

    expect(body).toContain(
      '<a href="https://wiki.example.test/spaces/DEMO/pages">https://wiki.example.test/spaces/DEMO/pages</a> (report page not resolved; space root)',
    );
  });
});
