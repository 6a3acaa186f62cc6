import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, readFileSync, rmSync, writeFileSync, mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ArtifactStore } from '../runtime/artifact-store.js';
import {
  RunCorrelator,
  artifactName,
  correlate,
  deriveStatus,
  nextVersion,
  reportTitle,
} from '../runtime/correlator.js';

describe('version and status correlation', () => {
  it('starts at 1 with no prior versions', () => {
    expect(nextVersion([])).toBe(1);
  });

  it('takes max prior + 1, regardless of gaps or order', () => {
    expect(nextVersion([3, 7, 5])).toBe(8);
    expect(nextVersion([1, 1, 2])).toBe(3);
  });

  it('skips versions beyond the safe integer range', () => {
    expect(nextVersion([2, 2 ** 53, Number.NaN])).toBe(3);
  });

  it('derives FAIL from any case of "failed"', () => {
    expect(deriveStatus('2 failed, 3 passed')).toBe('FAIL');
    expect(deriveStatus('FAILED tests/test_app.py::test_index')).toBe('FAIL');
  });

  it('treats a zero-count "0 failed" as FAIL', () => {
    expect(deriveStatus('5 passed, 0 failed')).toBe('FAIL');
  });

  it('derives PASS from output without the token', () => {
    expect(deriveStatus('5 passed in 0.12s')).toBe('PASS');
  });

  it('derives UNKNOWN from absent or empty output', () => {
    expect(deriveStatus(undefined)).toBe('UNKNOWN');
    expect(deriveStatus('')).toBe('UNKNOWN');
    expect(deriveStatus('   \n')).toBe('UNKNOWN');
  });

  it('builds a full record', () => {
    const now = new Date('2026-10-19T08:00:00.000Z');
    expect(correlate([4], '1 passed', now)).toEqual({
      version: 5,
      status: 'PASS',
      timestamp: '2026-10-19T08:00:00.000Z',
    });
  });

  it('names artifacts and titles from the record', () => {
    expect(artifactName('test_result_report', 12, 'pdf')).toBe('test_result_report_v12.pdf');
    expect(artifactName('test_result_report', 12, 'text')).toBe('test_result_report_v12.txt');
    expect(reportTitle('Test Result Report', { version: 7, status: 'PASS' })).toBe('Test Result Report v7 (PASS)');
  });
});

describe('RunCorrelator', () => {
  let dir: string;
  let store: ArtifactStore;
  let versionFile: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'secpipe-corr-'));
    store = new ArtifactStore(join(dir, 'report'));
    mkdirSync(store.dir, { recursive: true });
    versionFile = join(store.dir, 'version.txt');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function correlator(testOutput?: string): RunCorrelator {
    return new RunCorrelator({
      store,
      versionFile,
      basename: 'test_result_report',
      testOutput,
      now: () => new Date('2026-10-19T08:00:00.000Z'),
    });
  }

  it('combines the version file and existing versioned reports', () => {
    writeFileSync(versionFile, '4\n');
    store.write('test_result_report_v6.html', '<html></html>');
    store.write('test_result_report_v2.pdf', '%PDF');
    store.write('other_v99.html', '<html></html>');

    expect(correlator().priorVersions().sort((a, b) => a - b)).toEqual([2, 4, 6]);
    expect(correlator().current().version).toBe(7);
  });

  it('ignores an unreadable version file', () => {
    writeFileSync(versionFile, 'seven');
    expect(correlator().current().version).toBe(1);
  });

  it('ignores a version too large to increment exactly', () => {
    writeFileSync(versionFile, '9007199254740993\n');
    store.write('test_result_report_v99999999999999999.html', '<html></html>');
    store.write('test_result_report_v3.html', '<html></html>');

    expect(correlator().priorVersions()).toEqual([3]);
    expect(correlator().current().version).toBe(4);
  });

  it('reads status from the run\'s test output', () => {
    expect(correlator('2 failed, 3 passed in 1.20s\n').current().status).toBe('FAIL');
  });

  it('is UNKNOWN without test output, whatever an earlier run left in the store', () => {
    store.write('pytest_output.txt', '2 failed, 3 passed in 1.20s\n');
    expect(correlator().current().status).toBe('UNKNOWN');
  });

  it('computes once and persists the version', () => {
    writeFileSync(versionFile, '9\n');
    const c = correlator();
    const first = c.persist();
    const second = c.current();

    expect(second).toBe(first);
    expect(first.version).toBe(10);
    expect(readFileSync(versionFile, 'utf8')).toBe('10\n');
    expect(c.artifactName('html')).toBe('test_result_report_v10.html');
  });
});
