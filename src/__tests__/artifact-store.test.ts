import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdirSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ArtifactStore, kindOf } from '../runtime/artifact-store.js';

describe('ArtifactStore', () => {
  let dir: string;
  let store: ArtifactStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'secpipe-store-'));
    store = new ArtifactStore(join(dir, 'report'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('infers kinds from extensions', () => {
    expect(kindOf('zap_dast_report.html')).toBe('html');
    expect(kindOf('REPORT.HTM')).toBe('html');
    expect(kindOf('test_result_report_v3.pdf')).toBe('pdf');
    expect(kindOf('dependency_vuln.txt')).toBe('text');
    expect(kindOf('version')).toBe('text');
  });

  it('creates the directory on first write', () => {
    const ref = store.write('bandit_report.html', '<html></html>');
    expect(ref).toEqual({
      name: 'bandit_report.html',
      path: join(store.dir, 'bandit_report.html'),
      kind: 'html',
      exists: true,
    });
    expect(store.read('bandit_report.html')).toBe('<html></html>');
  });

  it('keeps names flat inside the store', () => {
    expect(store.pathOf('../outside.txt')).toBe(join(store.dir, 'outside.txt'));
  });

  it('reports absent files without throwing', () => {
    expect(store.read('missing.txt')).toBeUndefined();
    expect(store.exists('missing.txt')).toBe(false);
    expect(store.ref('missing.txt').exists).toBe(false);
    expect(store.list()).toEqual([]);
  });

  it('lists files only, sorted', () => {
    store.write('b.txt', 'b');
    store.write('a.txt', 'a');
    mkdirSync(join(store.dir, 'nested'));
    expect(store.list()).toEqual(['a.txt', 'b.txt']);
  });

  it('removes a file and ignores one that is absent', () => {
    store.write('bandit_report.html', '<html></html>');

    store.remove('bandit_report.html');
    store.remove('never_written.txt');

    expect(store.exists('bandit_report.html')).toBe(false);
    expect(store.list()).toEqual([]);
  });
});
