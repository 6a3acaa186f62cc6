import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { dump } from 'js-yaml';
import { loadPipelineConfig, parsePipelineConfig } from '../workspace/config.js';
import { readEnvOverlay, splitList } from '../workspace/env.js';
import { getReportPaths, getStatePaths } from '../workspace/paths.js';
import { toggleOverrides } from '../cli/cli-shared.js';
import { ConfigError } from '../shared/errors.js';

describe('pipeline config', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'secpipe-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('fills every default when nothing is configured', () => {
    const config = loadPipelineConfig({ cwd: dir, env: {} });

    expect(Object.values(config.toggles).every((v) => v === true)).toBe(true);
    expect(config.image.tag).toBe('secure-flask-app:latest');
    expect(config.confluence.spaceKey).toBe('DEMO');
    expect(config.smtp).toEqual({ host: '', port: 587, user: '', pass: '', from: '', to: [] });
    expect(config.dast.healthPath).toBe('/health');
  });

  it('layers the YAML file, then the environment, then command-line toggles', () => {
    writeFileSync(
      join(dir, 'secpipe.yaml'),
      dump({
        toggles: { notify: false, dastScan: false },
        image: { tag: 'from-file:1' },
        confluence: { spaceKey: 'FILE', titlePrefix: 'Nightly' },
      }),
    );

    const config = loadPipelineConfig({
      cwd: dir,
      env: { IMAGE_TAG: 'from-env:2', CONFLUENCE_BASE: 'https://wiki.example.test/', REPORT_TO: 'a@x.test; b@x.test' },
      toggles: { dastScan: true },
    });

    expect(config.image.tag).toBe('from-env:2');
    expect(config.confluence).toEqual({
      baseUrl: 'https://wiki.example.test',
      user: '',
      token: '',
      spaceKey: 'FILE',
      titlePrefix: 'Nightly',
    });
    expect(config.smtp.to).toEqual(['a@x.test', 'b@x.test']);
    expect(config.toggles.notify).toBe(false);
    expect(config.toggles.dastScan).toBe(true);
    expect(config.toggles.sast).toBe(true);
  });

  it('reads an explicit config path relative to cwd', () => {
    writeFileSync(join(dir, 'ci.yaml'), 'report:\n  basename: nightly_report\n');
    const config = loadPipelineConfig({ cwd: dir, configPath: 'ci.yaml', env: {} });
    expect(config.report.basename).toBe('nightly_report');
  });

  it('rejects a missing explicit config file', () => {
    expect(() => loadPipelineConfig({ cwd: dir, configPath: 'absent.yaml', env: {} })).toThrow(
      `Config file not found: ${join(dir, 'absent.yaml')}`,
    );
  });

  it('rejects a non-mapping document', () => {
    writeFileSync(join(dir, 'secpipe.yaml'), '- just\n- a list\n');
    expect(() => loadPipelineConfig({ cwd: dir, env: {} })).toThrow(ConfigError);
  });

  it('reports schema violations with their path', () => {
    expect(() => parsePipelineConfig({ dast: { port: 'eighty' }, toggles: { sast: 'yes' } })).toThrow(
      'Invalid pipeline config – toggles.sast: Expected boolean, received string; dast.port: Expected number, received string',
    );
  });

  it('ignores an unparseable SMTP port from the environment', () => {
    expect(readEnvOverlay({ SMTP_PORT: 'twenty-five', SMTP_HOST: 'mail.example.test' })).toEqual({
      smtp: { host: 'mail.example.test' },
    });
  });

  it('splits recipient lists on commas and semicolons', () => {
    expect(splitList(' a@x.test,b@x.test ;; c@x.test ')).toEqual(['a@x.test', 'b@x.test', 'c@x.test']);
  });

  it('derives report and state paths from the project root', () => {
    const config = parsePipelineConfig({ project: { root: dir } });
    const paths = getReportPaths(config);

    expect(paths.dir).toBe(join(dir, 'report'));
    expect(paths.versionFile).toBe(join(dir, 'report', 'version.txt'));
    expect(getStatePaths(config).stateDb).toBe(join(dir, '.secpipe', 'state.db'));
  });

  it('places the version file where VERSION_FILE says', () => {
    const config = loadPipelineConfig({ cwd: dir, env: { VERSION_FILE: 'meta/version.txt' } });
    expect(getReportPaths(config, dir).versionFile).toBe(join(dir, 'meta', 'version.txt'));
  });
});

describe('command-line toggle overrides', () => {
  it('turns everything else off with --only', () => {
    const overrides = toggleOverrides({ only: 'unitTests,sast' });
    expect(overrides['unitTests']).toBe(true);
    expect(overrides['sast']).toBe(true);
    expect(overrides['notify']).toBe(false);
    expect(Object.keys(overrides)).toHaveLength(9);
  });

  it('lets --disable win over --enable', () => {
    expect(toggleOverrides({ enable: 'notify,dastScan', disable: 'notify' })).toEqual({
      notify: false,
      dastScan: true,
    });
  });

  it('rejects unknown toggle names', () => {
    expect(() => toggleOverrides({ enable: 'fuzzing' })).toThrow(/Unknown toggle "fuzzing"/);
  });
});
