import { existsSync } from 'node:fs';
import { spawnSync } from 'node:child_process';
import { join } from 'node:path';
import type { PipelineConfig } from '../workspace/types.js';
import { resolveProjectRoot } from '../workspace/paths.js';

export type CheckStatus = 'pass' | 'fail' | 'warn';

export interface DoctorCheck {
  name: string;
  status: CheckStatus;
  message: string;
  fix?: string;
}

export interface DoctorReport {
  overall: CheckStatus;
  checks: DoctorCheck[];
  summary: string;
}

export type CommandProbe = (cmd: string) => boolean;

export function commandExists(cmd: string): boolean {
  const result = spawnSync(process.platform === 'win32' ? 'where' : 'which', [cmd], { stdio: 'ignore' });
  return !result.error && result.status === 0;
}

function toolCheck(
  name: string,
  cmd: string,
  neededBy: string,
  enabled: boolean,
  probe: CommandProbe,
  fix: string,
): DoctorCheck {
  if (probe(cmd)) return { name, status: 'pass', message: `${cmd} found` };
  return {
    name,
    status: enabled ? 'fail' : 'warn',
    message: `${cmd} not found${enabled ? ` – required by ${neededBy}` : ` (${neededBy} disabled)`}`,
    fix,
  };
}

/**
 * Prerequisite checks for the stages enabled in `config`. A missing tool or file
 * for an enabled stage fails; for a disabled stage it only warns.
 */
export function runDoctorChecks(
  config: PipelineConfig,
  opts: { cwd?: string; probe?: CommandProbe } = {},
): DoctorReport {
  const probe = opts.probe ?? commandExists;
  const root = resolveProjectRoot(config, opts.cwd);
  const t = config.toggles;
  const { tools } = config;
  const usesDocker = t.imageBuild || t.dastDeploy || t.dastScan;

  const checks: DoctorCheck[] = [
    toolCheck('Python available', tools.python, 'envSetup', t.envSetup, probe, 'Install Python 3.11+'),
    toolCheck('Bandit available', tools.bandit, 'sast', t.sast, probe, 'pip install bandit'),
    toolCheck('Safety available', tools.safety, 'dependencyScan', t.dependencyScan, probe, 'pip install safety'),
    toolCheck('Pytest available', tools.pytest, 'unitTests', t.unitTests, probe, 'pip install pytest pytest-html'),
    toolCheck('Docker available', tools.docker, 'imageBuild/dast', usesDocker, probe, 'Install Docker Engine'),
    toolCheck('Trivy available', tools.trivy, 'imageBuild', t.imageBuild, probe, 'Install trivy: https://trivy.dev'),
  ];

  const dockerfile = join(root, config.project.dockerfile);
  checks.push(
    existsSync(dockerfile)
      ? { name: 'Dockerfile present', status: 'pass', message: dockerfile }
      : {
          name: 'Dockerfile present',
          status: t.imageBuild ? 'fail' : 'warn',
          message: `${dockerfile} missing`,
          fix: 'Add a Dockerfile or disable imageBuild',
        },
  );

  const requirements = join(root, config.project.requirements);
  checks.push(
    existsSync(requirements)
      ? { name: 'Requirements file present', status: 'pass', message: requirements }
      : {
          name: 'Requirements file present',
          status: t.envSetup || t.dependencyScan ? 'fail' : 'warn',
          message: `${requirements} missing`,
          fix: 'Add requirements.txt or disable envSetup and dependencyScan',
        },
  );

  if (t.publishReport) {
    const c = config.confluence;
    checks.push(
      c.baseUrl && c.user && c.token
        ? { name: 'Confluence configured', status: 'pass', message: `${c.baseUrl} (space ${c.spaceKey})` }
        : {
            name: 'Confluence configured',
            status: 'warn',
            message: 'CONFLUENCE_BASE/USER/TOKEN not all set – publishing will soft-fail',
          },
    );
  }
  if (t.notify) {
    const s = config.smtp;
    checks.push(
      s.host && s.from && s.to.length > 0
        ? { name: 'SMTP configured', status: 'pass', message: `${s.host}:${s.port}` }
        : {
            name: 'SMTP configured',
            status: 'warn',
            message: 'SMTP_HOST/REPORT_FROM/REPORT_TO not all set – notification will soft-fail',
          },
    );
  }

  const hasFailure = checks.some((c) => c.status === 'fail');
  const hasWarning = checks.some((c) => c.status === 'warn');
  const overall: CheckStatus = hasFailure ? 'fail' : hasWarning ? 'warn' : 'pass';

  const passCount = checks.filter((c) => c.status === 'pass').length;
  const summary =
    `${passCount}/${checks.length} checks passed` +
    (hasFailure ? ' – FAILURES detected' : '') +
    (hasWarning && !hasFailure ? ' – warnings present' : '');

  return { overall, checks, summary };
}
