import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '../shared/logger.js';
import type { ArtifactStore } from './artifact-store.js';
import type { ArtifactKind, ReportStatus, VersionRecord } from './types.js';

const FAILURE_TOKEN = /failed/i;

const EXT_BY_KIND: Record<ArtifactKind, string> = {
  html: 'html',
  pdf: 'pdf',
  text: 'txt',
};

export function nextVersion(priorVersions: readonly number[]): number {
  const valid = priorVersions.filter((v) => Number.isSafeInteger(v) && v > 0);
  return valid.length === 0 ? 1 : Math.max(...valid) + 1;
}

/**
 * Textual heuristic over the test runner's output: any "failed" (any case)
 * means FAIL. A count of zero ("0 failed") still matches.
 */
export function deriveStatus(testOutput: string | null | undefined): ReportStatus {
  if (testOutput === undefined || testOutput === null || testOutput.trim() === '') return 'UNKNOWN';
  return FAILURE_TOKEN.test(testOutput) ? 'FAIL' : 'PASS';
}

export function correlate(
  priorVersions: readonly number[],
  testOutput: string | null | undefined,
  now: Date = new Date(),
): VersionRecord {
  return {
    version: nextVersion(priorVersions),
    status: deriveStatus(testOutput),
    timestamp: now.toISOString(),
  };
}

export function artifactName(basename: string, version: number, kind: ArtifactKind): string {
  return `${basename}_v${version}.${EXT_BY_KIND[kind]}`;
}

export function reportTitle(prefix: string, record: Pick<VersionRecord, 'version' | 'status'>): string {
  return `${prefix} v${record.version} (${record.status})`;
}

export interface RunCorrelatorOptions {
  store: ArtifactStore;
  versionFile: string;
  basename: string;
  /** This run's captured test runner output; absent when no tests ran. */
  testOutput?: string;
  now?: () => Date;
}

/**
 * Stamps one run. The record is computed on first use and reused afterwards,
 * so every stage in the run sees the same version.
 */
export class RunCorrelator {
  private record: VersionRecord | null = null;

  constructor(private readonly opts: RunCorrelatorOptions) {}

  priorVersions(): number[] {
    const versions: number[] = [];
    if (existsSync(this.opts.versionFile)) {
      const raw = readFileSync(this.opts.versionFile, 'utf8').trim();
      const parsed = /^\d+$/.test(raw) ? Number(raw) : NaN;
      if (Number.isSafeInteger(parsed)) {
        versions.push(parsed);
      } else {
        logger.warn('Ignoring unreadable version file', { path: this.opts.versionFile });
      }
    }
    const pattern = new RegExp(`^${escapeRegExp(this.opts.basename)}_v(\\d+)\\.[A-Za-z0-9]+$`);
    for (const file of this.opts.store.list()) {
      const m = pattern.exec(file);
      const version = m?.[1] ? Number(m[1]) : NaN;
      if (Number.isSafeInteger(version)) versions.push(version);
    }
    return versions;
  }

  current(): VersionRecord {
    if (!this.record) {
      this.record = correlate(this.priorVersions(), this.opts.testOutput, this.opts.now?.() ?? new Date());
      logger.info('Run correlated', { version: this.record.version, status: this.record.status });
    }
    return this.record;
  }

  persist(): VersionRecord {
    const record = this.current();
    mkdirSync(dirname(this.opts.versionFile), { recursive: true });
    writeFileSync(this.opts.versionFile, `${record.version}\n`, 'utf8');
    return record;
  }

  artifactName(kind: ArtifactKind): string {
    return artifactName(this.opts.basename, this.current().version, kind);
  }
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
