/**
 * Artifact store – the run's report directory.
 *
 * Stages write named report files here; the correlator, publisher and notifier
 * read them back. File names are plain (no id prefix) because later runs and
 * external tools look for them by name.
 */
import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import type { ArtifactKind, ArtifactRef } from './types.js';

const KIND_BY_EXT: Record<string, ArtifactKind> = {
  '.html': 'html',
  '.htm': 'html',
  '.pdf': 'pdf',
};

export function kindOf(fileName: string): ArtifactKind {
  return KIND_BY_EXT[extname(fileName).toLowerCase()] ?? 'text';
}

export class ArtifactStore {
  constructor(readonly dir: string) {}

  ensureDir(): void {
    if (!existsSync(this.dir)) {
      mkdirSync(this.dir, { recursive: true });
    }
  }

  pathOf(name: string): string {
    return join(this.dir, basename(name));
  }

  ref(name: string, kind: ArtifactKind = kindOf(name)): ArtifactRef {
    const path = this.pathOf(name);
    return { name: basename(name), path, kind, exists: existsSync(path) };
  }

  write(name: string, content: string | Buffer, kind?: ArtifactKind): ArtifactRef {
    this.ensureDir();
    writeFileSync(this.pathOf(name), content);
    return this.ref(name, kind);
  }

  /** Returns undefined when the file is absent. */
  read(name: string): string | undefined {
    const path = this.pathOf(name);
    if (!existsSync(path)) return undefined;
    return readFileSync(path, 'utf8');
  }

  exists(name: string): boolean {
    return existsSync(this.pathOf(name));
  }

  list(): string[] {
    if (!existsSync(this.dir)) return [];
    return readdirSync(this.dir)
      .filter((entry) => statSync(join(this.dir, entry)).isFile())
      .sort();
  }

  /** Drop a file left behind by an earlier run. Absent files are ignored. */
  remove(name: string): void {
    rmSync(this.pathOf(name), { force: true });
  }
}
