import { spawn, type ChildProcess } from 'node:child_process';
import { ToolLaunchError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { ArtifactStore } from './artifact-store.js';
import type { ArtifactKind, ArtifactRef } from './types.js';

export const TIMEOUT_EXIT_CODE = 124;
export const ABORT_EXIT_CODE = 130;
export const LAUNCH_FAILURE_EXIT_CODE = 127;

const LAUNCH_ERROR_CODES = new Set(['ENOENT', 'EACCES', 'EPERM', 'ENOEXEC']);

export interface CaptureRequest {
  name: string;
  kind?: ArtifactKind;
  streams: 'stdout' | 'stderr' | 'combined';
}

export interface InvocationRequest {
  command: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Persist the chosen output streams into the artifact store under `name`. */
  capture?: CaptureRequest;
}

export interface InvocationResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  artifact?: ArtifactRef;
}

export interface ToolInvoker {
  invoke(req: InvocationRequest): Promise<InvocationResult>;
}

export interface ProcessToolInvokerOptions {
  store?: ArtifactStore;
  spawn?: typeof spawn;
}

/**
 * SIGKILL the child's whole process group so forked workers die with it. Falls
 * back to the child alone when it has no group of its own.
 */
function killProcessTree(child: ChildProcess): void {
  if (child.pid !== undefined && process.platform !== 'win32') {
    try {
      process.kill(-child.pid, 'SIGKILL');
      return;
    } catch (err) {
      logger.debug('Process group kill failed', { pid: child.pid, error: (err as Error).message });
    }
  }
  child.kill('SIGKILL');
}

/**
 * Runs external processes (scanners, build tools, test runners). A non-zero exit
 * is a normal result; only a process that cannot be started rejects.
 */
export class ProcessToolInvoker implements ToolInvoker {
  private readonly spawnImpl: typeof spawn;

  constructor(private readonly opts: ProcessToolInvokerOptions = {}) {
    this.spawnImpl = opts.spawn ?? spawn;
  }

  async invoke(req: InvocationRequest): Promise<InvocationResult> {
    const args = req.args ?? [];
    logger.debug('Invoking tool', { command: req.command, args, cwd: req.cwd, timeout_ms: req.timeoutMs });

    const result = await this.exec(req, args);

    if (req.capture) {
      if (!this.opts.store) {
        throw new Error(`Capture of ${req.capture.name} requested but no artifact store configured`);
      }
      const content =
        req.capture.streams === 'stdout'
          ? result.stdout
          : req.capture.streams === 'stderr'
            ? result.stderr
            : result.stdout + result.stderr;
      result.artifact = this.opts.store.write(req.capture.name, content, req.capture.kind);
    }

    logger.debug('Tool exited', {
      command: req.command,
      exit_code: result.exitCode,
      timed_out: result.timedOut,
    });
    return result;
  }

  private exec(req: InvocationRequest, args: string[]): Promise<InvocationResult> {
    return new Promise((resolve, reject) => {
      if (req.signal?.aborted) {
        resolve({ exitCode: ABORT_EXIT_CODE, stdout: '', stderr: '[secpipe] aborted', timedOut: false });
        return;
      }

      const child = this.spawnImpl(req.command, args, {
        cwd: req.cwd,
        env: { ...process.env, ...req.env },
        detached: process.platform !== 'win32',
      });

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let timedOut = false;
      let aborted = false;
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const onAbort = () => {
        aborted = true;
        killProcessTree(child);
      };

      const finish = () => {
        settled = true;
        if (timer) clearTimeout(timer);
        req.signal?.removeEventListener('abort', onAbort);
      };

      child.stdout.on('data', (chunk) => stdoutChunks.push(Buffer.from(chunk)));
      child.stderr.on('data', (chunk) => stderrChunks.push(Buffer.from(chunk)));

      child.on('error', (err: NodeJS.ErrnoException) => {
        if (settled) return;
        finish();
        if (err.code && LAUNCH_ERROR_CODES.has(err.code)) {
          reject(new ToolLaunchError(req.command, err));
        } else {
          reject(err);
        }
      });

      const settle = (code: number | null) => {
        if (settled) return;
        finish();
        const stdout = Buffer.concat(stdoutChunks).toString('utf8');
        let stderr = Buffer.concat(stderrChunks).toString('utf8');
        let exitCode = code ?? 1;
        if (timedOut) {
          exitCode = TIMEOUT_EXIT_CODE;
          stderr += `${stderr && !stderr.endsWith('\n') ? '\n' : ''}[secpipe] timed out after ${req.timeoutMs}ms`;
        } else if (aborted) {
          exitCode = ABORT_EXIT_CODE;
          stderr += `${stderr && !stderr.endsWith('\n') ? '\n' : ''}[secpipe] aborted`;
        }
        resolve({ exitCode, stdout, stderr, timedOut });
      };

      child.on('close', settle);

      // A killed child is done once it exits, even if a surviving grandchild
      // still holds the output pipes open.
      child.on('exit', (code) => {
        if (!timedOut && !aborted) return;
        settle(code);
        child.stdout.destroy();
        child.stderr.destroy();
      });

      if (req.timeoutMs !== undefined && req.timeoutMs > 0) {
        timer = setTimeout(() => {
          timedOut = true;
          logger.warn('Tool timed out – killing', { command: req.command, timeout_ms: req.timeoutMs });
          killProcessTree(child);
        }, req.timeoutMs);
      }
      req.signal?.addEventListener('abort', onAbort, { once: true });

      child.stdin.end();
    });
  }
}
