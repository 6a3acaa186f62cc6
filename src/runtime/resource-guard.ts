import { setTimeout as delay } from 'node:timers/promises';
import { ResourceProvisionError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { InvocationResult, ToolInvoker } from './tool-invoker.js';
import type { EphemeralResource, PortMapping } from './types.js';

export interface ResourceSpec {
  name: string;
  network: string;
  image: string;
  ports: PortMapping[];
  /** Polled until it answers 2xx. Without it, readiness is a fixed delay. */
  healthUrl?: string | null;
  env?: Record<string, string>;
}

export interface ResourceGuardOptions {
  invoker: ToolInvoker;
  dockerBin?: string;
  readinessTimeoutMs?: number;
  pollIntervalMs?: number;
  fixedDelayMs?: number;
  commandTimeoutMs?: number;
  fetch?: (url: string, init?: RequestInit) => Promise<Response>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Provisions the container + network pair used for dynamic scanning and makes
 * sure each one is torn down exactly once.
 */
export class EphemeralResourceGuard {
  private readonly live = new Map<string, EphemeralResource>();
  private readonly docker: string;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly fetchImpl: (url: string, init?: RequestInit) => Promise<Response>;

  constructor(private readonly opts: ResourceGuardOptions) {
    this.docker = opts.dockerBin ?? 'docker';
    this.sleep = opts.sleep ?? ((ms) => delay(ms));
    this.now = opts.now ?? Date.now;
    this.fetchImpl = opts.fetch ?? ((url, init) => fetch(url, init));
  }

  get active(): EphemeralResource[] {
    return [...this.live.values()];
  }

  async provision(spec: ResourceSpec, signal?: AbortSignal): Promise<EphemeralResource> {
    if (this.live.has(spec.name)) {
      throw new ResourceProvisionError(spec.name, 'container', 'a resource with this name is already live');
    }
    const log = logger.child({ resource: spec.name, network: spec.network });

    const net = await this.runDocker(['network', 'create', spec.network], signal);
    if (net.exitCode !== 0) {
      throw new ResourceProvisionError(spec.name, 'network', net.stderr.trim() || `exit ${net.exitCode}`);
    }

    const partial: EphemeralResource = {
      name: spec.name,
      network: spec.network,
      image: spec.image,
      containerId: '',
      ports: spec.ports,
    };
    // Registered before the container exists so a failure below still removes the network.
    this.live.set(spec.name, partial);

    try {
      const runArgs = ['run', '-d', '--name', spec.name, '--network', spec.network];
      for (const p of spec.ports) runArgs.push('-p', `${p.host}:${p.container}`);
      for (const [k, v] of Object.entries(spec.env ?? {})) runArgs.push('--env', `${k}=${v}`);
      runArgs.push(spec.image);

      const run = await this.runDocker(runArgs, signal);
      if (run.exitCode !== 0) {
        throw new ResourceProvisionError(spec.name, 'container', run.stderr.trim() || `exit ${run.exitCode}`);
      }
      partial.containerId = run.stdout.trim().split('\n').pop() ?? '';

      await this.waitUntilReady(spec, signal);
      log.info('Ephemeral resource ready', { container_id: partial.containerId });
      return partial;
    } catch (err) {
      await this.release(partial);
      if (err instanceof ResourceProvisionError) throw err;
      throw new ResourceProvisionError(spec.name, 'container', (err as Error).message);
    }
  }

  /** Removes the container, then the network. Repeated calls for the same resource are no-ops. */
  async release(resource: EphemeralResource): Promise<void> {
    if (this.live.get(resource.name) !== resource) return;
    this.live.delete(resource.name);

    const failures: string[] = [];
    const rm = await this.tryDocker(['rm', '-f', resource.name]);
    if (rm !== null) failures.push(`container: ${rm}`);
    const netRm = await this.tryDocker(['network', 'rm', resource.network]);
    if (netRm !== null) failures.push(`network: ${netRm}`);

    if (failures.length > 0) {
      logger.warn('Ephemeral resource release incomplete', { resource: resource.name, failures });
    } else {
      logger.info('Ephemeral resource released', { resource: resource.name });
    }
  }

  async releaseAll(): Promise<void> {
    for (const resource of [...this.live.values()].reverse()) {
      await this.release(resource);
    }
  }

  async withResource<T>(
    spec: ResourceSpec,
    fn: (resource: EphemeralResource) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const resource = await this.provision(spec, signal);
    try {
      return await fn(resource);
    } finally {
      await this.release(resource);
    }
  }

  private async waitUntilReady(spec: ResourceSpec, signal?: AbortSignal): Promise<void> {
    const healthUrl = spec.healthUrl;
    if (!healthUrl) {
      await this.sleep(this.opts.fixedDelayMs ?? 15_000);
      return;
    }
    const timeoutMs = this.opts.readinessTimeoutMs ?? 60_000;
    const interval = this.opts.pollIntervalMs ?? 2_000;
    const deadline = this.now() + timeoutMs;
    let lastError = 'no response';

    for (;;) {
      if (signal?.aborted) {
        throw new ResourceProvisionError(spec.name, 'readiness', 'aborted');
      }
      try {
        const resp = await this.fetchImpl(healthUrl, { signal });
        if (resp.ok) return;
        lastError = `HTTP ${resp.status}`;
      } catch (err) {
        lastError = (err as Error).message;
      }
      if (this.now() >= deadline) {
        throw new ResourceProvisionError(
          spec.name,
          'readiness',
          `${healthUrl} not healthy within ${timeoutMs}ms (${lastError})`,
        );
      }
      await this.sleep(interval);
    }
  }

  private runDocker(args: string[], signal?: AbortSignal): Promise<InvocationResult> {
    return this.opts.invoker.invoke({
      command: this.docker,
      args,
      timeoutMs: this.opts.commandTimeoutMs ?? 120_000,
      signal,
    });
  }

  /** Best-effort docker call; returns an error description or null on success. */
  private async tryDocker(args: string[]): Promise<string | null> {
    try {
      const res = await this.runDocker(args);
      return res.exitCode === 0 ? null : res.stderr.trim() || `exit ${res.exitCode}`;
    } catch (err) {
      return (err as Error).message;
    }
  }
}
