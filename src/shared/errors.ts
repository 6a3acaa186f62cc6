export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** The process could not be started at all (binary absent, not executable). */
export class ToolLaunchError extends Error {
  readonly command: string;
  readonly code: string | undefined;

  constructor(command: string, cause: NodeJS.ErrnoException) {
    super(`Failed to launch ${command}: ${cause.code ?? cause.message}`);
    this.name = 'ToolLaunchError';
    this.command = command;
    this.code = cause.code;
  }
}

export class ResourceProvisionError extends Error {
  readonly resource: string;
  readonly step: 'network' | 'container' | 'readiness';

  constructor(resource: string, step: ResourceProvisionError['step'], detail: string) {
    super(`Provisioning ${resource} failed at ${step}: ${detail}`);
    this.name = 'ResourceProvisionError';
    this.resource = resource;
    this.step = step;
  }
}

export class PublishError extends Error {
  readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'PublishError';
    this.status = status;
  }
}

export class NotificationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotificationError';
  }
}
