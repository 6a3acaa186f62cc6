import { existsSync } from 'node:fs';
import { STAGE_OUTPUTS } from '../report.js';
import type { StageDescriptor } from '../types.js';
import { invokeTool, projectPath, toStageResult } from './helpers.js';

export const imageBuildStage: StageDescriptor = {
  name: 'image-build',
  description: 'Build the application image',
  enablement: { kind: 'toggle', toggle: 'imageBuild' },
  fatal: true,
  async action(ctx) {
    const dockerfile = projectPath(ctx, ctx.config.project.dockerfile);
    if (!existsSync(dockerfile)) {
      return { exitCode: 1, error: `Dockerfile not found: ${dockerfile}` };
    }
    const result = await invokeTool(ctx, {
      command: ctx.config.tools.docker,
      args: ['build', '-t', ctx.config.image.tag, '-f', ctx.config.project.dockerfile, '.'],
    });
    return toStageResult(result);
  },
};

export const imageScanStage: StageDescriptor = {
  name: 'image-scan',
  description: 'Container vulnerability scan with Trivy',
  enablement: { kind: 'toggle', toggle: 'imageBuild' },
  fatal: false,
  async action(ctx) {
    ctx.store.remove(STAGE_OUTPUTS.trivyText);
    const result = await invokeTool(ctx, {
      command: ctx.config.tools.trivy,
      args: ['image', '--no-progress', '--severity', 'HIGH,CRITICAL', '--format', 'table', ctx.config.image.tag],
      capture: { name: STAGE_OUTPUTS.trivyText, kind: 'text', streams: 'stdout' },
    });
    return toStageResult(result);
  },
};
