import { existsSync } from 'node:fs';
import { STAGE_OUTPUTS } from '../report.js';
import type { StageDescriptor } from '../types.js';
import { invokeTool, projectPath, toStageResult } from './helpers.js';

export const setupStage: StageDescriptor = {
  name: 'setup',
  description: 'Install the application dependencies',
  enablement: { kind: 'toggle', toggle: 'envSetup' },
  fatal: true,
  async action(ctx) {
    const requirements = projectPath(ctx, ctx.config.project.requirements);
    if (!existsSync(requirements)) {
      return { exitCode: 1, error: `Requirements file not found: ${requirements}` };
    }
    const result = await invokeTool(ctx, {
      command: ctx.config.tools.python,
      args: ['-m', 'pip', 'install', '--disable-pip-version-check', '-r', ctx.config.project.requirements],
    });
    return toStageResult(result);
  },
};

export const sastStage: StageDescriptor = {
  name: 'sast',
  description: 'Static analysis with Bandit',
  enablement: { kind: 'toggle', toggle: 'sast' },
  fatal: false,
  async action(ctx) {
    const out = ctx.store.pathOf(STAGE_OUTPUTS.banditHtml);
    ctx.store.ensureDir();
    ctx.store.remove(STAGE_OUTPUTS.banditHtml);
    const result = await invokeTool(ctx, {
      command: ctx.config.tools.bandit,
      args: ['-r', ctx.config.project.sourceDir, '-f', 'html', '-o', out],
    });
    return toStageResult(result, [ctx.store.ref(STAGE_OUTPUTS.banditHtml, 'html')]);
  },
};

export const dependencyScanStage: StageDescriptor = {
  name: 'dependency-scan',
  description: 'Known-vulnerability check of requirements',
  enablement: { kind: 'toggle', toggle: 'dependencyScan' },
  fatal: false,
  async action(ctx) {
    ctx.store.remove(STAGE_OUTPUTS.dependencyVulns);
    const result = await invokeTool(ctx, {
      command: ctx.config.tools.safety,
      args: ['check', '-r', ctx.config.project.requirements, '--full-report'],
      capture: { name: STAGE_OUTPUTS.dependencyVulns, kind: 'text', streams: 'combined' },
    });
    return toStageResult(result);
  },
};

export const unitTestStage: StageDescriptor = {
  name: 'unit-tests',
  description: 'Run the test suite with pytest',
  enablement: { kind: 'toggle', toggle: 'unitTests' },
  fatal: false,
  async action(ctx) {
    ctx.store.ensureDir();
    ctx.store.remove(STAGE_OUTPUTS.testOutput);
    ctx.store.remove(STAGE_OUTPUTS.testResultsHtml);
    const result = await invokeTool(ctx, {
      command: ctx.config.tools.pytest,
      args: [
        ctx.config.project.testsDir,
        `--html=${ctx.store.pathOf(STAGE_OUTPUTS.testResultsHtml)}`,
        '--self-contained-html',
      ],
      capture: { name: STAGE_OUTPUTS.testOutput, kind: 'text', streams: 'combined' },
    });
    return toStageResult(result, [ctx.store.ref(STAGE_OUTPUTS.testResultsHtml, 'html')]);
  },
};
