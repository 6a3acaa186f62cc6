import { ResourceProvisionError } from '../../shared/errors.js';
import { STAGE_OUTPUTS } from '../report.js';
import type { StageDescriptor } from '../types.js';
import { invokeTool, toStageResult } from './helpers.js';

export const dastDeployStage: StageDescriptor = {
  name: 'dast-deploy',
  description: 'Start the built image on an ephemeral network for dynamic scanning',
  enablement: { kind: 'toggle', toggle: 'dastDeploy' },
  fatal: false,
  async action(ctx) {
    const { dast, image } = ctx.config;
    try {
      ctx.state.dastTarget = await ctx.guard.provision(
        {
          name: dast.container,
          network: dast.network,
          image: image.tag,
          ports: [{ host: dast.port, container: dast.port }],
          healthUrl: dast.healthPath ? `http://localhost:${dast.port}${dast.healthPath}` : null,
        },
        ctx.signal,
      );
      return { exitCode: 0 };
    } catch (err) {
      if (err instanceof ResourceProvisionError) {
        return { exitCode: 1, error: err.message };
      }
      throw err;
    }
  },
  cleanup: {
    after: 'dast-scan',
    async run(ctx) {
      const target = ctx.state.dastTarget;
      if (!target) return;
      ctx.state.dastTarget = undefined;
      await ctx.guard.release(target);
    },
  },
};

export const dastScanStage: StageDescriptor = {
  name: 'dast-scan',
  description: 'OWASP ZAP baseline scan against the deployed target',
  enablement: { kind: 'toggle', toggle: 'dastScan' },
  fatal: false,
  async action(ctx) {
    const target = ctx.state.dastTarget;
    if (!target) {
      return { exitCode: 1, error: 'No DAST target is running (dast-deploy disabled or failed)' };
    }
    const { dast, tools } = ctx.config;
    ctx.store.ensureDir();
    ctx.store.remove(STAGE_OUTPUTS.zapHtml);
    const result = await invokeTool(ctx, {
      command: tools.docker,
      args: [
        'run',
        '--rm',
        '--network',
        target.network,
        '-v',
        `${ctx.store.dir}:/zap/wrk:rw`,
        dast.zapImage,
        'zap-baseline.py',
        '-t',
        `http://${target.name}:${dast.port}`,
        '-r',
        STAGE_OUTPUTS.zapHtml,
      ],
    });
    return toStageResult(result, [ctx.store.ref(STAGE_OUTPUTS.zapHtml, 'html')]);
  },
};
