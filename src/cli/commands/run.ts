import type { Command } from 'commander';
import { configFromOptions, openHistory, type ConfigOptions } from '../cli-shared.js';
import { runDevSecOpsPipeline } from '../../runtime/pipelines.js';
import type { RunHistory } from '../../workspace/db.js';
import type { StageResult } from '../../runtime/types.js';

interface RunOptions extends ConfigOptions {
  history: boolean;
}

const ICONS: Record<StageResult['outcome'], string> = {
  OK: '[ok]',
  SOFT_FAIL: '[soft-fail]',
  HARD_FAIL: '[FAIL]',
  SKIPPED: '[skipped]',
};

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the DevSecOps pipeline')
    .option('-c, --config <path>', 'Pipeline config file (default: ./secpipe.yaml if present)')
    .option('--cwd <dir>', 'Project directory')
    .option('--enable <toggles>', 'Comma-separated toggles to switch on')
    .option('--disable <toggles>', 'Comma-separated toggles to switch off')
    .option('--only <toggles>', 'Switch on only these toggles')
    .option('--no-history', 'Do not record the run in .secpipe/state.db')
    .action(async (opts: RunOptions) => {
      const config = configFromOptions(opts);
      const history: RunHistory | undefined = opts.history ? openHistory(config) : undefined;

      const controller = new AbortController();
      const onSignal = (signal: NodeJS.Signals) => {
        console.error(`\nReceived ${signal} – cancelling run and releasing resources...`);
        controller.abort();
      };
      process.once('SIGINT', onSignal);
      process.once('SIGTERM', onSignal);

      console.log('Running DevSecOps pipeline');
      const enabled = Object.entries(config.toggles)
        .filter(([, on]) => on)
        .map(([name]) => name);
      console.log(`Enabled toggles: ${enabled.join(', ') || '(none)'}`);

      const run = await runDevSecOpsPipeline(config, { signal: controller.signal, history }).finally(() => {
        process.removeListener('SIGINT', onSignal);
        process.removeListener('SIGTERM', onSignal);
      });

      console.log(`\nRun ${run.id}: ${run.outcome}${run.cancelled ? ' (cancelled)' : ''}`);
      for (const result of run.results) {
        const exit = result.exitCode === 'skipped' ? '' : ` (exit ${result.exitCode})`;
        console.log(`  ${ICONS[result.outcome]} ${result.name}${exit}`);
        if (result.error) console.log(`    Error: ${result.error}`);
      }
      for (const cleanup of run.cleanups.filter((c) => !c.ok)) {
        console.log(`  [cleanup failed] ${cleanup.stage}: ${cleanup.error ?? 'unknown error'}`);
      }

      if (run.version) {
        console.log(`\nReport version: v${run.version.version} (${run.version.status})`);
      }
      if (run.link) {
        console.log(`Report link: ${run.link.url ?? `${run.link.fallbackUrl} (fallback)`}`);
      }

      if (run.outcome === 'FAILURE') process.exit(1);
    });
}
