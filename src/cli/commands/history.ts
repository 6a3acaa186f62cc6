import type { Command } from 'commander';
import { configFromOptions, openHistory, type ConfigOptions } from '../cli-shared.js';

export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('List recent pipeline runs')
    .option('-c, --config <path>', 'Pipeline config file')
    .option('--cwd <dir>', 'Project directory')
    .option('-n, --limit <n>', 'Number of runs to show', '10')
    .option('--stages', 'Show stage results for each run', false)
    .action((opts: ConfigOptions & { limit: string; stages: boolean }) => {
      const history = openHistory(configFromOptions(opts));
      const limit = Math.max(1, parseInt(opts.limit, 10) || 10);
      const runs = history.listRuns(limit);
      if (runs.length === 0) {
        console.log('No runs recorded yet.');
        return;
      }
      for (const run of runs) {
        const report = run.report_version !== null ? `v${run.report_version} (${run.report_status ?? 'UNKNOWN'})` : '-';
        const outcome = run.outcome ?? 'RUNNING';
        console.log(`${run.id}  ${outcome}${run.cancelled ? ' (cancelled)' : ''}  ${report}  ${run.link_url ?? ''}`);
        if (opts.stages) {
          for (const stage of history.stagesOf(run.id)) {
            const exit = stage.exit_code === null ? '' : ` exit=${stage.exit_code}`;
            console.log(`    ${stage.name}: ${stage.outcome}${exit}${stage.error ? ` – ${stage.error}` : ''}`);
          }
        }
      }
    });
}
