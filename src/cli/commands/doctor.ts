import type { Command } from 'commander';
import { configFromOptions, type ConfigOptions } from '../cli-shared.js';
import { runDoctorChecks } from '../../runtime/doctor.js';

export function registerDoctorCommand(program: Command): void {
  program
    .command('doctor')
    .description('Check that the tools and files enabled stages need are present')
    .option('-c, --config <path>', 'Pipeline config file')
    .option('--cwd <dir>', 'Project directory')
    .option('--enable <toggles>', 'Comma-separated toggles to switch on')
    .option('--disable <toggles>', 'Comma-separated toggles to switch off')
    .option('--only <toggles>', 'Check only for these toggles')
    .action((opts: ConfigOptions) => {
      console.log('Running secpipe prerequisite checks...\n');

      const config = configFromOptions(opts);
      const report = runDoctorChecks(config);
      const reset = '\x1b[0m';

      for (const check of report.checks) {
        const icon = check.status === 'pass' ? '✓' : check.status === 'warn' ? '⚠' : '✗';
        const color =
          check.status === 'pass' ? '\x1b[32m' : check.status === 'warn' ? '\x1b[33m' : '\x1b[31m';

        console.log(`${color}${icon} ${check.name}${reset}`);
        console.log(`  ${check.message}`);
        if (check.fix) console.log(`  Fix: ${check.fix}`);
        console.log();
      }

      const overallColor =
        report.overall === 'pass'
          ? '\x1b[32m'
          : report.overall === 'warn'
            ? '\x1b[33m'
            : '\x1b[31m';
      console.log(`${overallColor}Overall: ${report.overall.toUpperCase()} – ${report.summary}${reset}`);

      if (report.overall === 'fail') process.exit(1);
    });
}
