import type { Command } from 'commander';
import { dump } from 'js-yaml';
import { configFromOptions, type ConfigOptions } from '../cli-shared.js';
import { safeStringify } from '../../shared/redact.js';

export function registerConfigCommand(program: Command): void {
  program
    .command('config')
    .description('Print the resolved pipeline configuration (secrets redacted)')
    .option('-c, --config <path>', 'Pipeline config file')
    .option('--cwd <dir>', 'Project directory')
    .option('--enable <toggles>', 'Comma-separated toggles to switch on')
    .option('--disable <toggles>', 'Comma-separated toggles to switch off')
    .option('--only <toggles>', 'Switch on only these toggles')
    .option('--json', 'Print JSON instead of YAML', false)
    .action((opts: ConfigOptions & { json: boolean }) => {
      const config = configFromOptions(opts);
      const redacted = safeStringify(config, 2);
      console.log(opts.json ? redacted : dump(JSON.parse(redacted)));
    });
}
