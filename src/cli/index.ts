#!/usr/bin/env node
import { Command } from 'commander';
import { setLogLevel, type LogLevel } from '../shared/logger.js';
import { parseLogLevel } from './cli-shared.js';
import { registerRunCommand } from './commands/run.js';
import { registerDoctorCommand } from './commands/doctor.js';
import { registerLinkCommand } from './commands/link.js';
import { registerHistoryCommand } from './commands/history.js';
import { registerConfigCommand } from './commands/config.js';

const program = new Command();

program
  .name('secpipe')
  .description('secpipe – DevSecOps stage runner with version-correlated reports')
  .version('0.1.0')
  .option('--log-level <level>', 'Log threshold: debug, info, warn or error (default: LOG_LEVEL or info)', parseLogLevel)
  .hook('preAction', () => {
    const { logLevel } = program.opts<{ logLevel?: LogLevel }>();
    if (logLevel) setLogLevel(logLevel);
  });

registerRunCommand(program);
registerDoctorCommand(program);
registerLinkCommand(program);
registerHistoryCommand(program);
registerConfigCommand(program);

program.parseAsync(process.argv).catch((err: Error) => {
  console.error('Error:', err.message);
  process.exit(1);
});
