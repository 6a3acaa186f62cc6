import type { Command } from 'commander';
import { configFromOptions, type ConfigOptions } from '../cli-shared.js';
import { ConfluencePublisher } from '../../connector/confluence/publisher.js';
import { ConfigError } from '../../shared/errors.js';
import type { ReportStatus } from '../../runtime/types.js';

const STATUSES: readonly ReportStatus[] = ['PASS', 'FAIL', 'UNKNOWN'];

function parseStatus(raw: string): ReportStatus {
  const upper = raw.toUpperCase();
  const status = STATUSES.find((s) => s === upper);
  if (!status) throw new ConfigError(`Invalid status "${raw}". Use PASS, FAIL or UNKNOWN.`);
  return status;
}

export function registerLinkCommand(program: Command): void {
  program
    .command('link <version> <status>')
    .description('Resolve the Confluence page link for a report version and status')
    .option('-c, --config <path>', 'Pipeline config file')
    .option('--cwd <dir>', 'Project directory')
    .option('--space <key>', 'Confluence space key (default from config)')
    .action(async (versionArg: string, statusArg: string, opts: ConfigOptions & { space?: string }) => {
      const version = Number(versionArg);
      if (!Number.isInteger(version) || version < 1) {
        throw new ConfigError(`Invalid version "${versionArg}" – expected a positive integer`);
      }
      const status = parseStatus(statusArg);
      const config = configFromOptions(opts);
      const publisher = new ConfluencePublisher(config.confluence);

      const link = await publisher.resolveLink(version, status, opts.space ?? config.confluence.spaceKey);
      if (link.resolved && link.url) {
        console.log(link.url);
      } else {
        console.log(`${link.fallbackUrl} (fallback – "${publisher.titleFor(version, status)}" not uniquely found)`);
      }
    });
}
