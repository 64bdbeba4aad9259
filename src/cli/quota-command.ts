import type { Command } from 'commander';
import { createQuotaManager } from '../retrieval/factory';
import { printQuotaUsage } from '../output/reporter';
import { resolveConfig } from './context';

/*
 * Registers the 'quota' command. Reads the quota store only; no search
 * credentials are needed.
 */
export function registerQuotaCommand(program: Command): void {
  program
    .command('quota')
    .description("Show today's search quota usage")
    .action(() => {
      const config = resolveConfig();
      const quota = createQuotaManager(config);
      printQuotaUsage(quota.usage());
    });
}
