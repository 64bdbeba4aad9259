import type { Command } from 'commander';
import { printConfigStatus } from '../output/reporter';
import { resolveConfig } from './context';

/*
 * Registers the 'config' command: prints which settings are present.
 * Exits with status 1 when the search credentials are missing.
 */
export function registerConfigCommand(program: Command): void {
  program
    .command('config')
    .description('Show configuration status')
    .action(() => {
      const config = resolveConfig();
      printConfigStatus(config);

      if (config.search.apiKey && config.search.cx) {
        console.log('\n✓ Configuration is valid!');
        return;
      }
      console.error('\n✗ Configuration is incomplete. Please set the required environment variables.');
      process.exitCode = 1;
    });
}
