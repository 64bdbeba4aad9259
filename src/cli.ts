#!/usr/bin/env node
import { program } from 'commander';
import { readFileSync, existsSync } from 'fs';
import * as path from 'path';
import { handleUnknownError } from './errors/index';
import { registerBatchCommand, registerSearchCommand } from './cli/search-command';
import { registerQuotaCommand } from './cli/quota-command';
import { registerConfigCommand } from './cli/config-command';
import { registerInitCommand } from './cli/init-command';

/*
 * Best-effort .env loader without external dependencies.
 * Loads environment variables from .env or .env.local files; values already
 * in the environment win.
 */
function loadDotEnv(): void {
  const candidates = ['.env', '.env.local'];
  for (const filename of candidates) {
    const full = path.resolve(process.cwd(), filename);
    if (!existsSync(full)) continue;
    try {
      const content = readFileSync(full, 'utf-8');
      for (const rawLine of content.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line || line.startsWith('#')) continue;
        const match = line.match(/^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/);
        if (!match || !match[1] || match[2] === undefined) continue;
        const key = match[1];
        let value = match[2];
        if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
          value = value.slice(1, -1);
        } else {
          const hashAt = value.indexOf(' #');
          if (hashAt !== -1) value = value.slice(0, hashAt).trim();
        }
        if (process.env[key] === undefined) {
          process.env[key] = value;
        }
      }
      break; // stop after first found
    } catch (e: unknown) {
      // Unreadable file: keep the existing environment
      const err = handleUnknownError(e, 'Loading .env file');
      console.warn(`[evidence] Warning: ${err.message}`);
    }
  }
}

// Load environment variables at startup
loadDotEnv();

program
  .name('evidence-engine')
  .description('Ranked, cached, quota-aware web evidence for fact checking')
  .version('0.1.0');

registerSearchCommand(program);
registerBatchCommand(program);
registerQuotaCommand(program);
registerConfigCommand(program);
registerInitCommand(program);

program.parseAsync(process.argv).catch((e: unknown) => {
  const err = handleUnknownError(e, 'Running command');
  console.error(`Error: ${err.message}`);
  process.exit(1);
});
