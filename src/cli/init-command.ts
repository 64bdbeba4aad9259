import type { Command } from 'commander';
import { existsSync, writeFileSync } from 'fs';
import * as path from 'path';
import { ENV_TEMPLATE_FILENAME } from '../config/constants';

// Template for .env.evidence environment file
export const ENV_TEMPLATE = `# Evidence Engine Environment Configuration
#
# SETUP INSTRUCTIONS:
# 1. Rename this file to .env, OR
# 2. Copy its contents into your existing .env file

# ============================================
# Google Programmable Search (required)
# ============================================
GCP_SEARCH_API_KEY=
GCP_CUSTOM_SEARCH_ENGINE_ID=

# ============================================
# Gemini embeddings (optional)
# Without a key, a local term-frequency embedding is used
# ============================================
# GOOGLE_API_KEY=
# EMBEDDING_MODEL=text-embedding-004

# ============================================
# Quota and cache
# ============================================
GCP_DAILY_QUERY_LIMIT=100
GCP_QUOTA_STORE=logs/.google_quota.json
GCP_SEARCH_CACHE=logs/.google_search_cache.json

# ============================================
# Retrieval defaults
# ============================================
DEFAULT_SEARCH_RESULTS=10
DEFAULT_TOP_K=5
RETRIEVAL_CONCURRENCY=4

# Logging: debug, info, warn, error, silent
LOG_LEVEL=info
`;

interface InitOptions {
    force?: boolean;
}

/**
 * Registers the 'init' command with Commander.
 * This command writes an environment template into the current directory.
 */
export function registerInitCommand(program: Command): void {
    program
        .command('init')
        .description('Create an environment template for the evidence engine')
        .option('--force', 'Overwrite an existing template')
        .action((opts: InitOptions) => {
            const envPath = path.join(process.cwd(), ENV_TEMPLATE_FILENAME);

            if (!opts.force && existsSync(envPath)) {
                console.error(`Error: ${ENV_TEMPLATE_FILENAME} already exists.`);
                console.error(`\nUse --force to overwrite it.`);
                process.exit(1);
            }

            try {
                writeFileSync(envPath, ENV_TEMPLATE, 'utf-8');
            } catch (e: unknown) {
                const err = e instanceof Error ? e : new Error(String(e));
                console.error(`Error: Failed to write ${ENV_TEMPLATE_FILENAME}: ${err.message}`);
                process.exit(1);
            }

            // Print success message with next steps
            console.log(`✓ Created ${ENV_TEMPLATE_FILENAME}\n`);
            console.log(`Next steps:`);
            console.log(`  1. Rename ${ENV_TEMPLATE_FILENAME} to .env, or copy its contents into your .env`);
            console.log(`  2. Fill in GCP_SEARCH_API_KEY and GCP_CUSTOM_SEARCH_ENGINE_ID`);
            console.log(`  3. Run 'evidence-engine config' to check the setup`);
        });
}
