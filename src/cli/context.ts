import { loadEngineConfig, type EngineConfig } from '../config/config';
import { createEngineComponents, type EngineComponents } from '../retrieval/factory';
import { handleUnknownError } from '../errors/index';
import { setLogLevel, setSilentMode } from '../output/logger';
import type { OutputFormat } from '../schemas/cli-schemas';

/*
 * Parses the environment into an EngineConfig and applies its log level.
 * Exits with status 1 on invalid configuration.
 */
export function resolveConfig(): EngineConfig {
  try {
    const config = loadEngineConfig();
    setLogLevel(config.logLevel);
    return config;
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Validating environment variables');
    console.error(`Error: ${err.message}`);
    console.error('Please set these in your .env file or environment.');
    process.exit(1);
  }
}

export function buildComponents(config: EngineConfig): EngineComponents {
  try {
    return createEngineComponents(config);
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Creating evidence engine');
    console.error(`Error: ${err.message}`);
    process.exit(1);
  }
}

// Machine-readable output must own stdout
export function applyOutputMode(output: OutputFormat): void {
  setSilentMode(output === 'json');
}
