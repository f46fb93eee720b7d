/**
 * Helpers shared by the CLI commands.
 */

import { loadPipelineConfig, type LoadedConfig } from '../../src/config/loader.js';
import { MemoryGraphStore } from '../../src/store/memory-store.js';
import { Neo4jGraphStore } from '../../src/store/neo4j-store.js';
import type { GraphStore } from '../../src/store/types.js';
import type { Logger } from '../../src/utils/logger.js';

export interface CommonOptions {
  config?: string;
  verbose?: boolean;
  help?: boolean;
}

/**
 * Value following a flag: `--config file`. Throws if it is missing.
 */
export function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`${flag} requires a value`);
  }
  return value;
}

export function parsePositiveInteger(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Parse the flags every command accepts. Returns the index to continue from,
 * or undefined if `args[index]` is not a common flag.
 */
export function parseCommonFlag(args: string[], index: number, options: CommonOptions): number | undefined {
  switch (args[index]) {
    case '--config':
    case '-c':
      options.config = takeValue(args, index, args[index]);
      return index + 1;
    case '--verbose':
      options.verbose = true;
      return index;
    case '-h':
    case '--help':
      options.help = true;
      return index;
    default:
      return undefined;
  }
}

export async function loadCommandConfig(options: CommonOptions, requireNeo4j: boolean): Promise<LoadedConfig> {
  return loadPipelineConfig({ configPath: options.config, requireNeo4j });
}

export function openStore(loaded: LoadedConfig, dryRun: boolean, logger: Logger): GraphStore {
  if (dryRun) {
    logger.info('Dry run: writing to an in-memory graph');
    return new MemoryGraphStore();
  }
  const { neo4j } = loaded.config;
  logger.debug(`Connecting to ${neo4j.uri}${neo4j.database ? ` (database ${neo4j.database})` : ''}`);
  return Neo4jGraphStore.fromConfig(neo4j, logger.child('Neo4j'));
}
