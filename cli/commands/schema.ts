/**
 * Schema command - create the stableId constraint and lookup indexes
 */

import { ensureSchema, SCHEMA_STATEMENTS } from '../../src/store/schema.js';
import { buildSchemaQuery } from '../../src/store/cypher.js';
import { createConsoleLogger } from '../../src/utils/logger.js';
import { loadCommandConfig, openStore, parseCommonFlag, type CommonOptions } from './shared.js';

export interface SchemaOptions extends CommonOptions {
  /** Print the statements instead of running them */
  print?: boolean;
}

export function printSchemaHelp(): void {
  console.log(`
Usage: cadgraph schema [options]

Create the CadEntity.stableId uniqueness constraint and lookup indexes.
Idempotent.

Options:
  -c, --config <file>    Config file (default: ./cadgraph.yaml if present)
  --print                Print the Cypher statements and exit
  --verbose              Show debug output
  -h, --help             Show this help
`);
}

export function parseSchemaOptions(args: string[]): SchemaOptions {
  const options: SchemaOptions = {};

  for (let i = 0; i < args.length; i++) {
    const common = parseCommonFlag(args, i, options);
    if (common !== undefined) {
      i = common;
      continue;
    }
    if (args[i] === '--print') {
      options.print = true;
      continue;
    }
    throw new Error(`Unknown option "${args[i]}"`);
  }

  return options;
}

export async function runSchema(options: SchemaOptions): Promise<void> {
  if (options.help) {
    printSchemaHelp();
    return;
  }
  if (options.print) {
    for (const statement of SCHEMA_STATEMENTS) {
      console.log(`${buildSchemaQuery(statement)};`);
    }
    return;
  }

  const loaded = await loadCommandConfig(options, true);
  const logger = createConsoleLogger('cadgraph', {
    verbose: options.verbose || loaded.config.logging.verbose,
  });

  const store = openStore(loaded, false, logger);
  try {
    await store.verifyConnectivity();
    await ensureSchema(store, { logger: logger.child('Schema') });
  } finally {
    await store.close();
  }
}
