/**
 * Transform command - re-run the derivation passes on a loaded graph
 */

import { GraphTransformer } from '../../src/transform/graph-transformer.js';
import { createConsoleLogger } from '../../src/utils/logger.js';
import {
  loadCommandConfig,
  openStore,
  parseCommonFlag,
  parsePositiveInteger,
  takeValue,
  type CommonOptions,
} from './shared.js';

export interface TransformOptions extends CommonOptions {
  batchSize?: number;
}

export function printTransformHelp(): void {
  console.log(`
Usage: cadgraph transform [options]

Derive NEXT_IN_TIMELINE and ADJACENT_TO relationships from the graph
already in Neo4j. Safe to re-run: existing relationships are merged.

Options:
  -c, --config <file>    Config file (default: ./cadgraph.yaml if present)
  --batch-size <n>       Max relationships per transaction (default: 1000)
  --verbose              Show debug output
  -h, --help             Show this help
`);
}

export function parseTransformOptions(args: string[]): TransformOptions {
  const options: TransformOptions = {};

  for (let i = 0; i < args.length; i++) {
    const common = parseCommonFlag(args, i, options);
    if (common !== undefined) {
      i = common;
      continue;
    }
    if (args[i] === '--batch-size') {
      options.batchSize = parsePositiveInteger(takeValue(args, i, args[i]), args[i]);
      i++;
      continue;
    }
    throw new Error(`Unknown option "${args[i]}"`);
  }

  return options;
}

export async function runTransform(options: TransformOptions): Promise<void> {
  if (options.help) {
    printTransformHelp();
    return;
  }

  const loaded = await loadCommandConfig(options, true);
  const { config } = loaded;
  const logger = createConsoleLogger('cadgraph', { verbose: options.verbose || config.logging.verbose });

  const store = openStore(loaded, false, logger);
  try {
    await store.verifyConnectivity();
    const transformer = new GraphTransformer({
      store,
      maxBatchSize: options.batchSize ?? config.pipeline.maxBatchSize,
      retry: config.retry,
      transactionTimeoutMs: config.pipeline.transactionTimeoutMs,
      logger: logger.child('Transform'),
    });

    const results = await transformer.transform();
    for (const result of results) {
      console.log(
        `${result.pass}: ${result.status}, ${result.relationshipsCreated} created, ` +
        `${result.relationshipsMerged} merged${result.error ? ` (${result.error})` : ''}`
      );
    }
    if (results.some(result => result.status !== 'completed')) {
      process.exitCode = 2;
    }
  } finally {
    await store.close();
  }
}
