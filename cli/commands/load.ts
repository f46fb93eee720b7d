/**
 * Load command - extract a snapshot into the graph
 *
 * Usage:
 *   cadgraph load design.json
 *   cadgraph load design.json --batch-size 500 --verbose
 *   cadgraph load design.json --dry-run
 */

import { loadSnapshotDocument } from '../../src/host/snapshot-document.js';
import { runPipeline } from '../../src/pipeline/run-pipeline.js';
import { formatRunSummary, type RunStatus } from '../../src/pipeline/summary.js';
import { ensureSchema } from '../../src/store/schema.js';
import { createConsoleLogger } from '../../src/utils/logger.js';
import {
  loadCommandConfig,
  openStore,
  parseCommonFlag,
  parsePositiveInteger,
  takeValue,
  type CommonOptions,
} from './shared.js';

export interface LoadOptions extends CommonOptions {
  snapshot?: string;
  batchSize?: number;
  dryRun?: boolean;
  skipTransform?: boolean;
}

export function printLoadHelp(): void {
  console.log(`
Usage: cadgraph load <snapshot.json> [options]

Extract a CAD snapshot, load it into Neo4j and derive timeline and
adjacency relationships.

Options:
  -c, --config <file>    Config file (default: ./cadgraph.yaml if present)
  --batch-size <n>       Max records per transaction (default: 1000)
  --dry-run              Load into an in-memory graph instead of Neo4j
  --skip-transform       Do not run the derivation passes
  --verbose              Show debug output
  -h, --help             Show this help

Exit codes:
  0  completed    1  failed    2  partial (aborted extraction or failed batches)

Examples:
  cadgraph load ./bracket.json
  cadgraph load ./bracket.json --dry-run --verbose
`);
}

export function parseLoadOptions(args: string[]): LoadOptions {
  const options: LoadOptions = {};

  for (let i = 0; i < args.length; i++) {
    const common = parseCommonFlag(args, i, options);
    if (common !== undefined) {
      i = common;
      continue;
    }

    const arg = args[i];
    switch (arg) {
      case '--batch-size':
        options.batchSize = parsePositiveInteger(takeValue(args, i, arg), arg);
        i++;
        break;
      case '--dry-run':
        options.dryRun = true;
        break;
      case '--skip-transform':
        options.skipTransform = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option "${arg}"`);
        }
        if (options.snapshot) {
          throw new Error(`Unexpected argument "${arg}"`);
        }
        options.snapshot = arg;
    }
  }

  return options;
}

export function exitCodeForStatus(status: RunStatus): number {
  switch (status) {
    case 'completed':
      return 0;
    case 'failed':
      return 1;
    case 'partial':
      return 2;
  }
}

export async function runLoad(options: LoadOptions): Promise<void> {
  if (options.help) {
    printLoadHelp();
    return;
  }
  if (!options.snapshot) {
    throw new Error('load requires a snapshot file (see: cadgraph help load)');
  }

  const loaded = await loadCommandConfig(options, !options.dryRun);
  const { config } = loaded;
  const logger = createConsoleLogger('cadgraph', { verbose: options.verbose || config.logging.verbose });
  if (loaded.source) logger.debug(`Config: ${loaded.source}`);

  const document = await loadSnapshotDocument(options.snapshot);
  logger.info(`Snapshot "${document.name}": ${document.entityCount} entities`);

  const store = openStore(loaded, options.dryRun ?? false, logger);
  try {
    await store.verifyConnectivity();
    await ensureSchema(store, { logger: logger.child('Schema') });

    const summary = await runPipeline({
      document,
      store,
      maxBatchSize: options.batchSize ?? config.pipeline.maxBatchSize,
      maxPendingBatches: config.pipeline.maxPendingBatches,
      transactionTimeoutMs: config.pipeline.transactionTimeoutMs,
      retry: config.retry,
      skipTransform: options.skipTransform || config.pipeline.skipTransform,
      logger: logger.child('Pipeline'),
    });

    console.log(formatRunSummary(summary));
    process.exitCode = exitCodeForStatus(summary.status);
  } finally {
    document.close();
    await store.close();
  }
}
