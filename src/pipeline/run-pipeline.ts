/**
 * Pipeline
 *
 * host document -> walker -> dispatch -> record builder -> batch loader
 *   -> graph transformer
 *
 * Extraction runs synchronously; every batch the builder flushes is queued
 * on a single-slot p-limit queue, so commits are serialized per run while
 * extraction continues. Between flushes the pipeline yields to the event
 * loop and waits whenever more than `maxPendingBatches` batches are queued.
 */

import pLimit from 'p-limit';
import type { HostDocument } from '../host/types.js';
import { IdentityService } from '../identity/identity-service.js';
import { createDefaultDispatcher, type ExtractorDispatcher } from '../extract/dispatch.js';
import { DocumentWalker } from '../extract/walker.js';
import { GraphRecordBuilder } from '../graph/record-builder.js';
import type { RecordBatch } from '../graph/types.js';
import { BatchLoader, type LoadResult } from '../load/batch-loader.js';
import { GraphTransformer } from '../transform/graph-transformer.js';
import type { PassResult } from '../transform/types.js';
import type { GraphStore } from '../store/types.js';
import { StoreConnectionError, errorMessage } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { yieldToEventLoop, type RetryPolicy } from '../utils/retry.js';
import { summarizeRun, type ExtractionTally, type RunSummary } from './summary.js';

export interface PipelineOptions {
  document: HostDocument;
  store: GraphStore;
  /** Max records per batch (default: 1000) */
  maxBatchSize?: number;
  /** Queued batches before extraction waits (default: 4) */
  maxPendingBatches?: number;
  /** Per-attempt transaction timeout in ms (default: 30000) */
  transactionTimeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  /** Skip the derivation passes */
  skipTransform?: boolean;
  /** Custom dispatcher; defaults to every built-in extractor */
  dispatcher?: ExtractorDispatcher;
  identity?: IdentityService;
  logger?: Logger;
}

export const DEFAULT_MAX_PENDING_BATCHES = 4;

/**
 * Extract, load and transform one document.
 *
 * @throws StoreConnectionError if the store is unreachable at start; every
 * other failure is reported in the summary
 */
export async function runPipeline(options: PipelineOptions): Promise<RunSummary> {
  const startTime = Date.now();
  const logger = options.logger ?? silentLogger;
  const { document, store } = options;
  const maxPendingBatches = options.maxPendingBatches ?? DEFAULT_MAX_PENDING_BATCHES;

  if (!Number.isInteger(maxPendingBatches) || maxPendingBatches < 1) {
    throw new Error(`maxPendingBatches must be a positive integer, got ${maxPendingBatches}`);
  }

  try {
    await store.verifyConnectivity();
  } catch (error) {
    if (error instanceof StoreConnectionError) throw error;
    throw new StoreConnectionError(`Graph store unreachable: ${errorMessage(error)}`, { cause: error });
  }

  const identity = options.identity ?? new IdentityService();
  const dispatcher = options.dispatcher ?? createDefaultDispatcher(identity, logger.child('Extract'));
  const walker = new DocumentWalker({ dispatcher, identity, logger: logger.child('Walker') });
  const loader = new BatchLoader({
    store,
    retry: options.retry,
    transactionTimeoutMs: options.transactionTimeoutMs,
    logger: logger.child('Loader'),
  });

  const queue = pLimit(1);
  const pending: Promise<LoadResult>[] = [];
  const enqueue = (batch: RecordBatch): void => {
    pending.push(queue(() => loader.load(batch)));
  };

  const builder = new GraphRecordBuilder({
    maxBatchSize: options.maxBatchSize,
    onBatch: enqueue,
    logger: logger.child('Builder'),
  });

  const tally: ExtractionTally = {
    documentName: document.name,
    aborted: false,
    entitiesExtracted: 0,
    skippedEntities: [],
    unrecognizedTypes: {},
    conflictingNodes: 0,
  };

  logger.info(`Extracting "${document.name}"`);

  let batchesSeen = 0;
  for (const event of walker.walk(document)) {
    switch (event.type) {
      case 'entity': {
        const { result } = event;
        builder.add(result);
        tally.entitiesExtracted++;
        if (!result.recognized) {
          const objectType = String(result.node.properties.objectType ?? result.node.label);
          tally.unrecognizedTypes[objectType] = (tally.unrecognizedTypes[objectType] ?? 0) + 1;
        }
        break;
      }
      case 'skipped':
        tally.skippedEntities.push({ objectType: event.objectType, reason: event.reason });
        break;
      case 'aborted':
        tally.aborted = true;
        tally.abortReason = event.reason;
        break;
    }

    if (pending.length > batchesSeen) {
      batchesSeen = pending.length;
      await yieldToEventLoop();
      const waitFor = pending[pending.length - 1 - maxPendingBatches];
      if (waitFor) await waitFor;
    }
  }

  const last = builder.flush();
  if (last) enqueue(last);

  const loads = await Promise.all(pending);
  tally.conflictingNodes = builder.stats.conflictingNodes;

  const committed = loads.filter(load => load.status === 'committed').length;
  logger.info(
    `Loaded ${committed}/${loads.length} batches from ${tally.entitiesExtracted} entities` +
    (tally.aborted ? ' (extraction aborted)' : '')
  );

  let transform: PassResult[] | undefined;
  if (!options.skipTransform) {
    const transformer = new GraphTransformer({
      store,
      maxBatchSize: options.maxBatchSize,
      retry: options.retry,
      transactionTimeoutMs: options.transactionTimeoutMs,
      logger: logger.child('Transform'),
    });
    transform = await transformer.transform();
  }

  return summarizeRun(tally, loads, transform, Date.now() - startTime);
}
