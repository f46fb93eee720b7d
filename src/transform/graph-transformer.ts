/**
 * Graph Transformer
 *
 * Runs the derivation passes against the persisted graph after loading.
 * Passes run concurrently and independently: one failing does not stop the
 * other. Within a pass, derived relationships are upserted in bounded
 * batches, one transaction each, committed in order.
 */

import type { GraphStore, RelationshipRow } from '../store/types.js';
import { TransientStoreError, errorMessage } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { withRetry, type RetryPolicy } from '../utils/retry.js';
import { DEFAULT_MAX_BATCH_SIZE } from '../graph/record-builder.js';
import { DEFAULT_TRANSACTION_TIMEOUT_MS } from '../load/batch-loader.js';
import { AdjacencyPass } from './adjacency-pass.js';
import { TimelinePass } from './timeline-pass.js';
import type { DerivationPass, PassResult } from './types.js';

export interface GraphTransformerOptions {
  store: GraphStore;
  /** Derived relationships per write transaction (default: 1000) */
  maxBatchSize?: number;
  retry?: Partial<RetryPolicy>;
  transactionTimeoutMs?: number;
  /** Default: timeline and adjacency */
  passes?: DerivationPass[];
  logger?: Logger;
}

export class GraphTransformer {
  private readonly store: GraphStore;
  private readonly maxBatchSize: number;
  private readonly retry?: Partial<RetryPolicy>;
  private readonly timeoutMs: number;
  private readonly passes: DerivationPass[];
  private readonly logger: Logger;

  constructor(options: GraphTransformerOptions) {
    this.store = options.store;
    this.maxBatchSize = options.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE;
    this.retry = options.retry;
    this.timeoutMs = options.transactionTimeoutMs ?? DEFAULT_TRANSACTION_TIMEOUT_MS;
    this.passes = options.passes ?? [new TimelinePass(), new AdjacencyPass()];
    this.logger = options.logger ?? silentLogger;

    if (!Number.isInteger(this.maxBatchSize) || this.maxBatchSize < 1) {
      throw new Error(`maxBatchSize must be a positive integer, got ${this.maxBatchSize}`);
    }
  }

  /**
   * Run every pass. Never rejects: a pass that throws is reported as failed.
   */
  async transform(): Promise<PassResult[]> {
    const settled = await Promise.allSettled(this.passes.map(pass => this.runPass(pass)));

    return settled.map((outcome, index): PassResult => {
      if (outcome.status === 'fulfilled') return outcome.value;
      const pass = this.passes[index];
      const message = errorMessage(outcome.reason);
      this.logger.error(`Pass ${pass.name} failed: ${message}`);
      return {
        pass: pass.name,
        status: 'failed',
        relationshipsCreated: 0,
        relationshipsMerged: 0,
        batchesCommitted: 0,
        batchesFailed: 0,
        error: message,
      };
    });
  }

  async runPass(pass: DerivationPass): Promise<PassResult> {
    const read = await withRetry(
      () => this.store.executeRead(unit => pass.derive(unit), { timeoutMs: this.timeoutMs }),
      { policy: this.retry, shouldRetry: isTransient }
    );
    if (!read.ok) throw read.error;

    const rows = read.value;
    this.logger.debug(`Pass ${pass.name}: ${rows.length} ${pass.relationshipType} relationships derived`);

    const result: PassResult = {
      pass: pass.name,
      status: 'completed',
      relationshipsCreated: 0,
      relationshipsMerged: 0,
      batchesCommitted: 0,
      batchesFailed: 0,
    };

    for (let start = 0; start < rows.length; start += this.maxBatchSize) {
      const chunk = rows.slice(start, start + this.maxBatchSize);
      const write = await this.writeChunk(pass, chunk);
      if (write.ok) {
        result.relationshipsCreated += write.value.created;
        result.relationshipsMerged += write.value.merged;
        result.batchesCommitted++;
      } else {
        result.batchesFailed++;
        result.error ??= errorMessage(write.error);
        this.logger.error(
          `Pass ${pass.name}: batch at offset ${start} failed after ${write.attempts} attempt(s): ` +
          errorMessage(write.error)
        );
      }
    }

    if (result.batchesFailed > 0) {
      result.status = result.batchesCommitted > 0 ? 'partial' : 'failed';
    }
    this.logger.info(
      `Pass ${pass.name}: ${result.relationshipsCreated} created, ${result.relationshipsMerged} unchanged`
    );
    return result;
  }

  private writeChunk(pass: DerivationPass, rows: RelationshipRow[]) {
    return withRetry(
      () => this.store.executeWrite(unit => unit.mergeRelationships(pass.relationshipType, rows), {
        timeoutMs: this.timeoutMs,
      }),
      {
        policy: this.retry,
        shouldRetry: isTransient,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn(
            `Pass ${pass.name} attempt ${attempt} failed (${errorMessage(error)}), retrying in ${delayMs}ms`
          );
        },
      }
    );
  }
}

function isTransient(error: unknown): boolean {
  return error instanceof TransientStoreError;
}
