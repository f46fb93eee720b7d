/**
 * Batch Loader
 *
 * Writes one RecordBatch as one transaction: nodes upserted by stableId
 * (one UNWIND per label set), then relationships upserted by
 * (source, target, type) (one UNWIND per type).
 *
 * Transient failures are retried with exponential backoff. A batch that
 * still fails is reported, never thrown, so the caller can keep loading.
 */

import { nodeLabels, type AffectedEntity, type RecordBatch, type RelationshipType } from '../graph/types.js';
import { BatchLoadFailedError, TransientStoreError, errorMessage } from '../errors.js';
import type { GraphStore, GraphWriteUnit, NodeRow, RelationshipRow } from '../store/types.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { withRetry, type RetryPolicy } from '../utils/retry.js';

export interface LoadResult {
  sequence: number;
  status: 'committed' | 'failed';
  nodesCreated: number;
  nodesMerged: number;
  relationshipsCreated: number;
  relationshipsMerged: number;
  attempts: number;
  error?: BatchLoadFailedError;
  /** Entities whose records were in the batch (for failure reports) */
  affectedEntities: AffectedEntity[];
}

export interface BatchLoaderOptions {
  store: GraphStore;
  retry?: Partial<RetryPolicy>;
  /** Per-attempt transaction timeout in ms (default: 30000) */
  transactionTimeoutMs?: number;
  logger?: Logger;
}

export const DEFAULT_TRANSACTION_TIMEOUT_MS = 30_000;

interface WriteCounts {
  nodesCreated: number;
  nodesMerged: number;
  relationshipsCreated: number;
  relationshipsMerged: number;
}

interface NodeGroup {
  labels: string[];
  rows: NodeRow[];
}

export class BatchLoader {
  private readonly store: GraphStore;
  private readonly retry?: Partial<RetryPolicy>;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: BatchLoaderOptions) {
    this.store = options.store;
    this.retry = options.retry;
    this.timeoutMs = options.transactionTimeoutMs ?? DEFAULT_TRANSACTION_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  async load(batch: RecordBatch): Promise<LoadResult> {
    const nodeGroups = groupNodes(batch);
    const relationshipGroups = groupRelationships(batch);

    const outcome = await withRetry(
      () => this.store.executeWrite(unit => writeGroups(unit, nodeGroups, relationshipGroups), {
        timeoutMs: this.timeoutMs,
      }),
      {
        policy: this.retry,
        shouldRetry: error => error instanceof TransientStoreError,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn(
            `Batch ${batch.sequence} attempt ${attempt} failed (${errorMessage(error)}), retrying in ${delayMs}ms`
          );
        },
      }
    );

    if (outcome.ok) {
      this.logger.debug(
        `Batch ${batch.sequence} committed: ${outcome.value.nodesCreated} nodes created, ` +
        `${outcome.value.nodesMerged} merged, ${outcome.value.relationshipsCreated} relationships created`
      );
      return {
        sequence: batch.sequence,
        status: 'committed',
        ...outcome.value,
        attempts: outcome.attempts,
        affectedEntities: batch.sourceEntities,
      };
    }

    const error = new BatchLoadFailedError(batch.sequence, outcome.attempts, { cause: outcome.error });
    this.logger.error(`${error.message} (${batch.sourceEntities.length} entities affected)`);
    return {
      sequence: batch.sequence,
      status: 'failed',
      nodesCreated: 0,
      nodesMerged: 0,
      relationshipsCreated: 0,
      relationshipsMerged: 0,
      attempts: outcome.attempts,
      error,
      affectedEntities: batch.sourceEntities,
    };
  }
}

async function writeGroups(
  unit: GraphWriteUnit,
  nodeGroups: NodeGroup[],
  relationshipGroups: Map<RelationshipType, RelationshipRow[]>
): Promise<WriteCounts> {
  const counts: WriteCounts = {
    nodesCreated: 0,
    nodesMerged: 0,
    relationshipsCreated: 0,
    relationshipsMerged: 0,
  };

  for (const group of nodeGroups) {
    const { created, merged } = await unit.mergeNodes(group.labels, group.rows);
    counts.nodesCreated += created;
    counts.nodesMerged += merged;
  }
  for (const [type, rows] of relationshipGroups) {
    const { created, merged } = await unit.mergeRelationships(type, rows);
    counts.relationshipsCreated += created;
    counts.relationshipsMerged += merged;
  }
  return counts;
}

function groupNodes(batch: RecordBatch): NodeGroup[] {
  const groups = new Map<string, NodeGroup>();
  for (const node of batch.nodes) {
    const labels = nodeLabels(node);
    const key = labels.join(':');
    let group = groups.get(key);
    if (!group) {
      group = { labels, rows: [] };
      groups.set(key, group);
    }
    group.rows.push({ stableId: node.stableId, properties: node.properties });
  }
  return [...groups.values()];
}

function groupRelationships(batch: RecordBatch): Map<RelationshipType, RelationshipRow[]> {
  const groups = new Map<RelationshipType, RelationshipRow[]>();
  for (const rel of batch.relationships) {
    const rows = groups.get(rel.type) ?? [];
    rows.push({ sourceId: rel.sourceId, targetId: rel.targetId, properties: rel.properties ?? {} });
    groups.set(rel.type, rows);
  }
  return groups;
}
