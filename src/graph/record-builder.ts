/**
 * Graph Record Builder
 *
 * Accumulates extractor output into size-bounded batches:
 * - nodes deduplicated by stableId (last write wins on properties)
 * - relationships deduplicated by (source, target, type)
 * - a relationship already flushed earlier in the run is dropped
 * - a node already flushed is re-emitted only when its properties changed
 *
 * When a batch reaches `maxBatchSize` records it is handed to `onBatch`.
 */

import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { fingerprintProperties } from './properties.js';
import {
  relationshipKey,
  nodeLabels,
  type AffectedEntity,
  type ExtractionOutput,
  type GraphNodeRecord,
  type GraphRelationshipRecord,
  type RecordBatch,
} from './types.js';

export interface RecordBuilderOptions {
  /** Max records (nodes + relationships) per batch (default: 1000) */
  maxBatchSize?: number;
  /** Called with every batch flushed because it reached the bound */
  onBatch?: (batch: RecordBatch) => void;
  logger?: Logger;
}

export interface RecordBuilderStats {
  nodesAdded: number;
  relationshipsAdded: number;
  duplicateNodes: number;
  duplicateRelationships: number;
  /** Same stableId emitted with differing properties */
  conflictingNodes: number;
  batchesFlushed: number;
}

export const DEFAULT_MAX_BATCH_SIZE = 1000;

export class GraphRecordBuilder {
  private readonly maxBatchSize: number;
  private readonly onBatch?: (batch: RecordBatch) => void;
  private readonly logger: Logger;

  private pendingNodes = new Map<string, GraphNodeRecord>();
  private pendingRelationships = new Map<string, GraphRelationshipRecord>();

  /** stableId -> fingerprint of the version last flushed */
  private flushedNodes = new Map<string, string>();
  private flushedRelationships = new Set<string>();
  /** stableId -> primary label, for failure reports on relationship-only batches */
  private labels = new Map<string, string>();

  private sequence = 0;
  private counters: RecordBuilderStats = {
    nodesAdded: 0,
    relationshipsAdded: 0,
    duplicateNodes: 0,
    duplicateRelationships: 0,
    conflictingNodes: 0,
    batchesFlushed: 0,
  };

  constructor(options: RecordBuilderOptions = {}) {
    const maxBatchSize = options.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE;
    if (!Number.isInteger(maxBatchSize) || maxBatchSize < 1) {
      throw new Error(`maxBatchSize must be a positive integer, got ${maxBatchSize}`);
    }
    this.maxBatchSize = maxBatchSize;
    this.onBatch = options.onBatch;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Add one extractor output (its node first, then its relationships).
   */
  add(output: ExtractionOutput): void {
    this.addNode(output.node);
    for (const relationship of output.relationships) {
      this.addRelationship(relationship);
    }
  }

  addNode(node: GraphNodeRecord): void {
    const fingerprint = nodeFingerprint(node);
    this.labels.set(node.stableId, node.label);

    const pending = this.pendingNodes.get(node.stableId);
    if (pending) {
      this.counters.duplicateNodes++;
      if (nodeFingerprint(pending) !== fingerprint) {
        this.recordConflict(node);
        this.pendingNodes.set(node.stableId, node);
      }
      return;
    }

    const flushed = this.flushedNodes.get(node.stableId);
    if (flushed !== undefined) {
      this.counters.duplicateNodes++;
      if (flushed === fingerprint) return;
      this.recordConflict(node);
    }

    this.pendingNodes.set(node.stableId, node);
    this.counters.nodesAdded++;
    this.flushIfFull();
  }

  addRelationship(relationship: GraphRelationshipRecord): void {
    const key = relationshipKey(relationship);

    if (this.flushedRelationships.has(key)) {
      this.counters.duplicateRelationships++;
      return;
    }

    const pending = this.pendingRelationships.get(key);
    if (pending) {
      this.counters.duplicateRelationships++;
      this.pendingRelationships.set(key, {
        ...pending,
        properties: { ...pending.properties, ...relationship.properties },
      });
      return;
    }

    this.pendingRelationships.set(key, relationship);
    this.counters.relationshipsAdded++;
    this.flushIfFull();
  }

  /** Records waiting for the next flush */
  get size(): number {
    return this.pendingNodes.size + this.pendingRelationships.size;
  }

  get stats(): RecordBuilderStats {
    return { ...this.counters };
  }

  hasNode(stableId: string): boolean {
    return this.pendingNodes.has(stableId) || this.flushedNodes.has(stableId);
  }

  /**
   * Close the current batch. Returns null if nothing is pending.
   * Does not call `onBatch`.
   */
  flush(): RecordBatch | null {
    if (this.size === 0) return null;

    const nodes = [...this.pendingNodes.values()];
    const relationships = [...this.pendingRelationships.values()];

    for (const node of nodes) {
      this.flushedNodes.set(node.stableId, nodeFingerprint(node));
    }
    for (const key of this.pendingRelationships.keys()) {
      this.flushedRelationships.add(key);
    }

    this.pendingNodes = new Map();
    this.pendingRelationships = new Map();
    this.sequence++;
    this.counters.batchesFlushed++;

    const batch: RecordBatch = {
      sequence: this.sequence,
      nodes,
      relationships,
      sourceEntities: this.collectSourceEntities(nodes, relationships),
    };

    this.logger.debug(
      `Batch ${batch.sequence}: ${nodes.length} nodes, ${relationships.length} relationships`
    );
    return batch;
  }

  private flushIfFull(): void {
    if (this.size < this.maxBatchSize) return;
    const batch = this.flush();
    if (batch && this.onBatch) {
      this.onBatch(batch);
    }
  }

  private recordConflict(node: GraphNodeRecord): void {
    this.counters.conflictingNodes++;
    this.logger.warn(
      `${node.label} ${node.stableId} emitted twice with different properties; keeping the latest`
    );
  }

  private collectSourceEntities(
    nodes: GraphNodeRecord[],
    relationships: GraphRelationshipRecord[]
  ): AffectedEntity[] {
    const entities = new Map<string, AffectedEntity>();
    for (const node of nodes) {
      entities.set(node.stableId, { stableId: node.stableId, label: node.label });
    }
    for (const rel of relationships) {
      if (!entities.has(rel.sourceId)) {
        entities.set(rel.sourceId, {
          stableId: rel.sourceId,
          label: this.labels.get(rel.sourceId) ?? 'unknown',
        });
      }
    }
    return [...entities.values()];
  }
}

function nodeFingerprint(node: GraphNodeRecord): string {
  return `${nodeLabels(node).join(':')}|${fingerprintProperties(node.properties)}`;
}
