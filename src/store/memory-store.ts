/**
 * In-process GraphStore
 *
 * Same upsert semantics as the Neo4j store, held in maps. A unit of work
 * records its writes in an overlay over the committed graph; the overlay
 * is applied on success and dropped on failure, so a failed unit leaves
 * nothing behind. Writes are serialized.
 *
 * Used for --dry-run and in tests.
 */

import pLimit from 'p-limit';
import { BASE_LABEL, relationshipKey, type PropertyMap, type RelationshipType } from '../graph/types.js';
import { StoreConnectionError } from '../errors.js';
import { withTimeout } from '../utils/retry.js';
import type {
  GraphReadUnit,
  GraphStore,
  GraphWriteUnit,
  MergeCounts,
  NodeRow,
  RelationshipQuery,
  RelationshipRow,
  SchemaStatement,
  StoredNode,
  StoredRelationship,
  TransactionOptions,
} from './types.js';

interface MemoryNode {
  stableId: string;
  labels: Set<string>;
  properties: PropertyMap;
  /** Created as a relationship endpoint, not yet upserted itself */
  placeholder: boolean;
}

interface GraphState {
  nodes: Map<string, MemoryNode>;
  relationships: Map<string, StoredRelationship>;
}

export interface MemoryStoreStats {
  nodes: number;
  placeholders: number;
  relationships: number;
  relationshipsByType: Record<string, number>;
  commits: number;
  rollbacks: number;
}

export class MemoryGraphStore implements GraphStore {
  private readonly state: GraphState = { nodes: new Map(), relationships: new Map() };
  private readonly writeLock = pLimit(1);
  private readonly schema: SchemaStatement[] = [];
  private closed = false;
  private commits = 0;
  private rollbacks = 0;

  async verifyConnectivity(): Promise<void> {
    if (this.closed) {
      throw new StoreConnectionError('Memory store is closed');
    }
  }

  executeWrite<T>(work: (unit: GraphWriteUnit) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
    return this.writeLock(async () => {
      this.assertOpen();
      const unit = new MemoryUnit(this.state);
      try {
        const result = await withTimeout(work(unit), options.timeoutMs ?? 0, 'Memory transaction');
        unit.commit();
        this.commits++;
        return result;
      } catch (error) {
        this.rollbacks++;
        throw error;
      }
    });
  }

  async executeRead<T>(work: (unit: GraphReadUnit) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
    this.assertOpen();
    return withTimeout(work(new MemoryUnit(this.state)), options.timeoutMs ?? 0, 'Memory read');
  }

  async runSchema(statements: readonly SchemaStatement[]): Promise<void> {
    this.assertOpen();
    for (const statement of statements) {
      if (!this.schema.some(existing => existing.name === statement.name)) {
        this.schema.push(statement);
      }
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  // ============================================
  // Inspection
  // ============================================

  get stats(): MemoryStoreStats {
    const relationshipsByType: Record<string, number> = {};
    for (const rel of this.state.relationships.values()) {
      relationshipsByType[rel.type] = (relationshipsByType[rel.type] ?? 0) + 1;
    }
    let placeholders = 0;
    for (const node of this.state.nodes.values()) {
      if (node.placeholder) placeholders++;
    }
    return {
      nodes: this.state.nodes.size,
      placeholders,
      relationships: this.state.relationships.size,
      relationshipsByType,
      commits: this.commits,
      rollbacks: this.rollbacks,
    };
  }

  getNode(stableId: string): StoredNode | undefined {
    const node = this.state.nodes.get(stableId);
    return node ? toStoredNode(node) : undefined;
  }

  listNodes(label?: string): StoredNode[] {
    return [...this.state.nodes.values()]
      .filter(node => label === undefined || node.labels.has(label))
      .map(toStoredNode);
  }

  listRelationships(type?: RelationshipType): StoredRelationship[] {
    return [...this.state.relationships.values()]
      .filter(rel => type === undefined || rel.type === type)
      .map(rel => ({ ...rel, properties: { ...rel.properties } }));
  }

  get schemaStatements(): readonly SchemaStatement[] {
    return [...this.schema];
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreConnectionError('Memory store is closed');
    }
  }
}

/**
 * Reads see the committed graph with this unit's own writes on top.
 * Nothing reaches the committed graph before `commit`.
 */
class MemoryUnit implements GraphWriteUnit {
  private readonly nodes = new Map<string, MemoryNode>();
  private readonly relationships = new Map<string, StoredRelationship>();

  constructor(private readonly committed: GraphState) {}

  commit(): void {
    for (const [stableId, node] of this.nodes) this.committed.nodes.set(stableId, node);
    for (const [key, rel] of this.relationships) this.committed.relationships.set(key, rel);
  }

  async mergeNodes(labels: readonly string[], rows: readonly NodeRow[]): Promise<MergeCounts> {
    const counts: MergeCounts = { created: 0, merged: 0 };
    for (const row of rows) {
      const node = this.writableNode(row.stableId);
      if (!node || node.placeholder) {
        counts.created++;
      } else {
        counts.merged++;
      }
      const target = node ?? this.addPlaceholder(row.stableId);
      target.placeholder = false;
      for (const label of labels) target.labels.add(label);
      target.properties = { ...row.properties, stableId: row.stableId };
    }
    return counts;
  }

  async mergeRelationships(type: RelationshipType, rows: readonly RelationshipRow[]): Promise<MergeCounts> {
    const counts: MergeCounts = { created: 0, merged: 0 };
    for (const row of rows) {
      if (!this.node(row.sourceId)) this.addPlaceholder(row.sourceId);
      if (!this.node(row.targetId)) this.addPlaceholder(row.targetId);

      const key = relationshipKey({ sourceId: row.sourceId, targetId: row.targetId, type });
      if (this.relationship(key)) {
        counts.merged++;
      } else {
        counts.created++;
      }
      this.relationships.set(key, {
        sourceId: row.sourceId,
        targetId: row.targetId,
        type,
        properties: { ...row.properties },
      });
    }
    return counts;
  }

  async findNodes(label: string): Promise<StoredNode[]> {
    const nodes: StoredNode[] = [];
    for (const node of this.allNodes()) {
      if (node.labels.has(label)) nodes.push(toStoredNode(node));
    }
    return nodes;
  }

  async findRelationships(query: RelationshipQuery): Promise<StoredRelationship[]> {
    const sourceLabel = query.sourceLabel ?? BASE_LABEL;
    const targetLabel = query.targetLabel ?? BASE_LABEL;
    const matches: StoredRelationship[] = [];
    for (const rel of this.allRelationships()) {
      if (rel.type !== query.type) continue;
      if (!this.node(rel.sourceId)?.labels.has(sourceLabel)) continue;
      if (!this.node(rel.targetId)?.labels.has(targetLabel)) continue;
      matches.push({ ...rel, properties: { ...rel.properties } });
    }
    return matches;
  }

  private node(stableId: string): MemoryNode | undefined {
    return this.nodes.get(stableId) ?? this.committed.nodes.get(stableId);
  }

  private relationship(key: string): StoredRelationship | undefined {
    return this.relationships.get(key) ?? this.committed.relationships.get(key);
  }

  /** The overlay's copy of a node, copied from the committed graph on first write */
  private writableNode(stableId: string): MemoryNode | undefined {
    const written = this.nodes.get(stableId);
    if (written) return written;
    const committed = this.committed.nodes.get(stableId);
    if (!committed) return undefined;
    const copy: MemoryNode = {
      ...committed,
      labels: new Set(committed.labels),
      properties: { ...committed.properties },
    };
    this.nodes.set(stableId, copy);
    return copy;
  }

  private *allNodes(): Generator<MemoryNode, void, undefined> {
    for (const [stableId, node] of this.committed.nodes) {
      if (!this.nodes.has(stableId)) yield node;
    }
    yield* this.nodes.values();
  }

  private *allRelationships(): Generator<StoredRelationship, void, undefined> {
    for (const [key, rel] of this.committed.relationships) {
      if (!this.relationships.has(key)) yield rel;
    }
    yield* this.relationships.values();
  }

  private addPlaceholder(stableId: string): MemoryNode {
    const node: MemoryNode = {
      stableId,
      labels: new Set([BASE_LABEL]),
      properties: { stableId },
      placeholder: true,
    };
    this.nodes.set(stableId, node);
    return node;
  }
}

function toStoredNode(node: MemoryNode): StoredNode {
  return {
    stableId: node.stableId,
    labels: [...node.labels],
    properties: { ...node.properties },
  };
}
