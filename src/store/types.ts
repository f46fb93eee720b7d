/**
 * Graph store protocol
 *
 * Loader and transformer talk to the database only through these
 * interfaces. Every write happens inside `executeWrite`: the unit of work
 * either commits as a whole or is rolled back.
 */

import type { PropertyMap, RelationshipType } from '../graph/types.js';

export interface NodeRow {
  stableId: string;
  properties: PropertyMap;
}

export interface RelationshipRow {
  sourceId: string;
  targetId: string;
  properties: PropertyMap;
}

/** Upsert outcome: `created` new, `merged` already present */
export interface MergeCounts {
  created: number;
  merged: number;
}

export interface RelationshipQuery {
  type: RelationshipType;
  /** Label the source node must carry (default: any CadEntity) */
  sourceLabel?: string;
  targetLabel?: string;
}

export interface StoredNode {
  stableId: string;
  labels: string[];
  properties: PropertyMap;
}

export interface StoredRelationship {
  sourceId: string;
  targetId: string;
  type: RelationshipType;
  properties: PropertyMap;
}

export interface GraphReadUnit {
  findNodes(label: string): Promise<StoredNode[]>;
  findRelationships(query: RelationshipQuery): Promise<StoredRelationship[]>;
}

export interface GraphWriteUnit extends GraphReadUnit {
  /**
   * Upsert nodes by stableId, adding `labels` and replacing properties
   * with the row's. A node that only existed as a relationship placeholder
   * counts as created.
   */
  mergeNodes(labels: readonly string[], rows: readonly NodeRow[]): Promise<MergeCounts>;
  /**
   * Upsert relationships by (source, target, type), replacing their
   * properties. Missing endpoints are created as placeholder nodes.
   */
  mergeRelationships(type: RelationshipType, rows: readonly RelationshipRow[]): Promise<MergeCounts>;
}

export interface TransactionOptions {
  /** Per-attempt bound in ms; 0 disables it */
  timeoutMs?: number;
}

export type SchemaStatement =
  | { kind: 'uniqueConstraint'; name: string; label: string; property: string }
  | { kind: 'index'; name: string; label: string; property: string };

export interface GraphStore {
  /** @throws StoreConnectionError */
  verifyConnectivity(): Promise<void>;
  executeWrite<T>(work: (unit: GraphWriteUnit) => Promise<T>, options?: TransactionOptions): Promise<T>;
  executeRead<T>(work: (unit: GraphReadUnit) => Promise<T>, options?: TransactionOptions): Promise<T>;
  /** Idempotent constraint and index creation */
  runSchema(statements: readonly SchemaStatement[]): Promise<void>;
  close(): Promise<void>;
}
