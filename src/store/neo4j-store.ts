/**
 * Neo4j Graph Store
 *
 * GraphStore over neo4j-driver. One session and one explicit transaction
 * per unit of work; the transaction timeout is passed to the server and
 * also enforced client-side.
 */

import neo4j from 'neo4j-driver';
import type { RelationshipType, PropertyMap, PropertyValue } from '../graph/types.js';
import { CadGraphError, StoreConnectionError, TransientStoreError, errorMessage } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/retry.js';
import {
  buildFindNodesQuery,
  buildFindRelationshipsQuery,
  buildMergeNodesQuery,
  buildMergeRelationshipsQuery,
  buildSchemaQuery,
} from './cypher.js';
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

// ============================================
// Driver surface
// ============================================

/** The parts of neo4j-driver's Driver this store uses */
export interface Neo4jDriverLike {
  session(config: { database?: string; defaultAccessMode?: 'READ' | 'WRITE' }): Neo4jSessionLike;
  verifyConnectivity(): Promise<unknown>;
  close(): Promise<void>;
}

export interface Neo4jSessionLike {
  beginTransaction(config?: { timeout?: number }): Neo4jTransactionLike;
  run(query: string, parameters?: Record<string, unknown>): PromiseLike<{ records: Neo4jRecordLike[] }>;
  close(): Promise<void>;
}

export interface Neo4jTransactionLike {
  run(query: string, parameters?: Record<string, unknown>): PromiseLike<{ records: Neo4jRecordLike[] }>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  isOpen(): boolean;
}

export interface Neo4jRecordLike {
  get(key: string): unknown;
}

export interface Neo4jStoreConfig {
  uri: string;
  username: string;
  password: string;
  /** Default: the server's default database */
  database?: string;
  maxConnectionPoolSize?: number;
}

const TRANSIENT_CODES = ['ServiceUnavailable', 'SessionExpired', 'ECONNRESET', 'EPIPE', 'ETIMEDOUT'];

export function createNeo4jDriver(config: Neo4jStoreConfig): Neo4jDriverLike {
  return neo4j.driver(config.uri, neo4j.auth.basic(config.username, config.password), {
    maxConnectionPoolSize: config.maxConnectionPoolSize ?? 10,
  });
}

// ============================================
// Store
// ============================================

export class Neo4jGraphStore implements GraphStore {
  private readonly logger: Logger;

  constructor(
    private readonly driver: Neo4jDriverLike,
    private readonly options: { database?: string; uri?: string; logger?: Logger } = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  static fromConfig(config: Neo4jStoreConfig, logger?: Logger): Neo4jGraphStore {
    return new Neo4jGraphStore(createNeo4jDriver(config), {
      database: config.database,
      uri: config.uri,
      logger,
    });
  }

  async verifyConnectivity(): Promise<void> {
    try {
      await this.driver.verifyConnectivity();
    } catch (error) {
      const where = this.options.uri ? ` at ${this.options.uri}` : '';
      throw new StoreConnectionError(`Cannot reach Neo4j${where}: ${errorMessage(error)}`, { cause: error });
    }
  }

  executeWrite<T>(work: (unit: GraphWriteUnit) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
    return this.inTransaction('WRITE', work, options);
  }

  executeRead<T>(work: (unit: GraphReadUnit) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
    return this.inTransaction('READ', work, options);
  }

  /**
   * Schema commands run as auto-commit queries, one per statement.
   */
  async runSchema(statements: readonly SchemaStatement[]): Promise<void> {
    const session = this.driver.session({ database: this.options.database, defaultAccessMode: 'WRITE' });
    try {
      for (const statement of statements) {
        const query = buildSchemaQuery(statement);
        this.logger.debug(query);
        await session.run(query);
      }
    } catch (error) {
      throw classifyStoreError(error);
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    await this.driver.close();
  }

  private async inTransaction<T>(
    mode: 'READ' | 'WRITE',
    work: (unit: Neo4jWriteUnit) => Promise<T>,
    options: TransactionOptions
  ): Promise<T> {
    const timeoutMs = options.timeoutMs ?? 0;
    const session = this.driver.session({ database: this.options.database, defaultAccessMode: mode });
    const tx = session.beginTransaction(timeoutMs > 0 ? { timeout: timeoutMs } : undefined);

    try {
      const result = await withTimeout(
        (async () => {
          const value = await work(new Neo4jWriteUnit(tx));
          await tx.commit();
          return value;
        })(),
        timeoutMs,
        'Neo4j transaction'
      );
      return result;
    } catch (error) {
      await this.rollback(tx);
      throw classifyStoreError(error);
    } finally {
      await session.close();
    }
  }

  private async rollback(tx: Neo4jTransactionLike): Promise<void> {
    if (!tx.isOpen()) return;
    try {
      await tx.rollback();
    } catch (rollbackError) {
      this.logger.warn(`Rollback failed: ${errorMessage(rollbackError)}`);
    }
  }
}

class Neo4jWriteUnit implements GraphWriteUnit {
  constructor(private readonly tx: Neo4jTransactionLike) {}

  async mergeNodes(labels: readonly string[], rows: readonly NodeRow[]): Promise<MergeCounts> {
    if (rows.length === 0) return { created: 0, merged: 0 };
    const result = await this.tx.run(buildMergeNodesQuery(labels), { rows });
    return mergeCounts(result.records[0]);
  }

  async mergeRelationships(type: RelationshipType, rows: readonly RelationshipRow[]): Promise<MergeCounts> {
    if (rows.length === 0) return { created: 0, merged: 0 };
    const result = await this.tx.run(buildMergeRelationshipsQuery(type), { rows });
    return mergeCounts(result.records[0]);
  }

  async findNodes(label: string): Promise<StoredNode[]> {
    const result = await this.tx.run(buildFindNodesQuery(label));
    return result.records.map(record => ({
      stableId: String(record.get('stableId')),
      labels: toStringArray(record.get('labels')),
      properties: toPropertyMap(record.get('properties')),
    }));
  }

  async findRelationships(query: RelationshipQuery): Promise<StoredRelationship[]> {
    const result = await this.tx.run(buildFindRelationshipsQuery(query));
    return result.records.map(record => ({
      sourceId: String(record.get('sourceId')),
      targetId: String(record.get('targetId')),
      type: query.type,
      properties: toPropertyMap(record.get('properties')),
    }));
  }
}

// ============================================
// Value conversion
// ============================================

/**
 * Neo4j integers come back as Integer objects; everything we write is a
 * JS number, so convert back.
 */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (neo4j.isInt(value)) return value.toNumber();
  return 0;
}

function mergeCounts(record: Neo4jRecordLike | undefined): MergeCounts {
  if (!record) return { created: 0, merged: 0 };
  const created = toNumber(record.get('created'));
  const total = toNumber(record.get('total'));
  return { created, merged: total - created };
}

function toStringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.map(item => String(item)) : [];
}

export function toPropertyMap(value: unknown): PropertyMap {
  const properties: PropertyMap = {};
  if (typeof value !== 'object' || value === null) return properties;

  for (const [key, raw] of Object.entries(value)) {
    const converted = toPropertyValue(raw);
    if (converted !== undefined) properties[key] = converted;
  }
  return properties;
}

function toPropertyValue(value: unknown): PropertyValue | undefined {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (neo4j.isInt(value)) return value.toNumber();
  if (!Array.isArray(value)) return undefined;

  const items = value.map(item => (neo4j.isInt(item) ? item.toNumber() : item));
  if (items.every((item): item is number => typeof item === 'number')) return items;
  if (items.every((item): item is string => typeof item === 'string')) return items;
  if (items.every((item): item is boolean => typeof item === 'boolean')) return items;
  return undefined;
}

/**
 * Map driver errors that are worth retrying onto TransientStoreError.
 */
export function classifyStoreError(error: unknown): unknown {
  if (error instanceof CadGraphError) return error;
  const code = errorCode(error);
  if (code !== undefined && (code.startsWith('Neo.TransientError') || TRANSIENT_CODES.includes(code))) {
    return new TransientStoreError(`Neo4j ${code}: ${errorMessage(error)}`, { cause: error });
  }
  return error;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}
