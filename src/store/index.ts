export type {
  GraphStore,
  GraphReadUnit,
  GraphWriteUnit,
  MergeCounts,
  NodeRow,
  RelationshipRow,
  RelationshipQuery,
  SchemaStatement,
  StoredNode,
  StoredRelationship,
  TransactionOptions,
} from './types.js';
export { MemoryGraphStore, type MemoryStoreStats } from './memory-store.js';
export {
  Neo4jGraphStore,
  createNeo4jDriver,
  classifyStoreError,
  type Neo4jStoreConfig,
  type Neo4jDriverLike,
} from './neo4j-store.js';
export { ensureSchema, SCHEMA_STATEMENTS } from './schema.js';
