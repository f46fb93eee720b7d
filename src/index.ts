/**
 * cadgraph - CAD design graph loader
 *
 * Walks a parametric CAD document, extracts every entity into typed graph
 * records and loads them into Neo4j in retried, idempotent batches.
 */

// Host model
export * from './host/types.js';
export { SnapshotDocument, parseSnapshot, loadSnapshotDocument, SNAPSHOT_VERSION } from './host/snapshot-document.js';
export type { SnapshotEntityRecord, SnapshotJsonValue } from './host/snapshot-handles.js';

// Identity and graph records
export { IdentityService, stableIdForToken } from './identity/identity-service.js';
export * from './graph/types.js';
export { serializeProperties, serializeProperty, fingerprintProperties, type PropertyInput } from './graph/properties.js';
export { GraphRecordBuilder, DEFAULT_MAX_BATCH_SIZE, type RecordBuilderOptions, type RecordBuilderStats } from './graph/record-builder.js';

// Extraction
export {
  BaseExtractor,
  RelationshipCollector,
  labelForObjectType,
  type EntityExtractor,
  type ExtractionContext,
  type PropertyInputMap,
} from './extract/base-extractor.js';
export * from './extract/extractors/index.js';
export { ExtractorDispatcher, createDefaultDispatcher, type DispatchResult } from './extract/dispatch.js';
export { DocumentWalker, orderByTimeline, type WalkEvent, type DocumentWalkerOptions } from './extract/walker.js';

// Loading and transformation
export * from './store/index.js';
export { BatchLoader, DEFAULT_TRANSACTION_TIMEOUT_MS, type LoadResult, type BatchLoaderOptions } from './load/batch-loader.js';
export * from './transform/index.js';
export * from './pipeline/index.js';

// Ambient
export * from './config/index.js';
export * from './errors.js';
export { createConsoleLogger, silentLogger, type Logger, type ConsoleLoggerOptions } from './utils/logger.js';
export {
  withRetry,
  withTimeout,
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  type RetryOutcome,
} from './utils/retry.js';
