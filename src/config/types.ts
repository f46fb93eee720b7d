/**
 * Pipeline configuration
 */

import type { RetryPolicy } from '../utils/retry.js';
import { DEFAULT_RETRY_POLICY } from '../utils/retry.js';

export interface Neo4jConnectionConfig {
  uri: string;
  username: string;
  password: string;
  database?: string;
  maxConnectionPoolSize: number;
}

export interface PipelineSettings {
  /** Max records (nodes + relationships) per transaction */
  maxBatchSize: number;
  /** Batches queued for loading before extraction waits */
  maxPendingBatches: number;
  /** Per-attempt transaction timeout in ms; 0 disables it */
  transactionTimeoutMs: number;
  skipTransform: boolean;
}

export interface PipelineConfig {
  neo4j: Neo4jConnectionConfig;
  pipeline: PipelineSettings;
  retry: RetryPolicy;
  logging: {
    verbose: boolean;
  };
}

/**
 * Built-in defaults. Connection settings come from the environment
 * (`${VAR}` or `${VAR:-fallback}`).
 */
export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  neo4j: {
    uri: '${NEO4J_URI:-bolt://localhost:7687}',
    username: '${NEO4J_USERNAME:-neo4j}',
    password: '${NEO4J_PASSWORD}',
    database: '${NEO4J_DATABASE:-neo4j}',
    maxConnectionPoolSize: 10,
  },
  pipeline: {
    maxBatchSize: 1000,
    maxPendingBatches: 4,
    transactionTimeoutMs: 30_000,
    skipTransform: false,
  },
  retry: { ...DEFAULT_RETRY_POLICY },
  logging: {
    verbose: false,
  },
};
