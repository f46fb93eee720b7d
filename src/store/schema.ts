/**
 * Schema Management
 *
 * Constraints and indexes the loader and transformer rely on:
 *
 * 1. Uniqueness - stableId on the CadEntity base label (MERGE key)
 * 2. Lookup indexes - timelineIndex for the timeline pass, objectType and
 *    entityToken for ad-hoc queries
 *
 * All statements use IF NOT EXISTS, so running them again is a no-op.
 *
 * Usage:
 *   await ensureSchema(store, { logger });
 */

import { BASE_LABEL } from '../graph/types.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import type { GraphStore, SchemaStatement } from './types.js';

export const SCHEMA_STATEMENTS: readonly SchemaStatement[] = [
  { kind: 'uniqueConstraint', name: 'cad_entity_stable_id', label: BASE_LABEL, property: 'stableId' },
  { kind: 'index', name: 'cad_entity_object_type', label: BASE_LABEL, property: 'objectType' },
  { kind: 'index', name: 'cad_entity_token', label: BASE_LABEL, property: 'entityToken' },
  { kind: 'index', name: 'feature_timeline_index', label: 'Feature', property: 'timelineIndex' },
];

export interface EnsureSchemaOptions {
  logger?: Logger;
  /** Extra statements appended after the built-in ones */
  extraStatements?: readonly SchemaStatement[];
}

export async function ensureSchema(store: GraphStore, options: EnsureSchemaOptions = {}): Promise<number> {
  const logger = options.logger ?? silentLogger;
  const statements = [...SCHEMA_STATEMENTS, ...(options.extraStatements ?? [])];

  await store.runSchema(statements);
  logger.info(`Schema ensured (${statements.length} constraints/indexes)`);
  return statements.length;
}
