/**
 * Cypher builders for the Neo4j store.
 *
 * Batched upserts use one UNWIND + MERGE query per label set or
 * relationship type. Labels and types cannot be parameters, so they are
 * escaped into the query text.
 *
 * Created-vs-merged counting: MERGE marks new elements with a temporary
 * property that is read before the row's properties replace the stored
 * ones, which drops the marker. Relationship endpoints created on the fly
 * are marked `_placeholder` until their own node upsert arrives, which
 * then counts them as created.
 *
 * Re-upserting replaces properties: a key the latest emission omits is
 * removed. `stableId` is written back after the replace.
 */

import { BASE_LABEL, type RelationshipType } from '../graph/types.js';
import type { RelationshipQuery, SchemaStatement } from './types.js';

export const PLACEHOLDER_PROPERTY = '_placeholder';
const CREATED_PROPERTY = '_created';

/**
 * Backtick-quote a label, type or property name.
 */
export function escapeIdentifier(name: string): string {
  if (name === '') {
    throw new Error('Cannot escape an empty identifier');
  }
  return `\`${name.replace(/`/g, '``')}\``;
}

export function buildMergeNodesQuery(labels: readonly string[]): string {
  const extraLabels = labels.filter(label => label !== BASE_LABEL);
  const setLabels = extraLabels.length > 0
    ? `\nSET n:${extraLabels.map(escapeIdentifier).join(':')}`
    : '';

  return `UNWIND $rows AS row
MERGE (n:${BASE_LABEL} {stableId: row.stableId})
  ON CREATE SET n.${PLACEHOLDER_PROPERTY} = true
WITH n, row, coalesce(n.${PLACEHOLDER_PROPERTY}, false) AS created
SET n = row.properties
SET n.stableId = row.stableId${setLabels}
RETURN sum(CASE WHEN created THEN 1 ELSE 0 END) AS created, count(*) AS total`;
}

export function buildMergeRelationshipsQuery(type: RelationshipType): string {
  return `UNWIND $rows AS row
MERGE (a:${BASE_LABEL} {stableId: row.sourceId})
  ON CREATE SET a.${PLACEHOLDER_PROPERTY} = true
MERGE (b:${BASE_LABEL} {stableId: row.targetId})
  ON CREATE SET b.${PLACEHOLDER_PROPERTY} = true
MERGE (a)-[r:${escapeIdentifier(type)}]->(b)
  ON CREATE SET r.${CREATED_PROPERTY} = true
WITH r, row, coalesce(r.${CREATED_PROPERTY}, false) AS created
SET r = row.properties
RETURN sum(CASE WHEN created THEN 1 ELSE 0 END) AS created, count(*) AS total`;
}

export function buildFindNodesQuery(label: string): string {
  return `MATCH (n:${escapeIdentifier(label)})
RETURN n.stableId AS stableId, labels(n) AS labels, properties(n) AS properties`;
}

export function buildFindRelationshipsQuery(query: RelationshipQuery): string {
  const source = escapeIdentifier(query.sourceLabel ?? BASE_LABEL);
  const target = escapeIdentifier(query.targetLabel ?? BASE_LABEL);
  return `MATCH (a:${source})-[r:${escapeIdentifier(query.type)}]->(b:${target})
RETURN a.stableId AS sourceId, b.stableId AS targetId, properties(r) AS properties`;
}

export function buildSchemaQuery(statement: SchemaStatement): string {
  const name = escapeIdentifier(statement.name);
  const label = escapeIdentifier(statement.label);
  const property = escapeIdentifier(statement.property);

  switch (statement.kind) {
    case 'uniqueConstraint':
      return `CREATE CONSTRAINT ${name} IF NOT EXISTS FOR (n:${label}) REQUIRE n.${property} IS UNIQUE`;
    case 'index':
      return `CREATE INDEX ${name} IF NOT EXISTS FOR (n:${label}) ON (n.${property})`;
  }
}
