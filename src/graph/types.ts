/**
 * Graph Record Types
 *
 * Flat node and relationship records produced by extraction. Records link
 * to each other by stable ID only, never by holding host handles.
 */

/** Values Neo4j can store as a property */
export type PropertyValue = string | number | boolean | string[] | number[] | boolean[];

export type PropertyMap = Record<string, PropertyValue>;

/** Base label carried by every node; `stableId` is unique on it */
export const BASE_LABEL = 'CadEntity';

export type StructuralRelationshipType =
  | 'CONTAINS'
  | 'BOUNDED_BY'
  | 'REFERENCES'
  | 'CONSUMES'
  | 'PRODUCES'
  | 'PRODUCED_BY'
  | 'SHARES_EDGE'
  | 'CONSTRAINS'
  | 'HAS_PARAMETER'
  | 'DEPENDS_ON'
  | 'DEFINED_BY'
  | 'MODIFIES';

export type DerivedRelationshipType = 'NEXT_IN_TIMELINE' | 'ADJACENT_TO';

export type RelationshipType = StructuralRelationshipType | DerivedRelationshipType;

export const STRUCTURAL_RELATIONSHIP_TYPES: readonly StructuralRelationshipType[] = [
  'CONTAINS',
  'BOUNDED_BY',
  'REFERENCES',
  'CONSUMES',
  'PRODUCES',
  'PRODUCED_BY',
  'SHARES_EDGE',
  'CONSTRAINS',
  'HAS_PARAMETER',
  'DEPENDS_ON',
  'DEFINED_BY',
  'MODIFIES',
];

export const DERIVED_RELATIONSHIP_TYPES: readonly DerivedRelationshipType[] = [
  'NEXT_IN_TIMELINE',
  'ADJACENT_TO',
];

export interface GraphNodeRecord {
  stableId: string;
  /** Entity type name, e.g. 'SketchLine' */
  label: string;
  /** Family labels, e.g. ['SketchCurve', 'SketchEntity'] */
  categoryLabels: string[];
  properties: PropertyMap;
}

export interface GraphRelationshipRecord {
  sourceId: string;
  targetId: string;
  type: RelationshipType;
  properties?: PropertyMap;
}

/** Output of one extractor for one entity */
export interface ExtractionOutput {
  node: GraphNodeRecord;
  relationships: GraphRelationshipRecord[];
}

export interface AffectedEntity {
  stableId: string;
  label: string;
}

/**
 * Size-bounded set of records committed as one transaction.
 */
export interface RecordBatch {
  /** 1-based, in flush order */
  sequence: number;
  nodes: GraphNodeRecord[];
  relationships: GraphRelationshipRecord[];
  /** Entities whose records are in this batch, for failure reports */
  sourceEntities: AffectedEntity[];
}

/**
 * Key that identifies a relationship for upserts: (source, target, type).
 */
export function relationshipKey(rel: Pick<GraphRelationshipRecord, 'sourceId' | 'targetId' | 'type'>): string {
  return `${rel.sourceId}|${rel.type}|${rel.targetId}`;
}

/** All labels a node is written with, primary label first */
export function nodeLabels(node: GraphNodeRecord): string[] {
  return [node.label, ...node.categoryLabels.filter(label => label !== node.label)];
}
