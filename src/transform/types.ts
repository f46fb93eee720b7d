import type { DerivedRelationshipType } from '../graph/types.js';
import type { GraphReadUnit, RelationshipRow } from '../store/types.js';

export type PassName = 'timeline' | 'adjacency';

/**
 * One derivation rule: reads structural relationships from the persisted
 * graph and computes the derived relationships to upsert.
 */
export interface DerivationPass {
  readonly name: PassName;
  readonly relationshipType: DerivedRelationshipType;
  derive(unit: GraphReadUnit): Promise<RelationshipRow[]>;
}

export interface PassResult {
  pass: PassName;
  /** 'partial' when some write batches failed */
  status: 'completed' | 'partial' | 'failed';
  relationshipsCreated: number;
  relationshipsMerged: number;
  batchesCommitted: number;
  batchesFailed: number;
  error?: string;
}
