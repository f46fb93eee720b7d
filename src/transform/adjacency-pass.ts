/**
 * Adjacency derivation
 *
 * Two profiles (or two faces) are adjacent iff they are BOUNDED_BY a
 * common curve (or edge). One ADJACENT_TO per unordered pair, directed from
 * the lower to the higher stableId, carrying how many boundary elements the
 * pair shares. Faces meeting only at a vertex are not adjacent.
 */

import type { GraphReadUnit, RelationshipRow } from '../store/types.js';
import type { DerivationPass } from './types.js';

/** Node labels whose BOUNDED_BY targets define adjacency */
export const ADJACENCY_OWNER_LABELS = ['Profile', 'BRepFace'] as const;

export class AdjacencyPass implements DerivationPass {
  readonly name = 'adjacency';
  readonly relationshipType = 'ADJACENT_TO';

  constructor(private readonly ownerLabels: readonly string[] = ADJACENCY_OWNER_LABELS) {}

  async derive(unit: GraphReadUnit): Promise<RelationshipRow[]> {
    const rows: RelationshipRow[] = [];

    for (const label of this.ownerLabels) {
      const boundaries = await unit.findRelationships({ type: 'BOUNDED_BY', sourceLabel: label });

      // boundary element -> owners bounded by it
      const owners = new Map<string, Set<string>>();
      for (const rel of boundaries) {
        const set = owners.get(rel.targetId) ?? new Set<string>();
        set.add(rel.sourceId);
        owners.set(rel.targetId, set);
      }

      rows.push(...adjacentPairs(owners));
    }
    return rows;
  }
}

/**
 * Count shared boundary elements for every owner pair.
 */
export function adjacentPairs(owners: Map<string, Set<string>>): RelationshipRow[] {
  const shared = new Map<string, { sourceId: string; targetId: string; count: number }>();

  for (const ownerSet of owners.values()) {
    const sorted = [...ownerSet].sort();
    for (let i = 0; i < sorted.length; i++) {
      for (let j = i + 1; j < sorted.length; j++) {
        const key = `${sorted[i]}|${sorted[j]}`;
        const pair = shared.get(key);
        if (pair) {
          pair.count++;
        } else {
          shared.set(key, { sourceId: sorted[i], targetId: sorted[j], count: 1 });
        }
      }
    }
  }

  return [...shared.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, pair]) => ({
      sourceId: pair.sourceId,
      targetId: pair.targetId,
      properties: { sharedBoundaryCount: pair.count },
    }));
}
