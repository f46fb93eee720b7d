/**
 * Timeline sequencing
 *
 * Orders each component's features by `timelineIndex` and links every
 * feature to its successor with NEXT_IN_TIMELINE: N features, N-1 edges,
 * one linear chain per component. Features without an index go last;
 * ties are broken by stableId so the chain is the same on every run.
 */

import type { GraphReadUnit, RelationshipRow, StoredNode } from '../store/types.js';
import type { DerivationPass } from './types.js';

export class TimelinePass implements DerivationPass {
  readonly name = 'timeline';
  readonly relationshipType = 'NEXT_IN_TIMELINE';

  async derive(unit: GraphReadUnit): Promise<RelationshipRow[]> {
    const features = new Map<string, StoredNode>();
    for (const feature of await unit.findNodes('Feature')) {
      features.set(feature.stableId, feature);
    }

    const containment = await unit.findRelationships({
      type: 'CONTAINS',
      sourceLabel: 'Component',
      targetLabel: 'Feature',
    });

    const byComponent = new Map<string, StoredNode[]>();
    for (const rel of containment) {
      const feature = features.get(rel.targetId);
      if (!feature) continue;
      const members = byComponent.get(rel.sourceId) ?? [];
      members.push(feature);
      byComponent.set(rel.sourceId, members);
    }

    const rows: RelationshipRow[] = [];
    for (const componentId of [...byComponent.keys()].sort()) {
      const chain = sortByTimeline(byComponent.get(componentId) ?? []);
      for (let i = 0; i + 1 < chain.length; i++) {
        rows.push({ sourceId: chain[i].stableId, targetId: chain[i + 1].stableId, properties: {} });
      }
    }
    return rows;
  }
}

export function sortByTimeline(features: readonly StoredNode[]): StoredNode[] {
  return [...features].sort((a, b) => {
    const ai = timelineIndexOf(a);
    const bi = timelineIndexOf(b);
    if (ai !== bi) {
      if (ai === undefined) return 1;
      if (bi === undefined) return -1;
      return ai - bi;
    }
    return compareIds(a.stableId, b.stableId);
  });
}

function timelineIndexOf(node: StoredNode): number | undefined {
  const index = node.properties.timelineIndex;
  return typeof index === 'number' ? index : undefined;
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
