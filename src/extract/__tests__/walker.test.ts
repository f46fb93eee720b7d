import { describe, it, expect } from 'vitest';
import { IdentityService } from '../../identity/identity-service.js';
import type { HostFeature } from '../../host/types.js';
import { createDefaultDispatcher } from '../dispatch.js';
import { DocumentWalker, orderByTimeline, type WalkEvent } from '../walker.js';
import {
  buildCubeSnapshot,
  buildCubeWithUnlistedEntities,
  buildDetailedCubeSnapshot,
  buildThreeFeatureSnapshot,
  CUBE_ENTITY_COUNT,
  DETAILED_CUBE_ENTITY_COUNT,
} from '../../__tests__/fixtures/cube-snapshot.js';
import { cubeDocument, documentOf } from '../../__tests__/fixtures/helpers.js';
import type { SnapshotDocument } from '../../host/snapshot-document.js';

function walker(): DocumentWalker {
  const identity = new IdentityService();
  return new DocumentWalker({ dispatcher: createDefaultDispatcher(identity), identity });
}

function tokensOf(events: WalkEvent[]): string[] {
  return events.flatMap(event =>
    event.type === 'entity' ? [String(event.result.node.properties.entityToken)] : []
  );
}

function walkAll(document: SnapshotDocument): WalkEvent[] {
  return [...walker().walk(document)];
}

const range = (n: number): number[] => Array.from({ length: n }, (_, i) => i);

describe('DocumentWalker', () => {
  it('visits the design tree top-down, sketches before the features that consume them', () => {
    expect(tokensOf(walkAll(cubeDocument()))).toEqual([
      'comp-root',
      'sk-1',
      ...range(4).map(i => `pt-${i}`),
      ...range(4).map(i => `ln-${i}`),
      'prof-1',
      'ext-1',
      'body-1',
      'f-bottom',
      'f-top',
      ...range(4).map(i => `f-side-${i}`),
      ...range(4).map(i => `e-b${i}`),
      ...range(4).map(i => `e-t${i}`),
      ...range(4).map(i => `e-v${i}`),
      ...range(8).map(i => `v-${i}`),
    ]);
  });

  it('extracts every entity exactly once', () => {
    const tokens = tokensOf(walkAll(cubeDocument()));
    expect(tokens).toHaveLength(CUBE_ENTITY_COUNT);
    expect(new Set(tokens).size).toBe(CUBE_ENTITY_COUNT);
  });

  it('walks features in timeline order with unindexed features last', () => {
    const tokens = tokensOf(walkAll(documentOf(buildThreeFeatureSnapshot())));
    const features = tokens.filter(token => ['ext-1', 'ext-2', 'fillet-1'].includes(token));
    expect(features).toEqual(['ext-1', 'ext-2', 'fillet-1']);
  });

  it('skips entities without a token and carries on', () => {
    const snapshot = buildCubeSnapshot();
    const point = snapshot.entities.find(entity => entity.token === 'pt-3');
    if (!point) throw new Error('fixture');
    point.transient = true;

    const events = walkAll(documentOf(snapshot));
    expect(events.filter(event => event.type === 'skipped')).toEqual([
      {
        type: 'skipped',
        objectType: 'SketchPoint',
        reason: 'No stable token for SketchPoint: host returned no entity token',
      },
    ]);
    expect(tokensOf(events)).toHaveLength(CUBE_ENTITY_COUNT - 1);
  });

  it('walks constraints, construction geometry, lumps, shells and parameters', () => {
    const tokens = tokensOf(walkAll(documentOf(buildDetailedCubeSnapshot())));

    expect(tokens).toHaveLength(DETAILED_CUBE_ENTITY_COUNT);
    expect(new Set(tokens).size).toBe(DETAILED_CUBE_ENTITY_COUNT);
    expect(tokens.slice(10, 15)).toEqual(['dim-1', 'con-par', 'con-coin', 'con-off', 'prof-1']);
    expect(tokens.slice(-8)).toEqual([
      'lump-1',
      'shell-1',
      'fillet-1',
      'pat-1',
      'hole-1',
      'cp-1',
      'par-d1',
      'par-width',
    ]);
  });

  it('extracts entities a container lists outside its typed collections', () => {
    const events = walkAll(documentOf(buildCubeWithUnlistedEntities()));
    const tokens = tokensOf(events);

    expect(tokens).toHaveLength(CUBE_ENTITY_COUNT + 4);
    expect(tokens.slice(9, 13)).toEqual(['ln-3', 'dim-cp', 'prof-1', 'txt-1']);
    expect(tokens[13]).toBe('cp-x');
    expect(tokens[tokens.length - 1]).toBe('jt-1');
    const fallbacks = events.flatMap(event =>
      event.type === 'entity' && !event.result.recognized ? [event.result.node.properties.objectType] : []
    );
    expect(fallbacks).toEqual(['SketchText', 'Joint']);
  });

  it('walks a transient sketch referenced from its own dimension once', () => {
    const snapshot = buildCubeSnapshot();
    const sketch = snapshot.entities.find(entity => entity.token === 'sk-1');
    if (!sketch) throw new Error('fixture');
    sketch.transient = true;
    sketch.refs = { ...sketch.refs, dimensions: ['dim-self'] };
    snapshot.entities.push({
      token: 'dim-self',
      objectType: 'SketchAngularDimension',
      refs: { parentSketch: 'sk-1', measuredEntities: ['sk-1', 'ln-0'] },
    });

    const events = walkAll(documentOf(snapshot));
    expect(events.filter(event => event.type === 'skipped')).toHaveLength(1);
    expect(tokensOf(events)).toHaveLength(CUBE_ENTITY_COUNT);
    expect(tokensOf(events)).toContain('dim-self');
  });

  it('ends with an aborted event when the document closes mid-walk', () => {
    const document = cubeDocument();
    const seen: WalkEvent[] = [];
    for (const event of walker().walk(document)) {
      seen.push(event);
      if (seen.length === 5) document.close();
    }

    expect(seen).toHaveLength(6);
    expect(seen[5]).toEqual({ type: 'aborted', reason: 'Document "Cube" was closed' });
  });
});

describe('orderByTimeline', () => {
  function feature(name: string, timelineIndex: number | undefined): HostFeature {
    return {
      kind: 'feature',
      objectType: 'ExtrudeFeature',
      entityToken: name,
      name,
      timelineIndex,
      parameters: {},
      profiles: [],
      bodies: [],
      startFaces: [],
      endFaces: [],
      sideFaces: [],
      edges: [],
      inputEntities: [],
      otherMembers: [],
    };
  }

  it('sorts by index, keeps host order for ties and puts missing indices last', () => {
    const ordered = orderByTimeline([
      feature('late', undefined),
      feature('b', 2),
      feature('a', 1),
      feature('b2', 2),
      feature('later', undefined),
    ]);
    expect(ordered.map(f => f.name)).toEqual(['a', 'b', 'b2', 'late', 'later']);
  });
});
