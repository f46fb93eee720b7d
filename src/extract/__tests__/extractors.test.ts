import { describe, it, expect } from 'vitest';
import { IdentityService, stableIdForToken } from '../../identity/identity-service.js';
import type { ExtractionContext } from '../base-extractor.js';
import { labelForObjectType } from '../base-extractor.js';
import {
  BRepEdgeExtractor,
  BRepLumpExtractor,
  BRepShellExtractor,
  BRepVertexExtractor,
  ComponentExtractor,
  ConstructionGeometryExtractor,
  EdgeTreatmentFeatureExtractor,
  ExtrudeFeatureExtractor,
  FeatureExtractor,
  GenericSketchCurveExtractor,
  HoleFeatureExtractor,
  ParameterExtractor,
  PatternFeatureExtractor,
  ProfileExtractor,
  RevolveFeatureExtractor,
  SketchArcExtractor,
  SketchCircleExtractor,
  SketchConstraintExtractor,
  SketchDimensionExtractor,
  SketchExtractor,
  SketchLineExtractor,
  SketchPointExtractor,
  constraintKindFromObjectType,
  dimensionKindFromObjectType,
  featureKindFromObjectType,
} from '../extractors/index.js';
import {
  buildDetailedCubeSnapshot,
  CUBE_FACE_TOKENS,
  type FixtureSnapshot,
} from '../../__tests__/fixtures/cube-snapshot.js';
import type { SnapshotDocument } from '../../host/snapshot-document.js';
import { cubeDocument, documentOf, extractWith, requireEntity } from '../../__tests__/fixtures/helpers.js';

const id = stableIdForToken;

function detailedCube(): SnapshotDocument {
  return documentOf(buildDetailedCubeSnapshot());
}

function context(): ExtractionContext {
  return { identity: new IdentityService() };
}

/**
 * One sketch holding an arc, a circle, a spline, a dimension and a
 * projected point, plus two revolves.
 */
function sketchZoo(): FixtureSnapshot {
  return {
    version: 1,
    name: 'Zoo',
    rootComponent: 'root',
    entities: [
      {
        token: 'root',
        objectType: 'Component',
        properties: { isRoot: true },
        refs: { sketches: ['sk'], features: ['rev-full', 'rev-half'] },
      },
      { token: 'sk', objectType: 'Sketch', refs: { parentComponent: 'root' } },
      { token: 'c', objectType: 'SketchPoint', properties: { geometry: [0, 0, 0] }, refs: { parentSketch: 'sk' } },
      { token: 'p1', objectType: 'SketchPoint', properties: { geometry: [5, 0, 0] }, refs: { parentSketch: 'sk' } },
      { token: 'p2', objectType: 'SketchPoint', properties: { geometry: [0, 5, 0] }, refs: { parentSketch: 'sk' } },
      { token: 'edge-src', objectType: 'BRepEdge' },
      {
        token: 'proj',
        objectType: 'SketchPoint',
        properties: { geometry: [1, 1, 0], isReference: true, isFixed: true },
        refs: { parentSketch: 'sk', referencedEntity: 'edge-src' },
      },
      {
        token: 'arc',
        objectType: 'adsk::fusion::SketchArc',
        properties: { radius: 5, startAngle: 0, endAngle: Math.PI / 2 },
        refs: { parentSketch: 'sk', centerPoint: 'c', startPoint: 'p1', endPoint: 'p2' },
      },
      {
        token: 'circle',
        objectType: 'SketchCircle',
        properties: { radius: 2 },
        refs: { parentSketch: 'sk', centerPoint: 'c' },
      },
      {
        token: 'spline',
        objectType: 'SketchFittedSpline',
        properties: { isClosed: false },
        refs: { parentSketch: 'sk', definingPoints: ['p1', 'c', 'p2'] },
      },
      {
        token: 'dim',
        objectType: 'SketchRadialDimension',
        properties: { value: 2, parameterName: 'd1', expression: '2 mm', isDriving: true },
        refs: { parentSketch: 'sk', measuredEntities: ['circle'] },
      },
      {
        token: 'rev-full',
        objectType: 'RevolveFeature',
        properties: { timelineIndex: 1, parameters: { angle: 2 * Math.PI } },
        refs: { parentComponent: 'root' },
      },
      {
        token: 'rev-half',
        objectType: 'RevolveFeature',
        properties: { timelineIndex: 2, parameters: { angle: Math.PI, isFullRevolve: true } },
        refs: { parentComponent: 'root' },
      },
    ],
  };
}

describe('sketch extractors', () => {
  it('extracts a line with its endpoints', () => {
    const output = extractWith(new SketchLineExtractor(context()), requireEntity(cubeDocument(), 'ln-0'));

    expect(output.node).toEqual({
      stableId: id('ln-0'),
      label: 'SketchLine',
      categoryLabels: ['SketchCurve', 'SketchEntity'],
      properties: {
        stableId: id('ln-0'),
        entityToken: 'ln-0',
        objectType: 'SketchLine',
        start: [0, 0, 0],
        end: [10, 0, 0],
        isConstruction: false,
        length: 10,
      },
    });
    expect(output.relationships).toEqual([
      { sourceId: id('sk-1'), targetId: id('ln-0'), type: 'CONTAINS' },
      { sourceId: id('ln-0'), targetId: id('pt-0'), type: 'BOUNDED_BY', properties: { role: 'start' } },
      { sourceId: id('ln-0'), targetId: id('pt-1'), type: 'BOUNDED_BY', properties: { role: 'end' } },
    ]);
  });

  it('extracts sketch properties and counts', () => {
    const output = extractWith(new SketchExtractor(context()), requireEntity(cubeDocument(), 'sk-1'));

    expect(output.node.label).toBe('Sketch');
    expect(output.node.properties).toMatchObject({
      name: 'Base',
      timelineIndex: 0,
      isVisible: true,
      origin: [0, 0, 0],
      pointCount: 4,
      curveCount: 4,
      dimensionCount: 0,
      profileCount: 1,
    });
    expect(output.relationships).toEqual([{ sourceId: id('comp-root'), targetId: id('sk-1'), type: 'CONTAINS' }]);
  });

  it('keeps profile boundary order as sequenceIndex', () => {
    const output = extractWith(new ProfileExtractor(context()), requireEntity(cubeDocument(), 'prof-1'));

    expect(output.node.properties).toMatchObject({ area: 100, perimeter: 40, loopCount: 1, curveCount: 4 });
    expect(output.relationships.filter(rel => rel.type === 'BOUNDED_BY')).toEqual(
      [0, 1, 2, 3].map(i => ({
        sourceId: id('prof-1'),
        targetId: id(`ln-${i}`),
        type: 'BOUNDED_BY',
        properties: { sequenceIndex: i },
      }))
    );
  });

  it('records a projected point as a reference', () => {
    const output = extractWith(new SketchPointExtractor(context()), requireEntity(documentOf(sketchZoo()), 'proj'));

    expect(output.node.categoryLabels).toEqual(['SketchEntity']);
    expect(output.node.properties).toMatchObject({ x: 1, y: 1, z: 0, isReference: true, isFixed: true });
    expect(output.relationships).toContainEqual({
      sourceId: id('proj'),
      targetId: id('edge-src'),
      type: 'REFERENCES',
      properties: { role: 'projection' },
    });
  });

  it('extracts arc geometry and its center reference', () => {
    const output = extractWith(new SketchArcExtractor(context()), requireEntity(documentOf(sketchZoo()), 'arc'));

    expect(output.node.label).toBe('SketchArc');
    expect(output.node.properties).toMatchObject({
      objectType: 'adsk::fusion::SketchArc',
      radius: 5,
      startAngle: 0,
      endAngle: Math.PI / 2,
      center: [0, 0, 0],
    });
    expect(output.relationships.slice(1)).toEqual([
      { sourceId: id('arc'), targetId: id('p1'), type: 'BOUNDED_BY', properties: { role: 'start' } },
      { sourceId: id('arc'), targetId: id('p2'), type: 'BOUNDED_BY', properties: { role: 'end' } },
      { sourceId: id('arc'), targetId: id('c'), type: 'REFERENCES', properties: { role: 'center' } },
    ]);
  });

  it('derives circumference and area of a circle', () => {
    const output = extractWith(new SketchCircleExtractor(context()), requireEntity(documentOf(sketchZoo()), 'circle'));

    expect(output.node.properties.circumference).toBeCloseTo(4 * Math.PI);
    expect(output.node.properties.area).toBeCloseTo(4 * Math.PI);
  });

  it('names a generic curve by its class and references defining points', () => {
    const output = extractWith(new GenericSketchCurveExtractor(context()), requireEntity(documentOf(sketchZoo()), 'spline'));

    expect(output.node.properties).toMatchObject({ curveKind: 'FittedSpline', isClosed: false, definingPointCount: 3 });
    expect(output.relationships.filter(rel => rel.type === 'REFERENCES').map(rel => rel.properties)).toEqual([
      { role: 'definingPoint', sequenceIndex: 0 },
      { role: 'definingPoint', sequenceIndex: 1 },
      { role: 'definingPoint', sequenceIndex: 2 },
    ]);
  });

  it('extracts dimensions with their measured entities', () => {
    const output = extractWith(new SketchDimensionExtractor(context()), requireEntity(documentOf(sketchZoo()), 'dim'));

    expect(output.node.categoryLabels).toEqual(['SketchDimension', 'SketchEntity']);
    expect(output.node.properties).toMatchObject({
      dimensionKind: 'Radial',
      value: 2,
      parameterName: 'd1',
      expression: '2 mm',
      isDriving: true,
    });
    expect(output.relationships).toContainEqual({
      sourceId: id('dim'),
      targetId: id('circle'),
      type: 'REFERENCES',
      properties: { role: 'measured', sequenceIndex: 0 },
    });
  });
});

describe('sketch constraint extractor', () => {
  it('relates a constraint to each member under its role', () => {
    const output = extractWith(new SketchConstraintExtractor(context()), requireEntity(detailedCube(), 'con-par'));

    expect(output.node).toEqual({
      stableId: id('con-par'),
      label: 'ParallelConstraint',
      categoryLabels: ['SketchConstraint'],
      properties: {
        stableId: id('con-par'),
        entityToken: 'con-par',
        objectType: 'ParallelConstraint',
        constraintKind: 'Parallel',
        isDeletable: true,
        memberCount: 2,
      },
    });
    expect(output.relationships).toEqual([
      { sourceId: id('sk-1'), targetId: id('con-par'), type: 'CONTAINS' },
      { sourceId: id('con-par'), targetId: id('ln-0'), type: 'CONSTRAINS', properties: { role: 'lineOne' } },
      { sourceId: id('con-par'), targetId: id('ln-2'), type: 'CONSTRAINS', properties: { role: 'lineTwo' } },
    ]);
  });

  it('reads list members and offset distance', () => {
    const output = extractWith(new SketchConstraintExtractor(context()), requireEntity(detailedCube(), 'con-off'));

    expect(output.node.label).toBe('OffsetConstraint');
    expect(output.node.properties).toMatchObject({ constraintKind: 'Offset', distance: 2, memberCount: 2 });
    expect(output.relationships.slice(1)).toEqual([
      { sourceId: id('con-off'), targetId: id('ln-0'), type: 'CONSTRAINS', properties: { role: 'parentCurves' } },
      { sourceId: id('con-off'), targetId: id('ln-1'), type: 'CONSTRAINS', properties: { role: 'childCurves' } },
    ]);
  });
});

describe('parameter extractor', () => {
  it('hangs a model parameter off the feature that created it', () => {
    const output = extractWith(new ParameterExtractor(context()), requireEntity(detailedCube(), 'par-d1'));

    expect(output.node.label).toBe('ModelParameter');
    expect(output.node.categoryLabels).toEqual(['Parameter']);
    expect(output.node.properties).toMatchObject({
      name: 'd1',
      value: 10,
      expression: 'width',
      unit: 'mm',
      role: 'AlongDistance',
      isUserParameter: false,
      dependencyCount: 1,
    });
    expect(output.relationships).toEqual([
      { sourceId: id('ext-1'), targetId: id('par-d1'), type: 'HAS_PARAMETER' },
      { sourceId: id('par-d1'), targetId: id('par-width'), type: 'DEPENDS_ON' },
    ]);
  });

  it('hangs a user parameter off its component', () => {
    const output = extractWith(new ParameterExtractor(context()), requireEntity(detailedCube(), 'par-width'));

    expect(output.node.properties).toMatchObject({
      expression: '10 mm',
      comment: 'Cube edge length',
      isFavorite: true,
      isUserParameter: true,
      dependencyCount: 0,
    });
    expect(output.relationships).toEqual([
      { sourceId: id('comp-root'), targetId: id('par-width'), type: 'HAS_PARAMETER' },
    ]);
  });
});

describe('construction geometry extractor', () => {
  it('extracts an offset plane and the face defining it', () => {
    const output = extractWith(new ConstructionGeometryExtractor(context()), requireEntity(detailedCube(), 'cp-1'));

    expect(output.node.label).toBe('ConstructionPlane');
    expect(output.node.categoryLabels).toEqual(['ConstructionGeometry']);
    expect(output.node.properties).toMatchObject({
      name: 'Mid plane',
      geometryKind: 'Plane',
      definitionKind: 'Offset',
      timelineIndex: 2,
      origin: [0, 0, 5],
      direction: [0, 0, 1],
      offset: 5,
    });
    expect(output.relationships).toEqual([
      { sourceId: id('comp-root'), targetId: id('cp-1'), type: 'CONTAINS' },
      { sourceId: id('cp-1'), targetId: id('f-bottom'), type: 'DEFINED_BY', properties: { sequenceIndex: 0 } },
    ]);
  });
});

describe('feature extractors', () => {
  it('extracts an extrude with its inputs, outputs and faces', () => {
    const output = extractWith(new ExtrudeFeatureExtractor(context()), requireEntity(cubeDocument(), 'ext-1'));

    expect(output.node.categoryLabels).toEqual(['Feature']);
    expect(output.node.properties).toMatchObject({
      name: 'Extrude1',
      timelineIndex: 1,
      featureKind: 'Extrude',
      operation: 'NewBody',
      healthState: 'Healthy',
      extentKind: 'OneSide',
      distance: 10,
      isSolid: true,
    });
    expect(output.relationships.slice(0, 3)).toEqual([
      { sourceId: id('comp-root'), targetId: id('ext-1'), type: 'CONTAINS' },
      { sourceId: id('ext-1'), targetId: id('prof-1'), type: 'CONSUMES', properties: { sequenceIndex: 0 } },
      { sourceId: id('ext-1'), targetId: id('body-1'), type: 'PRODUCES' },
    ]);
    const producedBy = output.relationships.filter(rel => rel.type === 'PRODUCED_BY');
    expect(producedBy.map(rel => rel.properties?.faceRole)).toEqual(['start', 'end', 'side', 'side', 'side', 'side']);
    expect(producedBy.every(rel => rel.targetId === id('ext-1'))).toBe(true);
  });

  it('detects full revolves from the angle unless the host says otherwise', () => {
    const document = documentOf(sketchZoo());
    const extractor = new RevolveFeatureExtractor(context());

    expect(extractWith(extractor, requireEntity(document, 'rev-full')).node.properties).toMatchObject({
      featureKind: 'Revolve',
      angle: 2 * Math.PI,
      isFullRevolve: true,
    });
    expect(extractWith(extractor, requireEntity(document, 'rev-half')).node.properties).toMatchObject({
      angle: Math.PI,
      isFullRevolve: true,
    });
  });

  it('handles any feature class generically', () => {
    const snapshot = sketchZoo();
    snapshot.entities.push({ token: 'shell', objectType: 'ShellFeature', properties: { isSuppressed: true } });
    const output = extractWith(new FeatureExtractor(context()), requireEntity(documentOf(snapshot), 'shell'));

    expect(output.node.label).toBe('ShellFeature');
    expect(output.node.properties).toMatchObject({ featureKind: 'Shell', isSuppressed: true });
    expect(output.relationships).toEqual([]);
  });
});

describe('hole, fillet and pattern extractors', () => {
  it('reads counterbore dimensions and the faces a hole produced', () => {
    const snapshot = buildDetailedCubeSnapshot();
    const hole = snapshot.entities.find(entity => entity.token === 'hole-1');
    if (!hole) throw new Error('fixture');
    hole.refs = { ...hole.refs, sideFaces: ['f-side-0'], endFaces: ['f-bottom'] };
    const output = extractWith(new HoleFeatureExtractor(context()), requireEntity(documentOf(snapshot), 'hole-1'));

    expect(output.node.properties).toMatchObject({
      featureKind: 'Hole',
      timelineIndex: 5,
      holeKind: 'Counterbore',
      diameter: 3,
      depth: 8,
      counterboreDiameter: 6,
      counterboreDepth: 2,
    });
    expect(output.node.properties.countersinkAngle).toBeUndefined();
    expect(output.relationships).toEqual([
      { sourceId: id('comp-root'), targetId: id('hole-1'), type: 'CONTAINS' },
      { sourceId: id('f-side-0'), targetId: id('hole-1'), type: 'PRODUCED_BY', properties: { faceRole: 'side' } },
      { sourceId: id('f-bottom'), targetId: id('hole-1'), type: 'PRODUCED_BY', properties: { faceRole: 'end' } },
    ]);
  });

  it('records the edges a fillet rounds off', () => {
    const output = extractWith(new EdgeTreatmentFeatureExtractor(context()), requireEntity(detailedCube(), 'fillet-1'));

    expect(output.node.properties).toMatchObject({
      featureKind: 'Fillet',
      radius: 1,
      isTangentChain: true,
      edgeSetCount: 1,
      edgeCount: 2,
    });
    expect(output.relationships).toEqual([
      { sourceId: id('comp-root'), targetId: id('fillet-1'), type: 'CONTAINS' },
      { sourceId: id('fillet-1'), targetId: id('e-t0'), type: 'MODIFIES', properties: { sequenceIndex: 0 } },
      { sourceId: id('fillet-1'), targetId: id('e-t1'), type: 'MODIFIES', properties: { sequenceIndex: 1 } },
    ]);
  });

  it('references the entities a pattern repeats', () => {
    const output = extractWith(new PatternFeatureExtractor(context()), requireEntity(detailedCube(), 'pat-1'));

    expect(output.node.properties).toMatchObject({
      featureKind: 'RectangularPattern',
      quantity: 3,
      distance: 30,
      patternDistanceKind: 'Extent',
      inputCount: 1,
    });
    expect(output.relationships).toEqual([
      { sourceId: id('comp-root'), targetId: id('pat-1'), type: 'CONTAINS' },
      {
        sourceId: id('pat-1'),
        targetId: id('fillet-1'),
        type: 'REFERENCES',
        properties: { role: 'patternInput', sequenceIndex: 0 },
      },
    ]);
  });
});

describe('topology extractors', () => {
  it('places a lump in its body', () => {
    const output = extractWith(new BRepLumpExtractor(context()), requireEntity(detailedCube(), 'lump-1'));

    expect(output.node.label).toBe('BRepLump');
    expect(output.node.categoryLabels).toEqual(['BRepEntity']);
    expect(output.node.properties).toMatchObject({ volume: 1000, shellCount: 1 });
    expect(output.relationships).toEqual([{ sourceId: id('body-1'), targetId: id('lump-1'), type: 'CONTAINS' }]);
  });

  it('places a shell in its lump, bounded by its faces', () => {
    const output = extractWith(new BRepShellExtractor(context()), requireEntity(detailedCube(), 'shell-1'));

    expect(output.node.properties).toMatchObject({ isClosed: true, isVoid: false, faceCount: 6 });
    expect(output.relationships).toEqual([
      { sourceId: id('lump-1'), targetId: id('shell-1'), type: 'CONTAINS' },
      ...CUBE_FACE_TOKENS.map((face, sequenceIndex) => ({
        sourceId: id('shell-1'),
        targetId: id(face),
        type: 'BOUNDED_BY',
        properties: { sequenceIndex },
      })),
    ]);
  });

  it('places a shell without a lump in its body', () => {
    const snapshot = buildDetailedCubeSnapshot();
    const shell = snapshot.entities.find(entity => entity.token === 'shell-1');
    if (!shell) throw new Error('fixture');
    shell.refs = { body: 'body-1', faces: ['f-top'] };
    const output = extractWith(new BRepShellExtractor(context()), requireEntity(documentOf(snapshot), 'shell-1'));

    expect(output.relationships[0]).toEqual({ sourceId: id('body-1'), targetId: id('shell-1'), type: 'CONTAINS' });
  });

  it('links an edge to its vertices and faces', () => {
    const output = extractWith(new BRepEdgeExtractor(context()), requireEntity(cubeDocument(), 'e-v0'));

    expect(output.node.categoryLabels).toEqual(['BRepEntity']);
    expect(output.node.properties).toMatchObject({ curveKind: 'Line3D', length: 10, faceCount: 2 });
    expect(output.relationships).toEqual([
      { sourceId: id('body-1'), targetId: id('e-v0'), type: 'CONTAINS' },
      { sourceId: id('e-v0'), targetId: id('v-0'), type: 'BOUNDED_BY', properties: { role: 'start' } },
      { sourceId: id('e-v0'), targetId: id('v-4'), type: 'BOUNDED_BY', properties: { role: 'end' } },
      { sourceId: id('e-v0'), targetId: id('f-side-3'), type: 'SHARES_EDGE' },
      { sourceId: id('e-v0'), targetId: id('f-side-0'), type: 'SHARES_EDGE' },
    ]);
  });

  it('flattens vertex coordinates', () => {
    const output = extractWith(new BRepVertexExtractor(context()), requireEntity(cubeDocument(), 'v-5'));
    expect(output.node.properties).toMatchObject({ x: 10, y: 0, z: 10 });
  });

  it('counts component contents', () => {
    const output = extractWith(new ComponentExtractor(context()), requireEntity(cubeDocument(), 'comp-root'));
    expect(output.node.properties).toMatchObject({
      name: 'Cube',
      isRoot: true,
      sketchCount: 1,
      featureCount: 1,
      bodyCount: 1,
      childCount: 0,
    });
    expect(output.relationships).toEqual([]);
  });
});

describe('naming helpers', () => {
  it('derives labels from host class names', () => {
    expect(labelForObjectType('adsk::fusion::SketchLine')).toBe('SketchLine');
    expect(labelForObjectType('3DSketch')).toBe('UnknownEntity');
  });

  it('derives feature and dimension kinds', () => {
    expect(featureKindFromObjectType('adsk::fusion::FilletFeature')).toBe('Fillet');
    expect(featureKindFromObjectType('Feature')).toBe('Generic');
    expect(dimensionKindFromObjectType('SketchAngularDimension')).toBe('Angular');
    expect(dimensionKindFromObjectType('SketchDimension')).toBe('Generic');
  });

  it('derives constraint kinds', () => {
    expect(constraintKindFromObjectType('adsk::fusion::PerpendicularConstraint')).toBe('Perpendicular');
    expect(constraintKindFromObjectType('GeometricConstraint')).toBe('Generic');
    expect(constraintKindFromObjectType('Constraint')).toBe('Generic');
  });
});
