import { describe, it, expect } from 'vitest';
import { IdentityService, stableIdForToken } from '../../identity/identity-service.js';
import { isComponent, type HostComponent, type HostEntity } from '../../host/types.js';
import type { EntityExtractor } from '../base-extractor.js';
import { ExtractorDispatcher, createDefaultDispatcher } from '../dispatch.js';
import { FallbackExtractor } from '../extractors/index.js';
import { cubeDocument, requireEntity } from '../../__tests__/fixtures/helpers.js';

describe('ExtractorDispatcher', () => {
  const dispatcher = createDefaultDispatcher(new IdentityService());

  it('prefers an exact object type over the entity family', () => {
    expect(dispatcher.resolve('ExtrudeFeature', 'feature')).toBe('ExtrudeFeatureExtractor');
    expect(dispatcher.resolve('adsk::fusion::RevolveFeature', 'feature')).toBe('RevolveFeatureExtractor');
    expect(dispatcher.resolve('ChamferFeature', 'feature')).toBe('EdgeTreatmentFeatureExtractor');
    expect(dispatcher.resolve('CircularPatternFeature', 'feature')).toBe('PatternFeatureExtractor');
    expect(dispatcher.resolve('HoleFeature', 'feature')).toBe('HoleFeatureExtractor');
    expect(dispatcher.resolve('ShellFeature', 'feature')).toBe('FeatureExtractor');
    expect(dispatcher.resolve('SketchEllipse', 'sketchCurve')).toBe('GenericSketchCurveExtractor');
  });

  it('resolves constraints, parameters, construction geometry, lumps and shells by family', () => {
    expect(dispatcher.resolve('TangentConstraint', 'sketchConstraint')).toBe('SketchConstraintExtractor');
    expect(dispatcher.resolve('UserParameter', 'parameter')).toBe('ParameterExtractor');
    expect(dispatcher.resolve('ConstructionAxis', 'constructionGeometry')).toBe('ConstructionGeometryExtractor');
    expect(dispatcher.resolve('BRepLump', 'brepLump')).toBe('BRepLumpExtractor');
    expect(dispatcher.resolve('BRepShell', 'brepShell')).toBe('BRepShellExtractor');
  });

  it('falls back for unknown entity types', () => {
    expect(dispatcher.resolve('Joint', 'unknown')).toBe('FallbackExtractor');
    expect(dispatcher.resolve('SketchText', 'unknown')).toBe('FallbackExtractor');
  });

  it('extracts a recognized entity', () => {
    const result = dispatcher.extract(requireEntity(cubeDocument(), 'f-top'));

    expect(result.extractor).toBe('BRepFaceExtractor');
    expect(result.recognized).toBe(true);
    expect(result.node.label).toBe('BRepFace');
    expect(result.node.properties).toMatchObject({ surfaceKind: 'Plane', area: 100, edgeCount: 4 });
  });

  it('degrades to the fallback when the registered extractor rejects the entity', () => {
    const identity = new IdentityService();
    const componentsOnly: EntityExtractor<HostComponent> = {
      name: 'ComponentsOnly',
      objectTypes: ['SketchLine'],
      accepts: (entity: HostEntity): entity is HostComponent => isComponent(entity),
      extract: () => {
        throw new Error('not reached');
      },
    };
    const custom = new ExtractorDispatcher(new FallbackExtractor({ identity })).register(componentsOnly);

    const result = custom.extract(requireEntity(cubeDocument(), 'ln-2'));
    expect(result.extractor).toBe('FallbackExtractor');
    expect(result.recognized).toBe(false);
    expect(result.node).toEqual({
      stableId: stableIdForToken('ln-2'),
      label: 'SketchLine',
      categoryLabels: ['UnrecognizedEntity'],
      properties: {
        stableId: stableIdForToken('ln-2'),
        entityToken: 'ln-2',
        objectType: 'SketchLine',
      },
    });
    expect(result.relationships).toEqual([]);
  });

  it('refuses extractors that register under nothing', () => {
    const identity = new IdentityService();
    const custom = new ExtractorDispatcher(new FallbackExtractor({ identity }));
    const nameless: EntityExtractor<HostComponent> = {
      name: 'Nowhere',
      accepts: (entity: HostEntity): entity is HostComponent => isComponent(entity),
      extract: () => {
        throw new Error('not reached');
      },
    };

    expect(() => custom.register(nameless)).toThrow('Extractor Nowhere declares neither objectTypes nor kind');
  });
});
