/**
 * Feature extractors
 *
 * The generic extractor handles every `*Feature` class. Extrude, revolve,
 * hole, fillet, chamfer and pattern features add their own parameters and
 * record which faces they created, which edges they modified or which
 * entities they repeat.
 */

import {
  isFeature,
  simplifyObjectType,
  type HostBRepFace,
  type HostEntity,
  type HostFeature,
} from '../../host/types.js';
import { BaseExtractor, type PropertyInputMap, type RelationshipCollector } from '../base-extractor.js';
import { booleanParameter, numberParameter, stringParameter } from './parameter-values.js';

const FULL_TURN = 2 * Math.PI;
const ANGLE_TOLERANCE = 1e-9;

export class FeatureExtractor extends BaseExtractor<HostFeature> {
  readonly name: string = 'FeatureExtractor';
  readonly kind = 'feature';
  protected readonly categoryLabels: readonly string[] = ['Feature'];

  accepts(entity: HostEntity): entity is HostFeature {
    return isFeature(entity);
  }

  protected properties(feature: HostFeature): PropertyInputMap {
    return {
      timelineIndex: feature.timelineIndex,
      featureKind: featureKindFromObjectType(feature.objectType),
      isSuppressed: feature.isSuppressed,
      isParametric: feature.isParametric,
      healthState: feature.healthState,
      errorOrWarningMessage: feature.errorOrWarningMessage,
      operation: feature.operation,
      ...this.featureParameters(feature),
    };
  }

  protected relate(feature: HostFeature, relationships: RelationshipCollector): void {
    relationships.from('CONTAINS', feature.parentComponent);
    relationships.toEach('CONSUMES', feature.profiles);
    for (const body of feature.bodies) {
      relationships.to('PRODUCES', body);
    }
    this.relateResults(feature, relationships);
  }

  protected featureParameters(_feature: HostFeature): PropertyInputMap {
    return {};
  }

  protected relateResults(_feature: HostFeature, _relationships: RelationshipCollector): void {}
}

export class ExtrudeFeatureExtractor extends FeatureExtractor {
  readonly name = 'ExtrudeFeatureExtractor';
  readonly objectTypes = ['ExtrudeFeature'];

  protected featureParameters(feature: HostFeature): PropertyInputMap {
    return {
      extentKind: stringParameter(feature.parameters.extentKind),
      distance: numberParameter(feature.parameters.distance),
      taperAngle: numberParameter(feature.parameters.taperAngle),
      isSolid: booleanParameter(feature.parameters.isSolid),
    };
  }

  protected relateResults(feature: HostFeature, relationships: RelationshipCollector): void {
    relateProducedFaces(relationships, feature.startFaces, 'start');
    relateProducedFaces(relationships, feature.endFaces, 'end');
    relateProducedFaces(relationships, feature.sideFaces, 'side');
  }
}

export class RevolveFeatureExtractor extends FeatureExtractor {
  readonly name = 'RevolveFeatureExtractor';
  readonly objectTypes = ['RevolveFeature'];

  protected featureParameters(feature: HostFeature): PropertyInputMap {
    const angle = numberParameter(feature.parameters.angle);
    return {
      angle,
      isFullRevolve:
        booleanParameter(feature.parameters.isFullRevolve) ??
        (angle === undefined ? undefined : Math.abs(angle) >= FULL_TURN - ANGLE_TOLERANCE),
    };
  }

  protected relateResults(feature: HostFeature, relationships: RelationshipCollector): void {
    relateProducedFaces(relationships, feature.sideFaces, 'side');
  }
}

export class HoleFeatureExtractor extends FeatureExtractor {
  readonly name = 'HoleFeatureExtractor';
  readonly objectTypes = ['HoleFeature'];

  protected featureParameters(feature: HostFeature): PropertyInputMap {
    const parameters = feature.parameters;
    return {
      holeKind: stringParameter(parameters.holeKind),
      diameter: numberParameter(parameters.diameter),
      depth: numberParameter(parameters.depth),
      tipAngle: numberParameter(parameters.tipAngle),
      counterboreDiameter: numberParameter(parameters.counterboreDiameter),
      counterboreDepth: numberParameter(parameters.counterboreDepth),
      countersinkDiameter: numberParameter(parameters.countersinkDiameter),
      countersinkAngle: numberParameter(parameters.countersinkAngle),
    };
  }

  protected relateResults(feature: HostFeature, relationships: RelationshipCollector): void {
    relateProducedFaces(relationships, feature.sideFaces, 'side');
    relateProducedFaces(relationships, feature.endFaces, 'end');
  }
}

/**
 * Fillets and chamfers: each rounded or bevelled edge is MODIFIED in the
 * order the edge sets list it.
 */
export class EdgeTreatmentFeatureExtractor extends FeatureExtractor {
  readonly name = 'EdgeTreatmentFeatureExtractor';
  readonly objectTypes = ['FilletFeature', 'ChamferFeature'];

  protected featureParameters(feature: HostFeature): PropertyInputMap {
    const parameters = feature.parameters;
    return {
      radius: numberParameter(parameters.radius),
      distance: numberParameter(parameters.distance),
      distanceTwo: numberParameter(parameters.distanceTwo),
      angle: numberParameter(parameters.angle),
      isTangentChain: booleanParameter(parameters.isTangentChain),
      edgeSetCount: numberParameter(parameters.edgeSetCount),
      edgeCount: feature.edges.length,
    };
  }

  protected relateResults(feature: HostFeature, relationships: RelationshipCollector): void {
    relationships.toEach('MODIFIES', feature.edges);
    relateProducedFaces(relationships, feature.sideFaces, 'side');
  }
}

export class PatternFeatureExtractor extends FeatureExtractor {
  readonly name = 'PatternFeatureExtractor';
  readonly objectTypes = ['RectangularPatternFeature', 'CircularPatternFeature', 'PathPatternFeature'];

  protected featureParameters(feature: HostFeature): PropertyInputMap {
    const parameters = feature.parameters;
    return {
      quantity: numberParameter(parameters.quantity),
      quantityTwo: numberParameter(parameters.quantityTwo),
      distance: numberParameter(parameters.distance),
      distanceTwo: numberParameter(parameters.distanceTwo),
      totalAngle: numberParameter(parameters.totalAngle),
      isSymmetric: booleanParameter(parameters.isSymmetric),
      patternDistanceKind: stringParameter(parameters.patternDistanceKind),
      inputCount: feature.inputEntities.length,
    };
  }

  protected relateResults(feature: HostFeature, relationships: RelationshipCollector): void {
    relationships.toEach('REFERENCES', feature.inputEntities, { role: 'patternInput' });
  }
}

/**
 * 'ExtrudeFeature' -> 'Extrude'
 */
export function featureKindFromObjectType(objectType: string): string {
  const kind = simplifyObjectType(objectType).replace(/Feature$/, '');
  return kind || 'Generic';
}

function relateProducedFaces(
  relationships: RelationshipCollector,
  faces: readonly HostBRepFace[],
  faceRole: 'start' | 'end' | 'side'
): void {
  for (const face of faces) {
    relationships.from('PRODUCED_BY', face, { faceRole });
  }
}
