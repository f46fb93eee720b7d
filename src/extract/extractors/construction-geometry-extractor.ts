import {
  isConstructionGeometry,
  simplifyObjectType,
  type HostConstructionGeometry,
  type HostEntity,
} from '../../host/types.js';
import { BaseExtractor, type PropertyInputMap, type RelationshipCollector } from '../base-extractor.js';
import { booleanParameter, numberParameter } from './parameter-values.js';

/**
 * Construction planes, axes and points. Each is DEFINED_BY the entities its
 * definition names, keeping their order as `sequenceIndex`.
 */
export class ConstructionGeometryExtractor extends BaseExtractor<HostConstructionGeometry> {
  readonly name = 'ConstructionGeometryExtractor';
  readonly kind = 'constructionGeometry';
  protected readonly categoryLabels: readonly string[] = ['ConstructionGeometry'];

  accepts(entity: HostEntity): entity is HostConstructionGeometry {
    return isConstructionGeometry(entity);
  }

  protected properties(geometry: HostConstructionGeometry): PropertyInputMap {
    const parameters = geometry.parameters;
    return {
      geometryKind: simplifyObjectType(geometry.objectType).replace(/^Construction/, '') || 'Generic',
      definitionKind: geometry.definitionKind,
      timelineIndex: geometry.timelineIndex,
      isParametric: geometry.isParametric,
      isVisible: geometry.isVisible,
      healthState: geometry.healthState,
      errorOrWarningMessage: geometry.errorOrWarningMessage,
      origin: geometry.origin,
      direction: geometry.direction,
      offset: numberParameter(parameters.offset),
      angle: numberParameter(parameters.angle),
      distance: numberParameter(parameters.distance),
      isFlipped: booleanParameter(parameters.isFlipped),
    };
  }

  protected relate(geometry: HostConstructionGeometry, relationships: RelationshipCollector): void {
    relationships.from('CONTAINS', geometry.parentComponent);
    relationships.toEach('DEFINED_BY', geometry.definingEntities);
  }
}
