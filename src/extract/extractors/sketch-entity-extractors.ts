/**
 * Sketch entity extractors: points, lines, arcs, circles, other curves
 * and dimensions.
 *
 * Every sketch entity is contained by its parent sketch, and a projected
 * entity REFERENCES the entity it was projected from.
 */

import {
  isSketchCurveEntity,
  isSketchDimension,
  isSketchPoint,
  simplifyObjectType,
  type HostEntity,
  type HostSketchArc,
  type HostSketchCircle,
  type HostSketchCurve,
  type HostSketchCurveEntity,
  type HostSketchDimension,
  type HostSketchLine,
  type HostSketchPoint,
} from '../../host/types.js';
import { BaseExtractor, type PropertyInputMap, type RelationshipCollector } from '../base-extractor.js';

type HostSketchEntity = HostSketchPoint | HostSketchCurveEntity | HostSketchDimension;

abstract class SketchEntityExtractor<E extends HostSketchEntity> extends BaseExtractor<E> {
  protected readonly categoryLabels: readonly string[] = ['SketchEntity'];

  protected properties(entity: E): PropertyInputMap {
    return {
      isReference: entity.isReference,
      isFixed: entity.isFixed,
      isVisible: entity.isVisible,
      ...this.geometry(entity),
    };
  }

  protected relate(entity: E, relationships: RelationshipCollector): void {
    relationships.from('CONTAINS', entity.parentSketch);
    if (entity.isReference) {
      relationships.to('REFERENCES', entity.referencedEntity, { role: 'projection' });
    }
    this.relateGeometry(entity, relationships);
  }

  protected abstract geometry(entity: E): PropertyInputMap;

  protected relateGeometry(_entity: E, _relationships: RelationshipCollector): void {}
}

// ============================================
// Points
// ============================================

export class SketchPointExtractor extends SketchEntityExtractor<HostSketchPoint> {
  readonly name = 'SketchPointExtractor';
  readonly kind = 'sketchPoint';

  accepts(entity: HostEntity): entity is HostSketchPoint {
    return isSketchPoint(entity);
  }

  protected geometry(point: HostSketchPoint): PropertyInputMap {
    return {
      x: point.geometry?.x,
      y: point.geometry?.y,
      z: point.geometry?.z,
      connectedEntityCount: point.connectedEntities.length,
    };
  }
}

// ============================================
// Curves
// ============================================

abstract class SketchCurveExtractor<E extends HostSketchCurveEntity> extends SketchEntityExtractor<E> {
  protected readonly categoryLabels: readonly string[] = ['SketchCurve', 'SketchEntity'];

  protected properties(curve: E): PropertyInputMap {
    return {
      ...super.properties(curve),
      isConstruction: curve.isConstruction,
      length: curve.length,
    };
  }
}

export class SketchLineExtractor extends SketchCurveExtractor<HostSketchLine> {
  readonly name = 'SketchLineExtractor';
  readonly kind = 'sketchLine';

  accepts(entity: HostEntity): entity is HostSketchLine {
    return entity.kind === 'sketchLine';
  }

  protected geometry(line: HostSketchLine): PropertyInputMap {
    return {
      start: line.startPoint?.geometry,
      end: line.endPoint?.geometry,
    };
  }

  protected relateGeometry(line: HostSketchLine, relationships: RelationshipCollector): void {
    relationships.to('BOUNDED_BY', line.startPoint, { role: 'start' });
    relationships.to('BOUNDED_BY', line.endPoint, { role: 'end' });
  }
}

export class SketchArcExtractor extends SketchCurveExtractor<HostSketchArc> {
  readonly name = 'SketchArcExtractor';
  readonly kind = 'sketchArc';

  accepts(entity: HostEntity): entity is HostSketchArc {
    return entity.kind === 'sketchArc';
  }

  protected geometry(arc: HostSketchArc): PropertyInputMap {
    return {
      radius: arc.radius,
      startAngle: arc.startAngle,
      endAngle: arc.endAngle,
      center: arc.centerPoint?.geometry,
    };
  }

  protected relateGeometry(arc: HostSketchArc, relationships: RelationshipCollector): void {
    relationships.to('BOUNDED_BY', arc.startPoint, { role: 'start' });
    relationships.to('BOUNDED_BY', arc.endPoint, { role: 'end' });
    relationships.to('REFERENCES', arc.centerPoint, { role: 'center' });
  }
}

export class SketchCircleExtractor extends SketchCurveExtractor<HostSketchCircle> {
  readonly name = 'SketchCircleExtractor';
  readonly kind = 'sketchCircle';

  accepts(entity: HostEntity): entity is HostSketchCircle {
    return entity.kind === 'sketchCircle';
  }

  protected geometry(circle: HostSketchCircle): PropertyInputMap {
    const radius = circle.radius;
    return {
      radius,
      circumference: radius === undefined ? undefined : 2 * Math.PI * radius,
      area: radius === undefined ? undefined : Math.PI * radius * radius,
      center: circle.centerPoint?.geometry,
    };
  }

  protected relateGeometry(circle: HostSketchCircle, relationships: RelationshipCollector): void {
    relationships.to('REFERENCES', circle.centerPoint, { role: 'center' });
  }
}

/**
 * Splines, ellipses, conics: any sketch curve without its own extractor.
 */
export class GenericSketchCurveExtractor extends SketchCurveExtractor<HostSketchCurve> {
  readonly name = 'GenericSketchCurveExtractor';
  readonly kind = 'sketchCurve';

  accepts(entity: HostEntity): entity is HostSketchCurve {
    return isSketchCurveEntity(entity) && entity.kind === 'sketchCurve';
  }

  protected geometry(curve: HostSketchCurve): PropertyInputMap {
    return {
      curveKind: curve.curveKind ?? simplifyObjectType(curve.objectType).replace(/^Sketch/, ''),
      isClosed: curve.isClosed,
      definingPointCount: curve.definingPoints.length,
    };
  }

  protected relateGeometry(curve: HostSketchCurve, relationships: RelationshipCollector): void {
    relationships.toEach('REFERENCES', curve.definingPoints, { role: 'definingPoint' });
  }
}

// ============================================
// Dimensions
// ============================================

export class SketchDimensionExtractor extends SketchEntityExtractor<HostSketchDimension> {
  readonly name = 'SketchDimensionExtractor';
  readonly kind = 'sketchDimension';
  protected readonly categoryLabels: readonly string[] = ['SketchDimension', 'SketchEntity'];

  accepts(entity: HostEntity): entity is HostSketchDimension {
    return isSketchDimension(entity);
  }

  protected geometry(dimension: HostSketchDimension): PropertyInputMap {
    return {
      dimensionKind: dimension.dimensionKind ?? dimensionKindFromObjectType(dimension.objectType),
      value: dimension.value,
      parameterName: dimension.parameterName,
      expression: dimension.expression,
      isDriving: dimension.isDriving,
    };
  }

  protected relateGeometry(dimension: HostSketchDimension, relationships: RelationshipCollector): void {
    relationships.toEach('REFERENCES', dimension.measuredEntities, { role: 'measured' });
  }
}

/**
 * 'SketchLinearDimension' -> 'Linear'
 */
export function dimensionKindFromObjectType(objectType: string): string {
  const kind = simplifyObjectType(objectType).replace(/^Sketch/, '').replace(/Dimension$/, '');
  return kind || 'Generic';
}
