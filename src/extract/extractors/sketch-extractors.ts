/**
 * Sketch and profile extractors.
 */

import {
  isProfile,
  isSketch,
  type HostEntity,
  type HostProfile,
  type HostSketch,
} from '../../host/types.js';
import { BaseExtractor, type PropertyInputMap, type RelationshipCollector } from '../base-extractor.js';

export class SketchExtractor extends BaseExtractor<HostSketch> {
  readonly name = 'SketchExtractor';
  readonly kind = 'sketch';

  accepts(entity: HostEntity): entity is HostSketch {
    return isSketch(entity);
  }

  protected properties(sketch: HostSketch): PropertyInputMap {
    return {
      timelineIndex: sketch.timelineIndex,
      isVisible: sketch.isVisible,
      isParametric: sketch.isParametric,
      healthState: sketch.healthState,
      origin: sketch.origin,
      xDirection: sketch.xDirection,
      yDirection: sketch.yDirection,
      pointCount: sketch.points.length,
      curveCount: sketch.curves.length,
      dimensionCount: sketch.dimensions.length,
      constraintCount: sketch.constraints.length,
      profileCount: sketch.profiles.length,
    };
  }

  protected relate(sketch: HostSketch, relationships: RelationshipCollector): void {
    relationships.from('CONTAINS', sketch.parentComponent);
  }
}

/**
 * Boundary curves keep the host's order as `sequenceIndex`; adjacency
 * derivation reads them back later.
 */
export class ProfileExtractor extends BaseExtractor<HostProfile> {
  readonly name = 'ProfileExtractor';
  readonly kind = 'profile';

  accepts(entity: HostEntity): entity is HostProfile {
    return isProfile(entity);
  }

  protected properties(profile: HostProfile): PropertyInputMap {
    return {
      area: profile.area,
      perimeter: profile.perimeter,
      centroid: profile.centroid,
      loopCount: profile.loopCount,
      curveCount: profile.curves.length,
    };
  }

  protected relate(profile: HostProfile, relationships: RelationshipCollector): void {
    relationships.from('CONTAINS', profile.parentSketch);
    relationships.toEach('BOUNDED_BY', profile.curves);
  }
}
