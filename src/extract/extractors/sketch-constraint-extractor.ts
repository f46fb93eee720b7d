/**
 * Geometric constraints between sketch entities.
 *
 * Every constrained entity gets one CONSTRAINS relationship carrying the
 * host accessor it came from as `role` (lineOne, point, symmetryLine, ...).
 */

import {
  isSketchConstraint,
  simplifyObjectType,
  type HostEntity,
  type HostSketchConstraint,
} from '../../host/types.js';
import { BaseExtractor, type PropertyInputMap, type RelationshipCollector } from '../base-extractor.js';
import { booleanParameter, numberParameter } from './parameter-values.js';

export class SketchConstraintExtractor extends BaseExtractor<HostSketchConstraint> {
  readonly name = 'SketchConstraintExtractor';
  readonly kind = 'sketchConstraint';
  protected readonly categoryLabels: readonly string[] = ['SketchConstraint'];

  accepts(entity: HostEntity): entity is HostSketchConstraint {
    return isSketchConstraint(entity);
  }

  protected properties(constraint: HostSketchConstraint): PropertyInputMap {
    const parameters = constraint.parameters;
    return {
      constraintKind: constraintKindFromObjectType(constraint.objectType),
      isDeletable: constraint.isDeletable,
      isSuppressed: constraint.isSuppressed,
      distance: numberParameter(parameters.distance),
      angle: numberParameter(parameters.angle),
      quantity: numberParameter(parameters.quantity),
      isSymmetric: booleanParameter(parameters.isSymmetric),
      memberCount: constraint.members.length,
    };
  }

  protected relate(constraint: HostSketchConstraint, relationships: RelationshipCollector): void {
    relationships.from('CONTAINS', constraint.parentSketch);
    for (const member of constraint.members) {
      relationships.to('CONSTRAINS', member.entity, { role: member.role });
    }
  }
}

/**
 * 'ParallelConstraint' -> 'Parallel'
 */
export function constraintKindFromObjectType(objectType: string): string {
  const kind = simplifyObjectType(objectType).replace(/Constraint$/, '');
  return kind === '' || kind === 'Geometric' ? 'Generic' : kind;
}
