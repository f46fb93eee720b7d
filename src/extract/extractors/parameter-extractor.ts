import {
  isParameter,
  simplifyObjectType,
  type HostEntity,
  type HostParameter,
} from '../../host/types.js';
import { BaseExtractor, type PropertyInputMap, type RelationshipCollector } from '../base-extractor.js';

/**
 * Model parameters hang off the feature or dimension that created them;
 * user parameters off their component. A parameter DEPENDS_ON every
 * parameter its expression names.
 */
export class ParameterExtractor extends BaseExtractor<HostParameter> {
  readonly name = 'ParameterExtractor';
  readonly kind = 'parameter';
  protected readonly categoryLabels: readonly string[] = ['Parameter'];

  accepts(entity: HostEntity): entity is HostParameter {
    return isParameter(entity);
  }

  protected properties(parameter: HostParameter): PropertyInputMap {
    return {
      value: parameter.value,
      expression: parameter.expression,
      unit: parameter.unit,
      comment: parameter.comment,
      role: parameter.role,
      isFavorite: parameter.isFavorite,
      isDeletable: parameter.isDeletable,
      isUserParameter: simplifyObjectType(parameter.objectType) === 'UserParameter',
      dependencyCount: parameter.dependencies.length,
    };
  }

  protected relate(parameter: HostParameter, relationships: RelationshipCollector): void {
    relationships.from('HAS_PARAMETER', parameter.createdBy ?? parameter.parentComponent);
    for (const dependency of parameter.dependencies) {
      relationships.to('DEPENDS_ON', dependency);
    }
  }
}
