import { isAnyEntity, type HostEntity } from '../../host/types.js';
import { BaseExtractor, type PropertyInputMap } from '../base-extractor.js';

/**
 * Emits a node carrying only the base properties (stableId, token, name,
 * objectType) for entity types no other extractor handles.
 */
export class FallbackExtractor extends BaseExtractor<HostEntity> {
  readonly name = 'FallbackExtractor';
  protected readonly categoryLabels: readonly string[] = ['UnrecognizedEntity'];

  accepts(entity: HostEntity): entity is HostEntity {
    return isAnyEntity(entity);
  }

  protected properties(): PropertyInputMap {
    return {};
  }
}
