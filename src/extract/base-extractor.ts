/**
 * Base Extractor
 *
 * Converts one host entity plus its direct references into a node record
 * and relationship records. Subclasses supply the type guard, the entity's
 * properties and its relationships.
 *
 * @example
 * ```typescript
 * class SketchPointExtractor extends BaseExtractor<HostSketchPoint> {
 *   readonly name = 'SketchPointExtractor';
 *   readonly kind = 'sketchPoint';
 *   accepts(entity: HostEntity): entity is HostSketchPoint {
 *     return isSketchPoint(entity);
 *   }
 *   protected properties(point: HostSketchPoint) {
 *     return { x: point.geometry?.x };
 *   }
 * }
 * ```
 */

import type { EntityKind, HostEntity } from '../host/types.js';
import { simplifyObjectType } from '../host/types.js';
import type { IdentityService } from '../identity/identity-service.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { serializeProperties, type PropertyInput } from '../graph/properties.js';
import type {
  ExtractionOutput,
  GraphRelationshipRecord,
  PropertyMap,
  RelationshipType,
} from '../graph/types.js';

export interface ExtractionContext {
  identity: IdentityService;
  logger?: Logger;
}

/**
 * Extractor contract used by dispatch. `objectTypes` registers exact host
 * class names; `kind` registers the extractor for a whole entity family.
 */
export interface EntityExtractor<E extends HostEntity = HostEntity> {
  readonly name: string;
  readonly objectTypes?: readonly string[];
  readonly kind?: EntityKind;
  accepts(entity: HostEntity): entity is E;
  extract(entity: E): ExtractionOutput;
}

export type PropertyInputMap = Record<string, PropertyInput>;

/**
 * Collects the relationships of one entity. References without a stable
 * token are dropped.
 */
export class RelationshipCollector {
  readonly records: GraphRelationshipRecord[] = [];

  constructor(
    private readonly selfId: string,
    private readonly identity: IdentityService,
    private readonly logger: Logger
  ) {}

  /** self -[type]-> target */
  to(type: RelationshipType, target: HostEntity | undefined, properties?: PropertyInputMap): void {
    const targetId = this.resolve(type, target);
    if (targetId === undefined) return;
    this.push(this.selfId, targetId, type, properties);
  }

  /** source -[type]-> self */
  from(type: RelationshipType, source: HostEntity | undefined, properties?: PropertyInputMap): void {
    const sourceId = this.resolve(type, source);
    if (sourceId === undefined) return;
    this.push(sourceId, this.selfId, type, properties);
  }

  /** self -[type {sequenceIndex}]-> each target, in order */
  toEach(
    type: RelationshipType,
    targets: readonly HostEntity[],
    properties?: PropertyInputMap
  ): void {
    targets.forEach((target, sequenceIndex) => {
      this.to(type, target, { ...properties, sequenceIndex });
    });
  }

  private resolve(type: RelationshipType, entity: HostEntity | undefined): string | undefined {
    if (!entity) return undefined;
    const id = this.identity.tryIdentityOf(entity);
    if (id === undefined) {
      this.logger.debug(`Dropped ${type} to ${entity.objectType}: no stable token`);
    }
    return id;
  }

  private push(
    sourceId: string,
    targetId: string,
    type: RelationshipType,
    properties?: PropertyInputMap
  ): void {
    const record: GraphRelationshipRecord = { sourceId, targetId, type };
    if (properties) {
      const serialized: PropertyMap = serializeProperties(properties);
      if (Object.keys(serialized).length > 0) {
        record.properties = serialized;
      }
    }
    this.records.push(record);
  }
}

export abstract class BaseExtractor<E extends HostEntity> implements EntityExtractor<E> {
  abstract readonly name: string;
  readonly objectTypes?: readonly string[];
  readonly kind?: EntityKind;
  /** Family labels added to every node this extractor emits */
  protected readonly categoryLabels: readonly string[] = [];

  protected readonly identity: IdentityService;
  protected readonly logger: Logger;

  constructor(context: ExtractionContext) {
    this.identity = context.identity;
    this.logger = context.logger ?? silentLogger;
  }

  abstract accepts(entity: HostEntity): entity is E;

  /**
   * @throws IdentityUnavailableError if the entity itself has no token
   */
  extract(entity: E): ExtractionOutput {
    const stableId = this.identity.identityOf(entity);
    const relationships = new RelationshipCollector(stableId, this.identity, this.logger);

    const properties = serializeProperties({
      stableId,
      entityToken: entity.entityToken,
      name: entity.name,
      objectType: entity.objectType,
      ...this.properties(entity),
    });
    this.relate(entity, relationships);

    return {
      node: {
        stableId,
        label: labelForObjectType(entity.objectType),
        categoryLabels: [...this.categoryLabels],
        properties,
      },
      relationships: relationships.records,
    };
  }

  protected abstract properties(entity: E): PropertyInputMap;

  protected relate(_entity: E, _relationships: RelationshipCollector): void {}
}

/**
 * Node label for a host class name: namespace stripped, restricted to
 * identifier characters.
 */
export function labelForObjectType(objectType: string): string {
  const label = simplifyObjectType(objectType).replace(/[^A-Za-z0-9_]/g, '');
  return /^[A-Za-z]/.test(label) ? label : 'UnknownEntity';
}
