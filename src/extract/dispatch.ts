/**
 * Extractor Dispatch
 *
 * Routes a host entity to its extractor:
 * 1. exact objectType (namespace stripped)
 * 2. entity family (`kind`)
 * 3. fallback extractor
 *
 * An extractor whose type guard rejects the entity also degrades to the
 * fallback, so an unexpected subtype never aborts the traversal.
 */

import type { EntityKind, HostEntity } from '../host/types.js';
import { simplifyObjectType } from '../host/types.js';
import type { IdentityService } from '../identity/identity-service.js';
import type { ExtractionOutput } from '../graph/types.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import type { EntityExtractor, ExtractionContext } from './base-extractor.js';
import {
  BRepBodyExtractor,
  BRepEdgeExtractor,
  BRepFaceExtractor,
  BRepLumpExtractor,
  BRepShellExtractor,
  BRepVertexExtractor,
  ComponentExtractor,
  ConstructionGeometryExtractor,
  EdgeTreatmentFeatureExtractor,
  ExtrudeFeatureExtractor,
  FallbackExtractor,
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
} from './extractors/index.js';

export interface DispatchResult extends ExtractionOutput {
  /** Name of the extractor that produced the records */
  extractor: string;
  /** False when the fallback extractor handled the entity */
  recognized: boolean;
}

/** Type-erased extractor: runs only if the guard accepts */
interface RegisteredExtractor {
  name: string;
  run(entity: HostEntity): ExtractionOutput | undefined;
}

function erase<E extends HostEntity>(extractor: EntityExtractor<E>): RegisteredExtractor {
  return {
    name: extractor.name,
    run: entity => (extractor.accepts(entity) ? extractor.extract(entity) : undefined),
  };
}

export class ExtractorDispatcher {
  private readonly byObjectType = new Map<string, RegisteredExtractor>();
  private readonly byKind = new Map<EntityKind, RegisteredExtractor>();
  private readonly fallback: RegisteredExtractor;
  private readonly logger: Logger;

  constructor(fallback: EntityExtractor<HostEntity>, logger: Logger = silentLogger) {
    this.fallback = erase(fallback);
    this.logger = logger;
  }

  /**
   * Register an extractor under its `objectTypes`, or under its `kind` when
   * it declares no object types. A later registration replaces an earlier one.
   */
  register<E extends HostEntity>(extractor: EntityExtractor<E>): this {
    const registered = erase(extractor);
    if (extractor.objectTypes && extractor.objectTypes.length > 0) {
      for (const objectType of extractor.objectTypes) {
        this.byObjectType.set(simplifyObjectType(objectType), registered);
      }
    } else if (extractor.kind) {
      this.byKind.set(extractor.kind, registered);
    } else {
      throw new Error(`Extractor ${extractor.name} declares neither objectTypes nor kind`);
    }
    return this;
  }

  /**
   * Name of the extractor an entity of this type and kind would go to.
   */
  resolve(objectType: string, kind: EntityKind): string {
    return this.lookup(objectType, kind)?.name ?? this.fallback.name;
  }

  /**
   * @throws IdentityUnavailableError if the entity has no stable token
   */
  extract(entity: HostEntity): DispatchResult {
    const registered = this.lookup(entity.objectType, entity.kind);
    if (registered) {
      const output = registered.run(entity);
      if (output) {
        return { ...output, extractor: registered.name, recognized: true };
      }
      this.logger.debug(`${registered.name} rejected ${entity.objectType}, using fallback`);
    }

    const output = this.fallback.run(entity);
    if (!output) {
      throw new Error(`Fallback extractor ${this.fallback.name} rejected ${entity.objectType}`);
    }
    return { ...output, extractor: this.fallback.name, recognized: false };
  }

  private lookup(objectType: string, kind: EntityKind): RegisteredExtractor | undefined {
    return this.byObjectType.get(simplifyObjectType(objectType)) ?? this.byKind.get(kind);
  }
}

/**
 * Dispatcher with every built-in extractor registered.
 */
export function createDefaultDispatcher(identity: IdentityService, logger?: Logger): ExtractorDispatcher {
  const context: ExtractionContext = { identity, logger };
  return new ExtractorDispatcher(new FallbackExtractor(context), logger)
    .register(new ComponentExtractor(context))
    .register(new SketchExtractor(context))
    .register(new SketchPointExtractor(context))
    .register(new SketchLineExtractor(context))
    .register(new SketchArcExtractor(context))
    .register(new SketchCircleExtractor(context))
    .register(new GenericSketchCurveExtractor(context))
    .register(new SketchDimensionExtractor(context))
    .register(new SketchConstraintExtractor(context))
    .register(new ProfileExtractor(context))
    .register(new FeatureExtractor(context))
    .register(new ExtrudeFeatureExtractor(context))
    .register(new RevolveFeatureExtractor(context))
    .register(new HoleFeatureExtractor(context))
    .register(new EdgeTreatmentFeatureExtractor(context))
    .register(new PatternFeatureExtractor(context))
    .register(new ParameterExtractor(context))
    .register(new ConstructionGeometryExtractor(context))
    .register(new BRepBodyExtractor(context))
    .register(new BRepLumpExtractor(context))
    .register(new BRepShellExtractor(context))
    .register(new BRepFaceExtractor(context))
    .register(new BRepEdgeExtractor(context))
    .register(new BRepVertexExtractor(context));
}
