/**
 * Document Walker
 *
 * Traverses a host document top-down and yields one event per entity:
 *
 *   component
 *     -> features in timeline order
 *          -> sketches of consumed profiles (sketch, points, curves,
 *             dimensions, constraints, profiles)
 *          -> the feature
 *          -> produced bodies (body, faces, edges, vertices, lumps, shells)
 *     -> sketches and bodies no feature reached, construction geometry
 *     -> parameters
 *     -> child components
 *
 * Entities a container lists outside its typed collections, and entities
 * only reachable through a reference (a dimension's measured entities, a
 * projection's source, a constraint's members), are walked as well so
 * they reach their extractor or the fallback. Each entity is extracted
 * once (keyed by stable ID). The walk is synchronous: the host object
 * model is only ever touched from here.
 */

import type {
  HostBRepBody,
  HostComponent,
  HostDocument,
  HostEntity,
  HostFeature,
  HostParameter,
  HostSketch,
} from '../host/types.js';
import type { IdentityService } from '../identity/identity-service.js';
import { HostUnavailableError, IdentityUnavailableError, errorMessage } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import type { DispatchResult, ExtractorDispatcher } from './dispatch.js';

export type WalkEvent =
  | { type: 'entity'; result: DispatchResult }
  | { type: 'skipped'; objectType: string; reason: string }
  | { type: 'aborted'; reason: string };

type VisitOutcome = 'extracted' | 'seen' | 'skipped';

export interface DocumentWalkerOptions {
  dispatcher: ExtractorDispatcher;
  identity: IdentityService;
  logger?: Logger;
}

export class DocumentWalker {
  private readonly dispatcher: ExtractorDispatcher;
  private readonly identity: IdentityService;
  private readonly logger: Logger;

  private document: HostDocument | undefined;
  private visited = new Set<string>();
  private skipped = new Set<HostEntity>();
  private expanded = new Set<HostEntity>();

  constructor(options: DocumentWalkerOptions) {
    this.dispatcher = options.dispatcher;
    this.identity = options.identity;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Walk the whole document. Ends with an 'aborted' event if the document
   * closes or the host becomes unavailable mid-walk.
   */
  *walk(document: HostDocument): Generator<WalkEvent, void, undefined> {
    this.document = document;
    this.visited = new Set();
    this.skipped = new Set();
    this.expanded = new Set();

    try {
      this.ensureOpen();
      yield* this.walkComponent(document.rootComponent);
    } catch (error) {
      if (!(error instanceof HostUnavailableError)) throw error;
      this.logger.warn(`Extraction aborted: ${error.message}`);
      yield { type: 'aborted', reason: error.message };
    } finally {
      this.document = undefined;
    }
  }

  private *walkComponent(component: HostComponent): Generator<WalkEvent, void, undefined> {
    if (!this.expand(component)) return;
    if ((yield* this.visit(component)) === 'seen') return;

    for (const feature of orderByTimeline(component.features)) {
      yield* this.walkFeature(feature);
    }
    for (const sketch of component.sketches) {
      yield* this.walkSketch(sketch);
    }
    for (const geometry of component.constructionGeometry) {
      yield* this.visit(geometry);
      yield* this.walkReferences(geometry.definingEntities);
    }
    for (const body of component.bodies) {
      yield* this.walkBody(body);
    }
    for (const parameter of component.parameters) {
      yield* this.walkParameter(parameter);
    }
    yield* this.walkReferences(component.otherMembers);
    for (const child of component.children) {
      yield* this.walkComponent(child);
    }
  }

  private *walkFeature(feature: HostFeature): Generator<WalkEvent, void, undefined> {
    if (!this.expand(feature)) return;
    for (const profile of feature.profiles) {
      if (profile.parentSketch) {
        yield* this.walkSketch(profile.parentSketch);
      }
      yield* this.visit(profile);
    }

    if ((yield* this.visit(feature)) === 'seen') return;

    for (const body of feature.bodies) {
      yield* this.walkBody(body);
    }
    yield* this.walkReferences(feature.edges);
    yield* this.walkReferences(feature.inputEntities);
    yield* this.walkReferences(feature.otherMembers);
  }

  private *walkSketch(sketch: HostSketch): Generator<WalkEvent, void, undefined> {
    if (!this.expand(sketch)) return;
    if ((yield* this.visit(sketch)) === 'seen') return;

    const points = sketch.points;
    const curves = sketch.curves;
    const dimensions = sketch.dimensions;
    const constraints = sketch.constraints;
    yield* this.visitAll(points);
    yield* this.visitAll(curves);
    yield* this.visitAll(dimensions);
    yield* this.visitAll(constraints);
    yield* this.visitAll(sketch.profiles);
    yield* this.walkReferences(sketch.otherMembers);

    for (const entity of [...points, ...curves, ...dimensions]) {
      if (entity.referencedEntity) yield* this.walkReference(entity.referencedEntity);
    }
    for (const point of points) {
      yield* this.walkReferences(point.connectedEntities);
    }
    for (const dimension of dimensions) {
      yield* this.walkReferences(dimension.measuredEntities);
    }
    for (const constraint of constraints) {
      yield* this.walkReferences(constraint.members.map(member => member.entity));
    }
  }

  private *walkBody(body: HostBRepBody): Generator<WalkEvent, void, undefined> {
    if (!this.expand(body)) return;
    if ((yield* this.visit(body)) === 'seen') return;

    yield* this.visitAll(body.faces);
    yield* this.visitAll(body.edges);
    yield* this.visitAll(body.vertices);
    for (const lump of body.lumps) {
      yield* this.visit(lump);
      yield* this.visitAll(lump.shells);
    }
    yield* this.walkReferences(body.otherMembers);
  }

  private *walkParameter(parameter: HostParameter): Generator<WalkEvent, void, undefined> {
    if (!this.expand(parameter)) return;
    if ((yield* this.visit(parameter)) === 'seen') return;

    if (parameter.createdBy) yield* this.walkReference(parameter.createdBy);
    for (const dependency of parameter.dependencies) {
      yield* this.walkParameter(dependency);
    }
  }

  /** False if the container was already expanded in this walk */
  private expand(container: HostEntity): boolean {
    if (this.expanded.has(container)) return false;
    this.expanded.add(container);
    return true;
  }

  private *visitAll(entities: readonly HostEntity[]): Generator<WalkEvent, void, undefined> {
    for (const entity of entities) {
      yield* this.visit(entity);
    }
  }

  private *walkReferences(entities: readonly HostEntity[]): Generator<WalkEvent, void, undefined> {
    for (const entity of entities) {
      yield* this.walkReference(entity);
    }
  }

  /**
   * Entities reached through a reference rather than their container:
   * containers are walked in full, anything else is extracted on its own.
   * Already-seen entities yield nothing.
   */
  private *walkReference(entity: HostEntity): Generator<WalkEvent, void, undefined> {
    switch (entity.kind) {
      case 'component':
        return yield* this.walkComponent(entity);
      case 'sketch':
        return yield* this.walkSketch(entity);
      case 'feature':
        return yield* this.walkFeature(entity);
      case 'brepBody':
        return yield* this.walkBody(entity);
      case 'parameter':
        return yield* this.walkParameter(entity);
      default:
        yield* this.visit(entity);
    }
  }

  /**
   * Extract one entity unless already seen. Identity and extractor failures
   * skip the entity; HostUnavailableError propagates to `walk`.
   */
  private *visit(entity: HostEntity): Generator<WalkEvent, VisitOutcome, undefined> {
    this.ensureOpen();
    if (this.skipped.has(entity)) return 'skipped';

    let result: DispatchResult;
    try {
      const stableId = this.identity.identityOf(entity);
      if (this.visited.has(stableId)) return 'seen';
      this.visited.add(stableId);
      result = this.dispatcher.extract(entity);
    } catch (error) {
      if (error instanceof HostUnavailableError) throw error;
      this.skipped.add(entity);
      const reason = errorMessage(error);
      if (error instanceof IdentityUnavailableError) {
        this.logger.debug(`Skipped ${entity.objectType}: ${reason}`);
      } else {
        this.logger.warn(`Skipped ${entity.objectType}: extraction failed: ${reason}`);
      }
      yield { type: 'skipped', objectType: entity.objectType, reason };
      return 'skipped';
    }

    yield { type: 'entity', result };
    return 'extracted';
  }

  private ensureOpen(): void {
    if (this.document && !this.document.isOpen) {
      throw new HostUnavailableError(`Document "${this.document.name}" was closed`);
    }
  }
}

/**
 * Features sorted by timelineIndex; ties and missing indices keep host
 * order, missing indices last.
 */
export function orderByTimeline(features: readonly HostFeature[]): HostFeature[] {
  return features
    .map((feature, position) => ({ feature, position, index: feature.timelineIndex }))
    .sort((a, b) => {
      if (a.index === undefined && b.index === undefined) return a.position - b.position;
      if (a.index === undefined) return 1;
      if (b.index === undefined) return -1;
      return a.index - b.index || a.position - b.position;
    })
    .map(entry => entry.feature);
}
