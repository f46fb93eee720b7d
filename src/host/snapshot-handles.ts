/**
 * Entity handles backed by a snapshot record.
 *
 * Every accessor goes through the owning document, so once the document is
 * closed any read throws HostUnavailableError, as a live host would.
 * References resolve lazily by token; a reference of the wrong kind reads
 * as absent from its typed accessor, and containers report such entities
 * through `otherMembers`. Scalar properties of the wrong JSON type read as undefined.
 */

import {
  isBRepBody,
  isBRepEdge,
  isBRepFace,
  isBRepVertex,
  isBRepLump,
  isBRepShell,
  isComponent,
  isConstructionGeometry,
  isFeature,
  isParameter,
  isProfile,
  isSketch,
  isSketchConstraint,
  isSketchCurveEntity,
  isSketchDimension,
  isSketchPoint,
  isAnyEntity,
  type EntityKind,
  type HostBRepBody,
  type HostBRepEdge,
  type HostBRepFace,
  type HostBRepLump,
  type HostBRepShell,
  type HostBRepVertex,
  type HostComponent,
  type HostConstraintMember,
  type HostConstructionGeometry,
  type HostEntity,
  type HostFeature,
  type HostParameter,
  type HostProfile,
  type HostSketch,
  type HostSketchConstraint,
  type HostSketchArc,
  type HostSketchCircle,
  type HostSketchCurve,
  type HostSketchCurveEntity,
  type HostSketchDimension,
  type HostSketchLine,
  type HostSketchPoint,
  type HostUnknownEntity,
  type ParameterValue,
  type Point3D,
} from './types.js';

export type SnapshotJsonValue =
  | string
  | number
  | boolean
  | null
  | SnapshotJsonValue[]
  | { [key: string]: SnapshotJsonValue };

export interface SnapshotEntityRecord {
  token: string;
  objectType: string;
  kind: EntityKind;
  /** Transient entities expose no token to the pipeline */
  transient: boolean;
  name?: string;
  properties: Record<string, SnapshotJsonValue>;
  refs: Record<string, string | string[]>;
}

type EntityGuard = (entity: HostEntity) => boolean;

/** What a handle needs from its document */
export interface SnapshotResolver {
  assertOpen(): void;
  resolve(token: string): HostEntity | undefined;
}

abstract class SnapshotHandle {
  constructor(
    protected readonly resolver: SnapshotResolver,
    protected readonly record: SnapshotEntityRecord
  ) {}

  get objectType(): string {
    return this.record.objectType;
  }

  get entityToken(): string | undefined {
    this.resolver.assertOpen();
    return this.record.transient ? undefined : this.record.token;
  }

  get name(): string | undefined {
    this.resolver.assertOpen();
    return this.record.name;
  }

  protected number(key: string): number | undefined {
    const value = this.property(key);
    return typeof value === 'number' ? value : undefined;
  }

  protected string(key: string): string | undefined {
    const value = this.property(key);
    return typeof value === 'string' ? value : undefined;
  }

  protected boolean(key: string): boolean | undefined {
    const value = this.property(key);
    return typeof value === 'boolean' ? value : undefined;
  }

  /** Accepts `{x, y, z}` or `[x, y, z]` */
  protected point(key: string): Point3D | undefined {
    return toPoint3D(this.property(key));
  }

  protected parameterMap(key: string): Record<string, ParameterValue> {
    const value = this.property(key);
    const parameters: Record<string, ParameterValue> = {};
    if (!isJsonObject(value)) return parameters;
    for (const [name, parameter] of Object.entries(value)) {
      if (typeof parameter === 'number' || typeof parameter === 'string' || typeof parameter === 'boolean') {
        parameters[name] = parameter;
      }
    }
    return parameters;
  }

  protected ref<T extends HostEntity>(key: string, guard: (entity: HostEntity) => entity is T): T | undefined {
    this.resolver.assertOpen();
    const token = this.record.refs[key];
    if (typeof token !== 'string') return undefined;
    const entity = this.resolver.resolve(token);
    return entity && guard(entity) ? entity : undefined;
  }

  protected refs<T extends HostEntity>(key: string, guard: (entity: HostEntity) => entity is T): T[] {
    this.resolver.assertOpen();
    const tokens = this.record.refs[key];
    if (!Array.isArray(tokens)) return [];
    const entities: T[] = [];
    for (const token of tokens) {
      const entity = this.resolver.resolve(token);
      if (entity && guard(entity)) entities.push(entity);
    }
    return entities;
  }

  /**
   * Entities under any list reference that the typed collection for that
   * key rejects. Lists with no typed collection contribute every entity.
   */
  protected unmatchedMembers(collections: ReadonlyMap<string, EntityGuard>): HostEntity[] {
    this.resolver.assertOpen();
    const others: HostEntity[] = [];
    for (const [key, tokens] of Object.entries(this.record.refs)) {
      if (!Array.isArray(tokens)) continue;
      const accepts = collections.get(key);
      for (const token of tokens) {
        const entity = this.resolver.resolve(token);
        if (!entity || accepts?.(entity) || others.includes(entity)) continue;
        others.push(entity);
      }
    }
    return others;
  }

  /** Every reference except `excluded`, tagged with its key */
  protected namedRefs(excluded: readonly string[]): HostConstraintMember[] {
    this.resolver.assertOpen();
    const members: HostConstraintMember[] = [];
    for (const [role, value] of Object.entries(this.record.refs)) {
      if (excluded.includes(role)) continue;
      for (const token of Array.isArray(value) ? value : [value]) {
        const entity = this.resolver.resolve(token);
        if (entity) members.push({ role, entity });
      }
    }
    return members;
  }

  private property(key: string): SnapshotJsonValue | undefined {
    this.resolver.assertOpen();
    return this.record.properties[key];
  }
}

// ============================================
// Design tree
// ============================================

const COMPONENT_COLLECTIONS = new Map<string, EntityGuard>([
  ['sketches', isSketch],
  ['features', isFeature],
  ['bodies', isBRepBody],
  ['children', isComponent],
  ['parameters', isParameter],
  ['constructionGeometry', isConstructionGeometry],
]);

const SKETCH_COLLECTIONS = new Map<string, EntityGuard>([
  ['points', isSketchPoint],
  ['curves', isSketchCurveEntity],
  ['dimensions', isSketchDimension],
  ['constraints', isSketchConstraint],
  ['profiles', isProfile],
]);

const FEATURE_COLLECTIONS = new Map<string, EntityGuard>([
  ['profiles', isProfile],
  ['bodies', isBRepBody],
  ['startFaces', isBRepFace],
  ['endFaces', isBRepFace],
  ['sideFaces', isBRepFace],
  ['edges', isBRepEdge],
  ['inputEntities', isAnyEntity],
]);

const BODY_COLLECTIONS = new Map<string, EntityGuard>([
  ['faces', isBRepFace],
  ['edges', isBRepEdge],
  ['vertices', isBRepVertex],
  ['lumps', isBRepLump],
]);

class SnapshotComponent extends SnapshotHandle implements HostComponent {
  readonly kind = 'component';
  get isRoot() { return this.boolean('isRoot') ?? false; }
  get partNumber() { return this.string('partNumber'); }
  get description() { return this.string('description'); }
  get volume() { return this.number('volume'); }
  get parentComponent() { return this.ref('parentComponent', isComponent); }
  get sketches() { return this.refs('sketches', isSketch); }
  get features() { return this.refs('features', isFeature); }
  get bodies() { return this.refs('bodies', isBRepBody); }
  get children() { return this.refs('children', isComponent); }
  get parameters() { return this.refs('parameters', isParameter); }
  get constructionGeometry() { return this.refs('constructionGeometry', isConstructionGeometry); }
  get otherMembers() { return this.unmatchedMembers(COMPONENT_COLLECTIONS); }
}

class SnapshotSketch extends SnapshotHandle implements HostSketch {
  readonly kind = 'sketch';
  get timelineIndex() { return this.number('timelineIndex'); }
  get isVisible() { return this.boolean('isVisible'); }
  get isParametric() { return this.boolean('isParametric'); }
  get healthState() { return this.string('healthState'); }
  get origin() { return this.point('origin'); }
  get xDirection() { return this.point('xDirection'); }
  get yDirection() { return this.point('yDirection'); }
  get parentComponent() { return this.ref('parentComponent', isComponent); }
  get points() { return this.refs('points', isSketchPoint); }
  get curves() { return this.refs('curves', isSketchCurveEntity); }
  get dimensions() { return this.refs('dimensions', isSketchDimension); }
  get constraints() { return this.refs('constraints', isSketchConstraint); }
  get profiles() { return this.refs('profiles', isProfile); }
  get otherMembers() { return this.unmatchedMembers(SKETCH_COLLECTIONS); }
}

// ============================================
// Sketch entities
// ============================================

abstract class SnapshotSketchEntity extends SnapshotHandle {
  get parentSketch() { return this.ref('parentSketch', isSketch); }
  get isReference() { return this.boolean('isReference'); }
  get isFixed() { return this.boolean('isFixed'); }
  get isVisible() { return this.boolean('isVisible'); }
  get referencedEntity() { return this.ref('referencedEntity', isAnyEntity); }
}

class SnapshotSketchPoint extends SnapshotSketchEntity implements HostSketchPoint {
  readonly kind = 'sketchPoint';
  get geometry() { return this.point('geometry'); }
  get connectedEntities() { return this.refs('connectedEntities', isAnyEntity); }
}

abstract class SnapshotSketchCurveBase extends SnapshotSketchEntity {
  get isConstruction() { return this.boolean('isConstruction'); }
  get length() { return this.number('length'); }
}

class SnapshotSketchLine extends SnapshotSketchCurveBase implements HostSketchLine {
  readonly kind = 'sketchLine';
  get startPoint() { return this.ref('startPoint', isSketchPoint); }
  get endPoint() { return this.ref('endPoint', isSketchPoint); }
}

class SnapshotSketchArc extends SnapshotSketchCurveBase implements HostSketchArc {
  readonly kind = 'sketchArc';
  get centerPoint() { return this.ref('centerPoint', isSketchPoint); }
  get startPoint() { return this.ref('startPoint', isSketchPoint); }
  get endPoint() { return this.ref('endPoint', isSketchPoint); }
  get radius() { return this.number('radius'); }
  get startAngle() { return this.number('startAngle'); }
  get endAngle() { return this.number('endAngle'); }
}

class SnapshotSketchCircle extends SnapshotSketchCurveBase implements HostSketchCircle {
  readonly kind = 'sketchCircle';
  get centerPoint() { return this.ref('centerPoint', isSketchPoint); }
  get radius() { return this.number('radius'); }
}

class SnapshotSketchCurve extends SnapshotSketchCurveBase implements HostSketchCurve {
  readonly kind = 'sketchCurve';
  get curveKind() { return this.string('curveKind'); }
  get isClosed() { return this.boolean('isClosed'); }
  get definingPoints() { return this.refs('definingPoints', isSketchPoint); }
}

class SnapshotSketchDimension extends SnapshotSketchEntity implements HostSketchDimension {
  readonly kind = 'sketchDimension';
  get dimensionKind() { return this.string('dimensionKind'); }
  get value() { return this.number('value'); }
  get parameterName() { return this.string('parameterName'); }
  get expression() { return this.string('expression'); }
  get isDriving() { return this.boolean('isDriving'); }
  get measuredEntities() { return this.refs('measuredEntities', isAnyEntity); }
}

class SnapshotSketchConstraint extends SnapshotHandle implements HostSketchConstraint {
  readonly kind = 'sketchConstraint';
  get parentSketch() { return this.ref('parentSketch', isSketch); }
  get isDeletable() { return this.boolean('isDeletable'); }
  get isSuppressed() { return this.boolean('isSuppressed'); }
  get parameters() { return this.parameterMap('parameters'); }
  get members() { return this.namedRefs(['parentSketch']); }
}

class SnapshotProfile extends SnapshotHandle implements HostProfile {
  readonly kind = 'profile';
  get parentSketch() { return this.ref('parentSketch', isSketch); }
  get curves(): HostSketchCurveEntity[] { return this.refs('curves', isSketchCurveEntity); }
  get area() { return this.number('area'); }
  get perimeter() { return this.number('perimeter'); }
  get centroid() { return this.point('centroid'); }
  get loopCount() { return this.number('loopCount'); }
}

// ============================================
// Features and topology
// ============================================

class SnapshotFeature extends SnapshotHandle implements HostFeature {
  readonly kind = 'feature';
  get timelineIndex() { return this.number('timelineIndex'); }
  get isSuppressed() { return this.boolean('isSuppressed'); }
  get isParametric() { return this.boolean('isParametric'); }
  get healthState() { return this.string('healthState'); }
  get errorOrWarningMessage() { return this.string('errorOrWarningMessage'); }
  get operation() { return this.string('operation'); }
  get parentComponent() { return this.ref('parentComponent', isComponent); }
  get profiles() { return this.refs('profiles', isProfile); }
  get bodies() { return this.refs('bodies', isBRepBody); }
  get startFaces() { return this.refs('startFaces', isBRepFace); }
  get endFaces() { return this.refs('endFaces', isBRepFace); }
  get sideFaces() { return this.refs('sideFaces', isBRepFace); }
  get edges() { return this.refs('edges', isBRepEdge); }
  get inputEntities() { return this.refs('inputEntities', isAnyEntity); }
  get parameters() { return this.parameterMap('parameters'); }
  get otherMembers() { return this.unmatchedMembers(FEATURE_COLLECTIONS); }
}

class SnapshotParameter extends SnapshotHandle implements HostParameter {
  readonly kind = 'parameter';
  get value() { return this.number('value'); }
  get expression() { return this.string('expression'); }
  get unit() { return this.string('unit'); }
  get comment() { return this.string('comment'); }
  get isFavorite() { return this.boolean('isFavorite'); }
  get isDeletable() { return this.boolean('isDeletable'); }
  get role() { return this.string('role'); }
  get parentComponent() { return this.ref('parentComponent', isComponent); }
  get createdBy() { return this.ref('createdBy', isAnyEntity); }
  get dependencies() { return this.refs('dependencies', isParameter); }
}

class SnapshotConstructionGeometry extends SnapshotHandle implements HostConstructionGeometry {
  readonly kind = 'constructionGeometry';
  get timelineIndex() { return this.number('timelineIndex'); }
  get isParametric() { return this.boolean('isParametric'); }
  get isVisible() { return this.boolean('isVisible'); }
  get healthState() { return this.string('healthState'); }
  get errorOrWarningMessage() { return this.string('errorOrWarningMessage'); }
  get definitionKind() { return this.string('definitionKind'); }
  get origin() { return this.point('origin'); }
  get direction() { return this.point('direction'); }
  get parameters() { return this.parameterMap('parameters'); }
  get parentComponent() { return this.ref('parentComponent', isComponent); }
  get definingEntities() { return this.refs('definingEntities', isAnyEntity); }
}

class SnapshotBRepBody extends SnapshotHandle implements HostBRepBody {
  readonly kind = 'brepBody';
  get isSolid() { return this.boolean('isSolid'); }
  get isVisible() { return this.boolean('isVisible'); }
  get area() { return this.number('area'); }
  get volume() { return this.number('volume'); }
  get parentComponent() { return this.ref('parentComponent', isComponent); }
  get faces() { return this.refs('faces', isBRepFace); }
  get edges() { return this.refs('edges', isBRepEdge); }
  get vertices() { return this.refs('vertices', isBRepVertex); }
  get lumps() { return this.refs('lumps', isBRepLump); }
  get otherMembers() { return this.unmatchedMembers(BODY_COLLECTIONS); }
}

class SnapshotBRepLump extends SnapshotHandle implements HostBRepLump {
  readonly kind = 'brepLump';
  get area() { return this.number('area'); }
  get volume() { return this.number('volume'); }
  get body() { return this.ref('body', isBRepBody); }
  get shells() { return this.refs('shells', isBRepShell); }
}

class SnapshotBRepShell extends SnapshotHandle implements HostBRepShell {
  readonly kind = 'brepShell';
  get isClosed() { return this.boolean('isClosed'); }
  get isVoid() { return this.boolean('isVoid'); }
  get area() { return this.number('area'); }
  get volume() { return this.number('volume'); }
  get lump() { return this.ref('lump', isBRepLump); }
  get body() { return this.ref('body', isBRepBody); }
  get faces() { return this.refs('faces', isBRepFace); }
}

class SnapshotBRepFace extends SnapshotHandle implements HostBRepFace {
  readonly kind = 'brepFace';
  get surfaceKind() { return this.string('surfaceKind'); }
  get area() { return this.number('area'); }
  get isParamReversed() { return this.boolean('isParamReversed'); }
  get centroid() { return this.point('centroid'); }
  get body() { return this.ref('body', isBRepBody); }
  get edges() { return this.refs('edges', isBRepEdge); }
}

class SnapshotBRepEdge extends SnapshotHandle implements HostBRepEdge {
  readonly kind = 'brepEdge';
  get curveKind() { return this.string('curveKind'); }
  get length() { return this.number('length'); }
  get isDegenerate() { return this.boolean('isDegenerate'); }
  get isTolerant() { return this.boolean('isTolerant'); }
  get tolerance() { return this.number('tolerance'); }
  get body() { return this.ref('body', isBRepBody); }
  get startVertex() { return this.ref('startVertex', isBRepVertex); }
  get endVertex() { return this.ref('endVertex', isBRepVertex); }
  get faces() { return this.refs('faces', isBRepFace); }
}

class SnapshotBRepVertex extends SnapshotHandle implements HostBRepVertex {
  readonly kind = 'brepVertex';
  get geometry() { return this.point('geometry'); }
  get isTolerant() { return this.boolean('isTolerant'); }
  get tolerance() { return this.number('tolerance'); }
  get body() { return this.ref('body', isBRepBody); }
}

class SnapshotUnknownEntity extends SnapshotHandle implements HostUnknownEntity {
  readonly kind = 'unknown';
}

/**
 * Wrap a record in the handle class for its kind.
 */
export function createSnapshotHandle(resolver: SnapshotResolver, record: SnapshotEntityRecord): HostEntity {
  switch (record.kind) {
    case 'component': return new SnapshotComponent(resolver, record);
    case 'sketch': return new SnapshotSketch(resolver, record);
    case 'sketchPoint': return new SnapshotSketchPoint(resolver, record);
    case 'sketchLine': return new SnapshotSketchLine(resolver, record);
    case 'sketchArc': return new SnapshotSketchArc(resolver, record);
    case 'sketchCircle': return new SnapshotSketchCircle(resolver, record);
    case 'sketchCurve': return new SnapshotSketchCurve(resolver, record);
    case 'sketchDimension': return new SnapshotSketchDimension(resolver, record);
    case 'sketchConstraint': return new SnapshotSketchConstraint(resolver, record);
    case 'profile': return new SnapshotProfile(resolver, record);
    case 'feature': return new SnapshotFeature(resolver, record);
    case 'parameter': return new SnapshotParameter(resolver, record);
    case 'constructionGeometry': return new SnapshotConstructionGeometry(resolver, record);
    case 'brepBody': return new SnapshotBRepBody(resolver, record);
    case 'brepLump': return new SnapshotBRepLump(resolver, record);
    case 'brepShell': return new SnapshotBRepShell(resolver, record);
    case 'brepFace': return new SnapshotBRepFace(resolver, record);
    case 'brepEdge': return new SnapshotBRepEdge(resolver, record);
    case 'brepVertex': return new SnapshotBRepVertex(resolver, record);
    case 'unknown': return new SnapshotUnknownEntity(resolver, record);
  }
}

export function isJsonObject(value: unknown): value is { [key: string]: SnapshotJsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPoint3D(value: SnapshotJsonValue | undefined): Point3D | undefined {
  if (Array.isArray(value)) {
    const [x, y, z] = value;
    if (typeof x === 'number' && typeof y === 'number' && typeof z === 'number') {
      return { x, y, z };
    }
    return undefined;
  }
  if (isJsonObject(value)) {
    const { x, y, z } = value;
    if (typeof x === 'number' && typeof y === 'number' && typeof z === 'number') {
      return { x, y, z };
    }
  }
  return undefined;
}
