/**
 * Host Object Model
 *
 * Read-only view of a CAD design as the host application exposes it.
 * Every handle carries a `kind` (its entity family) and an `objectType`
 * (the host's concrete class name, e.g. 'ExtrudeFeature').
 *
 * Accessors may throw HostUnavailableError once the document is closed.
 */

export interface Point3D {
  x: number;
  y: number;
  z: number;
}

export type EntityKind =
  | 'component'
  | 'sketch'
  | 'sketchPoint'
  | 'sketchLine'
  | 'sketchArc'
  | 'sketchCircle'
  | 'sketchCurve'
  | 'sketchDimension'
  | 'sketchConstraint'
  | 'profile'
  | 'feature'
  | 'parameter'
  | 'constructionGeometry'
  | 'brepBody'
  | 'brepLump'
  | 'brepShell'
  | 'brepFace'
  | 'brepEdge'
  | 'brepVertex'
  | 'unknown';

export type ParameterValue = string | number | boolean;

interface HostEntityBase {
  readonly kind: EntityKind;
  /** Host class name, possibly namespaced ('adsk::fusion::SketchLine') */
  readonly objectType: string;
  /** Persistent token; undefined for transient or virtual entities */
  readonly entityToken: string | undefined;
  readonly name?: string;
}

/**
 * Entities a container lists that none of its typed collections accept:
 * unrecognized classes, or known entities filed under an unexpected key.
 */
interface HostContainer {
  readonly otherMembers: readonly HostEntity[];
}

// ============================================
// Design tree
// ============================================

export interface HostComponent extends HostEntityBase, HostContainer {
  readonly kind: 'component';
  readonly isRoot: boolean;
  readonly partNumber?: string;
  readonly description?: string;
  readonly volume?: number;
  readonly parentComponent?: HostComponent;
  readonly sketches: readonly HostSketch[];
  /** Features in the order the host enumerates them */
  readonly features: readonly HostFeature[];
  readonly bodies: readonly HostBRepBody[];
  readonly children: readonly HostComponent[];
  /** Model and user parameters owned by this component */
  readonly parameters: readonly HostParameter[];
  /** Construction planes, axes and points */
  readonly constructionGeometry: readonly HostConstructionGeometry[];
}

export interface HostSketch extends HostEntityBase, HostContainer {
  readonly kind: 'sketch';
  readonly timelineIndex?: number;
  readonly isVisible?: boolean;
  readonly isParametric?: boolean;
  readonly healthState?: string;
  readonly origin?: Point3D;
  readonly xDirection?: Point3D;
  readonly yDirection?: Point3D;
  readonly parentComponent?: HostComponent;
  readonly points: readonly HostSketchPoint[];
  readonly curves: readonly HostSketchCurveEntity[];
  readonly dimensions: readonly HostSketchDimension[];
  readonly constraints: readonly HostSketchConstraint[];
  readonly profiles: readonly HostProfile[];
}

// ============================================
// Sketch entities
// ============================================

interface HostSketchEntityBase extends HostEntityBase {
  readonly parentSketch?: HostSketch;
  readonly isReference?: boolean;
  readonly isFixed?: boolean;
  readonly isVisible?: boolean;
  /** Source entity when this sketch entity is a projection */
  readonly referencedEntity?: HostEntity;
}

export interface HostSketchPoint extends HostSketchEntityBase {
  readonly kind: 'sketchPoint';
  readonly geometry?: Point3D;
  readonly connectedEntities: readonly HostEntity[];
}

interface HostSketchCurveBase extends HostSketchEntityBase {
  readonly isConstruction?: boolean;
  readonly length?: number;
}

export interface HostSketchLine extends HostSketchCurveBase {
  readonly kind: 'sketchLine';
  readonly startPoint?: HostSketchPoint;
  readonly endPoint?: HostSketchPoint;
}

export interface HostSketchArc extends HostSketchCurveBase {
  readonly kind: 'sketchArc';
  readonly centerPoint?: HostSketchPoint;
  readonly startPoint?: HostSketchPoint;
  readonly endPoint?: HostSketchPoint;
  readonly radius?: number;
  readonly startAngle?: number;
  readonly endAngle?: number;
}

export interface HostSketchCircle extends HostSketchCurveBase {
  readonly kind: 'sketchCircle';
  readonly centerPoint?: HostSketchPoint;
  readonly radius?: number;
}

/** Splines, ellipses and any other sketch curve without a dedicated handle */
export interface HostSketchCurve extends HostSketchCurveBase {
  readonly kind: 'sketchCurve';
  readonly curveKind?: string;
  readonly isClosed?: boolean;
  readonly definingPoints: readonly HostSketchPoint[];
}

export type HostSketchCurveEntity =
  | HostSketchLine
  | HostSketchArc
  | HostSketchCircle
  | HostSketchCurve;

export interface HostSketchDimension extends HostSketchEntityBase {
  readonly kind: 'sketchDimension';
  readonly dimensionKind?: string;
  readonly value?: number;
  readonly parameterName?: string;
  readonly expression?: string;
  readonly isDriving?: boolean;
  readonly measuredEntities: readonly HostEntity[];
}

export interface HostConstraintMember {
  /** Host accessor the entity was read from ('lineOne', 'point', ...) */
  readonly role: string;
  readonly entity: HostEntity;
}

export interface HostSketchConstraint extends HostEntityBase {
  readonly kind: 'sketchConstraint';
  readonly parentSketch?: HostSketch;
  readonly isDeletable?: boolean;
  readonly isSuppressed?: boolean;
  /** Offset distance, pattern angle and similar numeric settings */
  readonly parameters: Readonly<Record<string, ParameterValue>>;
  readonly members: readonly HostConstraintMember[];
}

export interface HostProfile extends HostEntityBase {
  readonly kind: 'profile';
  readonly parentSketch?: HostSketch;
  /** Boundary curves in host order; the order is meaningful */
  readonly curves: readonly HostSketchCurveEntity[];
  readonly area?: number;
  readonly perimeter?: number;
  readonly centroid?: Point3D;
  readonly loopCount?: number;
}

// ============================================
// Features
// ============================================

export interface HostFeature extends HostEntityBase, HostContainer {
  readonly kind: 'feature';
  readonly timelineIndex?: number;
  readonly isSuppressed?: boolean;
  readonly isParametric?: boolean;
  readonly healthState?: string;
  readonly errorOrWarningMessage?: string;
  readonly operation?: string;
  readonly parentComponent?: HostComponent;
  readonly profiles: readonly HostProfile[];
  readonly bodies: readonly HostBRepBody[];
  readonly startFaces: readonly HostBRepFace[];
  readonly endFaces: readonly HostBRepFace[];
  readonly sideFaces: readonly HostBRepFace[];
  /** Edges a fillet or chamfer rounds off */
  readonly edges: readonly HostBRepEdge[];
  /** Features, bodies or faces a pattern repeats */
  readonly inputEntities: readonly HostEntity[];
  /** Feature-specific parameters (distance, taperAngle, angle, ...) */
  readonly parameters: Readonly<Record<string, ParameterValue>>;
}

export interface HostParameter extends HostEntityBase {
  readonly kind: 'parameter';
  readonly value?: number;
  readonly expression?: string;
  readonly unit?: string;
  readonly comment?: string;
  readonly isFavorite?: boolean;
  readonly isDeletable?: boolean;
  /** Role within the creating feature, e.g. 'AlongDistance' */
  readonly role?: string;
  readonly parentComponent?: HostComponent;
  /** Feature or sketch dimension that created a model parameter */
  readonly createdBy?: HostEntity;
  /** Parameters this parameter's expression refers to */
  readonly dependencies: readonly HostParameter[];
}

/** Construction planes, axes and points */
export interface HostConstructionGeometry extends HostEntityBase {
  readonly kind: 'constructionGeometry';
  readonly timelineIndex?: number;
  readonly isParametric?: boolean;
  readonly isVisible?: boolean;
  readonly healthState?: string;
  readonly errorOrWarningMessage?: string;
  /** How the host defined it: 'Offset', 'AtAngle', 'TwoPlanes', ... */
  readonly definitionKind?: string;
  readonly origin?: Point3D;
  /** Plane normal or axis direction */
  readonly direction?: Point3D;
  readonly parameters: Readonly<Record<string, ParameterValue>>;
  readonly parentComponent?: HostComponent;
  /** Entities named by the definition, in host order */
  readonly definingEntities: readonly HostEntity[];
}

// ============================================
// BRep topology
// ============================================

export interface HostBRepBody extends HostEntityBase, HostContainer {
  readonly kind: 'brepBody';
  readonly isSolid?: boolean;
  readonly isVisible?: boolean;
  readonly area?: number;
  readonly volume?: number;
  readonly parentComponent?: HostComponent;
  readonly faces: readonly HostBRepFace[];
  readonly edges: readonly HostBRepEdge[];
  readonly vertices: readonly HostBRepVertex[];
  readonly lumps: readonly HostBRepLump[];
}

export interface HostBRepLump extends HostEntityBase {
  readonly kind: 'brepLump';
  readonly area?: number;
  readonly volume?: number;
  readonly body?: HostBRepBody;
  readonly shells: readonly HostBRepShell[];
}

export interface HostBRepShell extends HostEntityBase {
  readonly kind: 'brepShell';
  readonly isClosed?: boolean;
  readonly isVoid?: boolean;
  readonly area?: number;
  readonly volume?: number;
  readonly lump?: HostBRepLump;
  readonly body?: HostBRepBody;
  readonly faces: readonly HostBRepFace[];
}

export interface HostBRepFace extends HostEntityBase {
  readonly kind: 'brepFace';
  readonly surfaceKind?: string;
  readonly area?: number;
  readonly isParamReversed?: boolean;
  readonly centroid?: Point3D;
  readonly body?: HostBRepBody;
  readonly edges: readonly HostBRepEdge[];
}

export interface HostBRepEdge extends HostEntityBase {
  readonly kind: 'brepEdge';
  readonly curveKind?: string;
  readonly length?: number;
  readonly isDegenerate?: boolean;
  readonly isTolerant?: boolean;
  readonly tolerance?: number;
  readonly body?: HostBRepBody;
  readonly startVertex?: HostBRepVertex;
  readonly endVertex?: HostBRepVertex;
  /** Faces using this edge, as the host reports them */
  readonly faces: readonly HostBRepFace[];
}

export interface HostBRepVertex extends HostEntityBase {
  readonly kind: 'brepVertex';
  readonly geometry?: Point3D;
  readonly isTolerant?: boolean;
  readonly tolerance?: number;
  readonly body?: HostBRepBody;
}

export interface HostUnknownEntity extends HostEntityBase {
  readonly kind: 'unknown';
}

export type HostEntity =
  | HostComponent
  | HostSketch
  | HostSketchPoint
  | HostSketchCurveEntity
  | HostSketchDimension
  | HostSketchConstraint
  | HostProfile
  | HostFeature
  | HostParameter
  | HostConstructionGeometry
  | HostBRepBody
  | HostBRepLump
  | HostBRepShell
  | HostBRepFace
  | HostBRepEdge
  | HostBRepVertex
  | HostUnknownEntity;

export type HostEntityOfKind<K extends EntityKind> = Extract<HostEntity, { kind: K }>;

export interface HostDocument {
  readonly name: string;
  /** False once the user closed the document */
  readonly isOpen: boolean;
  readonly rootComponent: HostComponent;
}

// ============================================
// Type guards
// ============================================

export const isComponent = (e: HostEntity): e is HostComponent => e.kind === 'component';
export const isSketch = (e: HostEntity): e is HostSketch => e.kind === 'sketch';
export const isSketchPoint = (e: HostEntity): e is HostSketchPoint => e.kind === 'sketchPoint';
export const isSketchDimension = (e: HostEntity): e is HostSketchDimension => e.kind === 'sketchDimension';
export const isSketchConstraint = (e: HostEntity): e is HostSketchConstraint => e.kind === 'sketchConstraint';
export const isProfile = (e: HostEntity): e is HostProfile => e.kind === 'profile';
export const isFeature = (e: HostEntity): e is HostFeature => e.kind === 'feature';
export const isParameter = (e: HostEntity): e is HostParameter => e.kind === 'parameter';
export const isConstructionGeometry = (e: HostEntity): e is HostConstructionGeometry =>
  e.kind === 'constructionGeometry';
export const isBRepBody = (e: HostEntity): e is HostBRepBody => e.kind === 'brepBody';
export const isBRepLump = (e: HostEntity): e is HostBRepLump => e.kind === 'brepLump';
export const isBRepShell = (e: HostEntity): e is HostBRepShell => e.kind === 'brepShell';
export const isBRepFace = (e: HostEntity): e is HostBRepFace => e.kind === 'brepFace';
export const isBRepEdge = (e: HostEntity): e is HostBRepEdge => e.kind === 'brepEdge';
export const isBRepVertex = (e: HostEntity): e is HostBRepVertex => e.kind === 'brepVertex';
export const isAnyEntity = (_e: HostEntity): _e is HostEntity => true;

export function isSketchCurveEntity(e: HostEntity): e is HostSketchCurveEntity {
  return (
    e.kind === 'sketchLine' ||
    e.kind === 'sketchArc' ||
    e.kind === 'sketchCircle' ||
    e.kind === 'sketchCurve'
  );
}

// ============================================
// Object type classification
// ============================================

const OBJECT_TYPE_KINDS = new Map<string, EntityKind>(Object.entries({
  Component: 'component',
  Sketch: 'sketch',
  SketchPoint: 'sketchPoint',
  SketchLine: 'sketchLine',
  SketchArc: 'sketchArc',
  SketchCircle: 'sketchCircle',
  SketchCurve: 'sketchCurve',
  SketchFittedSpline: 'sketchCurve',
  SketchFixedSpline: 'sketchCurve',
  SketchControlPointSpline: 'sketchCurve',
  SketchEllipse: 'sketchCurve',
  SketchEllipticalArc: 'sketchCurve',
  SketchConicCurve: 'sketchCurve',
  Profile: 'profile',
  ModelParameter: 'parameter',
  UserParameter: 'parameter',
  ConstructionPlane: 'constructionGeometry',
  ConstructionAxis: 'constructionGeometry',
  ConstructionPoint: 'constructionGeometry',
  BRepBody: 'brepBody',
  BRepLump: 'brepLump',
  BRepShell: 'brepShell',
  BRepFace: 'brepFace',
  BRepEdge: 'brepEdge',
  BRepVertex: 'brepVertex',
} satisfies Record<string, EntityKind>));

/**
 * Strip a host namespace: 'adsk::fusion::SketchLine' -> 'SketchLine'
 */
export function simplifyObjectType(objectType: string): string {
  const parts = objectType.split('::');
  return parts[parts.length - 1];
}

/**
 * Entity family of a host class name. Feature, dimension and constraint
 * subclasses are recognised by suffix; anything else is 'unknown'.
 */
export function kindForObjectType(objectType: string): EntityKind {
  const simple = simplifyObjectType(objectType);
  const known = OBJECT_TYPE_KINDS.get(simple);
  if (known) return known;
  if (simple.length > 'Feature'.length && simple.endsWith('Feature')) return 'feature';
  if (simple.startsWith('Sketch') && simple.endsWith('Dimension')) return 'sketchDimension';
  if (simple.length > 'Constraint'.length && simple.endsWith('Constraint')) return 'sketchConstraint';
  return 'unknown';
}
