export {
  SketchPointExtractor,
  SketchLineExtractor,
  SketchArcExtractor,
  SketchCircleExtractor,
  GenericSketchCurveExtractor,
  SketchDimensionExtractor,
  dimensionKindFromObjectType,
} from './sketch-entity-extractors.js';
export { SketchExtractor, ProfileExtractor } from './sketch-extractors.js';
export {
  FeatureExtractor,
  ExtrudeFeatureExtractor,
  RevolveFeatureExtractor,
  HoleFeatureExtractor,
  EdgeTreatmentFeatureExtractor,
  PatternFeatureExtractor,
  featureKindFromObjectType,
} from './feature-extractors.js';
export {
  BRepBodyExtractor,
  BRepLumpExtractor,
  BRepShellExtractor,
  BRepFaceExtractor,
  BRepEdgeExtractor,
  BRepVertexExtractor,
} from './brep-extractors.js';
export { SketchConstraintExtractor, constraintKindFromObjectType } from './sketch-constraint-extractor.js';
export { ParameterExtractor } from './parameter-extractor.js';
export { ConstructionGeometryExtractor } from './construction-geometry-extractor.js';
export { ComponentExtractor } from './component-extractor.js';
export { FallbackExtractor } from './fallback-extractor.js';
