export { GraphTransformer, type GraphTransformerOptions } from './graph-transformer.js';
export { TimelinePass, sortByTimeline } from './timeline-pass.js';
export { AdjacencyPass, adjacentPairs, ADJACENCY_OWNER_LABELS } from './adjacency-pass.js';
export type { DerivationPass, PassName, PassResult } from './types.js';
