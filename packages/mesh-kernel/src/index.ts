// Public API
export { Mesh } from './mesh.js';
export type { ElementCategory } from './mesh.js';

// Elements
export { Point, ProjectedPoint, toVec3 } from './point.js';
export type { PointLike, PointKind, Operand, RotateOptions } from './point.js';
export { Geometry, TriSurfaceMesh } from './geometry.js';
export type { GeometryKind } from './geometry.js';
export { Block } from './block.js';
export type { GradingType, CellCounts, VertexRef } from './block.js';
export { Patch, DefaultPatch, PatchPair, ProjectedFace } from './patch.js';
export type { FacePoints } from './patch.js';

// Edges
export {
  BaseEdge, LineEdge, ArcMidEdge, ArcOriginEdge, SequenceEdge, ProjectEdge,
  line, arc, arcOrigin, sequence, spline, bspline, polyLine, project,
  simplifyPoints,
} from './edge.js';
export type { Edge, EdgeKind, SequenceKind } from './edge.js';

// Topology tables
export {
  FACE_TABLE, FACE_LABELS, EDGE_TABLE,
  isFaceLabel, edgeAxis, edgesOnAxis, edgeIndex, pairKey,
} from './topology.js';
export type { FaceLabel, Axis, LocalPair } from './topology.js';

// blockMeshDict output
export {
  renderBlockMeshDict, renderPoint, renderEdge, renderBlock, renderPatch,
  renderBoundary, renderFace, renderGeometry, renderPatchPair, DEFAULT_VERSION,
} from './document.js';
export type { RenderOptions } from './document.js';
export { formatFloat, formatNumber, formatScale, formatVec3, formatList } from './format.js';

// Errors
export {
  MeshError, DegenerateGeometryError, ConfigurationError,
  TypeContractError, UnsupportedFeatureError, RenderError,
} from './errors.js';
export type { MeshErrorKind } from './errors.js';

// Logging
export { createLogger } from './logger.js';
export type { Logger, LogLevel, LogContext } from './logger.js';

// Vectors
export type { Vec3 } from './vec3.js';
export { vec3 } from './vec3.js';
