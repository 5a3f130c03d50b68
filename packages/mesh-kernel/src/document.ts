/**
 * blockMeshDict writer.
 *
 * Renders a Mesh into the text dictionary read by blockMesh. Section
 * order is fixed:
 *   version comment, header, FoamFile, scale/fastMerge, geometry,
 *   vertices, blocks, edges, faces, defaultPatch, boundary, patches,
 *   mergePatchPairs, closing rule, footer.
 *
 * vertices, blocks and edges are always written (as an empty list if
 * need be). Every other optional section is left out when empty.
 * Vertex references are the bare integer ids assigned by the mesh.
 */

import type { Block } from './block.js';
import type { Edge } from './edge.js';
import { ConfigurationError, RenderError, UnsupportedFeatureError } from './errors.js';
import { formatList, formatNumber, formatScale, formatVec3, comment } from './format.js';
import { type Geometry, TriSurfaceMesh } from './geometry.js';
import type { Mesh } from './mesh.js';
import type { DefaultPatch, FacePoints, Patch, PatchPair, ProjectedFace } from './patch.js';
import { type Point, ProjectedPoint } from './point.js';

// ─── Config ─────────────────────────────────────────────────────

export interface RenderOptions {
  /** Version written in the first comment line. */
  version?: string;
  /** Free text placed after the version line. */
  header?: string;
  /** Free text placed after the closing rule. */
  footer?: string;
  format?: 'ascii' | 'binary';
  /** FoamFile `class` entry. */
  objectClass?: string;
  /** Emit `fastMerge yes;`. */
  fastMerge?: boolean;
  /** Append `// <id>` to every vertex. */
  pointComments?: boolean;
}

export const DEFAULT_VERSION = '0.1.0';

const FOAM_WORD = /^[A-Za-z_][A-Za-z0-9_.:-]*$/;

function resolveConfig(config?: RenderOptions) {
  const cfg = {
    version: config?.version ?? DEFAULT_VERSION,
    header: config?.header ?? '',
    footer: config?.footer ?? '',
    format: config?.format ?? 'ascii',
    objectClass: config?.objectClass ?? 'dictionary',
    fastMerge: config?.fastMerge ?? true,
    pointComments: config?.pointComments ?? true,
  };

  if (cfg.format === 'binary') {
    throw new UnsupportedFeatureError('Binary blockMeshDict output is not supported. Use format "ascii".');
  }
  if (!FOAM_WORD.test(cfg.objectClass)) {
    throw new ConfigurationError(`Invalid FoamFile class "${cfg.objectClass}"`);
  }
  if (/[\n\r]/.test(cfg.version)) {
    throw new ConfigurationError('Version must be a single line');
  }

  return cfg;
}

type ResolvedConfig = ReturnType<typeof resolveConfig>;

const INDENT = '    ';
const BANNER = '// * * * * * * * * * * * * * * * * * * * * * * * * * * * * * * * * * * * * * //';
const CLOSING = '// ************************************************************************* //';

function createEmitter() {
  const lines: string[] = [];

  function emit(line = '') {
    lines.push(line);
  }

  /** `name ( ... );` list section. */
  function list(name: string, entries: string[]) {
    emit(name);
    emit('(');
    for (const entry of entries) emit(INDENT + entry);
    emit(');');
    emit();
  }

  /** `name { ... }` dictionary section. */
  function dict(name: string, entries: string[], { spaced = true } = {}) {
    emit(name);
    emit('{');
    for (const entry of entries) emit(INDENT + entry);
    emit('}');
    if (spaced) emit();
  }

  return { lines, emit, list, dict };
}

// ─── References ─────────────────────────────────────────────────

function pointRef(mesh: Mesh, point: Point): number {
  const id = mesh.pointId(point);
  if (id === undefined) {
    throw new RenderError(
      `Point (${point.coords.join(', ')}) is not registered with this mesh`,
      'Point',
    );
  }
  return id;
}

function faceRefs(mesh: Mesh, face: FacePoints): string {
  return formatList(face.map((p) => pointRef(mesh, p)));
}

function geometryNames(geometries: readonly Geometry[]): string {
  return formatList(geometries.map((g) => g.name));
}

// ─── Element forms ──────────────────────────────────────────────

export function renderPoint(mesh: Mesh, point: Point, withComment = true): string {
  const id = pointRef(mesh, point);
  const coords = formatVec3(point.coords);
  const body = point instanceof ProjectedPoint
    ? `project ${coords} ${geometryNames(point.geometries)}`
    : coords;
  return body + (withComment ? comment(id) : '');
}

export function renderEdge(mesh: Mesh, edge: Edge): string {
  const ends = `${pointRef(mesh, edge.v0)} ${pointRef(mesh, edge.v1)}`;
  switch (edge.kind) {
    case 'line':
      return `line ${ends}`;
    case 'arc':
      return `arc ${ends} ${formatVec3(edge.point)}`;
    case 'arcOrigin':
      return `arc ${ends} origin ${formatNumber(edge.factor)} ${formatVec3(edge.origin)}`;
    case 'spline':
    case 'BSpline':
    case 'polyLine':
      return `${edge.kind} ${ends} ${formatList(edge.points.map(formatVec3))}`;
    case 'project':
      return `project ${ends} ${geometryNames(edge.geometries)}`;
    default: {
      const unknown: never = edge;
      throw new RenderError(`Cannot render edge of unknown kind: ${JSON.stringify(unknown)}`, 'Edge');
    }
  }
}

export function renderBlock(mesh: Mesh, block: Block): string {
  const zone = block.cellZone ? ` ${block.cellZone}` : '';
  return (
    `hex ${formatList(block.vertices.map((v) => pointRef(mesh, v)))}${zone}` +
    ` ${formatList(block.cells)}` +
    ` ${block.gradingType}Grading ${formatList(block.grading)}` +
    comment(block.description)
  );
}

export function renderPatch(mesh: Mesh, patch: Patch): string {
  return `${patch.type} ${patch.name} ${formatList(patch.faces.map((f) => faceRefs(mesh, f)))}`;
}

export function renderBoundary(mesh: Mesh, patch: Patch): string {
  return `${patch.name} { type ${patch.type}; faces ${formatList(patch.faces.map((f) => faceRefs(mesh, f)))}; }`;
}

export function renderFace(mesh: Mesh, face: ProjectedFace): string {
  return `project ${faceRefs(mesh, face.points)} ${face.geometry.name}`;
}

export function renderGeometry(geometry: Geometry): string {
  if (geometry instanceof TriSurfaceMesh) {
    return `${geometry.name} { type ${geometry.kind}; file "${geometry.file}"; }`;
  }
  throw new RenderError(
    `Cannot render geometry "${geometry.name}" of type ${geometry.constructor.name}`,
    'Geometry',
  );
}

export function renderDefaultPatch(patch: DefaultPatch): string[] {
  return [`name ${patch.name};`, `type ${patch.type};`];
}

export function renderPatchPair(pair: PatchPair): string {
  return formatList([pair.master.name, pair.slave.name]);
}

// ─── Document ───────────────────────────────────────────────────

function checkScale(scale: number): void {
  if (!Number.isFinite(scale) || scale <= 0) {
    throw new ConfigurationError(`Mesh scale must be a positive number, got ${scale}`);
  }
}

/** Curved block edges changed after registration would be silently dropped. */
function checkBlockEdges(mesh: Mesh): void {
  mesh.blocks.forEach((block, i) => {
    for (const edge of block.edges) {
      if (!edge.isLine && mesh.edgeId(edge) === undefined) {
        throw new RenderError(
          `Block ${i} has a ${edge.kind} edge that is not registered with the mesh. Add the block again after setting edges.`,
          'Block',
        );
      }
    }
  });
}

function emitHeader(e: ReturnType<typeof createEmitter>, cfg: ResolvedConfig) {
  e.emit(`// Generated by hexdict v${cfg.version}`);
  if (cfg.header) e.emit(cfg.header);
  e.dict('FoamFile', [
    'version     2.0;',
    `format      ${cfg.format};`,
    `class       ${cfg.objectClass};`,
    'object      blockMeshDict;',
  ], { spaced: false });
  e.emit(BANNER);
  e.emit();
}

function emitFooter(e: ReturnType<typeof createEmitter>, cfg: ResolvedConfig) {
  e.emit(CLOSING);
  if (cfg.footer) e.emit(cfg.footer);
}

export function renderBlockMeshDict(mesh: Mesh, config?: RenderOptions): string {
  const cfg = resolveConfig(config);
  checkScale(mesh.scale);
  checkBlockEdges(mesh);
  const e = createEmitter();

  emitHeader(e, cfg);

  e.emit(`scale ${formatScale(mesh.scale)};`);
  if (cfg.fastMerge) e.emit('fastMerge yes;');
  e.emit();

  if (mesh.geometries.length > 0) {
    e.dict('geometry', mesh.geometries.map(renderGeometry));
  }

  e.list('vertices', mesh.points.map((p) => renderPoint(mesh, p, cfg.pointComments)));
  e.list('blocks', mesh.blocks.map((b) => renderBlock(mesh, b)));
  e.list('edges', mesh.edges.filter((edge) => !edge.isLine).map((edge) => renderEdge(mesh, edge)));

  if (mesh.faces.length > 0) {
    e.list('faces', mesh.faces.map((f) => renderFace(mesh, f)));
  }
  if (mesh.defaultPatch) {
    e.dict('defaultPatch', renderDefaultPatch(mesh.defaultPatch));
  }
  if (mesh.boundary.length > 0) {
    e.list('boundary', mesh.boundary.map((p) => renderBoundary(mesh, p)));
  }
  if (mesh.patches.length > 0) {
    e.list('patches', mesh.patches.map((p) => renderPatch(mesh, p)));
  }
  if (mesh.mergePatchPairs.length > 0) {
    e.list('mergePatchPairs', mesh.mergePatchPairs.map(renderPatchPair));
  }

  emitFooter(e, cfg);
  return e.lines.join('\n') + '\n';
}
