/**
 * Mesh Registry — in-memory named mesh store.
 *
 * Each entry keeps the named parts a mesh is made of. The kernel Mesh
 * is rebuilt from them on demand, so blocks stay editable after they
 * were added: curved edges and grading can be changed at any time.
 */

import {
  Mesh, Block, Point, ProjectedPoint, Patch, DefaultPatch, TriSurfaceMesh,
  ConfigurationError,
  arc, arcOrigin, project, sequence,
  type Edge, type FaceLabel, type Geometry, type RenderOptions, type SequenceKind, type Vec3, type Axis,
} from '@hexdict/mesh-kernel';

const NAME = /^[a-zA-Z0-9_-]+$/;

function checkName(what: string, name: string): void {
  if (!NAME.test(name)) {
    throw new Error(`Invalid ${what} name "${name}". Use only letters, digits, hyphens, underscores.`);
  }
}

// ─── Types ──────────────────────────────────────────────────────

/** A named point of the mesh or an [x, y, z] coordinate. */
export type VertexInput = string | Vec3;

export type EdgeInput =
  | { type: 'arc'; point: Vec3 }
  | { type: 'arc_origin'; origin: Vec3; factor?: number }
  | { type: SequenceKind; points: Vec3[] }
  | { type: 'project'; geometries: string[] };

export interface FaceInput {
  block: string;
  face: FaceLabel;
}

interface PatchEntry {
  patch: Patch;
  boundary: boolean;
}

export interface MeshEntry {
  id: string;
  scale: number;
  points: Map<string, Point>;
  blocks: Map<string, Block>;
  patches: Map<string, PatchEntry>;
  geometries: Map<string, Geometry>;
  mergePairs: [string, string][];
  defaultPatch: DefaultPatch | null;
  nextPoint: number;
  nextBlock: number;
}

export interface MeshReadback {
  scale: number;
  point_count: number;
  edge_count: number;
  block_count: number;
  patch_count: number;
  points: Record<string, Vec3>;
  blocks: Record<string, { vertices: string[]; cells: number[]; grading: number[]; curved_edges: number }>;
  patches: Record<string, { type: string; faces: number; boundary: boolean }>;
  geometries: string[];
  default_patch: { name: string; type: string } | null;
  merge_patch_pairs: [string, string][];
}

export interface MeshResult {
  mesh_id: string;
  readback: MeshReadback;
}

let nextId = 1;

const meshes = new Map<string, MeshEntry>();

// ─── Meshes ─────────────────────────────────────────────────────

/** Create an empty mesh and return its ID + readback. */
export function createMesh(scale = 1, name?: string): MeshResult {
  if (name !== undefined) checkName('mesh', name);
  if (!Number.isFinite(scale) || scale <= 0) {
    throw new ConfigurationError(`Mesh scale must be a positive number, got ${scale}`);
  }
  const id = name ?? `mesh_${nextId++}`;
  if (meshes.has(id) && !name) {
    // Auto-generated collision — bump
    return createMesh(scale);
  }
  meshes.set(id, {
    id,
    scale,
    points: new Map(),
    blocks: new Map(),
    patches: new Map(),
    geometries: new Map(),
    mergePairs: [],
    defaultPatch: null,
    nextPoint: 0,
    nextBlock: 0,
  });
  return result(id);
}

/** Retrieve a mesh or throw a clear error. */
export function get(id: string): MeshEntry {
  const entry = meshes.get(id);
  if (!entry) {
    const available = [...meshes.keys()];
    throw new Error(`Mesh "${id}" not found. Available meshes: [${available.join(', ')}]`);
  }
  return entry;
}

export function has(id: string): boolean {
  return meshes.has(id);
}

/** List all meshes with their readbacks. */
export function list(): MeshResult[] {
  return [...meshes.keys()].map(result);
}

/** Clear all meshes (for testing). */
export function clear(): void {
  meshes.clear();
  nextId = 1;
}

export function result(id: string): MeshResult {
  return { mesh_id: id, readback: readback(get(id)) };
}

// ─── Points ─────────────────────────────────────────────────────

/** Add a named point, optionally projected onto registered geometries. */
export function addPoint(meshId: string, coords: Vec3, name?: string, geometries: string[] = []): MeshResult & { point: string } {
  const entry = get(meshId);
  if (name !== undefined) {
    checkName('point', name);
    if (entry.points.has(name)) {
      throw new Error(`Point "${name}" already exists in mesh "${meshId}".`);
    }
  }
  const point = geometries.length > 0
    ? new ProjectedPoint(coords[0], coords[1], coords[2], geometries.map((g) => getGeometry(entry, g)))
    : Point.from(coords);
  const id = storePoint(entry, point, name);
  return { ...result(meshId), point: id };
}

function storePoint(entry: MeshEntry, point: Point, name?: string): string {
  let id = name ?? `p${entry.nextPoint++}`;
  while (name === undefined && entry.points.has(id)) id = `p${entry.nextPoint++}`;
  entry.points.set(id, point);
  return id;
}

/**
 * Named points resolve by name; coordinates reuse an equal stored or
 * pending point, or create one. New points go to `pending` and are
 * stored only once the caller commits them.
 */
function resolveVertex(entry: MeshEntry, ref: VertexInput, pending: Point[]): Point {
  if (typeof ref === 'string') {
    const point = entry.points.get(ref);
    if (!point) {
      throw new Error(`Point "${ref}" not found. Available points: [${[...entry.points.keys()].join(', ')}]`);
    }
    return point;
  }
  for (const point of [...entry.points.values(), ...pending]) {
    if (!(point instanceof ProjectedPoint) && point.equals(ref)) return point;
  }
  const point = Point.from(ref);
  pending.push(point);
  return point;
}

// ─── Blocks ─────────────────────────────────────────────────────

export interface BlockOptions {
  name?: string;
  cells?: [number, number, number];
  grading?: number[];
  cellZone?: string;
  description?: string;
}

/** Add a hex block from 8 corners in local order 0–7. */
export function addBlock(meshId: string, vertices: VertexInput[], options: BlockOptions = {}): MeshResult & { block: string } {
  const entry = get(meshId);
  if (options.name !== undefined) {
    checkName('block', options.name);
    if (entry.blocks.has(options.name)) {
      throw new Error(`Block "${options.name}" already exists in mesh "${meshId}".`);
    }
  }
  if (vertices.length !== 8) {
    throw new ConfigurationError(`Incorrect number of vertices: expected 8, got ${vertices.length}`);
  }

  const pending: Point[] = [];
  const corners = vertices.map((v) => resolveVertex(entry, v, pending));

  const block = new Block();
  if (options.cells) block.cells = options.cells;
  if (options.grading) block.grading = options.grading;
  if (options.cellZone !== undefined) block.cellZone = options.cellZone;
  if (options.description !== undefined) block.description = options.description;
  block.setVertices(corners);
  for (const point of pending) storePoint(entry, point);

  let id = options.name ?? `b${entry.nextBlock++}`;
  while (options.name === undefined && entry.blocks.has(id)) id = `b${entry.nextBlock++}`;
  entry.blocks.set(id, block);
  return { ...result(meshId), block: id };
}

export function getBlock(entry: MeshEntry, name: string): Block {
  const block = entry.blocks.get(name);
  if (!block) {
    throw new Error(`Block "${name}" not found. Available blocks: [${[...entry.blocks.keys()].join(', ')}]`);
  }
  return block;
}

export function setBlockCells(meshId: string, blockName: string, cells: [number, number, number]): MeshResult {
  getBlock(get(meshId), blockName).cells = cells;
  return result(meshId);
}

export function setBlockCellSize(meshId: string, blockName: string, size: number, axis?: Axis): MeshResult {
  getBlock(get(meshId), blockName).setCellSize(size, axis);
  return result(meshId);
}

export function setBlockGrading(meshId: string, blockName: string, grading: number[]): MeshResult {
  getBlock(get(meshId), blockName).grading = grading;
  return result(meshId);
}

export function setBlockZone(meshId: string, blockName: string, cellZone: string, description?: string): MeshResult {
  const block = getBlock(get(meshId), blockName);
  const previous = { cellZone: block.cellZone, description: block.description };
  try {
    block.cellZone = cellZone;
    if (description !== undefined) block.description = description;
  } catch (err) {
    block.cellZone = previous.cellZone;
    block.description = previous.description;
    throw err;
  }
  return result(meshId);
}

/** Curve the block edge running from local corner `from` to `to`. */
export function setBlockEdge(meshId: string, blockName: string, from: number, to: number, input: EdgeInput): MeshResult {
  const entry = get(meshId);
  const block = getBlock(entry, blockName);
  const { v0, v1 } = block.edge(from, to);
  block.setEdge(buildEdge(entry, v0, v1, input));
  return result(meshId);
}

function buildEdge(entry: MeshEntry, v0: Point, v1: Point, input: EdgeInput): Edge {
  switch (input.type) {
    case 'arc':
      return arc(v0, v1, input.point);
    case 'arc_origin':
      return arcOrigin(v0, v1, input.origin, input.factor);
    case 'spline':
    case 'BSpline':
    case 'polyLine':
      return sequence(input.type, v0, v1, input.points);
    case 'project':
      return project(v0, v1, input.geometries.map((g) => getGeometry(entry, g)));
  }
}

// ─── Geometry ───────────────────────────────────────────────────

export function addGeometry(meshId: string, name: string, file: string): MeshResult {
  const entry = get(meshId);
  const geometry = new TriSurfaceMesh(name, file);
  const existing = entry.geometries.get(name);
  if (existing && !existing.sameSource(geometry)) {
    throw new ConfigurationError(`Geometry "${name}" is already registered with a different source`);
  }
  if (!existing) entry.geometries.set(name, geometry);
  return result(meshId);
}

function getGeometry(entry: MeshEntry, name: string): Geometry {
  const geometry = entry.geometries.get(name);
  if (!geometry) {
    throw new Error(`Geometry "${name}" not found. Available geometries: [${[...entry.geometries.keys()].join(', ')}]`);
  }
  return geometry;
}

// ─── Patches ────────────────────────────────────────────────────

/** Add a patch of block faces; `boundary` selects the boundary section over patches. */
export function addPatch(meshId: string, name: string, type: string, faces: FaceInput[], boundary = false): MeshResult {
  const entry = get(meshId);
  if (entry.patches.has(name)) {
    throw new Error(`Patch "${name}" already exists in mesh "${meshId}".`);
  }
  const patch = new Patch(name, type, faces.map((f) => getBlock(entry, f.block).face(f.face)));
  entry.patches.set(name, { patch, boundary });
  return result(meshId);
}

export function setDefaultPatch(meshId: string, name?: string, type?: string): MeshResult {
  get(meshId).defaultPatch = new DefaultPatch(name, type);
  return result(meshId);
}

export function mergePatchPairs(meshId: string, master: string, slave: string): MeshResult {
  const entry = get(meshId);
  for (const name of [master, slave]) {
    if (!entry.patches.has(name)) {
      throw new Error(`Patch "${name}" not found. Available patches: [${[...entry.patches.keys()].join(', ')}]`);
    }
  }
  if (master === slave) {
    throw new ConfigurationError(`Cannot merge patch "${master}" with itself`);
  }
  entry.mergePairs.push([master, slave]);
  return result(meshId);
}

// ─── Build & render ─────────────────────────────────────────────

/** Assemble a kernel Mesh from the entry, in insertion order. */
export function build(entry: MeshEntry): Mesh {
  const mesh = new Mesh();
  mesh.scale = entry.scale;
  for (const geometry of entry.geometries.values()) mesh.addGeometry(geometry);
  for (const point of entry.points.values()) mesh.addPoint(point);
  for (const block of entry.blocks.values()) mesh.addBlock(block);
  for (const { patch, boundary } of entry.patches.values()) {
    if (boundary) mesh.addBoundary(patch);
    else mesh.addPatch(patch);
  }
  for (const [master, slave] of entry.mergePairs) {
    const m = entry.patches.get(master);
    const s = entry.patches.get(slave);
    if (m && s) mesh.addMergePatchPairs(m.patch, s.patch);
  }
  if (entry.defaultPatch) mesh.setDefaultPatch(entry.defaultPatch);
  return mesh;
}

export function render(meshId: string, options?: RenderOptions): string {
  return build(get(meshId)).render(options);
}

function readback(entry: MeshEntry): MeshReadback {
  const mesh = build(entry);
  const pointNames = new Map<Point, string>();
  for (const [name, point] of entry.points) pointNames.set(point, name);

  const blocks: MeshReadback['blocks'] = {};
  for (const [name, block] of entry.blocks) {
    blocks[name] = {
      vertices: block.vertices.map((v) => pointNames.get(v) ?? String(mesh.pointId(v))),
      cells: [...block.cells],
      grading: [...block.grading],
      curved_edges: block.edges.filter((e) => !e.isLine).length,
    };
  }

  const patches: MeshReadback['patches'] = {};
  for (const [name, { patch, boundary }] of entry.patches) {
    patches[name] = { type: patch.type, faces: patch.faces.length, boundary };
  }

  const points: MeshReadback['points'] = {};
  for (const [name, point] of entry.points) points[name] = [...point.coords];

  return {
    scale: entry.scale,
    point_count: mesh.points.length,
    edge_count: mesh.edges.length,
    block_count: mesh.blocks.length,
    patch_count: mesh.patches.length + mesh.boundary.length,
    points,
    blocks,
    patches,
    geometries: [...entry.geometries.keys()],
    default_patch: entry.defaultPatch ? { name: entry.defaultPatch.name, type: entry.defaultPatch.type } : null,
    merge_patch_pairs: entry.mergePairs.map(([m, s]) => [m, s]),
  };
}
