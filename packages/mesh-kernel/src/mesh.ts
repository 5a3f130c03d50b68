/**
 * Mesh — the registry that owns every element written to blockMeshDict.
 *
 * Registration assigns each element a per-category integer id, once.
 * Identity is object identity: adding the same instance again is a
 * no-op, while two structurally equal points stay two vertices.
 *
 *   const mesh = new Mesh();
 *   mesh.addBlock(block);           // registers its 8 points and curved edges
 *   mesh.addPatch(inlet);
 *   const text = mesh.render();
 */

import { Block } from './block.js';
import { renderBlockMeshDict, type RenderOptions } from './document.js';
import { BaseEdge, type Edge } from './edge.js';
import { ConfigurationError, TypeContractError } from './errors.js';
import { Geometry } from './geometry.js';
import { createLogger } from './logger.js';
import { DefaultPatch, Patch, PatchPair, ProjectedFace } from './patch.js';
import { Point, ProjectedPoint } from './point.js';

const log = createLogger('Mesh');

export type ElementCategory = 'point' | 'edge' | 'block' | 'patch';

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}

function requireInstance<T>(value: unknown, ctor: abstract new (...args: never[]) => T, what: string): asserts value is T {
  if (!(value instanceof ctor)) {
    throw new TypeContractError(`Expected a ${what}, got ${describeValue(value)}`);
  }
}

export class Mesh {
  /** Factor applied by the mesher to every coordinate. */
  scale = 1;

  private readonly counters: Record<ElementCategory, number> = { point: 0, edge: 0, block: 0, patch: 0 };

  private readonly pointIds = new Map<Point, number>();
  private readonly edgeIds = new Map<Edge, number>();
  private readonly blockIds = new Map<Block, number>();
  private readonly patchIds = new Map<Patch, number>();

  private readonly _points: Point[] = [];
  private readonly _edges: Edge[] = [];
  private readonly _blocks: Block[] = [];
  private readonly _patches: Patch[] = [];
  private readonly _boundary: Patch[] = [];
  private readonly _mergePatchPairs: PatchPair[] = [];
  private readonly _faces: ProjectedFace[] = [];
  private readonly _geometries = new Map<string, Geometry>();
  private _defaultPatch: DefaultPatch | null = null;

  // ─── Read access ───────────────────────────────────────────

  get points(): readonly Point[] { return this._points; }
  get edges(): readonly Edge[] { return this._edges; }
  get blocks(): readonly Block[] { return this._blocks; }
  get patches(): readonly Patch[] { return this._patches; }
  get boundary(): readonly Patch[] { return this._boundary; }
  get mergePatchPairs(): readonly PatchPair[] { return this._mergePatchPairs; }
  get faces(): readonly ProjectedFace[] { return this._faces; }
  get geometries(): readonly Geometry[] { return [...this._geometries.values()]; }
  get defaultPatch(): DefaultPatch | null { return this._defaultPatch; }

  pointId(point: Point): number | undefined { return this.pointIds.get(point); }
  edgeId(edge: Edge): number | undefined { return this.edgeIds.get(edge); }
  blockId(block: Block): number | undefined { return this.blockIds.get(block); }
  patchId(patch: Patch): number | undefined { return this.patchIds.get(patch); }

  // ─── Registration ──────────────────────────────────────────

  addPoint(point: Point): void {
    requireInstance(point, Point, 'Point');
    if (this.pointIds.has(point)) return;

    if (point instanceof ProjectedPoint) {
      for (const g of point.geometries) this.addGeometry(g);
    }
    this.pointIds.set(point, this.next('point'));
    this._points.push(point);
  }

  /** Lines are implicit and never registered. */
  addEdge(edge: Edge): void {
    requireInstance(edge, BaseEdge, 'Edge');
    if (edge.isLine) return;

    this.addPoint(edge.v0);
    this.addPoint(edge.v1);

    if (this.edgeIds.has(edge)) return;
    if (edge.kind === 'project') {
      for (const g of edge.geometries) this.addGeometry(g);
    }
    this.edgeIds.set(edge, this.next('edge'));
    this._edges.push(edge);
  }

  /** Register a block with its 8 points and curved edges, in that order. */
  addBlock(block: Block): void {
    requireInstance(block, Block, 'Block');
    if (block.vertices.length !== 8) {
      throw new ConfigurationError('Cannot add a block without vertices. Call setVertices() first.');
    }

    for (const v of block.vertices) this.addPoint(v);
    for (const e of block.edges) this.addEdge(e);

    if (this.blockIds.has(block)) return;
    const id = this.next('block');
    this.blockIds.set(block, id);
    this._blocks.push(block);
    log.debug(`registered block ${id}`, {
      operation: 'addBlock',
      data: { points: this._points.length, edges: this._edges.length },
    });
  }

  /** Register a patch for the legacy `patches` section. */
  addPatch(patch: Patch): void {
    this.registerPatch(patch, this._patches);
  }

  /** Register a patch for the `boundary` section. */
  addBoundary(patch: Patch): void {
    this.registerPatch(patch, this._boundary);
  }

  /** Merge `slave` into `master`, registering both patches first. */
  addMergePatchPairs(master: Patch, slave: Patch): void {
    requireInstance(master, Patch, 'Patch');
    requireInstance(slave, Patch, 'Patch');
    const pair = new PatchPair(master, slave);
    this.addPatch(master);
    this.addPatch(slave);
    this._mergePatchPairs.push(pair);
  }

  setDefaultPatch(patch: DefaultPatch): void {
    requireInstance(patch, DefaultPatch, 'DefaultPatch');
    this._defaultPatch = patch;
  }

  /** Register a stand-alone projected face with its points and geometry. */
  addFace(face: ProjectedFace): void {
    requireInstance(face, ProjectedFace, 'ProjectedFace');
    if (this._faces.includes(face)) return;
    for (const p of face.points) this.addPoint(p);
    this.addGeometry(face.geometry);
    this._faces.push(face);
  }

  /** Geometries are keyed by name; two different files under one name conflict. */
  addGeometry(geometry: Geometry): void {
    requireInstance(geometry, Geometry, 'Geometry');
    const existing = this._geometries.get(geometry.name);
    if (existing === undefined) {
      this._geometries.set(geometry.name, geometry);
      return;
    }
    if (existing !== geometry && !existing.sameSource(geometry)) {
      throw new ConfigurationError(
        `Geometry "${geometry.name}" is already registered with a different source`
      );
    }
  }

  // ─── Output ────────────────────────────────────────────────

  render(options?: RenderOptions): string {
    return renderBlockMeshDict(this, options);
  }

  // ─── Internals ─────────────────────────────────────────────

  private registerPatch(patch: Patch, list: Patch[]): void {
    requireInstance(patch, Patch, 'Patch');
    for (const face of patch.faces) {
      for (const p of face) this.addPoint(p);
    }
    if (this.patchIds.has(patch)) return;
    this.patchIds.set(patch, this.next('patch'));
    list.push(patch);
  }

  private next(category: ElementCategory): number {
    return this.counters[category]++;
  }
}
