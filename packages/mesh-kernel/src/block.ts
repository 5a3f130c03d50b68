/**
 * Hex block — 8 corner points, 12 derived edges, cell counts and grading.
 *
 *   const b = Block.fromVertices(corners);
 *   b.cells = [10, 10, 1];
 *   b.grading = [1, 2, 1];                 // simpleGrading
 *   b.setEdge(arc(corners[0], corners[1], [0.5, -0.1, 0]));
 *   b.face('top');                         // outward-ordered corner points
 */

import { ConfigurationError } from './errors.js';
import { type Edge, LineEdge } from './edge.js';
import type { FacePoints } from './patch.js';
import type { Point } from './point.js';
import {
  type Axis, type FaceLabel,
  EDGE_TABLE, FACE_TABLE, edgeAxis, edgeIndex, edgesOnAxis, isFaceLabel,
} from './topology.js';

const ZONE_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

export type GradingType = 'simple' | 'edge';

export type CellCounts = [number, number, number];

/** A local corner index (0–7) or one of the block's points. */
export type VertexRef = Point | number;

export class Block {
  private _vertices: Point[] = [];
  private _edges: Edge[] = [];
  private _grading: number[] = [1, 1, 1];
  private _gradingType: GradingType = 'simple';
  private _cells: CellCounts = [1, 1, 1];
  private _cellZone = '';
  private _description = '';

  static fromVertices(vertices: readonly Point[]): Block {
    const block = new Block();
    block.setVertices(vertices);
    return block;
  }

  get vertices(): readonly Point[] {
    return this._vertices;
  }

  /** The 12 edges in EDGE_TABLE order, each running in the table direction. */
  get edges(): readonly Edge[] {
    return this._edges;
  }

  // ─── Vertices & edges ──────────────────────────────────────

  /**
   * Replace all 8 corners. Every edge is reset to a straight line,
   * discarding curves set earlier.
   */
  setVertices(vertices: readonly Point[]): void {
    if (vertices.length !== 8) {
      throw new ConfigurationError(`Incorrect number of vertices: expected 8, got ${vertices.length}`);
    }
    this._vertices = [...vertices];
    this._edges = EDGE_TABLE.map(([a, b]) => new LineEdge(this._vertices[a], this._vertices[b]));
  }

  /**
   * Override one block edge. Endpoints are located by object identity;
   * the edge is inverted when it runs against the table direction.
   */
  setEdge(edge: Edge): void {
    const i0 = this._vertices.indexOf(edge.v0);
    const i1 = this._vertices.indexOf(edge.v1);
    if (i0 < 0 || i1 < 0) {
      throw new ConfigurationError(
        `Edge endpoint is not a vertex of this block (local ids: ${i0}, ${i1})`
      );
    }

    const slot = edgeIndex(i0, i1);
    if (slot < 0) {
      throw new ConfigurationError(`Vertices ${i0} and ${i1} do not form a block edge`);
    }

    this._edges[slot] = EDGE_TABLE[slot][0] === i0 ? edge : edge.invert();
  }

  /**
   * The edge between two corners, oriented to start at `v0`.
   * Points are matched structurally.
   */
  edge(v0: VertexRef, v1: VertexRef): Edge {
    const slot = this.slotOf(v0, v1);
    const stored = this._edges[slot];
    return stored.v0.equals(this.resolve(v0)) ? stored : stored.invert();
  }

  /** Corner points of a face, in outward-normal order. */
  face(label: FaceLabel): FacePoints {
    if (!isFaceLabel(label)) {
      throw new ConfigurationError(
        `Unknown face label "${String(label)}". Expected one of: ${Object.keys(FACE_TABLE).join(', ')}`
      );
    }
    this.requireVertices();
    const [a, b, c, d] = FACE_TABLE[label];
    const v = this._vertices;
    return [v[a], v[b], v[c], v[d]];
  }

  // ─── Zone & description ────────────────────────────────────

  /** Optional cellZone the block's cells are put in. Empty means none. */
  get cellZone(): string {
    return this._cellZone;
  }

  set cellZone(zone: string) {
    if (zone !== '' && !ZONE_NAME.test(zone)) {
      throw new ConfigurationError(
        `Invalid cellZone name "${zone}". Use a letter or underscore followed by letters, digits, "_", "." or "-".`
      );
    }
    this._cellZone = zone;
  }

  /** Written as a trailing comment on the block entry. */
  get description(): string {
    return this._description;
  }

  set description(text: string) {
    if (/[\n\r]/.test(text)) {
      throw new ConfigurationError('Block description must be a single line');
    }
    this._description = text;
  }

  // ─── Grading ───────────────────────────────────────────────

  get grading(): readonly number[] {
    return this._grading;
  }

  /** 3 values select simpleGrading, 12 select edgeGrading. */
  set grading(values: readonly number[]) {
    let type: GradingType;
    if (values.length === 3) {
      type = 'simple';
    } else if (values.length === 12) {
      type = 'edge';
    } else {
      throw new ConfigurationError(
        `Grading needs 3 values (simpleGrading) or 12 values (edgeGrading), got ${values.length}`
      );
    }
    for (const g of values) {
      if (!Number.isFinite(g) || g <= 0) {
        throw new ConfigurationError(`Grading values must be positive numbers, got ${g}`);
      }
    }
    this._grading = [...values];
    this._gradingType = type;
  }

  get gradingType(): GradingType {
    return this._gradingType;
  }

  /** One expansion ratio per table edge; simple grading is broadcast per axis. */
  gradingPerEdge(): number[] {
    if (this._gradingType === 'edge') return [...this._grading];
    return EDGE_TABLE.map((_, i) => this._grading[edgeAxis(i)]);
  }

  // ─── Cells ─────────────────────────────────────────────────

  get cells(): Readonly<CellCounts> {
    return this._cells;
  }

  set cells(value: readonly number[]) {
    if (value.length !== 3) {
      throw new ConfigurationError(`Cell counts need 3 values, got ${value.length}`);
    }
    for (const n of value) {
      if (!Number.isInteger(n) || n < 1) {
        throw new ConfigurationError(`Cell counts must be positive integers, got ${n}`);
      }
    }
    this._cells = [value[0], value[1], value[2]];
  }

  /**
   * Set cell counts so cells are no longer than `size`, measured along
   * the first table edge of each axis (or only along `axis`).
   */
  setCellSize(size: number, axis?: Axis): void {
    if (!Number.isFinite(size) || size <= 0) {
      throw new ConfigurationError(`Cell size must be a positive number, got ${size}`);
    }
    this.requireVertices();

    const count = (a: Axis) => Math.max(1, Math.ceil(this._edges[edgesOnAxis(a)[0]].length() / size));

    if (axis !== undefined) {
      const next: CellCounts = [...this._cells];
      next[axis] = count(axis);
      this._cells = next;
      return;
    }
    this._cells = [count(0), count(1), count(2)];
  }

  /** Mean cell size along the edge v0–v1. */
  cellSize(v0: VertexRef, v1: VertexRef): number {
    const slot = this.slotOf(v0, v1);
    return this._edges[slot].length() / this._cells[edgeAxis(slot)];
  }

  // ─── Internals ─────────────────────────────────────────────

  private requireVertices(): void {
    if (this._vertices.length !== 8) {
      throw new ConfigurationError('Block has no vertices. Call setVertices() first.');
    }
  }

  private resolve(ref: VertexRef): Point {
    this.requireVertices();
    if (typeof ref === 'number') {
      if (!Number.isInteger(ref) || ref < 0 || ref > 7) {
        throw new ConfigurationError(`Local vertex index must be 0–7, got ${ref}`);
      }
      return this._vertices[ref];
    }
    return ref;
  }

  private localIndex(ref: VertexRef): number {
    if (typeof ref === 'number') {
      this.resolve(ref);
      return ref;
    }
    this.requireVertices();
    const i = this._vertices.findIndex((v) => v.equals(ref));
    if (i < 0) {
      throw new ConfigurationError(`Point (${ref.coords.join(', ')}) is not a vertex of this block`);
    }
    return i;
  }

  private slotOf(v0: VertexRef, v1: VertexRef): number {
    const i0 = this.localIndex(v0);
    const i1 = this.localIndex(v1);
    const slot = edgeIndex(i0, i1);
    if (slot < 0) {
      throw new ConfigurationError(`Vertices ${i0} and ${i1} do not form a block edge`);
    }
    return slot;
  }
}
