/**
 * Edges — curves between two block vertices.
 *
 * Straight lines are implicit in blockMeshDict: they are never registered
 * or written. Every other kind is an explicit entry in the `edges` section.
 *
 *   arc(v0, v1, [0.7, 0.7, 0])
 *   spline(v0, v1, [[0.2, 0.1, 0], [0.5, 0.15, 0]])
 *   project(v0, v1, [cylinderSurface])
 */

import { DegenerateGeometryError, ConfigurationError } from './errors.js';
import type { Geometry } from './geometry.js';
import { Point, toVec3, type PointLike } from './point.js';
import { type Vec3, sub, cross, dot, length, distance, isZero } from './vec3.js';

export type SequenceKind = 'spline' | 'BSpline' | 'polyLine';

export type EdgeKind = 'line' | 'arc' | 'arcOrigin' | SequenceKind | 'project';

/** Closed union of every edge variant. Switch on `kind`. */
export type Edge = LineEdge | ArcMidEdge | ArcOriginEdge | SequenceEdge | ProjectEdge;

// ─── Base class ────────────────────────────────────────────────

export abstract class BaseEdge {
  constructor(readonly v0: Point, readonly v1: Point) {
    if (v0.equals(v1)) {
      throw new DegenerateGeometryError(
        `Zero-length edge: both vertices at (${v0.coords.join(', ')})`
      );
    }
  }

  /** True when the edge is an implicit straight connection. */
  get isLine(): boolean {
    return false;
  }

  /** Same curve, opposite direction. */
  abstract invert(): Edge;

  /** Curve length in model units. */
  abstract length(): number;
}

// ─── Line ──────────────────────────────────────────────────────

export class LineEdge extends BaseEdge {
  readonly kind = 'line' as const;

  get isLine(): boolean {
    return true;
  }

  invert(): LineEdge {
    return new LineEdge(this.v1, this.v0);
  }

  length(): number {
    return distance(this.v0.coords, this.v1.coords);
  }
}

// ─── Arcs ──────────────────────────────────────────────────────

/** Circular arc through an interior point. */
export class ArcMidEdge extends BaseEdge {
  readonly kind = 'arc' as const;
  readonly point: Vec3;

  constructor(v0: Point, v1: Point, point: PointLike) {
    super(v0, v1);
    this.point = toVec3(point);
  }

  invert(): ArcMidEdge {
    return new ArcMidEdge(this.v1, this.v0, this.point);
  }

  /**
   * R · (2π − 2α), where α is the inscribed angle at the interior point
   * and R the circumradius of the three points.
   */
  length(): number {
    const a = this.v0.coords, m = this.point, b = this.v1.coords;
    const area2 = length(cross(sub(m, a), sub(b, a)));
    if (area2 === 0) return distance(a, b);

    const radius = (distance(a, b) * distance(a, m) * distance(m, b)) / (2 * area2);
    const ma = sub(a, m), mb = sub(b, m);
    const cosAlpha = dot(ma, mb) / (length(ma) * length(mb));
    const alpha = Math.acos(Math.min(1, Math.max(-1, cosAlpha)));
    return radius * (2 * Math.PI - 2 * alpha);
  }
}

/** Circular arc defined by its centre; `factor` scales the radius. */
export class ArcOriginEdge extends BaseEdge {
  readonly kind = 'arcOrigin' as const;
  readonly origin: Vec3;

  constructor(v0: Point, v1: Point, origin: PointLike, readonly factor = 1) {
    super(v0, v1);
    this.origin = toVec3(origin);
    if (!Number.isFinite(factor) || factor <= 0) {
      throw new ConfigurationError(`Arc origin factor must be a positive number, got ${factor}`);
    }
  }

  invert(): ArcOriginEdge {
    return new ArcOriginEdge(this.v1, this.v0, this.origin, this.factor);
  }

  /** Mean radius times the swept angle. */
  length(): number {
    const r0 = sub(this.v0.coords, this.origin);
    const r1 = sub(this.v1.coords, this.origin);
    const l0 = length(r0), l1 = length(r1);
    if (l0 === 0 || l1 === 0) return distance(this.v0.coords, this.v1.coords);
    const cosTheta = dot(r0, r1) / (l0 * l1);
    const theta = Math.acos(Math.min(1, Math.max(-1, cosTheta)));
    return theta * (l0 + l1) / 2;
  }
}

// ─── Point sequences ──────────────────────────────────────────

/**
 * Drop interior points that are collinear with their neighbours.
 *
 * Each triple (prev, cur, next) is tested against the original sequence
 * with both endpoints attached; all marked points go in a single pass.
 */
export function simplifyPoints(v0: Vec3, interior: readonly Vec3[], v1: Vec3): Vec3[] {
  const pts = [v0, ...interior, v1];
  const removable = new Set<number>();

  for (let i = 1; i < pts.length - 1; i++) {
    const prev = pts[i - 1], cur = pts[i], next = pts[i + 1];
    if (isZero(cross(sub(prev, cur), sub(prev, next)))) {
      removable.add(i);
    }
  }

  return pts.filter((_, i) => i > 0 && i < pts.length - 1 && !removable.has(i));
}

/** spline, BSpline or polyLine through an ordered list of interior points. */
export class SequenceEdge extends BaseEdge {
  readonly points: readonly Vec3[];

  constructor(readonly kind: SequenceKind, v0: Point, v1: Point, points: readonly PointLike[]) {
    super(v0, v1);
    const interior = points.map((p, i) => {
      try {
        return toVec3(p);
      } catch (err) {
        throw new ConfigurationError(
          `Invalid interior point ${i} of ${kind} edge: ${err instanceof Error ? err.message : String(err)}`
        );
      }
    });
    this.points = simplifyPoints(v0.coords, interior, v1.coords);
  }

  /** An empty interior list after simplification is a plain line. */
  get isLine(): boolean {
    return this.points.length === 0;
  }

  invert(): SequenceEdge {
    return new SequenceEdge(this.kind, this.v1, this.v0, [...this.points].reverse());
  }

  /** Polyline length through the control points. */
  length(): number {
    const pts = [this.v0.coords, ...this.points, this.v1.coords];
    let total = 0;
    for (let i = 1; i < pts.length; i++) {
      total += distance(pts[i - 1], pts[i]);
    }
    return total;
  }
}

// ─── Projection ────────────────────────────────────────────────

/** Edge projected onto one or more geometries. */
export class ProjectEdge extends BaseEdge {
  readonly kind = 'project' as const;

  constructor(v0: Point, v1: Point, readonly geometries: readonly Geometry[]) {
    super(v0, v1);
    if (geometries.length === 0) {
      throw new ConfigurationError('A projected edge needs at least one geometry');
    }
  }

  invert(): ProjectEdge {
    return new ProjectEdge(this.v1, this.v0, this.geometries);
  }

  /** Chord length; the projected shape is only known to the mesher. */
  length(): number {
    return distance(this.v0.coords, this.v1.coords);
  }
}

// ─── Constructors ──────────────────────────────────────────────

export function line(v0: Point, v1: Point): LineEdge {
  return new LineEdge(v0, v1);
}

export function arc(v0: Point, v1: Point, point: PointLike): ArcMidEdge {
  return new ArcMidEdge(v0, v1, point);
}

export function arcOrigin(v0: Point, v1: Point, origin: PointLike, factor = 1): ArcOriginEdge {
  return new ArcOriginEdge(v0, v1, origin, factor);
}

/** Sequence edge, collapsed to a line when every interior point is collinear. */
export function sequence(
  kind: SequenceKind,
  v0: Point,
  v1: Point,
  points: readonly PointLike[],
): SequenceEdge | LineEdge {
  const edge = new SequenceEdge(kind, v0, v1, points);
  return edge.isLine ? new LineEdge(v0, v1) : edge;
}

export function spline(v0: Point, v1: Point, points: readonly PointLike[]): SequenceEdge | LineEdge {
  return sequence('spline', v0, v1, points);
}

export function bspline(v0: Point, v1: Point, points: readonly PointLike[]): SequenceEdge | LineEdge {
  return sequence('BSpline', v0, v1, points);
}

export function polyLine(v0: Point, v1: Point, points: readonly PointLike[]): SequenceEdge | LineEdge {
  return sequence('polyLine', v0, v1, points);
}

export function project(v0: Point, v1: Point, geometries: readonly Geometry[]): ProjectEdge {
  return new ProjectEdge(v0, v1, geometries);
}
