/**
 * Point — a mesh vertex.
 *
 * Points are immutable: arithmetic and transforms return new instances.
 * Blocks and edges share points by reference; the mesh assigns identity.
 *
 *   const p = new Point(1, 0, 0).rotate(90);        // (0, 1, 0) about Z
 *   p.equals([0, 1, 0])                             // structural, exact
 */

import { ConfigurationError } from './errors.js';
import type { Geometry } from './geometry.js';
import { type Vec3, add, sub, mul, scale, equals, rotate as rotateVec } from './vec3.js';

/** Anything that can stand in for a coordinate triple. */
export type PointLike = Point | Vec3 | readonly number[];

/** Scalar operands broadcast to all three components. */
export type Operand = PointLike | number;

export type PointKind = 'point' | 'projected';

export interface RotateOptions {
  /** Point to rotate about. Default: global origin. */
  origin?: PointLike;
  /** Interpret angles as degrees (default) or radians. */
  degrees?: boolean;
}

/** Validate and copy a coordinate triple. */
export function toVec3(value: PointLike): Vec3 {
  if (value instanceof Point) return [value.coords[0], value.coords[1], value.coords[2]];
  if (value.length !== 3) {
    throw new ConfigurationError(
      `Expected 3 coordinates, got ${value.length}: [${value.join(', ')}]`
    );
  }
  const [x, y, z] = value;
  if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) {
    throw new ConfigurationError(`Coordinates must be finite numbers, got [${value.join(', ')}]`);
  }
  return [x, y, z];
}

function toOperand(value: Operand): Vec3 {
  return typeof value === 'number' ? [value, value, value] : toVec3(value);
}

export class Point {
  readonly kind: PointKind = 'point';
  readonly coords: Vec3;

  constructor(x: number, y: number, z: number) {
    this.coords = toVec3([x, y, z]);
  }

  static from(value: PointLike): Point {
    const [x, y, z] = toVec3(value);
    return new Point(x, y, z);
  }

  get x(): number { return this.coords[0]; }
  get y(): number { return this.coords[1]; }
  get z(): number { return this.coords[2]; }

  // ─── Arithmetic ────────────────────────────────────────────

  add(other: Operand): Point { return Point.from(add(this.coords, toOperand(other))); }
  sub(other: Operand): Point { return Point.from(sub(this.coords, toOperand(other))); }
  mul(other: Operand): Point { return Point.from(mul(this.coords, toOperand(other))); }

  div(other: Operand): Point {
    const [dx, dy, dz] = toOperand(other);
    return new Point(this.coords[0] / dx, this.coords[1] / dy, this.coords[2] / dz);
  }

  neg(): Point { return Point.from(scale(this.coords, -1)); }

  /** Exact structural equality against another point or a raw triple. */
  equals(other: PointLike): boolean {
    return equals(this.coords, toVec3(other));
  }

  // ─── Transforms ────────────────────────────────────────────

  translate(vector: Operand): Point {
    return this.add(vector);
  }

  /** Rotate by yaw (about Z), pitch (about Y) and roll (about X). */
  rotate(yaw = 0, pitch = 0, roll = 0, options: RotateOptions = {}): Point {
    const k = (options.degrees ?? true) ? Math.PI / 180 : 1;
    const origin: Vec3 = options.origin ? toVec3(options.origin) : [0, 0, 0];
    return Point.from(rotateVec(this.coords, yaw * k, pitch * k, roll * k, origin));
  }

  /**
   * Translate, then rotate about the point's original position
   * (or about `options.origin` when given).
   */
  move(vector: Operand, angles: Vec3 = [0, 0, 0], options: RotateOptions = {}): Point {
    const origin = options.origin ?? this.coords;
    return this.translate(vector).rotate(angles[0], angles[1], angles[2], { ...options, origin });
  }
}

/** A vertex snapped onto one or more geometries by the mesher. */
export class ProjectedPoint extends Point {
  readonly kind = 'projected' as const;

  constructor(
    x: number,
    y: number,
    z: number,
    readonly geometries: readonly Geometry[],
  ) {
    super(x, y, z);
    if (geometries.length === 0) {
      throw new ConfigurationError('A projected point needs at least one geometry');
    }
  }
}
