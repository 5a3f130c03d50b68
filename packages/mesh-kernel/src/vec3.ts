/** Minimal 3D vectors — plain tuples for speed, helpers for clarity. */
export type Vec3 = [number, number, number];

export function vec3(x: number, y: number, z: number): Vec3 {
  return [x, y, z];
}

export function add(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function mul(a: Vec3, b: Vec3): Vec3 {
  return [a[0] * b[0], a[1] * b[1], a[2] * b[2]];
}

export function scale(a: Vec3, s: number): Vec3 {
  return [a[0] * s, a[1] * s, a[2] * s];
}

export function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function length(a: Vec3): number {
  return Math.sqrt(a[0] * a[0] + a[1] * a[1] + a[2] * a[2]);
}

export function distance(a: Vec3, b: Vec3): number {
  return length(sub(a, b));
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

/** Exact component-wise equality. No tolerance. */
export function equals(a: Vec3, b: Vec3): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2];
}

export function isZero(a: Vec3): boolean {
  return a[0] === 0 && a[1] === 0 && a[2] === 0;
}

/**
 * Rotate `p` about `origin`. Angles apply intrinsically in z-y-x order:
 * yaw about Z, then pitch about Y, then roll about X.
 */
export function rotate(p: Vec3, yaw: number, pitch: number, roll: number, origin: Vec3): Vec3 {
  const [x, y, z] = sub(p, origin);

  const cz = Math.cos(yaw), sz = Math.sin(yaw);
  const cy = Math.cos(pitch), sy = Math.sin(pitch);
  const cx = Math.cos(roll), sx = Math.sin(roll);

  // R = Rz(yaw) · Ry(pitch) · Rx(roll)
  const rx = (cz * cy) * x + (cz * sy * sx - sz * cx) * y + (cz * sy * cx + sz * sx) * z;
  const ry = (sz * cy) * x + (sz * sy * sx + cz * cx) * y + (sz * sy * cx - cz * sx) * z;
  const rz = (-sy) * x + (cy * sx) * y + (cy * cx) * z;

  return add([rx, ry, rz], origin);
}
