/**
 * Hex block topology — local vertex numbering after the blockMesh convention.
 *
 *          7 ─────── 6
 *         /|        /|         z
 *        4 ─────── 5 |         |  y
 *        | 3 ──────|─ 2        | /
 *        |/        |/          |/
 *        0 ─────── 1           └──── x
 *
 * These tables are fixed by the file format; the mesher enforces them.
 */

export type FaceLabel = 'bottom' | 'top' | 'right' | 'left' | 'front' | 'back';

export type Axis = 0 | 1 | 2;

export type LocalPair = readonly [number, number];

/** Corner indices per face, ordered so the right-hand normal points outward. */
export const FACE_TABLE: Readonly<Record<FaceLabel, readonly [number, number, number, number]>> = {
  bottom: [0, 3, 2, 1],
  top: [4, 5, 6, 7],
  right: [1, 2, 6, 5],
  left: [3, 0, 4, 7],
  front: [0, 1, 5, 4],
  back: [2, 3, 7, 6],
};

export const FACE_LABELS = ['bottom', 'top', 'right', 'left', 'front', 'back'] as const satisfies readonly FaceLabel[];

/**
 * The 12 block edges, four per axis, in edgeGrading order.
 * Each pair runs in the positive local direction of its axis.
 */
export const EDGE_TABLE: readonly LocalPair[] = [
  // x1
  [0, 1], [3, 2], [7, 6], [4, 5],
  // x2
  [0, 3], [1, 2], [5, 6], [4, 7],
  // x3
  [0, 4], [1, 5], [2, 6], [3, 7],
];

export function isFaceLabel(label: string): label is FaceLabel {
  return Object.prototype.hasOwnProperty.call(FACE_TABLE, label);
}

/** Axis that table edge `index` runs along. */
export function edgeAxis(index: number): Axis {
  return index < 4 ? 0 : index < 8 ? 1 : 2;
}

/** Table edges of one axis, as indices into EDGE_TABLE. */
export function edgesOnAxis(axis: Axis): number[] {
  return [axis * 4, axis * 4 + 1, axis * 4 + 2, axis * 4 + 3];
}

/** Canonical key for an unordered pair of local indices. */
export function pairKey(a: number, b: number): string {
  return a < b ? `${a}-${b}` : `${b}-${a}`;
}

const EDGE_INDEX = new Map<string, number>(
  EDGE_TABLE.map(([a, b], i) => [pairKey(a, b), i])
);

/** Index into EDGE_TABLE for the unordered pair, or -1 if it is not a block edge. */
export function edgeIndex(a: number, b: number): number {
  return EDGE_INDEX.get(pairKey(a, b)) ?? -1;
}
