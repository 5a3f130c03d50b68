/**
 * Token formatting for the blockMeshDict grammar.
 *
 *   formatFloat(1)            → "1.000000"
 *   formatNumber(2)           → "2"
 *   formatList([1, 2, 3])     → "(1 2 3)"
 *   formatVec3([0, 0.5, -1])  → "(0.000000 0.500000 -1.000000)"
 */

import type { Vec3 } from './vec3.js';

const FLOAT_DIGITS = 6;

/** toFixed() switches to exponent notation from here on. */
const FIXED_LIMIT = 1e21;

/**
 * Fixed six-digit form used for every coordinate. Negative zero is
 * written as `0.000000`.
 */
export function formatFloat(value: number): string {
  if (Math.abs(value) < FIXED_LIMIT) return value.toFixed(FLOAT_DIGITS);
  return value.toLocaleString('en-US', {
    useGrouping: false,
    minimumFractionDigits: FLOAT_DIGITS,
    maximumFractionDigits: FLOAT_DIGITS,
  });
}

/** Safe integers stay bare; anything else gets the fixed float form. */
export function formatNumber(value: number): string {
  return Number.isSafeInteger(value) ? String(value) : formatFloat(value);
}

/** Shortest round-trip form, so small factors never round to zero. */
export function formatScale(value: number): string {
  return String(value);
}

export function formatVec3(v: Vec3): string {
  return `(${formatFloat(v[0])} ${formatFloat(v[1])} ${formatFloat(v[2])})`;
}

/** Parenthesized, space-separated list. Numbers go through formatNumber. */
export function formatList(items: ReadonlyArray<string | number>): string {
  return `(${items.map((item) => (typeof item === 'number' ? formatNumber(item) : item)).join(' ')})`;
}

/** Trailing C++-style comment, or nothing for empty text. */
export function comment(text: string | number | undefined): string {
  if (text === undefined || text === '') return '';
  return ` // ${text}`;
}
