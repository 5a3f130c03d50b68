import { describe, it, expect } from 'vitest';
import {
  Point, TriSurfaceMesh,
  LineEdge, ArcMidEdge, ArcOriginEdge, SequenceEdge, ProjectEdge,
  arc, arcOrigin, spline, polyLine, bspline, project, simplifyPoints,
  DegenerateGeometryError, ConfigurationError,
} from '../src/index.js';

const a = new Point(0, 0, 0);
const b = new Point(3, 0, 0);

// ─── Degeneracy ───────────────────────────────────────────────

describe('edge construction', () => {
  it('rejects zero-length edges for every kind', () => {
    const same = new Point(0, 0, 0);
    const surf = new TriSurfaceMesh('s', 's.stl');
    expect(() => new LineEdge(a, same)).toThrow(DegenerateGeometryError);
    expect(() => arc(a, same, [1, 1, 0])).toThrow(DegenerateGeometryError);
    expect(() => arcOrigin(a, a, [1, 1, 0])).toThrow(DegenerateGeometryError);
    expect(() => spline(a, same, [[1, 1, 0]])).toThrow(DegenerateGeometryError);
    expect(() => project(a, same, [surf])).toThrow(DegenerateGeometryError);
  });

  it('reports the degenerate location', () => {
    expect(() => new LineEdge(a, a)).toThrow('Zero-length edge: both vertices at (0, 0, 0)');
  });

  it('rejects malformed interior points', () => {
    expect(() => spline(a, b, [[1, 2]])).toThrow(ConfigurationError);
    expect(() => spline(a, b, [[1, 1, 0], [1, 2, 3, 4]])).toThrow('Invalid interior point 1 of spline edge');
  });

  it('rejects a non-positive arc origin factor', () => {
    expect(() => arcOrigin(a, b, [1.5, -1, 0], 0)).toThrow(ConfigurationError);
  });

  it('needs at least one geometry for projection', () => {
    expect(() => project(a, b, [])).toThrow(ConfigurationError);
  });
});

// ─── Simplification ───────────────────────────────────────────

describe('simplifyPoints', () => {
  it('drops interior points collinear with their neighbours', () => {
    const result = simplifyPoints([0, 0, 0], [[1, 0, 0], [2, 0, 0], [3, 1, 0]], [4, 0, 0]);
    expect(result).toEqual([[2, 0, 0], [3, 1, 0]]);
  });

  it('keeps every point of a genuine curve', () => {
    const result = simplifyPoints([0, 0, 0], [[1, 1, 0], [2, 1.5, 0]], [3, 0, 0]);
    expect(result).toEqual([[1, 1, 0], [2, 1.5, 0]]);
  });

  it('empties a fully collinear sequence', () => {
    expect(simplifyPoints([0, 0, 0], [[1, 0, 0], [2, 0, 0]], [3, 0, 0])).toEqual([]);
  });
});

describe('sequence edges', () => {
  it('collapse to a line when every interior point is collinear', () => {
    const e = spline(a, b, [[1, 0, 0], [2, 0, 0]]);
    expect(e).toBeInstanceOf(LineEdge);
    expect(e.kind).toBe('line');
    expect(e.isLine).toBe(true);
  });

  it('report isLine when constructed directly with no curvature', () => {
    const e = new SequenceEdge('polyLine', a, b, [[1, 0, 0]]);
    expect(e.points).toEqual([]);
    expect(e.isLine).toBe(true);
  });

  it('carry their kind tag', () => {
    expect(spline(a, b, [[1, 1, 0]]).kind).toBe('spline');
    expect(bspline(a, b, [[1, 1, 0]]).kind).toBe('BSpline');
    expect(polyLine(a, b, [[1, 1, 0]]).kind).toBe('polyLine');
  });
});

// ─── Inversion ────────────────────────────────────────────────

describe('invert', () => {
  it('reverses the interior points of a sequence edge', () => {
    const e = new SequenceEdge('spline', a, b, [[1, 1, 0], [2, 1.5, 0]]);
    const inv = e.invert();
    expect(inv.v0).toBe(b);
    expect(inv.v1).toBe(a);
    expect(inv.points).toEqual([[2, 1.5, 0], [1, 1, 0]]);
  });

  it('is an involution for sequence edges', () => {
    const e = new SequenceEdge('BSpline', a, b, [[1, 1, 0], [2, 1.5, 0]]);
    const twice = e.invert().invert();
    expect(twice.v0).toBe(a);
    expect(twice.v1).toBe(b);
    expect(twice.kind).toBe('BSpline');
    expect(twice.points).toEqual(e.points);
  });

  it('keeps arc data', () => {
    const mid = new ArcMidEdge(a, b, [1.5, 1, 0]).invert();
    expect(mid.v0).toBe(b);
    expect(mid.point).toEqual([1.5, 1, 0]);

    const origin = new ArcOriginEdge(a, b, [1.5, -1, 0], 1.2).invert().invert();
    expect(origin.v0).toBe(a);
    expect(origin.origin).toEqual([1.5, -1, 0]);
    expect(origin.factor).toBe(1.2);
  });

  it('keeps projection geometries', () => {
    const surf = new TriSurfaceMesh('s', 's.stl');
    const inv = new ProjectEdge(a, b, [surf]).invert();
    expect(inv.v0).toBe(b);
    expect(inv.geometries).toEqual([surf]);
  });

  it('swaps line endpoints', () => {
    const inv = new LineEdge(a, b).invert();
    expect(inv.v0).toBe(b);
    expect(inv.v1).toBe(a);
  });
});

// ─── Length ───────────────────────────────────────────────────

describe('length', () => {
  it('line is the chord', () => {
    expect(new LineEdge(a, new Point(3, 4, 0)).length()).toBeCloseTo(5);
  });

  it('arc through a midpoint measures the swept arc', () => {
    const semi = arc(new Point(1, 0, 0), new Point(-1, 0, 0), [0, 1, 0]);
    expect(semi.length()).toBeCloseTo(Math.PI);
  });

  it('arc about an origin measures radius times angle', () => {
    const quarter = arcOrigin(new Point(1, 0, 0), new Point(0, 1, 0), [0, 0, 0]);
    expect(quarter.length()).toBeCloseTo(Math.PI / 2);
  });

  it('sequence edges sum their segments', () => {
    const e = polyLine(a, new Point(2, 0, 0), [[1, 1, 0]]);
    expect(e.length()).toBeCloseTo(2 * Math.SQRT2);
  });
});
