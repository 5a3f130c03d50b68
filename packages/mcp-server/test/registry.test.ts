import { describe, it, expect, beforeEach } from 'vitest';
import { ConfigurationError, DegenerateGeometryError, type Vec3 } from '@hexdict/mesh-kernel';
import * as registry from '../src/registry.js';

const CUBE: Vec3[] = [
  [0, 0, 0], [1, 0, 0], [1, 1, 0], [0, 1, 0],
  [0, 0, 1], [1, 0, 1], [1, 1, 1], [0, 1, 1],
];

const NEIGHBOUR: Vec3[] = [
  [1, 0, 0], [2, 0, 0], [2, 1, 0], [1, 1, 0],
  [1, 0, 1], [2, 0, 1], [2, 1, 1], [1, 1, 1],
];

function lines(meshId: string): string[] {
  return registry.render(meshId).split('\n');
}

beforeEach(() => {
  registry.clear();
});

// ─── Meshes ───────────────────────────────────────────────────

describe('meshes', () => {
  it('creates meshes with generated ids', () => {
    expect(registry.createMesh().mesh_id).toBe('mesh_1');
    expect(registry.createMesh().mesh_id).toBe('mesh_2');
  });

  it('accepts a name and a scale', () => {
    const result = registry.createMesh(0.001, 'duct');
    expect(result.mesh_id).toBe('duct');
    expect(result.readback.scale).toBe(0.001);
    expect(lines('duct')).toContain('scale 0.001;');
  });

  it('rejects invalid names', () => {
    expect(() => registry.createMesh(1, 'bad name')).toThrow('Invalid mesh name "bad name"');
  });

  it('lists available meshes when one is missing', () => {
    registry.createMesh(1, 'duct');
    expect(() => registry.get('nope')).toThrow('Mesh "nope" not found. Available meshes: [duct]');
  });

  it('lists and clears', () => {
    registry.createMesh();
    registry.createMesh(1, 'duct');
    expect(registry.list().map((m) => m.mesh_id)).toEqual(['mesh_1', 'duct']);
    registry.clear();
    expect(registry.list()).toEqual([]);
    expect(registry.createMesh().mesh_id).toBe('mesh_1');
  });
});

// ─── Blocks ───────────────────────────────────────────────────

describe('blocks', () => {
  it('creates points for coordinates', () => {
    const { mesh_id } = registry.createMesh();
    const result = registry.addBlock(mesh_id, CUBE, { cells: [2, 2, 2] });
    expect(result.block).toBe('b0');
    expect(result.readback.point_count).toBe(8);
    expect(result.readback.blocks.b0.vertices).toEqual(['p0', 'p1', 'p2', 'p3', 'p4', 'p5', 'p6', 'p7']);
    expect(result.readback.points.p6).toEqual([1, 1, 1]);
    expect(lines(mesh_id)).toContain('    hex (0 1 2 3 4 5 6 7) (2 2 2) simpleGrading (1 1 1)');
  });

  it('reuses points with equal coordinates', () => {
    const { mesh_id } = registry.createMesh();
    registry.addBlock(mesh_id, CUBE);
    const result = registry.addBlock(mesh_id, NEIGHBOUR);
    expect(result.readback.point_count).toBe(12);
    expect(result.readback.blocks.b1.vertices).toEqual(['p1', 'p8', 'p9', 'p2', 'p5', 'p10', 'p11', 'p6']);
    expect(lines(mesh_id)).toContain('    hex (1 8 9 2 5 10 11 6) (1 1 1) simpleGrading (1 1 1)');
  });

  it('resolves named points', () => {
    const { mesh_id } = registry.createMesh();
    registry.addPoint(mesh_id, [0, 0, 0], 'origin');
    const result = registry.addBlock(mesh_id, ['origin', ...CUBE.slice(1)], { name: 'core' });
    expect(result.block).toBe('core');
    expect(result.readback.blocks.core.vertices[0]).toBe('origin');
    expect(result.readback.point_count).toBe(8);
  });

  it('reports unknown points and wrong corner counts', () => {
    const { mesh_id } = registry.createMesh();
    expect(() => registry.addBlock(mesh_id, ['nowhere', ...CUBE.slice(1)])).toThrow('Point "nowhere" not found');
    expect(() => registry.addBlock(mesh_id, CUBE.slice(0, 7))).toThrow(ConfigurationError);
  });

  it('keeps no points from a block that failed', () => {
    const { mesh_id } = registry.createMesh();
    const collapsed: Vec3[] = [[0, 0, 0], [0, 0, 0], ...CUBE.slice(2)];
    expect(() => registry.addBlock(mesh_id, collapsed)).toThrow(DegenerateGeometryError);
    const readback = registry.result(mesh_id).readback;
    expect(readback.point_count).toBe(0);
    expect(readback.points).toEqual({});
    expect(readback.blocks).toEqual({});
    const text = lines(mesh_id);
    expect(text[text.indexOf('vertices') + 2]).toBe(');');
  });

  it('keeps no points when block options are invalid', () => {
    const { mesh_id } = registry.createMesh();
    expect(() => registry.addBlock(mesh_id, CUBE, { cellZone: 'my zone' })).toThrow(ConfigurationError);
    expect(registry.result(mesh_id).readback.point_count).toBe(0);
    expect(registry.addBlock(mesh_id, CUBE).readback.blocks.b0.vertices[0]).toBe('p0');
  });

  it('leaves zone and description unchanged when either is invalid', () => {
    const { mesh_id } = registry.createMesh();
    registry.addBlock(mesh_id, CUBE);
    registry.setBlockZone(mesh_id, 'b0', 'fluid', 'core');
    expect(() => registry.setBlockZone(mesh_id, 'b0', 'solid', 'first\nsecond')).toThrow(ConfigurationError);
    expect(lines(mesh_id)).toContain('    hex (0 1 2 3 4 5 6 7) fluid (1 1 1) simpleGrading (1 1 1) // core');
  });

  it('rejects duplicate block names', () => {
    const { mesh_id } = registry.createMesh();
    registry.addBlock(mesh_id, CUBE, { name: 'core' });
    expect(() => registry.addBlock(mesh_id, NEIGHBOUR, { name: 'core' })).toThrow('Block "core" already exists');
  });

  it('updates cells, grading and zone', () => {
    const { mesh_id } = registry.createMesh();
    registry.addBlock(mesh_id, CUBE);
    registry.setBlockCellSize(mesh_id, 'b0', 0.25);
    registry.setBlockGrading(mesh_id, 'b0', [1, 2, 1]);
    const result = registry.setBlockZone(mesh_id, 'b0', 'fluid', 'core');
    expect(result.readback.blocks.b0.cells).toEqual([4, 4, 4]);
    expect(result.readback.blocks.b0.grading).toEqual([1, 2, 1]);
    expect(lines(mesh_id)).toContain('    hex (0 1 2 3 4 5 6 7) fluid (4 4 4) simpleGrading (1 2 1) // core');
  });

  it('curves edges after the block was added', () => {
    const { mesh_id } = registry.createMesh();
    registry.addBlock(mesh_id, CUBE);
    const result = registry.setBlockEdge(mesh_id, 'b0', 1, 0, { type: 'arc', point: [0.5, -0.2, 0] });
    expect(result.readback.edge_count).toBe(1);
    expect(result.readback.blocks.b0.curved_edges).toBe(1);
    expect(lines(mesh_id)).toContain('    arc 0 1 (0.500000 -0.200000 0.000000)');
  });

  it('rejects corners that do not share an edge', () => {
    const { mesh_id } = registry.createMesh();
    registry.addBlock(mesh_id, CUBE);
    expect(() => registry.setBlockEdge(mesh_id, 'b0', 0, 6, { type: 'arc', point: [0.5, 0.5, 0.5] }))
      .toThrow(ConfigurationError);
  });
});

// ─── Geometry & patches ───────────────────────────────────────

describe('geometry', () => {
  it('keeps one source per name', () => {
    const { mesh_id } = registry.createMesh();
    registry.addGeometry(mesh_id, 'cyl', 'cyl.stl');
    expect(registry.addGeometry(mesh_id, 'cyl', 'cyl.stl').readback.geometries).toEqual(['cyl']);
    expect(() => registry.addGeometry(mesh_id, 'cyl', 'other.stl')).toThrow(ConfigurationError);
  });

  it('projects points and edges onto registered geometry', () => {
    const { mesh_id } = registry.createMesh();
    registry.addGeometry(mesh_id, 'cyl', 'cyl.stl');
    registry.addPoint(mesh_id, [0, 0, 2], 'tip', ['cyl']);
    registry.addBlock(mesh_id, CUBE);
    registry.setBlockEdge(mesh_id, 'b0', 4, 5, { type: 'project', geometries: ['cyl'] });
    const text = lines(mesh_id);
    expect(text).toContain('    project (0.000000 0.000000 2.000000) (cyl) // 0');
    expect(text).toContain('    project 5 6 (cyl)');
  });

  it('reports unknown geometry', () => {
    const { mesh_id } = registry.createMesh();
    expect(() => registry.addPoint(mesh_id, [0, 0, 0], 'p', ['cyl'])).toThrow('Geometry "cyl" not found');
  });
});

describe('patches', () => {
  it('writes boundary and legacy patches', () => {
    const { mesh_id } = registry.createMesh();
    registry.addBlock(mesh_id, CUBE);
    registry.addPatch(mesh_id, 'inlet', 'patch', [{ block: 'b0', face: 'left' }], true);
    const result = registry.addPatch(mesh_id, 'walls', 'wall', [{ block: 'b0', face: 'bottom' }]);
    expect(result.readback.patch_count).toBe(2);
    expect(result.readback.patches.inlet).toEqual({ type: 'patch', faces: 1, boundary: true });
    const text = lines(mesh_id);
    expect(text).toContain('    inlet { type patch; faces ((3 0 4 7)); }');
    expect(text).toContain('    wall walls ((0 3 2 1))');
  });

  it('rejects duplicate patch names', () => {
    const { mesh_id } = registry.createMesh();
    registry.addBlock(mesh_id, CUBE);
    registry.addPatch(mesh_id, 'walls', 'wall', [{ block: 'b0', face: 'bottom' }]);
    expect(() => registry.addPatch(mesh_id, 'walls', 'wall', [{ block: 'b0', face: 'top' }]))
      .toThrow('Patch "walls" already exists');
  });

  it('merges patch pairs and sets the default patch', () => {
    const { mesh_id } = registry.createMesh();
    registry.addBlock(mesh_id, CUBE);
    registry.addPatch(mesh_id, 'master', 'patch', [{ block: 'b0', face: 'right' }]);
    registry.addPatch(mesh_id, 'slave', 'patch', [{ block: 'b0', face: 'front' }]);
    registry.setDefaultPatch(mesh_id);
    const result = registry.mergePatchPairs(mesh_id, 'master', 'slave');
    expect(result.readback.merge_patch_pairs).toEqual([['master', 'slave']]);
    expect(result.readback.default_patch).toEqual({ name: 'defaultFaces', type: 'empty' });
    const text = lines(mesh_id);
    expect(text).toContain('    (master slave)');
    expect(text).toContain('    name defaultFaces;');
  });

  it('rejects unknown and self merges', () => {
    const { mesh_id } = registry.createMesh();
    registry.addBlock(mesh_id, CUBE);
    registry.addPatch(mesh_id, 'master', 'patch', [{ block: 'b0', face: 'right' }]);
    expect(() => registry.mergePatchPairs(mesh_id, 'master', 'slave')).toThrow('Patch "slave" not found');
    expect(() => registry.mergePatchPairs(mesh_id, 'master', 'master')).toThrow(ConfigurationError);
  });
});
