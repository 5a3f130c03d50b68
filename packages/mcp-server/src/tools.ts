/**
 * MCP Tool Registrations — mesh construction and blockMeshDict output.
 *
 * Every mutating tool returns JSON with { mesh_id, readback } so the LLM
 * always knows the current state after every operation.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { createLogger, FACE_LABELS } from '@hexdict/mesh-kernel';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as registry from './registry.js';

const log = createLogger('McpServer');

const vec3 = z.tuple([z.number().finite(), z.number().finite(), z.number().finite()]);
const vertex = z.union([z.string(), vec3]);
const localIndex = z.number().int().min(0).max(7);
const meshId = z.string().describe('ID of the mesh');
const blockId = z.string().describe('Name of the block within the mesh');

const edgeSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('arc'), point: vec3.describe('Point the arc passes through') }),
  z.object({
    type: z.literal('arc_origin'),
    origin: vec3.describe('Arc centre'),
    factor: z.number().positive().optional().describe('Radius scale factor (default 1)'),
  }),
  z.object({ type: z.literal('spline'), points: z.array(vec3).describe('Interior points') }),
  z.object({ type: z.literal('BSpline'), points: z.array(vec3).describe('Interior control points') }),
  z.object({ type: z.literal('polyLine'), points: z.array(vec3).describe('Interior points') }),
  z.object({ type: z.literal('project'), geometries: z.array(z.string()).min(1).describe('Geometry names') }),
]);

function reply(result: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(result) }] };
}

export function registerTools(server: McpServer): void {

  // ─── Meshes & points (2) ────────────────────────────────────

  server.tool(
    'create_mesh',
    'Create an empty block mesh. Coordinates are multiplied by scale when meshing.',
    {
      scale: z.number().positive().default(1).describe('Coordinate scale factor (e.g. 0.001 for mm → m)'),
      name: z.string().optional().describe('Optional name for the mesh (letters, digits, hyphens, underscores only)'),
    },
    async ({ scale, name }) => reply(registry.createMesh(scale, name))
  );

  server.tool(
    'add_point',
    'Add a named vertex. Give geometries to project it onto registered surfaces.',
    {
      mesh: meshId,
      x: z.number().finite(),
      y: z.number().finite(),
      z: z.number().finite(),
      geometries: z.array(z.string()).optional().describe('Geometry names to project onto'),
      name: z.string().optional().describe('Optional point name (default: p0, p1, ...)'),
    },
    async (params) => reply(
      registry.addPoint(params.mesh, [params.x, params.y, params.z], params.name, params.geometries)
    )
  );

  // ─── Blocks (6) ─────────────────────────────────────────────

  server.tool(
    'add_block',
    'Add a hex block from 8 corners: bottom face 0-1-2-3 counter-clockwise seen from above, then top face 4-5-6-7 above them. Each corner is a point name or [x, y, z]; equal coordinates reuse the same vertex.',
    {
      mesh: meshId,
      vertices: z.array(vertex).length(8).describe('8 corners in local order 0-7'),
      cells: z.tuple([z.number().int().positive(), z.number().int().positive(), z.number().int().positive()])
        .optional().describe('Cell counts along local x, y, z (default [1, 1, 1])'),
      grading: z.array(z.number().positive()).optional()
        .describe('3 values (simpleGrading) or 12 values (edgeGrading)'),
      cell_zone: z.string().optional().describe('cellZone for the block cells'),
      description: z.string().optional().describe('Comment written after the block entry'),
      name: z.string().optional().describe('Optional block name (default: b0, b1, ...)'),
    },
    async (params) => reply(
      registry.addBlock(params.mesh, params.vertices, {
        name: params.name,
        cells: params.cells,
        grading: params.grading,
        cellZone: params.cell_zone,
        description: params.description,
      })
    )
  );

  server.tool(
    'set_block_cells',
    'Set the cell counts of a block.',
    {
      mesh: meshId,
      block: blockId,
      cells: z.tuple([z.number().int().positive(), z.number().int().positive(), z.number().int().positive()]),
    },
    async ({ mesh, block, cells }) => reply(registry.setBlockCells(mesh, block, cells))
  );

  server.tool(
    'set_block_cell_size',
    'Derive cell counts from a target cell size, measured along the first edge of each local axis.',
    {
      mesh: meshId,
      block: blockId,
      size: z.number().positive().describe('Target cell size in model units'),
      axis: z.union([z.literal(0), z.literal(1), z.literal(2)]).optional()
        .describe('Only update this local axis'),
    },
    async ({ mesh, block, size, axis }) => reply(registry.setBlockCellSize(mesh, block, size, axis))
  );

  server.tool(
    'set_block_grading',
    'Set expansion ratios: 3 values give simpleGrading, 12 values give edgeGrading.',
    {
      mesh: meshId,
      block: blockId,
      grading: z.array(z.number().positive()),
    },
    async ({ mesh, block, grading }) => reply(registry.setBlockGrading(mesh, block, grading))
  );

  server.tool(
    'set_block_zone',
    'Put the block cells in a cellZone and optionally set its description.',
    {
      mesh: meshId,
      block: blockId,
      cell_zone: z.string(),
      description: z.string().optional(),
    },
    async ({ mesh, block, cell_zone, description }) => reply(
      registry.setBlockZone(mesh, block, cell_zone, description)
    )
  );

  server.tool(
    'set_block_edge',
    'Curve the block edge between two local corners (0-7). Edge types: arc, arc_origin, spline, BSpline, polyLine, project.',
    {
      mesh: meshId,
      block: blockId,
      from: localIndex.describe('Local index of the start corner'),
      to: localIndex.describe('Local index of the end corner'),
      edge: edgeSchema,
    },
    async ({ mesh, block, from, to, edge }) => reply(registry.setBlockEdge(mesh, block, from, to, edge))
  );

  // ─── Boundary (4) ───────────────────────────────────────────

  server.tool(
    'add_geometry',
    'Register a triangulated surface (STL/OBJ) that points, edges and faces can be projected onto.',
    {
      mesh: meshId,
      name: z.string().describe('Geometry name'),
      file: z.string().describe('Surface file path, as read by the mesher'),
    },
    async ({ mesh, name, file }) => reply(registry.addGeometry(mesh, name, file))
  );

  server.tool(
    'add_patch',
    'Group block faces into a named patch. Set boundary to write it in the boundary section instead of patches.',
    {
      mesh: meshId,
      name: z.string().describe('Patch name'),
      type: z.string().default('patch').describe('Patch type (patch, wall, symmetryPlane, empty, ...)'),
      faces: z.array(z.object({
        block: z.string(),
        face: z.enum(FACE_LABELS),
      })).min(1).describe('Block faces by block name and face label'),
      boundary: z.boolean().default(false),
    },
    async ({ mesh, name, type, faces, boundary }) => reply(
      registry.addPatch(mesh, name, type, faces, boundary)
    )
  );

  server.tool(
    'set_default_patch',
    'Set the patch that collects every face not in another patch.',
    {
      mesh: meshId,
      name: z.string().optional().describe('Default: defaultFaces'),
      type: z.string().optional().describe('Default: empty'),
    },
    async ({ mesh, name, type }) => reply(registry.setDefaultPatch(mesh, name, type))
  );

  server.tool(
    'merge_patch_pairs',
    'Stitch the slave patch onto the master patch.',
    {
      mesh: meshId,
      master: z.string(),
      slave: z.string(),
    },
    async ({ mesh, master, slave }) => reply(registry.mergePatchPairs(mesh, master, slave))
  );

  // ─── Output (2) ─────────────────────────────────────────────

  server.tool(
    'render_mesh',
    'Render a mesh as blockMeshDict text.',
    {
      mesh: meshId,
      header: z.string().optional().describe('Text placed after the version comment'),
      footer: z.string().optional().describe('Text placed after the closing line'),
      fast_merge: z.boolean().optional().describe('Write fastMerge yes; (default true)'),
    },
    async ({ mesh, header, footer, fast_merge }) => {
      const text = registry.render(mesh, { header, footer, fastMerge: fast_merge });
      return { content: [{ type: 'text', text }] };
    }
  );

  server.tool(
    'export_mesh',
    'Write a mesh as <name>.blockMeshDict into the export directory.',
    {
      mesh: meshId,
      filename: z.string().optional().describe('Base file name (default: mesh ID)'),
    },
    async ({ mesh, filename }) => {
      const entry = registry.get(mesh);
      const text = registry.render(entry.id);

      // Write to safe output directory
      const exportDir = path.join(process.env.TMPDIR ?? '/tmp', 'hexdict');
      fs.mkdirSync(exportDir, { recursive: true });
      const safeName = (filename ?? entry.id).replace(/[^a-zA-Z0-9_-]/g, '_');
      const filePath = path.join(exportDir, `${safeName}.blockMeshDict`);
      fs.writeFileSync(filePath, text, 'utf-8');
      log.info(`wrote ${filePath}`, { operation: 'export_mesh' });

      const result = {
        mesh_id: entry.id,
        type: 'blockMeshDict_export',
        file_path: filePath,
        file_size_bytes: Buffer.byteLength(text),
        line_count: text.split('\n').length,
      };
      return reply(result);
    }
  );

  // ─── Session (2) ────────────────────────────────────────────

  server.tool(
    'get_mesh',
    'Show the current state of a mesh.',
    {
      mesh: meshId,
    },
    async ({ mesh }) => reply(registry.result(mesh))
  );

  server.tool(
    'list_meshes',
    'List all meshes in the registry.',
    {},
    async () => {
      const meshes = registry.list();
      return reply({ count: meshes.length, meshes });
    }
  );
}
