#!/usr/bin/env node
/**
 * hexdict MCP Server
 *
 * Exposes block mesh construction and blockMeshDict export as callable
 * tools for LLM agents. Runs over stdio transport.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { DEFAULT_VERSION } from '@hexdict/mesh-kernel';
import { registerTools } from './tools.js';

const server = new McpServer({
  name: 'hexdict',
  version: DEFAULT_VERSION,
});

registerTools(server);

const transport = new StdioServerTransport();
await server.connect(transport);
