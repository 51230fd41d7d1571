/**
 * surfacewatch — MCP Server
 *
 * Creates and configures the MCP server with all tools and resources.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { EngineContext } from '../types/engine.js';
import { registerFindingTools } from './tools/findings.js';
import { registerIngestTool } from './tools/ingest.js';
import { registerJobsTool } from './tools/jobs.js';
import { registerReconcileTool } from './tools/reconcile.js';
import { registerSearchTool } from './tools/search.js';
import { registerResources } from './resources.js';

export interface McpServerOptions {
  retentionDays: number;
}

/**
 * Create a fully configured MCP server over the given engine context.
 */
export function createMcpServer(ctx: EngineContext, options: McpServerOptions): McpServer {
  const server = new McpServer({
    name: 'surfacewatch',
    version: '0.1.0',
  });

  registerIngestTool(server, ctx);
  registerReconcileTool(server, ctx);
  registerFindingTools(server, ctx, options); // triage_findings + sweep_findings
  registerSearchTool(server, ctx);
  registerJobsTool(server, ctx);

  registerResources(server, ctx.db);

  return server;
}
