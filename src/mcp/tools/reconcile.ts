/**
 * surfacewatch — MCP Reconcile Tool
 *
 * Registers a list of names as targets or discovery results and applies a
 * work mode to the rows carrying the same tag.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { reconcileDiscoveries, reconcileTargets } from '../../engine/reconciler.js';
import { ZONES } from '../../types/entities.js';
import { WORK_MODES, type EngineContext } from '../../types/engine.js';
import { errorResult, jsonResult } from './result.js';

export function registerReconcileTool(server: McpServer, ctx: EngineContext): void {
  server.tool(
    'reconcile_targets',
    'Import a list of names into the target registry (or discovery results). Modes: merge, sync, delete, deletebytag',
    {
      names: z.array(z.string()).describe('Names to register (domains, addresses, URLs, ...)'),
      tag: z.string().default('DEFAULT').describe('Tag of the batch; deletions only touch this tag'),
      mode: z.enum(WORK_MODES).default('merge'),
      zone: z.enum(ZONES).default('external').describe('Registry zone (targets only)'),
      recordSet: z.enum(['targets', 'discovery']).default('targets'),
      owner: z.string().optional().describe('Owner to store on discovery results'),
    },
    async ({ names, tag, mode, zone, recordSet, owner }) => {
      try {
        const result =
          recordSet === 'targets'
            ? reconcileTargets(ctx, { zone, tag, mode, names })
            : reconcileDiscoveries(ctx, { tag, mode, names, owner });
        return jsonResult({ recordSet, mode, ...result });
      } catch (err) {
        return errorResult('Reconcile failed', err);
      }
    },
  );
}
