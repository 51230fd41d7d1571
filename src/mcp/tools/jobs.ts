/**
 * surfacewatch — MCP Jobs Tool
 *
 * Actions: create, list, delete, targets
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import {
  createJob,
  deleteJob,
  listJobs,
  selectJobTargets,
  TARGET_FORMATS,
} from '../../engine/jobs.js';
import { RECORD_SETS } from '../../types/entities.js';
import type { EngineContext } from '../../types/engine.js';
import { errorResult, invalidParams, jsonResult, textResult } from './result.js';

function missing(param: string, action: string): CallToolResult {
  return invalidParams(`${param} parameter required for ${action}`);
}

export function registerJobsTool(server: McpServer, ctx: EngineContext): void {
  server.tool(
    'manage_jobs',
    'Manage scan jobs. Actions: create, list, delete, targets (names or URLs selected by a job)',
    {
      action: z.enum(['create', 'list', 'delete', 'targets']),
      id: z.number().int().optional().describe('Job id (delete, targets)'),
      name: z.string().optional().describe('Job name (create)'),
      input: z.enum(RECORD_SETS).optional().describe('Record set the job selects from (create)'),
      module: z.string().optional(),
      regexp: z.string().optional(),
      exclude: z.string().optional(),
      tag: z.string().optional(),
      info: z.string().optional(),
      format: z.enum(TARGET_FORMATS).optional().describe('Target expansion (targets)'),
    },
    async ({ action, id, name, input, module, regexp, exclude, tag, info, format }) => {
      try {
        switch (action) {
          case 'create': {
            if (name === undefined) return missing('name', action);
            if (input === undefined) return missing('input', action);
            const job = createJob(ctx.db, { name, input, module, regexp, exclude, tag, info }, ctx.now());
            return jsonResult(job);
          }
          case 'list':
            return jsonResult(listJobs(ctx.db));
          case 'delete':
            if (id === undefined) return missing('id', action);
            deleteJob(ctx.db, id);
            return textResult(`Deleted job ${id}`);
          case 'targets':
            if (id === undefined) return missing('id', action);
            return textResult(selectJobTargets(ctx.db, id, format).join('\n'));
          default: {
            const _exhaustive: never = action;
            throw new Error(`Unknown action: ${String(_exhaustive)}`);
          }
        }
      } catch (err) {
        return errorResult('Job action failed', err);
      }
    },
  );
}
