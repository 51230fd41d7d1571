/**
 * surfacewatch — MCP Finding Tools
 *
 * triage_findings: triage, ptime override and deletion of findings.
 * sweep_findings: overdue alerts, retention cleanup and purge.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  alertUnattended,
  cleanUnseen,
  deleteFindings,
  FINDING_FILTERS,
  purgeFindings,
  setPtimeOverride,
  setTriage,
  toFindingSelector,
} from '../../engine/lifecycle.js';
import type { EngineContext } from '../../types/engine.js';
import { errorResult, invalidParams, jsonResult, textResult } from './result.js';

export interface FindingToolOptions {
  retentionDays: number;
}

export function registerFindingTools(
  server: McpServer,
  ctx: EngineContext,
  options: FindingToolOptions,
): void {
  server.tool(
    'triage_findings',
    'Triage vulnerability findings. Actions: true, false, unset, ptime, delete',
    {
      action: z.enum(['true', 'false', 'unset', 'ptime', 'delete']),
      name: z.string().optional().describe('Host name of the findings'),
      vulnerability: z.string().optional().describe('Vulnerability id (with name)'),
      search: z.string().optional().describe('Regex over URI, vulnerability and metadata'),
      exclude: z.string().optional().describe('Regex excluding search matches'),
      filters: z.array(z.enum(FINDING_FILTERS)).optional().describe('Restrict by triage state'),
      ptime: z.string().optional().describe('ptime code for the ptime action (e.g. P1E)'),
    },
    async ({ action, name, vulnerability, search, exclude, filters, ptime }) => {
      const selector = toFindingSelector({ name, vulnerability, search, exclude });
      try {
        if (action === 'delete') {
          return jsonResult(deleteFindings(ctx, selector, filters));
        }
        if (selector === undefined) {
          return invalidParams('name or search parameter required');
        }
        if (action === 'ptime') {
          return jsonResult(setPtimeOverride(ctx, ptime ?? '', selector, filters));
        }
        return jsonResult(setTriage(ctx, action, selector, filters));
      } catch (err) {
        return errorResult('Triage failed', err);
      }
    },
  );

  server.tool(
    'sweep_findings',
    'Run a finding sweep. alert: notify overdue findings; clean: drop findings unseen for the retention period; purge: delete every finding',
    {
      sweep: z.enum(['alert', 'clean', 'purge']),
      retentionDays: z.number().int().positive().optional(),
    },
    async ({ sweep, retentionDays }) => {
      try {
        switch (sweep) {
          case 'alert':
            return textResult(`Alerted ${alertUnattended(ctx)} unattended findings`);
          case 'clean': {
            const deleted = cleanUnseen(ctx, retentionDays ?? options.retentionDays);
            return textResult(`Deleted ${deleted} unseen findings`);
          }
          case 'purge':
            return textResult(`Purged ${purgeFindings(ctx)} findings`);
          default: {
            const _exhaustive: never = sweep;
            throw new Error(`Unknown sweep: ${String(_exhaustive)}`);
          }
        }
      } catch (err) {
        return errorResult('Sweep failed', err);
      }
    },
  );
}
