/**
 * surfacewatch — MCP Search Tool
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { runSavedSearch, saveSearch, searchRecords } from '../../engine/search.js';
import { RECORD_SETS } from '../../types/entities.js';
import type { EngineContext } from '../../types/engine.js';
import { errorResult, jsonResult } from './result.js';

export function registerSearchTool(server: McpServer, ctx: EngineContext): void {
  server.tool(
    'search_records',
    'Regex search over a record set (discovery, services, inservices, targets, intargets, nuclei), optionally through a saved search',
    {
      recordSet: z.enum(RECORD_SETS),
      regexp: z.string().optional().describe('Include regex (default .*)'),
      exclude: z.string().optional().describe('Exclude regex'),
      owner: z.string().optional().describe('Only hosts of this owner (services sets)'),
      savedSearch: z.string().optional().describe('Run the saved search with this name'),
      saveAs: z.string().optional().describe('Save regexp/exclude under this name'),
    },
    async ({ recordSet, regexp, exclude, owner, savedSearch, saveAs }) => {
      try {
        if (savedSearch !== undefined) {
          return jsonResult(runSavedSearch(ctx.db, savedSearch, recordSet));
        }
        const pattern = regexp ?? '.*';
        if (saveAs !== undefined) {
          saveSearch(ctx.db, { name: saveAs, regexp: pattern, exclude });
        }
        return jsonResult(searchRecords(ctx.db, { recordSet, regexp: pattern, exclude, owner }));
      } catch (err) {
        return errorResult('Search failed', err);
      }
    },
  );
}
