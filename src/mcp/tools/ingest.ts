/**
 * surfacewatch — MCP Ingest Tool
 *
 * Tool for ingesting scanner output files.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { INGEST_PARSERS, ingestFile } from '../../engine/ingest.js';
import { ZONES } from '../../types/entities.js';
import type { EngineContext } from '../../types/engine.js';
import { errorResult, textResult } from './result.js';

export function registerIngestTool(server: McpServer, ctx: EngineContext): void {
  server.tool(
    'ingest_file',
    'Ingest a scanner output file (amass, subfinder, gnmap, nmap XML, nuclei, wpscan, patator, hydra) and emit deltas for new findings',
    {
      path: z.string().describe('Absolute path to the scanner output file'),
      parser: z.enum(INGEST_PARSERS).describe('Parser for the file format'),
      zone: z.enum(ZONES).optional().describe('Network zone of the scanned hosts (default external)'),
      host: z.string().optional().describe('Override the host name of port scan results'),
    },
    async ({ path, parser, zone, host }) => {
      try {
        const s = ingestFile(ctx, { path, parser, zone, host });
        const summary = [
          `Ingested ${parser} output from ${path}`,
          `Parsed: ${s.parsed}, skipped: ${s.skipped}`,
          `Created: ${s.created}, updated: ${s.updated}, alerts: ${s.alerts}`,
        ].join('\n');
        return textResult(summary);
      } catch (err) {
        return errorResult('Ingest failed', err);
      }
    },
  );
}
