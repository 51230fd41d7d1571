/**
 * surfacewatch — Attack surface finding normalization and delta alerting
 *
 * MCP Server エントリポイント。
 * stdio トランスポートで LLM Agent と接続する。
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { createMcpServer } from './mcp/server.js';
import { createRuntime } from './runtime.js';

const config = loadConfig();
const { ctx } = createRuntime(config);

const server = createMcpServer(ctx, { retentionDays: config.retentionDays });
const transport = new StdioServerTransport();
await server.connect(transport);
ctx.logger.info('mcp server connected');
