/**
 * surfacewatch — MCP tool result helpers
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

export function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

export function jsonResult(value: unknown): CallToolResult {
  return textResult(JSON.stringify(value, null, 2));
}

export function errorResult(prefix: string, err: unknown): CallToolResult {
  const message = err instanceof Error ? err.message : String(err);
  return { content: [{ type: 'text', text: `${prefix}: ${message}` }], isError: true };
}

export function invalidParams(text: string): CallToolResult {
  return { content: [{ type: 'text', text }], isError: true };
}
