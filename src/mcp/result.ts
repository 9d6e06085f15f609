/**
 * Tool result helpers shared by every MCP tool
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { OpenOcdError, errorMessage } from '../errors.js';

export function toToolResult(data: Record<string, unknown>, message?: string): CallToolResult {
  const text = message ?? JSON.stringify(data, null, 2);
  return {
    content: [{ type: 'text', text }],
    structuredContent: data,
  };
}

/**
 * Failures are reported in the result rather than thrown to the client
 */
export function toErrorResult(error: unknown): CallToolResult {
  const message = errorMessage(error);
  const code = error instanceof OpenOcdError ? error.code : 'error';
  return { ...toToolResult({ ok: false, error: message, code }, message), isError: true };
}
