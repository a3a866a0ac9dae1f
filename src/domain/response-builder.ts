/**
 * Response builder for MCP tool responses
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

/**
 * Build a reply carrying the line the user sees
 *
 * @param text - Reply line
 * @param structuredContent - Optional machine-readable data (e.g. the weather record)
 */
export function buildCommandReply(
  text: string,
  structuredContent?: Record<string, unknown>
): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
    ...(structuredContent ? { structuredContent } : {}),
  };
}

/**
 * Build an error reply; the text is already localized for the caller
 *
 * @param text - Localized error message
 * @param kind - Error kind, e.g. "geocode" or "missing-api-key"
 * @param details - Payload of the error (status, provider)
 */
export function buildErrorReply(
  text: string,
  kind: string,
  details: Record<string, unknown> = {}
): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
    structuredContent: {
      error: { kind, ...details },
    },
    isError: true,
  };
}
