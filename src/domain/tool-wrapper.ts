/**
 * Tool Wrapper Utility
 * Wraps command handlers with requestId context, start/end logging, metrics and timing
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { runWithContext, generateRequestId } from './request-context.js';
import { logger } from './logger.js';
import { metrics } from './metrics.js';

export type ToolHandler = (...args: unknown[]) => Promise<CallToolResult>;

/**
 * Wrap a command handler with observability instrumentation
 */
export function wrapTool(commandName: string, handler: ToolHandler): ToolHandler {
  return async (...args: unknown[]): Promise<CallToolResult> => {
    const requestId = generateRequestId();
    const startTime = Date.now();

    return runWithContext({ requestId, commandName, startTime }, async () => {
      logger.logCommandStart(commandName, args[0], requestId);

      try {
        const result = await handler(...args);
        const latencyMs = Date.now() - startTime;
        const outcome: 'success' | 'error' = result.isError ? 'error' : 'success';

        logger.logCommandEnd(
          commandName,
          latencyMs,
          outcome,
          requestId,
          result.isError ? extractErrorKind(result.structuredContent) : undefined
        );
        metrics.incrementCommandCall(commandName, outcome);
        metrics.recordLatency(commandName, latencyMs);

        return result;
      } catch (error) {
        // Transport failures are not handled by the commands; log and let the SDK report them
        const latencyMs = Date.now() - startTime;

        logger.logCommandEnd(commandName, latencyMs, 'error', requestId, errorName(error));
        logger.logError(error, { requestId, commandName, context: 'tool_wrapper' });

        metrics.incrementCommandCall(commandName, 'error');
        metrics.recordLatency(commandName, latencyMs);

        throw error;
      }
    });
  };
}

function extractErrorKind(structuredContent: Record<string, unknown> | undefined): string | undefined {
  const error = structuredContent?.error;
  if (typeof error === 'object' && error !== null && 'kind' in error && typeof error.kind === 'string') {
    return error.kind;
  }
  return undefined;
}

function errorName(error: unknown): string {
  return error instanceof Error ? error.name : 'UnknownError';
}
