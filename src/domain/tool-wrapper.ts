/**
 * Tool wrapper utility
 * Wraps tool handlers with request id, logging, metrics and timing
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { runWithContext, generateRequestId } from './request-context.js';
import { logger } from './logger.js';
import { metrics } from './metrics.js';

/**
 * Tool handler function type
 */
export type ToolHandler = (args: unknown) => Promise<CallToolResult>;

/**
 * Wrap a tool handler with observability instrumentation
 *
 * Adds:
 * - RequestId generation and context
 * - Start/end logging with timing
 * - Metrics collection (calls, latency)
 */
export function wrapTool(toolName: string, handler: ToolHandler): ToolHandler {
  return async (args: unknown): Promise<CallToolResult> => {
    const requestId = generateRequestId();
    const startTime = Date.now();

    // Context propagates to every async operation of the call
    return runWithContext({ requestId, toolName, startTime }, async () => {
      try {
        logger.logToolStart(toolName, args, requestId);

        const result = await handler(args);

        const latencyMs = Date.now() - startTime;
        const outcome: 'success' | 'error' = result.isError ? 'error' : 'success';

        const first = result.content[0];
        const errorText = first && first.type === 'text' ? first.text : undefined;
        const errorCode = result.isError && errorText ? extractErrorCode(errorText) : undefined;

        logger.logToolEnd(toolName, latencyMs, outcome, requestId, errorCode);

        metrics.incrementToolCall(toolName, outcome);
        metrics.recordLatency(toolName, latencyMs);

        return result;
      } catch (error) {
        // Handlers return isError results; anything thrown here is unexpected
        const latencyMs = Date.now() - startTime;

        logger.logToolEnd(toolName, latencyMs, 'error', requestId, 'INTERNAL_ERROR');
        logger.logError(error instanceof Error ? error : new Error(String(error)), {
          requestId,
          toolName,
          context: 'tool_wrapper',
        });

        metrics.incrementToolCall(toolName, 'error');
        metrics.recordLatency(toolName, latencyMs);

        // Re-throw to let SDK handle it
        throw error;
      }
    });
  };
}

/**
 * Extract error code from error response text
 * Looks for pattern like "[ERROR_CODE]" or "Error: ERROR_CODE"
 */
export function extractErrorCode(text: string): string | undefined {
  const patterns = [
    /^\[(\w+)\]/, // "[LOOKUP_FAILED] ..."
    /Error:\s*(\w+)/, // "Error: INVALID_INPUT"
    /code:\s*"?(\w+)"?/i, // "code: RATE_LIMITED"
  ];

  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (match) {
      return match[1];
    }
  }

  return undefined;
}
