/**
 * Response builder for MCP tool responses
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ConversionError } from './types.js';

/**
 * Build a successful tool response
 *
 * @param structuredContent - Machine-readable result, e.g. a conversion summary
 * @param textSummary - Human-readable summary shown to the model
 * @returns MCP CallToolResult with both content types
 */
export function buildToolResponse(
  structuredContent: Record<string, unknown>,
  textSummary: string
): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: textSummary,
      },
    ],
    structuredContent,
  };
}

/**
 * Build an error tool response
 *
 * The text starts with the error code in brackets so the tool wrapper can
 * record it; the structured content carries the full error.
 *
 * @param error - Structured conversion error
 * @returns MCP CallToolResult with isError set
 */
export function buildErrorResponse(error: ConversionError): CallToolResult {
  const message = error.details?.retryAfterSeconds
    ? `${error.message} Retry after ${error.details.retryAfterSeconds} seconds.`
    : error.message;

  return {
    content: [
      {
        type: 'text',
        text: `[${error.code}] ${message}`,
      },
    ],
    structuredContent: {
      error,
    },
    isError: true,
  };
}
