/**
 * Diff Names Tool
 * Compares the name tags of two converted GeoJSON files
 */

import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { diffFiles, type NameDiff, type NameTags } from '../diff/name-diff.js';
import { toConversionError } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';
import { buildErrorResponse, buildToolResponse } from '../domain/response-builder.js';

export const DiffNamesInputSchema = z.object({
  firstPath: z.string().min(1).describe('Path to the first (usually older) GeoJSON file'),
  secondPath: z.string().min(1).describe('Path to the second GeoJSON file'),
});

export type DiffNamesInput = z.infer<typeof DiffNamesInputSchema>;

const MAX_LISTED_CHANGES = 20;

function formatTags(tags: NameTags): string {
  return Object.entries(tags)
    .map(([key, value]) => `${key}=${value}`)
    .join(', ');
}

export function generateSummary(diff: NameDiff): string {
  const lines = [
    `Compared ${diff.compared} places: ${diff.changed.length} changed, ` +
      `${diff.onlyInFirst.length} only in first file, ${diff.onlyInSecond.length} only in second file.`,
  ];

  for (const change of diff.changed.slice(0, MAX_LISTED_CHANGES)) {
    const parts: string[] = [];
    if (Object.keys(change.missingInSecond).length > 0) {
      parts.push(`first has ${formatTags(change.missingInSecond)}`);
    }
    if (Object.keys(change.missingInFirst).length > 0) {
      parts.push(`second has ${formatTags(change.missingInFirst)}`);
    }
    lines.push(`- ${change.placeId}: ${parts.join('; ')}`);
  }
  if (diff.changed.length > MAX_LISTED_CHANGES) {
    lines.push(`...and ${diff.changed.length - MAX_LISTED_CHANGES} more changed places.`);
  }

  return lines.join('\n');
}

export async function handleDiffNames(input: DiffNamesInput): Promise<CallToolResult> {
  try {
    const diff = await diffFiles(input.firstPath, input.secondPath);
    return buildToolResponse({ ...diff }, generateSummary(diff));
  } catch (error) {
    const conversionError = toConversionError(error, 'Failed to compare name files');
    logger.warn('Diff names tool error', {
      firstPath: input.firstPath,
      secondPath: input.secondPath,
      code: conversionError.code,
    });
    return buildErrorResponse(conversionError);
  }
}
