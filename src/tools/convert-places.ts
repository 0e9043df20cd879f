/**
 * Convert Places Tool
 * Converts SSR place names for a municipality, county or all of Norway into
 * OSM-tagged GeoJSON files
 */

import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { SourceMode } from '../config/env.js';
import type { ConversionSummary, ConvertRequest } from '../conversion/converter.js';
import { buildSourceMetadata } from '../domain/attribution.js';
import { toConversionError } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';
import { buildErrorResponse, buildToolResponse } from '../domain/response-builder.js';

/**
 * Tool input schema
 */
export const ConvertPlacesInputSchema = z.object({
  scope: z
    .string()
    .min(1)
    .describe('Municipality or county code, a municipality or county name, or "Norge" for the whole country'),
  nameType: z
    .string()
    .min(1)
    .optional()
    .describe('Only convert places of this SSR name type (e.g. "vik", "gard")'),
  includeUntagged: z
    .boolean()
    .default(false)
    .describe('Also output places whose name type has no OSM tagging'),
  sourceMode: z
    .enum(['static', 'wfs'])
    .optional()
    .describe('Read static GML extracts or query the Kartverket WFS (defaults to the server setting)'),
  skipBuildingRelocation: z
    .boolean()
    .default(false)
    .describe('Keep registry positions even where a place sits inside a building footprint'),
  includeAllWaterwayPoints: z
    .boolean()
    .default(false)
    .describe('Output every registered point of a waterway instead of one representative point'),
});

export type ConvertPlacesInput = z.infer<typeof ConvertPlacesInputSchema>;

export interface ConversionRunner {
  run(request: ConvertRequest): Promise<ConversionSummary>;
}

export interface ConvertPlacesDependencies {
  defaultMode: SourceMode;
  getRunner(mode: SourceMode): Promise<ConversionRunner>;
}

const MAX_LISTED_FILES = 10;

/**
 * Generate human-readable text summary
 */
export function generateSummary(summary: ConversionSummary): string {
  const { scope, totals } = summary;
  const written = summary.units.filter(unit => unit.path !== undefined);
  const typeLabel = summary.nameType ? ` (name type ${summary.nameType})` : '';

  const lines = [
    `Converted ${scope.name} (${scope.code})${typeLabel} from ${summary.sourceMode} source: ` +
      `${totals.converted} places in ${written.length} file(s).`,
    `Records: ${totals.records}, skipped: ${totals.skipped}, excluded: ${totals.excluded}, ` +
      `duplicates: ${totals.duplicates}, relocated: ${totals.relocated}, ` +
      `rank adjusted: ${totals.rankAdjusted}, non-Norwegian names: ${totals.nonMajorityNames}.`,
  ];

  for (const unit of written.slice(0, MAX_LISTED_FILES)) {
    lines.push(`- ${unit.path} (${unit.stats.converted} places)`);
  }
  if (written.length > MAX_LISTED_FILES) {
    lines.push(`...and ${written.length - MAX_LISTED_FILES} more files.`);
  }

  if (summary.failures.length > 0) {
    lines.push(`${summary.failures.length} unit(s) failed:`);
    for (const failure of summary.failures) {
      lines.push(`- ${failure.unit.code} ${failure.unit.name}: [${failure.error.code}] ${failure.error.message}`);
    }
  }

  if (summary.issueCount > 0) {
    lines.push(`${summary.issueCount} issue(s) logged; the first ${summary.issues.length} are in the structured result.`);
  }

  return lines.join('\n');
}

/**
 * Convert Places Tool Handler
 */
export async function handleConvertPlaces(
  input: ConvertPlacesInput,
  deps: ConvertPlacesDependencies
): Promise<CallToolResult> {
  const mode = input.sourceMode ?? deps.defaultMode;

  try {
    logger.debug('Convert places tool called', { scope: input.scope, nameType: input.nameType, mode });

    const runner = await deps.getRunner(mode);
    const summary = await runner.run({
      scope: input.scope,
      nameType: input.nameType,
      includeUntagged: input.includeUntagged,
      skipBuildingRelocation: input.skipBuildingRelocation,
      includeAllWaterwayPoints: input.includeAllWaterwayPoints,
    });

    logger.info('Convert places tool completed', {
      scope: summary.scope.code,
      units: summary.units.length,
      failures: summary.failures.length,
    });

    return buildToolResponse({ ...summary, source: buildSourceMetadata(mode) }, generateSummary(summary));
  } catch (error) {
    const conversionError = toConversionError(error, `Failed to convert places for '${input.scope}'`);
    logger.error('Convert places tool error', {
      scope: input.scope,
      code: conversionError.code,
      error: conversionError.message,
    });
    return buildErrorResponse(conversionError);
  }
}
