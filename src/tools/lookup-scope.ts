/**
 * Lookup Scope Tool
 * Resolves a scope parameter to a municipality, county or the whole country
 */

import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { SourceMode } from '../config/env.js';
import { toConversionError } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';
import { buildErrorResponse, buildToolResponse } from '../domain/response-builder.js';
import type { AdminUnit, MunicipalityRegistry } from '../sources/municipalities.js';

export const LookupScopeInputSchema = z.object({
  scope: z.string().min(1).describe('Municipality or county code or name, or "Norge"'),
  sourceMode: z
    .enum(['static', 'wfs'])
    .optional()
    .describe('Source mode the scope is meant for; Svalbard is only available from the WFS'),
});

export type LookupScopeInput = z.infer<typeof LookupScopeInputSchema>;

export interface LookupScopeDependencies {
  defaultMode: SourceMode;
  getRegistry(mode: SourceMode): Promise<MunicipalityRegistry>;
}

/**
 * Municipalities covered by a unit
 */
export function municipalitiesOf(registry: MunicipalityRegistry, unit: AdminUnit): AdminUnit[] {
  const municipalities = registry.list('municipality');
  switch (unit.kind) {
    case 'municipality':
      return [unit];
    case 'county':
      return municipalities.filter(municipality => municipality.code.startsWith(unit.code));
    case 'country':
      return municipalities;
  }
}

function generateSummary(unit: AdminUnit, municipalities: AdminUnit[]): string {
  switch (unit.kind) {
    case 'municipality':
      return `${unit.name} is municipality ${unit.code}.`;
    case 'county':
      return `${unit.name} is county ${unit.code} with ${municipalities.length} municipalities: ${municipalities
        .map(municipality => `${municipality.code} ${municipality.name}`)
        .join(', ')}.`;
    case 'country':
      return `${unit.name} (${unit.code}) covers ${municipalities.length} municipalities.`;
  }
}

export async function handleLookupScope(
  input: LookupScopeInput,
  deps: LookupScopeDependencies
): Promise<CallToolResult> {
  try {
    const registry = await deps.getRegistry(input.sourceMode ?? deps.defaultMode);
    const unit = registry.resolve(input.scope);
    const municipalities = municipalitiesOf(registry, unit);

    logger.info('Scope resolved', { scope: input.scope, code: unit.code, kind: unit.kind });

    return buildToolResponse(
      {
        unit,
        municipalities: unit.kind === 'country' ? undefined : municipalities,
        municipalityCount: municipalities.length,
      },
      generateSummary(unit, municipalities)
    );
  } catch (error) {
    const conversionError = toConversionError(error, `Failed to resolve scope '${input.scope}'`);
    logger.warn('Lookup scope tool error', { scope: input.scope, code: conversionError.code });
    return buildErrorResponse(conversionError);
  }
}
