/**
 * Municipality and county register (Geonorge kommuneinfo) and scope resolution
 */

import { z } from 'zod';
import { createConversionError } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';
import type { HttpClient } from './http-client.js';

export type UnitKind = 'municipality' | 'county' | 'country';

export interface AdminUnit {
  code: string;
  name: string;
  kind: UnitKind;
}

const CountyListingSchema = z.object({
  fylkesnummer: z.string().regex(/^\d{2}$/),
  fylkesnavn: z.string(),
  kommuner: z.array(
    z.object({
      kommunenummer: z.string().regex(/^\d{4}$/),
      kommunenavnNorsk: z.string(),
    })
  ),
});

const CountyListingsSchema = z.array(CountyListingSchema);

export type CountyListing = z.infer<typeof CountyListingSchema>;

export const COUNTRY: AdminUnit = { code: '00', name: 'Norge', kind: 'country' };

/** Svalbard is served by the WFS but has no static extract */
export const SVALBARD: AdminUnit = { code: '2100', name: 'Svalbard', kind: 'municipality' };

const COUNTRY_ALIASES = ['norge', 'norway', 'noreg'];

function kindOf(code: string): UnitKind {
  if (code === '00') {
    return 'country';
  }
  return code.length === 2 ? 'county' : 'municipality';
}

export class MunicipalityRegistry {
  private readonly units: Map<string, AdminUnit>;

  private constructor(units: AdminUnit[]) {
    this.units = new Map(
      [...units].sort((a, b) => a.code.localeCompare(b.code)).map(unit => [unit.code, unit])
    );
  }

  static fromCounties(counties: readonly CountyListing[], includeSvalbard = false): MunicipalityRegistry {
    const units: AdminUnit[] = [COUNTRY];
    for (const county of counties) {
      units.push({ code: county.fylkesnummer, name: county.fylkesnavn.trim(), kind: 'county' });
      for (const municipality of county.kommuner) {
        units.push({
          code: municipality.kommunenummer,
          name: municipality.kommunenavnNorsk.trim(),
          kind: 'municipality',
        });
      }
    }
    if (includeSvalbard) {
      units.push(SVALBARD);
    }
    return new MunicipalityRegistry(units);
  }

  /**
   * Counties with their municipalities from the kommuneinfo API
   *
   * @throws ConversionError when the service fails or answers in an unexpected shape
   */
  static async fetchListing(client: HttpClient): Promise<CountyListing[]> {
    const response = await client.getJson('/fylkerkommuner', {
      query: {
        filtrer: 'fylkesnummer,fylkesnavn,kommuner.kommunenummer,kommuner.kommunenavnNorsk',
      },
    });

    const parsed = CountyListingsSchema.safeParse(response.data);
    if (!parsed.success) {
      throw createConversionError('SOURCE_UNAVAILABLE', 'Unexpected municipality listing from kommuneinfo', {
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    logger.info('Municipality listing loaded', {
      counties: parsed.data.length,
      municipalities: parsed.data.reduce((sum, county) => sum + county.kommuner.length, 0),
    });
    return parsed.data;
  }

  static async fetch(client: HttpClient, includeSvalbard = false): Promise<MunicipalityRegistry> {
    return MunicipalityRegistry.fromCounties(await MunicipalityRegistry.fetchListing(client), includeSvalbard);
  }

  get(code: string): AdminUnit | undefined {
    return this.units.get(code);
  }

  /**
   * Units sorted by code, optionally of one kind
   */
  list(kind?: UnitKind): AdminUnit[] {
    const units = [...this.units.values()];
    return kind ? units.filter(unit => unit.kind === kind) : units;
  }

  /**
   * Resolve a scope parameter: a code, an exact name (case-insensitive) or a
   * unique part of a name
   *
   * @throws ConversionError INVALID_INPUT for empty or ambiguous input, LOOKUP_FAILED when nothing matches
   */
  resolve(parameter: string): AdminUnit {
    const query = parameter.trim();
    if (query === '') {
      throw createConversionError('INVALID_INPUT', 'Scope must be a municipality, county or Norge');
    }

    if (/^\d+$/.test(query)) {
      const unit = this.units.get(query);
      if (!unit || unit.kind !== kindOf(query)) {
        throw createConversionError('LOOKUP_FAILED', `Unknown municipality or county code '${query}'`, {
          scope: query,
        });
      }
      return unit;
    }

    const lower = query.toLowerCase();
    if (COUNTRY_ALIASES.includes(lower)) {
      return COUNTRY;
    }

    const units = this.list();
    const exact = units.find(unit => unit.name.toLowerCase() === lower);
    if (exact) {
      return exact;
    }

    const partial = units.filter(unit => unit.name.toLowerCase().includes(lower));
    if (partial.length === 1) {
      return partial[0];
    }
    if (partial.length > 1) {
      throw createConversionError(
        'INVALID_INPUT',
        `Scope '${query}' matches several units: ${partial.map(unit => `${unit.code} ${unit.name}`).join(', ')}`,
        { scope: query, candidates: partial.map(unit => unit.code) }
      );
    }

    throw createConversionError('LOOKUP_FAILED', `No municipality or county named '${query}'`, { scope: query });
  }
}
