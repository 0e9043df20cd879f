/**
 * Auxiliary datasets read from local GeoJSON files
 *
 * Per municipality, under the auxiliary directory:
 *   n50_places_<kommunenummer>.geojson   settlement name points (N50)
 *   n100_places_<kommunenummer>.geojson  settlement name points (N100)
 *   buildings_<kommunenummer>.geojson    building footprints
 *
 * A missing file is an empty dataset. Features that do not fit the expected
 * shape are skipped and counted.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { AuxiliaryData } from '../conversion/pipeline.js';
import {
  AUXILIARY_RANKS,
  type AuxiliaryDataset,
  type AuxiliaryNamePoint,
  type BuildingFootprint,
} from '../conversion/types.js';
import { createConversionError } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';
import type { LonLat, Ring } from '../geo/types.js';

export interface AuxiliarySource {
  loadPoints(dataset: AuxiliaryDataset, municipalityCode: string): Promise<AuxiliaryNamePoint[]>;
}

export interface BuildingSource {
  loadFootprints(municipalityCode: string): Promise<BuildingFootprint[]>;
}

const PositionSchema = z.tuple([z.number(), z.number()]).rest(z.number());

const FeatureCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(z.unknown()),
});

const NamePointFeatureSchema = z.object({
  type: z.literal('Feature'),
  geometry: z.object({ type: z.literal('Point'), coordinates: PositionSchema }),
  properties: z.object({
    name: z.string().min(1),
    rank: z.enum(AUXILIARY_RANKS),
  }),
});

const FootprintFeatureSchema = z.object({
  type: z.literal('Feature'),
  id: z.union([z.string(), z.number()]).optional(),
  geometry: z.discriminatedUnion('type', [
    z.object({ type: z.literal('Polygon'), coordinates: z.array(z.array(PositionSchema)).min(1) }),
    z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(z.array(z.array(PositionSchema)).min(1)) }),
  ]),
  properties: z
    .object({ id: z.union([z.string(), z.number()]).optional() })
    .nullable()
    .optional(),
});

type Position = z.infer<typeof PositionSchema>;

function toLonLat(position: Position): LonLat {
  return [position[0], position[1]];
}

function toRing(ring: Position[]): Ring {
  return ring.map(toLonLat);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function datasetFileName(dataset: AuxiliaryDataset, municipalityCode: string): string {
  return `${dataset.toLowerCase()}_places_${municipalityCode}.geojson`;
}

export function buildingsFileName(municipalityCode: string): string {
  return `buildings_${municipalityCode}.geojson`;
}

export class GeoJsonAuxiliarySource implements AuxiliarySource, BuildingSource {
  constructor(private readonly auxDir: string) {}

  /**
   * Read the features of one file; undefined when the file does not exist
   *
   * @throws ConversionError INVALID_INPUT when the file is not a FeatureCollection
   */
  private async readFeatures(fileName: string): Promise<unknown[] | undefined> {
    const path = join(this.auxDir, fileName);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.debug('Auxiliary file not found', { path });
        return undefined;
      }
      throw createConversionError('SOURCE_UNAVAILABLE', `Cannot read auxiliary file ${path}`, {
        path,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw createConversionError('INVALID_INPUT', `Auxiliary file is not valid JSON: ${path}`, {
        path,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = FeatureCollectionSchema.safeParse(json);
    if (!parsed.success) {
      throw createConversionError('INVALID_INPUT', `Auxiliary file is not a GeoJSON FeatureCollection: ${path}`, {
        path,
      });
    }
    return parsed.data.features;
  }

  async loadPoints(dataset: AuxiliaryDataset, municipalityCode: string): Promise<AuxiliaryNamePoint[]> {
    const features = await this.readFeatures(datasetFileName(dataset, municipalityCode));
    if (!features) {
      return [];
    }

    const points: AuxiliaryNamePoint[] = [];
    for (const feature of features) {
      const parsed = NamePointFeatureSchema.safeParse(feature);
      if (parsed.success) {
        points.push({
          position: toLonLat(parsed.data.geometry.coordinates),
          name: parsed.data.properties.name,
          rank: parsed.data.properties.rank,
        });
      }
    }

    logger.debug('Auxiliary name points loaded', {
      dataset,
      municipalityCode,
      points: points.length,
      skipped: features.length - points.length,
    });
    return points;
  }

  async loadFootprints(municipalityCode: string): Promise<BuildingFootprint[]> {
    const features = await this.readFeatures(buildingsFileName(municipalityCode));
    if (!features) {
      return [];
    }

    const footprints: BuildingFootprint[] = [];
    let skipped = 0;
    features.forEach((feature, index) => {
      const parsed = FootprintFeatureSchema.safeParse(feature);
      if (!parsed.success) {
        skipped++;
        return;
      }
      const { geometry } = parsed.data;
      const id = String(parsed.data.id ?? parsed.data.properties?.id ?? `${municipalityCode}-${index}`);
      const polygons = geometry.type === 'Polygon' ? [geometry.coordinates] : geometry.coordinates;
      for (const polygon of polygons) {
        footprints.push({ id, rings: polygon.map(toRing) });
      }
    });

    logger.debug('Building footprints loaded', { municipalityCode, footprints: footprints.length, skipped });
    return footprints;
  }

  /**
   * All auxiliary data for the municipalities of one output unit
   */
  async loadUnit(municipalityCodes: readonly string[]): Promise<AuxiliaryData> {
    let n50: AuxiliaryNamePoint[] = [];
    let n100: AuxiliaryNamePoint[] = [];
    let footprints: BuildingFootprint[] = [];

    // concat: a county can hold more footprints than spread arguments allow
    for (const code of municipalityCodes) {
      n50 = n50.concat(await this.loadPoints('N50', code));
      n100 = n100.concat(await this.loadPoints('N100', code));
      footprints = footprints.concat(await this.loadFootprints(code));
    }

    return { n50, n100, footprints };
  }
}
