/**
 * Name diff between two converted GeoJSON files, matched by ssr:stedsnr
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { createConversionError } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';

export type NameTags = Record<string, string>;

export interface ChangedPlace {
  placeId: string;
  /** Name tags of the second file absent from the first */
  missingInFirst: NameTags;
  /** Name tags of the first file absent from the second */
  missingInSecond: NameTags;
}

export interface UnmatchedPlace {
  placeId: string;
  names: NameTags;
}

export interface NameDiff {
  compared: number;
  changed: ChangedPlace[];
  onlyInFirst: UnmatchedPlace[];
  onlyInSecond: UnmatchedPlace[];
}

const DiffInputSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(
    z.object({
      properties: z.record(z.unknown()).nullable(),
    })
  ),
});

/**
 * Sort ";"-separated values within each " - " segment so ordering does not count as a change
 */
export function normalizeNameValue(value: string): string {
  return value
    .replace(/ {2,}/g, ' ')
    .split(' - ')
    .map(segment => segment.split(';').sort().join(';'))
    .join(' - ');
}

/**
 * The name-bearing tags of a feature (every key containing "name")
 */
export function extractNameTags(properties: Record<string, unknown>): NameTags {
  const names: NameTags = {};
  for (const [key, value] of Object.entries(properties)) {
    if (key.includes('name') && typeof value === 'string') {
      names[key] = normalizeNameValue(value);
    }
  }
  return names;
}

function missingFrom(reference: NameTags, other: NameTags): NameTags {
  const missing: NameTags = {};
  for (const key of Object.keys(reference).sort()) {
    if (other[key] !== reference[key]) {
      missing[key] = reference[key];
    }
  }
  return missing;
}

/**
 * Compare name tags of places keyed by id; order follows the first input,
 * then the remainder of the second
 */
export function diffNames(first: ReadonlyMap<string, NameTags>, second: ReadonlyMap<string, NameTags>): NameDiff {
  const diff: NameDiff = { compared: 0, changed: [], onlyInFirst: [], onlyInSecond: [] };

  for (const [placeId, names] of first) {
    const other = second.get(placeId);
    if (!other) {
      diff.onlyInFirst.push({ placeId, names });
      continue;
    }

    diff.compared++;
    const missingInFirst = missingFrom(other, names);
    const missingInSecond = missingFrom(names, other);
    if (Object.keys(missingInFirst).length > 0 || Object.keys(missingInSecond).length > 0) {
      diff.changed.push({ placeId, missingInFirst, missingInSecond });
    }
  }

  for (const [placeId, names] of second) {
    if (!first.has(placeId)) {
      diff.onlyInSecond.push({ placeId, names });
    }
  }

  return diff;
}

/**
 * Parse a converted file into name tags per place id; the first feature of an id wins
 *
 * @throws ConversionError INVALID_INPUT when the content is not a FeatureCollection
 */
export function parsePlaceNames(content: string, label: string): Map<string, NameTags> {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw createConversionError('INVALID_INPUT', `${label} is not valid JSON`, {
      file: label,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = DiffInputSchema.safeParse(json);
  if (!parsed.success) {
    throw createConversionError('INVALID_INPUT', `${label} is not a GeoJSON FeatureCollection`, { file: label });
  }

  const places = new Map<string, NameTags>();
  for (const feature of parsed.data.features) {
    const properties = feature.properties ?? {};
    const placeId = properties['ssr:stedsnr'];
    if (typeof placeId === 'string' && !places.has(placeId)) {
      places.set(placeId, extractNameTags(properties));
    }
  }
  return places;
}

async function readPlaceNames(path: string): Promise<Map<string, NameTags>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw createConversionError('INVALID_INPUT', `Cannot read ${path}`, {
      file: path,
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return parsePlaceNames(content, path);
}

export async function diffFiles(firstPath: string, secondPath: string): Promise<NameDiff> {
  const first = await readPlaceNames(firstPath);
  const second = await readPlaceNames(secondPath);
  const diff = diffNames(first, second);

  logger.info('Name diff computed', {
    firstPath,
    secondPath,
    compared: diff.compared,
    changed: diff.changed.length,
    onlyInFirst: diff.onlyInFirst.length,
    onlyInSecond: diff.onlyInSecond.length,
  });

  return diff;
}
