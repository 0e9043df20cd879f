/**
 * RecordNormalizer - raw registry records to place candidates
 *
 * Records with an unknown name type or without usable geometry are dropped
 * and reported; records sharing a place id are merged into one candidate.
 */

import { parseLanguagePriority, toOsmLanguage } from '../catalog/languages.js';
import type { NameTypeCatalog, NameTypeRule } from '../catalog/name-types.js';
import type { IssueLog } from '../domain/issues.js';
import { openRing } from '../geo/polygon.js';
import { averagePoint } from '../geo/representative-point.js';
import type { LonLat } from '../geo/types.js';
import type { NameEntry, PlaceCandidate, RawGeometry, RawRegistryRecord } from './types.js';

export function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}

function isFinitePoint(point: LonLat): boolean {
  return Number.isFinite(point[0]) && Number.isFinite(point[1]);
}

function reduceGeometry(geometry: RawGeometry, allPoints: boolean): LonLat[] {
  switch (geometry.type) {
    case 'Point':
      return [geometry.coordinates];
    case 'MultiPoint':
      return allPoints ? [...geometry.coordinates] : geometry.coordinates.slice(0, 1);
    case 'LineString': {
      const point = averagePoint(geometry.coordinates);
      return point ? [point] : [];
    }
    case 'Polygon': {
      const exterior = openRing(geometry.coordinates[0] ?? []);
      if (exterior.length === 0) {
        return [];
      }
      const lon = exterior.reduce((sum, node) => sum + node[0], 0) / exterior.length;
      const lat = exterior.reduce((sum, node) => sum + node[1], 0) / exterior.length;
      return [[lon, lat]];
    }
  }
}

/**
 * Representative point(s) for a registry geometry, or null when none can be
 * derived. Waterways keep all their points in all-points mode.
 */
export function representativePositions(
  geometry: RawGeometry | undefined,
  rule: NameTypeRule,
  includeAllWaterwayPoints: boolean
): LonLat[] | null {
  if (!geometry) {
    return null;
  }
  const positions = reduceGeometry(geometry, rule.category === 'waterway' && includeAllWaterwayPoints);
  if (positions.length === 0 || !positions.every(isFinitePoint)) {
    return null;
  }
  return positions;
}

function compareNames(a: NameEntry, b: NameEntry): number {
  if (a.priority !== b.priority) {
    return a.priority ? -1 : 1;
  }
  return a.order - b.order;
}

/**
 * Normalize one batch. Candidate order follows the first appearance of each
 * place id in the input.
 */
export function normalizeRecords(
  records: Iterable<RawRegistryRecord>,
  catalog: NameTypeCatalog,
  includeAllWaterwayPoints: boolean,
  issues: IssueLog
): PlaceCandidate[] {
  const byId = new Map<string, PlaceCandidate>();

  for (const record of records) {
    const rule = catalog.get(record.nameTypeCode);
    if (!rule) {
      issues.report(
        'UNKNOWN_NAME_TYPE',
        `Unknown name type '${record.nameTypeCode}'`,
        record.placeId,
        record.municipalityCode
      );
      continue;
    }

    const existing = byId.get(record.placeId);
    const names: NameEntry[] = [];
    let order = existing ? existing.names.length : 0;
    for (const entry of record.names) {
      const text = collapseWhitespace(entry.text);
      if (!text) {
        continue;
      }
      names.push({
        text,
        language: toOsmLanguage(entry.language),
        priority: entry.priority,
        historic: entry.historic,
        status: entry.status,
        order: order++,
      });
    }

    if (existing) {
      existing.names = [...existing.names, ...names].sort(compareNames);
      continue;
    }

    if (names.length === 0) {
      issues.report('MALFORMED_RECORD', 'Record has no names', record.placeId, record.municipalityCode);
      continue;
    }

    const positions = representativePositions(record.geometry, rule, includeAllWaterwayPoints);
    if (!positions) {
      issues.report('MALFORMED_RECORD', 'Record has no usable geometry', record.placeId, record.municipalityCode);
      continue;
    }

    byId.set(record.placeId, {
      placeId: record.placeId,
      rule,
      municipalityCode: record.municipalityCode,
      registeredAt: record.registeredAt,
      sequence: byId.size,
      registryRank: record.rank,
      languagePriority: parseLanguagePriority(record.languagePriority),
      position: positions[0],
      extraPositions: positions.slice(1),
      names: names.sort(compareNames),
      nameTags: {},
      notes: [],
      rankSource: 'none',
      duplicate: false,
      excluded: false,
    });
  }

  return [...byId.values()];
}
