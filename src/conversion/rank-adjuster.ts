/**
 * RankAdjuster - place=* for settlements from the N50/N100 name layers
 */

import { GridIndex } from '../geo/spatial-index.js';
import { haversineMeters, radiusToDegrees } from '../geo/distance.js';
import type { LonLat } from '../geo/types.js';
import type { AuxiliaryDataset, AuxiliaryNamePoint, PlaceCandidate } from './types.js';

const CELL_SIZE_DEG = 0.05;

/**
 * Comparison form of a name: diacritics stripped, Norwegian letters spelled
 * out, lower case, single spaces
 */
export function normalizeForMatch(text: string): string {
  return text
    .toLowerCase()
    .replace(/æ/g, 'ae')
    .replace(/ø/g, 'o')
    .replace(/å/g, 'a')
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .split(/\s+/)
    .filter(Boolean)
    .join(' ');
}

export interface AuxiliaryMatch {
  point: AuxiliaryNamePoint;
  distance: number;
}

export class AuxiliaryPointIndex {
  private readonly index = new GridIndex<{ point: AuxiliaryNamePoint; key: string }>(CELL_SIZE_DEG);

  constructor(
    readonly dataset: AuxiliaryDataset,
    points: readonly AuxiliaryNamePoint[]
  ) {
    for (const point of points) {
      const [lon, lat] = point.position;
      this.index.insert([lon, lat, lon, lat], { point, key: normalizeForMatch(point.name) });
    }
  }

  get size(): number {
    return this.index.size;
  }

  /**
   * Nearest point with a matching name within the radius. On equal distance
   * the point loaded first wins.
   */
  nearestMatch(position: LonLat, name: string, radiusMeters: number): AuxiliaryMatch | null {
    const key = normalizeForMatch(name);
    const { dLon, dLat } = radiusToDegrees(radiusMeters, position[1]);
    const hits = this.index.search([position[0] - dLon, position[1] - dLat, position[0] + dLon, position[1] + dLat]);

    let best: AuxiliaryMatch | null = null;
    for (const hit of hits) {
      if (hit.key !== key) {
        continue;
      }
      const distance = haversineMeters(position, hit.point.position);
      if (distance <= radiusMeters && (!best || distance < best.distance)) {
        best = { point: hit.point, distance };
      }
    }
    return best;
  }
}

/**
 * Set place=* and the rank source. Indexes are searched in the order given,
 * finer dataset first; a coarser dataset is consulted only without a finer
 * match. Returns true when a dataset supplied the rank.
 */
export function adjustRank(
  candidate: PlaceCandidate,
  indexes: readonly AuxiliaryPointIndex[],
  radiusMeters: number
): boolean {
  const rule = candidate.rule;
  if (rule.category !== 'settlement') {
    candidate.place = rule.tags.place;
    candidate.rankSource = 'none';
    return false;
  }

  const name = candidate.nameTags.name;
  const eligible = candidate.registryRank === undefined || rule.rankConfidence === 'low';
  if (eligible && name !== undefined) {
    for (const index of indexes) {
      const match = index.nearestMatch(candidate.position, name, radiusMeters);
      if (match) {
        candidate.place = match.point.rank;
        candidate.rankSource = index.dataset;
        return true;
      }
    }
  }

  candidate.place = candidate.registryRank ?? rule.defaultPlace ?? rule.tags.place;
  candidate.rankSource = 'registry';
  return false;
}
