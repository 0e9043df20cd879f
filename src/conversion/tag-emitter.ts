/**
 * TagEmitter - resolved candidate to an OSM-tagged GeoJSON feature
 *
 * Pure: reads the candidate, never writes to it.
 */

import type { Feature, MultiPoint, Point } from 'geojson';
import type { LonLat } from '../geo/types.js';
import type { PlaceCandidate } from './types.js';

export type PlaceTags = Record<string, string>;

export type PlaceFeature = Feature<Point | MultiPoint, PlaceTags>;

export interface EmitOptions {
  /** Adds KOMMUNE=* so features of a county or national file can be told apart */
  multiMunicipality: boolean;
}

const NAME_KEYS = ['name', 'alt_name', 'loc_name', 'old_name'] as const;

export function emitTags(candidate: PlaceCandidate, options: EmitOptions): PlaceTags {
  const tags: PlaceTags = {};
  const set = (key: string, value: string | undefined): void => {
    if (value !== undefined && value.trim() !== '') {
      tags[key] = value;
    }
  };

  set('ssr:stedsnr', candidate.placeId);

  for (const key of NAME_KEYS) {
    set(key, candidate.nameTags[key]);
  }
  for (const [key, value] of Object.entries(candidate.nameTags)) {
    if (key.startsWith('name:')) {
      set(key, value);
    }
  }

  const rule = candidate.rule;
  for (const [key, value] of Object.entries(rule.tags)) {
    if (key === 'fixme') {
      continue;
    }
    set(key, key === 'place' ? (candidate.place ?? value) : value);
  }
  if (!('place' in rule.tags)) {
    set('place', candidate.place);
  }

  const fixme = [rule.tags.fixme, ...candidate.notes].filter(
    (note): note is string => note !== undefined && note.trim() !== ''
  );
  set('fixme', fixme.join(';'));

  set('TYPE', rule.code);
  set('GRUPPE', rule.group);
  set('HOVEDGRUPPE', rule.mainGroup);
  if (options.multiMunicipality) {
    set('KOMMUNE', candidate.municipalityCode);
  }
  if (candidate.rankSource === 'N50' || candidate.rankSource === 'N100') {
    set('RANK', candidate.rankSource);
  }

  return tags;
}

export function emitFeature(candidate: PlaceCandidate, options: EmitOptions): PlaceFeature {
  const position: LonLat = [candidate.position[0], candidate.position[1]];
  const geometry: Point | MultiPoint =
    candidate.extraPositions.length > 0
      ? {
          type: 'MultiPoint',
          coordinates: [position, ...candidate.extraPositions.map((p): LonLat => [p[0], p[1]])],
        }
      : { type: 'Point', coordinates: position };

  return {
    type: 'Feature',
    geometry,
    properties: emitTags(candidate, options),
  };
}
