/**
 * Separates points that would land on the same OSM node position
 */

import { roundPosition } from '../geo/representative-point.js';
import type { LonLat } from '../geo/types.js';
import type { FootprintIndex } from './building-relocator.js';
import type { PlaceCandidate } from './types.js';

export const NUDGE_DEGREES = 0.0001;

/** One step of the 7-decimal output grid, about 1 cm */
export const RELOCATED_NUDGE_DEGREES = 0.0000001;

function positionKey(position: LonLat): string {
  return `${position[0]},${position[1]}`;
}

/**
 * First position north of `start` (or, when `bothWays`, north then south at
 * each distance) that `isBlocked` accepts
 */
function freePosition(
  start: LonLat,
  step: number,
  bothWays: boolean,
  isBlocked: (position: LonLat) => boolean
): LonLat {
  const signs = bothWays ? [1, -1] : [1];
  for (let k = 1; ; k++) {
    for (const sign of signs) {
      const position = roundPosition([start[0], start[1] + sign * k * step]);
      if (!isBlocked(position)) {
        return position;
      }
    }
  }
}

/**
 * Round included candidates to 7 decimals and move each collision until its
 * position is unused. Ordinary points move north by NUDGE_DEGREES. Points
 * moved out of a building move by one grid step, north or south, and never
 * into a footprint of `footprints`. Returns the number of candidates moved.
 */
export function separateCoincident(candidates: readonly PlaceCandidate[], footprints?: FootprintIndex): number {
  const taken = new Set<string>();
  let moved = 0;

  for (const candidate of candidates) {
    if (candidate.excluded) {
      continue;
    }
    let position = roundPosition(candidate.position);
    if (taken.has(positionKey(position))) {
      position = candidate.relocation
        ? freePosition(
            position,
            RELOCATED_NUDGE_DEGREES,
            true,
            next => taken.has(positionKey(next)) || footprints?.containing(next) !== undefined
          )
        : freePosition(position, NUDGE_DEGREES, false, next => taken.has(positionKey(next)));
      moved++;
    }
    taken.add(positionKey(position));
    candidate.position = position;
    candidate.extraPositions = candidate.extraPositions.map(roundPosition);
  }
  return moved;
}
