/**
 * Reduce registry geometries to a single representative point
 */

import type { LonLat } from './types.js';

/**
 * Mean of the vertices for a closed ring, middle of the vertex list for a line.
 * Returns null for an empty coordinate list.
 */
export function averagePoint(coordinates: readonly LonLat[]): LonLat | null {
  const length = coordinates.length;
  if (length === 0) {
    return null;
  }

  const first = coordinates[0];
  const last = coordinates[length - 1];

  if (length > 1 && first[0] === last[0] && first[1] === last[1]) {
    const ring = coordinates.slice(0, -1);
    const lon = ring.reduce((sum, node) => sum + node[0], 0) / ring.length;
    const lat = ring.reduce((sum, node) => sum + node[1], 0) / ring.length;
    return [lon, lat];
  }

  const mid = Math.floor(length / 2);
  if (mid * 2 === length) {
    const a = coordinates[mid - 1];
    const b = coordinates[mid];
    return [(a[0] + b[0]) / 2, (a[1] + b[1]) / 2];
  }
  return [coordinates[mid][0], coordinates[mid][1]];
}

/**
 * Round to 7 decimals, the precision OSM stores
 */
export function roundPosition(point: LonLat): LonLat {
  return [Math.round(point[0] * 1e7) / 1e7, Math.round(point[1] * 1e7) / 1e7];
}
