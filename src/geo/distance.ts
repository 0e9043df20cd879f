/**
 * Distances and a local metric projection for short-range geometry
 */

import type { LonLat, LocalXY } from './types.js';

const EARTH_RADIUS_M = 6371008.8;
const DEG = Math.PI / 180;

/**
 * Great-circle distance in meters
 */
export function haversineMeters(a: LonLat, b: LonLat): number {
  const dLat = (b[1] - a[1]) * DEG;
  const dLon = (b[0] - a[0]) * DEG;
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(a[1] * DEG) * Math.cos(b[1] * DEG) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_M * Math.asin(Math.min(1, Math.sqrt(h)));
}

/**
 * Equirectangular projection centred on an origin. Accurate to well below a
 * meter within a few hundred meters, which is all building relocation needs.
 */
export class LocalProjection {
  private readonly metersPerDegLon: number;
  private readonly metersPerDegLat: number;

  constructor(private readonly origin: LonLat) {
    this.metersPerDegLat = EARTH_RADIUS_M * DEG;
    this.metersPerDegLon = this.metersPerDegLat * Math.cos(origin[1] * DEG);
  }

  toLocal(point: LonLat): LocalXY {
    return {
      x: (point[0] - this.origin[0]) * this.metersPerDegLon,
      y: (point[1] - this.origin[1]) * this.metersPerDegLat,
    };
  }

  toLonLat(local: LocalXY): LonLat {
    return [
      this.origin[0] + local.x / this.metersPerDegLon,
      this.origin[1] + local.y / this.metersPerDegLat,
    ];
  }
}

/**
 * Degrees of latitude/longitude covering a radius in meters around a latitude
 */
export function radiusToDegrees(radiusMeters: number, latitude: number): { dLon: number; dLat: number } {
  const dLat = radiusMeters / (EARTH_RADIUS_M * DEG);
  const cosLat = Math.max(Math.cos(latitude * DEG), 1e-6);
  return { dLon: dLat / cosLat, dLat };
}
