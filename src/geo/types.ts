/**
 * Geometry primitives shared by the conversion pipeline
 */

/** Longitude, latitude in WGS84 decimal degrees (GeoJSON order) */
export type LonLat = [lon: number, lat: number];

/** minLon, minLat, maxLon, maxLat */
export type BBox = [minX: number, minY: number, maxX: number, maxY: number];

/** Local planar coordinates in meters */
export interface LocalXY {
  x: number;
  y: number;
}

/** A closed ring; first and last vertex may or may not repeat */
export type Ring = LonLat[];
