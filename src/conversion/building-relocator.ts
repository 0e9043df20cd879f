/**
 * BuildingRelocator - moves farm and dwelling points out of building footprints
 *
 * A point inside a footprint is pushed past the nearest footprint edge by a
 * fixed offset. When that lands in a neighbouring footprint the point keeps
 * moving in the same direction until it clears the neighbour, up to
 * MAX_ATTEMPTS footprints.
 */

import type { IssueLog } from '../domain/issues.js';
import { LocalProjection } from '../geo/distance.js';
import { nearestBoundaryPoint, openRing, pointInPolygon, ringArea, ringBBox } from '../geo/polygon.js';
import { GridIndex } from '../geo/spatial-index.js';
import type { LocalXY, LonLat } from '../geo/types.js';
import type { BuildingFootprint, PlaceCandidate } from './types.js';

const CELL_SIZE_DEG = 0.002;
export const MAX_ATTEMPTS = 5;

/**
 * Footprint rings in meters around an origin, closing vertex dropped
 */
function projectRings(footprint: BuildingFootprint, projection: LocalProjection): LocalXY[][] {
  return footprint.rings.map(ring => openRing(ring).map(vertex => projection.toLocal(vertex)));
}

export class FootprintIndex {
  private readonly index = new GridIndex<BuildingFootprint>(CELL_SIZE_DEG);

  constructor(footprints: readonly BuildingFootprint[]) {
    for (const footprint of footprints) {
      if (footprint.rings.length === 0 || footprint.rings[0].length === 0) {
        continue;
      }
      this.index.insert(ringBBox(footprint.rings[0]), footprint);
    }
  }

  get size(): number {
    return this.index.size;
  }

  /**
   * First footprint (in load order) containing the point
   */
  containing(position: LonLat): BuildingFootprint | undefined {
    const [lon, lat] = position;
    const projection = new LocalProjection(position);
    return this.index
      .search([lon, lat, lon, lat])
      .find(footprint => pointInPolygon({ x: 0, y: 0 }, projectRings(footprint, projection)));
  }
}

type StepResult = { ok: true; position: LonLat; direction: LocalXY } | { ok: false; reason: string };

function cross(u: LocalXY, v: LocalXY): number {
  return u.x * v.y - u.y * v.x;
}

/**
 * Distance along a unit direction from the origin to the first ring crossing
 */
function rayExitDistance(direction: LocalXY, rings: readonly (readonly LocalXY[])[]): number | null {
  let best: number | null = null;
  for (const ring of rings) {
    for (let i = 0; i < ring.length; i++) {
      const a = ring[i];
      const b = ring[(i + 1) % ring.length];
      const edge = { x: b.x - a.x, y: b.y - a.y };
      const denom = cross(direction, edge);
      if (Math.abs(denom) < 1e-12) {
        continue;
      }
      const t = cross(a, edge) / denom;
      const s = cross(a, direction) / denom;
      if (t > 1e-9 && s >= 0 && s <= 1 && (best === null || t < best)) {
        best = t;
      }
    }
  }
  return best;
}

function projectedRings(
  position: LonLat,
  footprint: BuildingFootprint
): { projection: LocalProjection; rings: LocalXY[][] } | null {
  const projection = new LocalProjection(position);
  const rings = projectRings(footprint, projection);
  const exterior = rings[0];
  if (!exterior || exterior.length < 3 || ringArea(exterior) === 0) {
    return null;
  }
  return { projection, rings };
}

/**
 * Push `position` past the nearest edge of `footprint`
 */
function stepToNearestEdge(position: LonLat, footprint: BuildingFootprint, offsetMeters: number): StepResult {
  const projected = projectedRings(position, footprint);
  if (!projected) {
    return { ok: false, reason: `Degenerate footprint ${footprint.id}` };
  }
  const { projection, rings } = projected;

  const hit = nearestBoundaryPoint({ x: 0, y: 0 }, rings);
  if (!hit) {
    return { ok: false, reason: `No boundary point on footprint ${footprint.id}` };
  }

  let direction: LocalXY;
  if (hit.distance > 1e-9) {
    direction = { x: hit.point.x / hit.distance, y: hit.point.y / hit.distance };
  } else {
    // On the boundary: use the edge normal that points out of the polygon
    const [a, b] = hit.segment;
    const length = Math.hypot(b.x - a.x, b.y - a.y);
    if (length === 0) {
      return { ok: false, reason: `Zero-length edge on footprint ${footprint.id}` };
    }
    direction = { x: (b.y - a.y) / length, y: -(b.x - a.x) / length };
    const outside = { x: hit.point.x + direction.x * offsetMeters, y: hit.point.y + direction.y * offsetMeters };
    if (pointInPolygon(outside, rings)) {
      direction = { x: -direction.x, y: -direction.y };
    }
  }

  return {
    ok: true,
    direction,
    position: projection.toLonLat({
      x: hit.point.x + direction.x * offsetMeters,
      y: hit.point.y + direction.y * offsetMeters,
    }),
  };
}

/**
 * Keep moving along `direction` until past the far edge of `footprint`
 */
function stepAlong(
  position: LonLat,
  footprint: BuildingFootprint,
  direction: LocalXY,
  offsetMeters: number
): StepResult {
  const projected = projectedRings(position, footprint);
  if (!projected) {
    return { ok: false, reason: `Degenerate footprint ${footprint.id}` };
  }
  const distance = rayExitDistance(direction, projected.rings);
  if (distance === null) {
    return { ok: false, reason: `No exit from footprint ${footprint.id}` };
  }
  const travel = distance + offsetMeters;
  return {
    ok: true,
    direction,
    position: projected.projection.toLonLat({ x: direction.x * travel, y: direction.y * travel }),
  };
}

/**
 * Relocate a building-associated candidate lying inside a footprint.
 * Returns true when the point was moved. On failure the original point is
 * kept and a geometry issue is logged.
 */
export function relocateCandidate(
  candidate: PlaceCandidate,
  footprints: FootprintIndex,
  offsetMeters: number,
  issues: IssueLog
): boolean {
  if (candidate.rule.category !== 'building') {
    return false;
  }

  const original = candidate.position;
  const first = footprints.containing(original);
  if (!first) {
    return false;
  }

  let position = original;
  let direction: LocalXY | undefined;
  let footprint: BuildingFootprint | undefined = first;
  for (let attempt = 0; attempt < MAX_ATTEMPTS && footprint; attempt++) {
    const step = direction
      ? stepAlong(position, footprint, direction, offsetMeters)
      : stepToNearestEdge(position, footprint, offsetMeters);
    if (!step.ok) {
      issues.report('GEOMETRY_FAILURE', step.reason, candidate.placeId, candidate.municipalityCode);
      return false;
    }
    position = step.position;
    direction = step.direction;
    footprint = footprints.containing(position);
  }

  if (footprint) {
    issues.report(
      'GEOMETRY_FAILURE',
      `Still inside footprint ${footprint.id} after ${MAX_ATTEMPTS} attempts`,
      candidate.placeId,
      candidate.municipalityCode
    );
    return false;
  }

  candidate.position = position;
  candidate.relocation = { footprintId: first.id, original };
  return true;
}
