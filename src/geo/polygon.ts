/**
 * Polygon predicates in planar coordinates
 */

import type { BBox, LocalXY, LonLat, Ring } from './types.js';

/**
 * Ring vertices without the repeated closing vertex
 */
export function openRing(ring: readonly LonLat[]): LonLat[] {
  if (ring.length < 2) {
    return [...ring];
  }
  const first = ring[0];
  const last = ring[ring.length - 1];
  const closed = first[0] === last[0] && first[1] === last[1];
  return closed ? ring.slice(0, -1) : [...ring];
}

/**
 * Ray-casting test; points exactly on the boundary may go either way
 */
export function pointInRing(point: LocalXY, ring: readonly LocalXY[]): boolean {
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const a = ring[i];
    const b = ring[j];
    if (a.y > point.y !== b.y > point.y) {
      const xCross = ((b.x - a.x) * (point.y - a.y)) / (b.y - a.y) + a.x;
      if (point.x < xCross) {
        inside = !inside;
      }
    }
  }
  return inside;
}

/**
 * First ring is the exterior, the rest are holes
 */
export function pointInPolygon(point: LocalXY, rings: readonly (readonly LocalXY[])[]): boolean {
  if (rings.length === 0 || !pointInRing(point, rings[0])) {
    return false;
  }
  return !rings.slice(1).some(hole => pointInRing(point, hole));
}

export function ringArea(ring: readonly LocalXY[]): number {
  let twice = 0;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    twice += (ring[j].x + ring[i].x) * (ring[j].y - ring[i].y);
  }
  return Math.abs(twice) / 2;
}

/**
 * Closest point to p on the segment a-b
 */
export function nearestOnSegment(p: LocalXY, a: LocalXY, b: LocalXY): LocalXY {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const lengthSq = dx * dx + dy * dy;
  if (lengthSq === 0) {
    return { x: a.x, y: a.y };
  }
  const t = Math.max(0, Math.min(1, ((p.x - a.x) * dx + (p.y - a.y) * dy) / lengthSq));
  return { x: a.x + t * dx, y: a.y + t * dy };
}

export interface BoundaryHit {
  point: LocalXY;
  distance: number;
  /** Segment the point lies on, used for a normal when distance is zero */
  segment: [LocalXY, LocalXY];
}

/**
 * Nearest point on any ring boundary
 */
export function nearestBoundaryPoint(p: LocalXY, rings: readonly (readonly LocalXY[])[]): BoundaryHit | null {
  let best: BoundaryHit | null = null;
  for (const ring of rings) {
    for (let i = 0; i < ring.length; i++) {
      const a = ring[i];
      const b = ring[(i + 1) % ring.length];
      const candidate = nearestOnSegment(p, a, b);
      const distance = Math.hypot(candidate.x - p.x, candidate.y - p.y);
      if (!best || distance < best.distance) {
        best = { point: candidate, distance, segment: [a, b] };
      }
    }
  }
  return best;
}

export function ringBBox(ring: Ring): BBox {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const [x, y] of ring) {
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  }
  return [minX, minY, maxX, maxY];
}
