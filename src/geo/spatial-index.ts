/**
 * Uniform grid index over bounding boxes in degrees
 *
 * Buildings and auxiliary name points are small relative to a cell, so each
 * item lands in one or a handful of cells and lookups touch only the cells a
 * query box overlaps.
 */

import type { BBox } from './types.js';

export class GridIndex<T> {
  private readonly cells = new Map<string, number[]>();
  private readonly items: T[] = [];
  private readonly boxes: BBox[] = [];

  /**
   * @param cellSize - Cell edge in degrees
   */
  constructor(private readonly cellSize = 0.01) {
    if (!(cellSize > 0)) {
      throw new Error(`Grid cell size must be positive, got ${cellSize}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  insert(box: BBox, item: T): void {
    const id = this.items.length;
    this.items.push(item);
    this.boxes.push(box);

    for (const key of this.cellKeys(box)) {
      const bucket = this.cells.get(key);
      if (bucket) {
        bucket.push(id);
      } else {
        this.cells.set(key, [id]);
      }
    }
  }

  /**
   * Items whose box intersects the query box, in insertion order
   */
  search(box: BBox): T[] {
    const hits = new Set<number>();
    for (const key of this.cellKeys(box)) {
      for (const id of this.cells.get(key) ?? []) {
        if (intersects(this.boxes[id], box)) {
          hits.add(id);
        }
      }
    }
    return [...hits].sort((a, b) => a - b).map(id => this.items[id]);
  }

  private *cellKeys(box: BBox): Generator<string> {
    const [minX, minY, maxX, maxY] = box;
    const x0 = Math.floor(minX / this.cellSize);
    const x1 = Math.floor(maxX / this.cellSize);
    const y0 = Math.floor(minY / this.cellSize);
    const y1 = Math.floor(maxY / this.cellSize);
    for (let x = x0; x <= x1; x++) {
      for (let y = y0; y <= y1; y++) {
        yield `${x}:${y}`;
      }
    }
  }
}

function intersects(a: BBox, b: BBox): boolean {
  return a[0] <= b[2] && a[2] >= b[0] && a[1] <= b[3] && a[3] >= b[1];
}
