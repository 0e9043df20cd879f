/**
 * GeoJSON output files, one per converted unit
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { FeatureCollection, MultiPoint, Point } from 'geojson';
import type { SourceMode } from '../config/env.js';
import type { PlaceTags } from '../conversion/tag-emitter.js';
import { logger } from '../domain/logger.js';

export type PlaceFeatureCollection = FeatureCollection<Point | MultiPoint, PlaceTags>;

export interface OutputNameOptions {
  nameType?: string;
  sourceMode: SourceMode;
  includeUntagged: boolean;
}

export interface OutputWriter {
  /**
   * Write one collection; returns the path written
   */
  write(fileName: string, collection: PlaceFeatureCollection): Promise<string>;
}

/**
 * stedsnavn_<code>_<name>[_<type>][_wfs][_all].geojson
 */
export function outputFileName(code: string, name: string, options: OutputNameOptions): string {
  let fileName = `stedsnavn_${code}_${name.replace(/ /g, '_')}`;
  if (options.nameType) {
    fileName += `_${options.nameType}`;
  }
  if (options.sourceMode === 'wfs') {
    fileName += '_wfs';
  }
  if (options.includeUntagged) {
    fileName += '_all';
  }
  return `${fileName}.geojson`;
}

export function serializeCollection(collection: PlaceFeatureCollection): string {
  return `${JSON.stringify(collection, null, 2)}\n`;
}

export class GeoJsonFileWriter implements OutputWriter {
  constructor(private readonly outputDir: string) {}

  async write(fileName: string, collection: PlaceFeatureCollection): Promise<string> {
    const path = join(this.outputDir, fileName);
    await mkdir(this.outputDir, { recursive: true });
    await writeFile(path, serializeCollection(collection), 'utf-8');

    logger.info('GeoJSON file written', { path, features: collection.features.length });
    return path;
  }
}
