/**
 * Registry source reading predefined "Basisdata Stedsnavn" GML extracts from disk
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { RawRegistryRecord } from '../conversion/types.js';
import { createConversionError, createMissingExtractError } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';
import { parseStaticExtract } from './gml-parser.js';
import { filterToQuery, type RegistryQuery, type RegistrySource } from './registry-source.js';

const FILENAME_REPLACEMENTS: Record<string, string> = {
  Æ: 'E',
  Ø: 'O',
  Å: 'A',
  æ: 'e',
  ø: 'o',
  å: 'a',
  ' ': '_',
};

/**
 * ASCII-safe unit name as used in Kartverket's download file names
 */
export function cleanFileName(name: string): string {
  return name.replace(/[ÆØÅæøå ]/g, char => FILENAME_REPLACEMENTS[char] ?? char);
}

export function extractFileName(unitCode: string, unitName: string): string {
  return `Basisdata_${unitCode}_${cleanFileName(unitName)}_25833_Stedsnavn_GML.gml`;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class StaticRegistrySource implements RegistrySource {
  readonly mode = 'static';

  constructor(private readonly extractDir: string) {}

  async fetchRecords(query: RegistryQuery): Promise<RawRegistryRecord[]> {
    const path = join(this.extractDir, extractFileName(query.unitCode, query.unitName));

    let xml: string;
    try {
      xml = await readFile(path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw createMissingExtractError(path, query.unitCode);
      }
      throw createConversionError('SOURCE_UNAVAILABLE', `Cannot read static extract ${path}`, {
        path,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const records = filterToQuery(parseStaticExtract(xml), query);

    logger.debug('Static extract loaded', { path, records: records.length });

    return records;
  }
}
