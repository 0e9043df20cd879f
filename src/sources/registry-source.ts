/**
 * Registry source abstraction shared by the static extract reader and the WFS client
 */

import type { SourceMode } from '../config/env.js';
import type { RawRegistryRecord } from '../conversion/types.js';

export interface RegistryQuery {
  /** 4-digit municipality, 2-digit county or "00" for the whole country */
  unitCode: string;
  unitName: string;
  nameType?: string;
}

export interface RegistrySource {
  readonly mode: SourceMode;

  /**
   * Fetch every record of one unit. Failures are thrown as ConversionError
   * and abort that unit only.
   */
  fetchRecords(query: RegistryQuery): Promise<RawRegistryRecord[]>;
}

/**
 * Records a source may return beyond the unit (WFS type queries are national)
 */
export function filterToQuery(records: readonly RawRegistryRecord[], query: RegistryQuery): RawRegistryRecord[] {
  return records.filter(
    record =>
      (query.unitCode === '00' || record.municipalityCode.startsWith(query.unitCode)) &&
      (query.nameType === undefined || record.nameTypeCode === query.nameType)
  );
}
