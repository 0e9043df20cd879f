/**
 * Live registry source: Kartverket Stedsnavn WFS 2.0 (EPSG:4326)
 */

import type { RawRegistryRecord } from '../conversion/types.js';
import { logger } from '../domain/logger.js';
import { parseWfsResponse } from './gml-parser.js';
import type { HttpClient } from './http-client.js';
import { filterToQuery, type RegistryQuery, type RegistrySource } from './registry-source.js';

const APP_NAMESPACE = 'http://skjema.geonorge.no/SOSI/produktspesifikasjon/Stedsnavn/5.0';

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * FES filter for one query. A name-type query is national; the municipality
 * prefix is applied to the parsed records afterwards.
 */
export function buildFilter(query: RegistryQuery): string {
  let property: string;
  let literal: string;

  if (query.nameType !== undefined) {
    property = 'app:navneobjekttype';
    literal = query.nameType;
  } else if (query.unitCode.length === 4) {
    property = 'app:kommune/app:Kommune/app:kommunenummer';
    literal = query.unitCode;
  } else {
    property = 'app:kommune/app:Kommune/app:fylkesnummer';
    literal = query.unitCode;
  }

  return (
    '<Filter><PropertyIsEqualTo>' +
    `<ValueReference xmlns:app="${APP_NAMESPACE}">${property}</ValueReference>` +
    `<Literal>${escapeXml(literal)}</Literal>` +
    '</PropertyIsEqualTo></Filter>'
  );
}

export function buildGetFeatureQuery(query: RegistryQuery): Record<string, string> {
  return {
    VERSION: '2.0.0',
    SERVICE: 'WFS',
    srsName: 'EPSG:4326',
    REQUEST: 'GetFeature',
    TYPENAME: 'app:Sted',
    resultType: 'results',
    Filter: buildFilter(query),
  };
}

export class WfsRegistrySource implements RegistrySource {
  readonly mode = 'wfs';

  constructor(private readonly client: HttpClient) {}

  async fetchRecords(query: RegistryQuery): Promise<RawRegistryRecord[]> {
    logger.info('Querying Stedsnavn WFS', {
      unitCode: query.unitCode,
      nameType: query.nameType,
    });

    const response = await this.client.getText('', { query: buildGetFeatureQuery(query) });
    const records = filterToQuery(parseWfsResponse(response.data), query);

    logger.debug('WFS records received', { unitCode: query.unitCode, records: records.length });

    return records;
  }
}
