/**
 * GML readers for the two registry formats
 *
 * Static extracts ("Stedsnavn for vanlig bruk", EPSG:25833) and the Stedsnavn
 * WFS (EPSG:4326) share the app:Sted feature but differ in how spellings and
 * their status are encoded. Both are mapped to RawRegistryRecord here; name
 * type and geometry problems are left for the normalizer to report.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { RawGeometry, RawNameEntry, RawRegistryRecord } from '../conversion/types.js';
import { createConversionError } from '../domain/error-handler.js';
import { utmToLonLat } from '../geo/utm.js';
import type { LonLat } from '../geo/types.js';

type XmlNode = Record<string, unknown>;

type CoordinateTransform = (x: number, y: number) => LonLat;

const ARRAY_TAGS = new Set([
  'featureMember',
  'member',
  'kommune',
  'stedsnavn',
  'skrivemåte',
  'annenSkrivemåte',
  'pointMember',
  'curveMember',
  'surfaceMember',
]);

const parser = new XMLParser({
  ignoreAttributes: false,
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  isArray: (tagName: string) => ARRAY_TAGS.has(tagName),
});

const HISTORIC = 'historisk';
const PROPOSED_STATUSES = ['foreslått', 'uvurdert'];
const REJECTED_NAME_STATUSES = ['feilført', 'avslåttNavnevalg'];
const REJECTED_SPELLING_STATUSES = ['avslått', 'avslåttNavneledd', 'feilført'];
const ACTIVE_PLACE_STATUSES = ['aktiv', 'relikt'];

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function children(node: unknown, key: string): unknown[] {
  if (!isNode(node)) {
    return [];
  }
  const value = node[key];
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function child(node: unknown, ...path: string[]): unknown {
  let current = node;
  for (const key of path) {
    current = children(current, key)[0];
    if (current === undefined) {
      return undefined;
    }
  }
  return current;
}

function text(node: unknown): string | undefined {
  if (typeof node === 'string') {
    return node;
  }
  if (isNode(node) && typeof node['#text'] === 'string') {
    return node['#text'];
  }
  return undefined;
}

function textAt(node: unknown, ...path: string[]): string | undefined {
  const value = text(child(node, ...path))?.trim();
  return value ? value : undefined;
}

export const wgs84: CoordinateTransform = (x, y) => [x, y];

export const utm33: CoordinateTransform = (x, y) => utmToLonLat(x, y, 33);

/**
 * "x1 y1 x2 y2 ..." to positions; a trailing odd value is ignored
 */
export function parsePosList(value: string | undefined, transform: CoordinateTransform): LonLat[] {
  if (!value) {
    return [];
  }
  const numbers = value.trim().split(/\s+/).map(Number);
  const positions: LonLat[] = [];
  for (let i = 0; i + 1 < numbers.length; i += 2) {
    positions.push(transform(numbers[i], numbers[i + 1]));
  }
  return positions;
}

function readPoint(point: unknown, transform: CoordinateTransform): LonLat | undefined {
  return parsePosList(textAt(point, 'pos'), transform)[0];
}

function readRing(polygon: unknown, transform: CoordinateTransform): LonLat[] {
  return parsePosList(textAt(polygon, 'exterior', 'LinearRing', 'posList'), transform);
}

/**
 * Read the first supported GML geometry inside a property element
 */
export function readGeometry(property: unknown, transform: CoordinateTransform): RawGeometry | undefined {
  const multiPoint = child(property, 'MultiPoint');
  if (multiPoint !== undefined) {
    const coordinates = children(multiPoint, 'pointMember')
      .map(member => readPoint(child(member, 'Point'), transform))
      .filter((point): point is LonLat => point !== undefined);
    return { type: 'MultiPoint', coordinates };
  }

  const point = child(property, 'Point');
  if (point !== undefined) {
    const coordinates = readPoint(point, transform);
    return coordinates ? { type: 'Point', coordinates } : undefined;
  }

  const line = child(property, 'LineString') ?? child(property, 'MultiCurve', 'curveMember', 'LineString');
  if (line !== undefined) {
    return { type: 'LineString', coordinates: parsePosList(textAt(line, 'posList'), transform) };
  }

  const polygon = child(property, 'Polygon') ?? child(property, 'MultiSurface', 'surfaceMember', 'Polygon');
  if (polygon !== undefined) {
    return { type: 'Polygon', coordinates: [readRing(polygon, transform)] };
  }

  return undefined;
}

/**
 * Parse and validate an XML document, returning the app:Sted features
 */
function placeFeatures(xml: string, source: string): unknown[] {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw createConversionError('SOURCE_UNAVAILABLE', `${source} is not valid XML: ${validation.err.msg}`, {
      line: validation.err.line,
      column: validation.err.col,
    });
  }

  const document: unknown = parser.parse(xml);

  const exception = textAt(document, 'ExceptionReport', 'Exception', 'ExceptionText');
  if (exception) {
    throw createConversionError('LOOKUP_FAILED', `${source} returned an exception: ${exception}`);
  }

  const collection = child(document, 'FeatureCollection');
  if (collection === undefined) {
    throw createConversionError('SOURCE_UNAVAILABLE', `${source} has no feature collection`);
  }

  return [...children(collection, 'featureMember'), ...children(collection, 'member')]
    .map(member => child(member, 'Sted'))
    .filter(isNode);
}

interface PlaceHeader {
  placeId: string;
  nameTypeCode: string;
  group?: string;
  mainGroup?: string;
  municipalityCode: string;
  languagePriority?: string;
  registeredAt?: string;
}

function readHeader(place: unknown): PlaceHeader {
  return {
    placeId: textAt(place, 'stedsnummer') ?? '',
    nameTypeCode: textAt(place, 'navneobjekttype') ?? '',
    group: textAt(place, 'navneobjektgruppe'),
    mainGroup: textAt(place, 'navneobjekthovedgruppe'),
    municipalityCode: textAt(place, 'kommune', 'Kommune', 'kommunenummer') ?? '',
    languagePriority: textAt(place, 'språkprioritering'),
    registeredAt: textAt(place, 'oppdateringsdato')?.slice(0, 10),
  };
}

/**
 * Static extract: spellings are app:skrivemåte (the priority spelling) and
 * app:annenSkrivemåte. A name is a priority candidate when it is in public
 * use, not a sub-name and not merely proposed.
 */
export function parseStaticExtract(xml: string): RawRegistryRecord[] {
  return placeFeatures(xml, 'Static extract').map(place => {
    const header = readHeader(place);
    const names: RawNameEntry[] = [];

    for (const entry of children(place, 'stedsnavn')) {
      const placeName = child(entry, 'Stedsnavn');
      const publicUse = textAt(placeName, 'offentligBruk') === 'true';
      const nameStatus = textAt(placeName, 'navnestatus');
      const language = textAt(placeName, 'språk');

      const spellings = [
        ...children(placeName, 'skrivemåte').map(spelling => ({ spelling, preferred: true })),
        ...children(placeName, 'annenSkrivemåte').map(spelling => ({ spelling, preferred: false })),
      ];

      for (const { spelling, preferred } of spellings) {
        const value = text(child(spelling, 'Skrivemåte', 'komplettskrivemåte'));
        if (value === undefined) {
          continue;
        }
        const status = textAt(spelling, 'Skrivemåte', 'skrivemåtestatus');
        const historic = nameStatus === HISTORIC || status === HISTORIC;
        const proposed = status !== undefined && PROPOSED_STATUSES.includes(status);

        names.push({
          text: value,
          language,
          nameTypeCode: header.nameTypeCode,
          priority: !historic && !proposed && publicUse && nameStatus !== 'undernavn' && preferred,
          historic,
          status,
        });
      }
    }

    const geometryProperty =
      child(place, 'multipunkt') ?? child(place, 'posisjon') ?? child(place, 'senterlinje') ?? child(place, 'område');

    return { ...header, geometry: readGeometry(geometryProperty, utm33), names };
  });
}

/**
 * WFS response: every spelling is app:skrivemåte with its own priority flag.
 * Rejected or misregistered names are dropped, as are places that are no
 * longer active.
 */
export function parseWfsResponse(xml: string): RawRegistryRecord[] {
  const records: RawRegistryRecord[] = [];

  for (const place of placeFeatures(xml, 'WFS response')) {
    const placeStatus = textAt(place, 'stedstatus');
    if (placeStatus !== undefined && !ACTIVE_PLACE_STATUSES.includes(placeStatus)) {
      continue;
    }

    const header = readHeader(place);
    const names: RawNameEntry[] = [];

    for (const entry of children(place, 'stedsnavn')) {
      const placeName = child(entry, 'Stedsnavn');
      const nameStatus = textAt(placeName, 'navnestatus');
      if (nameStatus !== undefined && REJECTED_NAME_STATUSES.includes(nameStatus)) {
        continue;
      }
      const language = textAt(placeName, 'språk');

      for (const spelling of children(placeName, 'skrivemåte')) {
        const value = text(child(spelling, 'Skrivemåte', 'langnavn'));
        const status = textAt(spelling, 'Skrivemåte', 'skrivemåtestatus');
        if (value === undefined || (status !== undefined && REJECTED_SPELLING_STATUSES.includes(status))) {
          continue;
        }
        const prioritized = textAt(spelling, 'Skrivemåte', 'prioritertSkrivemåte') === 'true';
        const historic = nameStatus === HISTORIC || status === HISTORIC;
        const proposed = status !== undefined && PROPOSED_STATUSES.includes(status);

        names.push({
          text: value,
          language,
          nameTypeCode: header.nameTypeCode,
          priority:
            !historic && !proposed && nameStatus !== 'undernavn' && (prioritized || status === 'vedtatt'),
          historic,
          status,
        });
      }
    }

    records.push({ ...header, geometry: readGeometry(child(place, 'posisjon'), wgs84), names });
  }

  return records;
}
