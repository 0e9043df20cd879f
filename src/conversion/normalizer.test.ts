/**
 * Unit tests for record normalization
 */

import { describe, it, expect, vi } from 'vitest';
import { NameTypeCatalog } from '../catalog/name-types.js';
import { IssueLog } from '../domain/issues.js';
import { collapseWhitespace, normalizeRecords, representativePositions } from './normalizer.js';
import type { RawGeometry, RawNameEntry, RawRegistryRecord } from './types.js';

vi.mock('../domain/logger.js', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
  },
}));

const catalog = NameTypeCatalog.load();

function name(text: string, extra: Partial<RawNameEntry> = {}): RawNameEntry {
  return { text, language: 'norsk', nameTypeCode: 'gard', priority: true, historic: false, ...extra };
}

function record(extra: Partial<RawRegistryRecord> = {}): RawRegistryRecord {
  return {
    placeId: '1001',
    nameTypeCode: 'gard',
    municipalityCode: '4601',
    geometry: { type: 'Point', coordinates: [5.3, 60.4] },
    names: [name('Haugen')],
    ...extra,
  };
}

describe('collapseWhitespace', () => {
  it('should trim and collapse runs of whitespace', () => {
    expect(collapseWhitespace('  Store \t Haugen\n')).toBe('Store Haugen');
    expect(collapseWhitespace('   ')).toBe('');
  });
});

describe('representativePositions', () => {
  const gard = catalog.require('gard');
  const elv = catalog.require('elv');

  it('should take the middle vertex of an odd line', () => {
    expect(
      representativePositions(
        { type: 'LineString', coordinates: [[0, 0], [1, 1], [4, 2]] },
        gard,
        false
      )
    ).toEqual([[1, 1]]);
  });

  it('should average the two middle vertices of an even line', () => {
    expect(
      representativePositions(
        { type: 'LineString', coordinates: [[0, 0], [2, 2], [4, 4], [6, 6]] },
        gard,
        false
      )
    ).toEqual([[3, 3]]);
  });

  it('should average the exterior ring of a polygon', () => {
    expect(
      representativePositions(
        { type: 'Polygon', coordinates: [[[0, 0], [4, 0], [4, 2], [0, 2], [0, 0]]] },
        gard,
        false
      )
    ).toEqual([[2, 1]]);
  });

  it('should keep only the first point of a multipoint', () => {
    const geometry: RawGeometry = { type: 'MultiPoint', coordinates: [[1, 1], [2, 2]] };

    expect(representativePositions(geometry, gard, true)).toEqual([[1, 1]]);
    expect(representativePositions(geometry, elv, false)).toEqual([[1, 1]]);
  });

  it('should keep all waterway points in all-points mode', () => {
    expect(
      representativePositions({ type: 'MultiPoint', coordinates: [[1, 1], [2, 2]] }, elv, true)
    ).toEqual([[1, 1], [2, 2]]);
  });

  it('should return null for missing or empty geometry', () => {
    expect(representativePositions(undefined, gard, false)).toBeNull();
    expect(representativePositions({ type: 'MultiPoint', coordinates: [] }, gard, false)).toBeNull();
    expect(representativePositions({ type: 'Point', coordinates: [Number.NaN, 60] }, gard, false)).toBeNull();
  });
});

describe('normalizeRecords', () => {
  it('should skip unknown name types and report them', () => {
    const issues = new IssueLog();

    const candidates = normalizeRecords([record({ nameTypeCode: 'romstasjon' })], catalog, false, issues);

    expect(candidates).toEqual([]);
    expect(issues.list()).toEqual([
      {
        kind: 'UNKNOWN_NAME_TYPE',
        message: "Unknown name type 'romstasjon'",
        placeId: '1001',
        municipalityCode: '4601',
      },
    ]);
  });

  it('should skip records without geometry as malformed', () => {
    const issues = new IssueLog();

    const candidates = normalizeRecords([record({ geometry: undefined })], catalog, false, issues);

    expect(candidates).toEqual([]);
    expect(issues.count('MALFORMED_RECORD')).toBe(1);
  });

  it('should skip records whose names are all blank', () => {
    const issues = new IssueLog();

    normalizeRecords([record({ names: [name('  ')] })], catalog, false, issues);

    expect(issues.list()[0]).toMatchObject({ kind: 'MALFORMED_RECORD', message: 'Record has no names' });
  });

  it('should map languages and collapse name whitespace', () => {
    const [candidate] = normalizeRecords(
      [record({ names: [name(' Store  Haugen '), name('Stuorra', { language: 'sme' })] })],
      catalog,
      false,
      new IssueLog()
    );

    expect(candidate.names.map(entry => [entry.text, entry.language])).toEqual([
      ['Store Haugen', 'no'],
      ['Stuorra', 'se'],
    ]);
  });

  it('should order priority names first, then by registration', () => {
    const [candidate] = normalizeRecords(
      [
        record({
          names: [name('A', { priority: false }), name('B'), name('C', { priority: false }), name('D')],
        }),
      ],
      catalog,
      false,
      new IssueLog()
    );

    expect(candidate.names.map(entry => entry.text)).toEqual(['B', 'D', 'A', 'C']);
    expect(candidate.names.map(entry => entry.order)).toEqual([1, 3, 0, 2]);
  });

  it('should merge records sharing a place id', () => {
    const candidates = normalizeRecords(
      [
        record({ names: [name('Haugen')] }),
        record({ placeId: '1002', names: [name('Bakken')] }),
        record({ names: [name('Haugen gamle', { historic: true, priority: false })] }),
      ],
      catalog,
      false,
      new IssueLog()
    );

    expect(candidates.map(candidate => candidate.placeId)).toEqual(['1001', '1002']);
    expect(candidates[0].names.map(entry => [entry.text, entry.order])).toEqual([
      ['Haugen', 0],
      ['Haugen gamle', 1],
    ]);
    expect(candidates.map(candidate => candidate.sequence)).toEqual([0, 1]);
  });

  it('should carry registry metadata onto the candidate', () => {
    const [candidate] = normalizeRecords(
      [
        record({
          nameTypeCode: 'tettsted',
          languagePriority: 'nordsamisk-norsk',
          registeredAt: '2019-03-01',
          rank: 'village',
        }),
      ],
      catalog,
      false,
      new IssueLog()
    );

    expect(candidate).toMatchObject({
      placeId: '1001',
      municipalityCode: '4601',
      registeredAt: '2019-03-01',
      registryRank: 'village',
      languagePriority: ['se', 'no'],
      position: [5.3, 60.4],
      extraPositions: [],
      rankSource: 'none',
      duplicate: false,
      excluded: false,
    });
    expect(candidate.rule.code).toBe('tettsted');
  });
});
