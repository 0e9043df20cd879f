/**
 * Unit tests for the municipality register and scope resolution
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpClient } from './http-client.js';
import { MunicipalityRegistry, type CountyListing } from './municipalities.js';

vi.mock('../domain/logger.js', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    logUpstreamCall: vi.fn(),
  },
}));

const LISTING: CountyListing[] = [
  {
    fylkesnummer: '34',
    fylkesnavn: 'Innlandet',
    kommuner: [
      { kommunenummer: '3411', kommunenavnNorsk: 'Ringsaker' },
      { kommunenummer: '3405', kommunenavnNorsk: 'Lillehammer' },
      { kommunenummer: '3412', kommunenavnNorsk: 'Løten' },
    ],
  },
  {
    fylkesnummer: '03',
    fylkesnavn: 'Oslo',
    kommuner: [{ kommunenummer: '0301', kommunenavnNorsk: 'Oslo' }],
  },
  {
    fylkesnummer: '46',
    fylkesnavn: 'Vestland',
    kommuner: [
      { kommunenummer: '4601', kommunenavnNorsk: 'Bergen' },
      { kommunenummer: '4640', kommunenavnNorsk: 'Sogndal' },
      { kommunenummer: '4641', kommunenavnNorsk: 'Aurland' },
    ],
  },
];

function caught(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('MunicipalityRegistry', () => {
  const registry = MunicipalityRegistry.fromCounties(LISTING);

  it('should list units sorted by code', () => {
    expect(registry.list('county').map(unit => unit.code)).toEqual(['03', '34', '46']);
    expect(registry.list('municipality').map(unit => unit.code)).toEqual([
      '0301',
      '3405',
      '3411',
      '3412',
      '4601',
      '4640',
      '4641',
    ]);
    expect(registry.list()[0]).toEqual({ code: '00', name: 'Norge', kind: 'country' });
  });

  it('should add Svalbard on request', () => {
    expect(registry.get('2100')).toBeUndefined();
    expect(MunicipalityRegistry.fromCounties(LISTING, true).get('2100')).toEqual({
      code: '2100',
      name: 'Svalbard',
      kind: 'municipality',
    });
  });

  describe('resolve', () => {
    it('should resolve codes', () => {
      expect(registry.resolve('3411')).toEqual({ code: '3411', name: 'Ringsaker', kind: 'municipality' });
      expect(registry.resolve(' 34 ')).toEqual({ code: '34', name: 'Innlandet', kind: 'county' });
      expect(registry.resolve('00').kind).toBe('country');
    });

    it('should prefer an exact name over a partial one', () => {
      expect(registry.resolve('oslo')).toEqual({ code: '03', name: 'Oslo', kind: 'county' });
    });

    it('should accept a unique part of a name', () => {
      expect(registry.resolve('sogn').code).toBe('4640');
      expect(registry.resolve('LØT').code).toBe('3412');
    });

    it('should accept Norway in several spellings', () => {
      expect(registry.resolve('Norway').code).toBe('00');
      expect(registry.resolve('NORGE').code).toBe('00');
    });

    it('should reject ambiguous names', () => {
      expect(caught(() => registry.resolve('land'))).toMatchObject({
        code: 'INVALID_INPUT',
        message: "Scope 'land' matches several units: 34 Innlandet, 46 Vestland, 4641 Aurland",
        details: { candidates: ['34', '46', '4641'] },
      });
    });

    it('should report unknown codes and names', () => {
      expect(caught(() => registry.resolve('9999'))).toMatchObject({
        code: 'LOOKUP_FAILED',
        message: "Unknown municipality or county code '9999'",
      });
      expect(caught(() => registry.resolve('Atlantis'))).toMatchObject({
        code: 'LOOKUP_FAILED',
        message: "No municipality or county named 'Atlantis'",
      });
      expect(caught(() => registry.resolve('  '))).toMatchObject({ code: 'INVALID_INPUT' });
    });
  });

  describe('fetch', () => {
    const mockFetch = vi.fn();

    beforeEach(() => {
      vi.clearAllMocks();
      vi.stubGlobal('fetch', mockFetch);
    });

    afterEach(() => {
      vi.unstubAllGlobals();
    });

    it('should load the listing from kommuneinfo', async () => {
      mockFetch.mockResolvedValue(new Response(JSON.stringify(LISTING), { status: 200 }));

      const loaded = await MunicipalityRegistry.fetch(new HttpClient('https://ws.example.test/kommuneinfo/v1'), true);

      expect(loaded.list().length).toBe(12);
      const url = new URL(String(mockFetch.mock.calls[0][0]));
      expect(url.pathname).toBe('/kommuneinfo/v1/fylkerkommuner');
      expect(url.searchParams.get('filtrer')).toBe(
        'fylkesnummer,fylkesnavn,kommuner.kommunenummer,kommuner.kommunenavnNorsk'
      );
    });

    it('should reject an unexpected listing', async () => {
      mockFetch.mockResolvedValue(new Response(JSON.stringify([{ fylkesnummer: 34 }]), { status: 200 }));

      await expect(
        MunicipalityRegistry.fetch(new HttpClient('https://ws.example.test/kommuneinfo/v1'))
      ).rejects.toMatchObject({
        code: 'SOURCE_UNAVAILABLE',
        message: 'Unexpected municipality listing from kommuneinfo',
      });
    });
  });
});
