import { describe, it, expect } from 'vitest';
import { utmToLonLat } from './utm.js';

describe('utmToLonLat', () => {
  it('should map the zone 33 origin to the equator on the central meridian', () => {
    const [lon, lat] = utmToLonLat(500000, 0);

    expect(lon).toBeCloseTo(15, 9);
    expect(lat).toBeCloseTo(0, 9);
  });

  it('should keep the central meridian for any northing', () => {
    const [lon, lat] = utmToLonLat(500000, 6651411);

    expect(lon).toBeCloseTo(15, 9);
    expect(lat).toBeCloseTo(60, 1);
  });

  it('should place eastings west of the central meridian at lower longitudes', () => {
    const [lon] = utmToLonLat(262000, 6650000);

    expect(lon).toBeLessThan(15);
    expect(lon).toBeGreaterThan(10);
  });
});
