/**
 * Inverse UTM projection (WGS84 / ETRS89) for the EPSG:25833 static extracts
 */

import type { LonLat } from './types.js';

const A = 6378137;
const F = 1 / 298.257223563;
const K0 = 0.9996;
const E2 = F * (2 - F);
const EP2 = E2 / (1 - E2);
const E1 = (1 - Math.sqrt(1 - E2)) / (1 + Math.sqrt(1 - E2));
const FALSE_EASTING = 500000;
const FALSE_NORTHING_SOUTH = 10000000;

export function utmToLonLat(easting: number, northing: number, zone = 33, northern = true): LonLat {
  const x = easting - FALSE_EASTING;
  const y = northern ? northing : northing - FALSE_NORTHING_SOUTH;
  const centralMeridian = ((zone - 1) * 6 - 180 + 3) * (Math.PI / 180);

  const m = y / K0;
  const mu = m / (A * (1 - E2 / 4 - (3 * E2 ** 2) / 64 - (5 * E2 ** 3) / 256));

  const phi1 =
    mu +
    ((3 * E1) / 2 - (27 * E1 ** 3) / 32) * Math.sin(2 * mu) +
    ((21 * E1 ** 2) / 16 - (55 * E1 ** 4) / 32) * Math.sin(4 * mu) +
    ((151 * E1 ** 3) / 96) * Math.sin(6 * mu) +
    ((1097 * E1 ** 4) / 512) * Math.sin(8 * mu);

  const sinPhi1 = Math.sin(phi1);
  const cosPhi1 = Math.cos(phi1);
  const tanPhi1 = Math.tan(phi1);

  const n1 = A / Math.sqrt(1 - E2 * sinPhi1 ** 2);
  const t1 = tanPhi1 ** 2;
  const c1 = EP2 * cosPhi1 ** 2;
  const r1 = (A * (1 - E2)) / (1 - E2 * sinPhi1 ** 2) ** 1.5;
  const d = x / (n1 * K0);

  const lat =
    phi1 -
    ((n1 * tanPhi1) / r1) *
      (d ** 2 / 2 -
        ((5 + 3 * t1 + 10 * c1 - 4 * c1 ** 2 - 9 * EP2) * d ** 4) / 24 +
        ((61 + 90 * t1 + 298 * c1 + 45 * t1 ** 2 - 252 * EP2 - 3 * c1 ** 2) * d ** 6) / 720);

  const lon =
    centralMeridian +
    (d -
      ((1 + 2 * t1 + c1) * d ** 3) / 6 +
      ((5 - 2 * c1 + 28 * t1 - 3 * c1 ** 2 + 8 * EP2 + 24 * t1 ** 2) * d ** 5) / 120) /
      cosPhi1;

  return [lon * (180 / Math.PI), lat * (180 / Math.PI)];
}
