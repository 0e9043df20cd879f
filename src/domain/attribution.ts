/**
 * Attribution helper for Kartverket license and credit information
 */

import type { SourceMode } from '../config/env.js';
import type { Attribution, SourceMetadata } from './types.js';

/**
 * Kartverket place-name data is licensed under CC BY 4.0
 */
const KARTVERKET_LICENSE_URI = 'https://creativecommons.org/licenses/by/4.0/';
const KARTVERKET_CREDIT_LINE = 'Inneholder data under CC BY 4.0 fra Kartverket (Sentralt stedsnavnregister)';

const PRODUCTS: Record<SourceMode, string> = {
  static: 'Stedsnavn for vanlig bruk (Basisdata GML)',
  wfs: 'Stedsnavn WFS',
};

/**
 * Get Kartverket attribution information
 *
 * Every converted file or tool response carrying SSR data must credit Kartverket.
 *
 * @returns License URI and credit line
 */
export function getAttribution(): Attribution {
  return {
    licenseUri: KARTVERKET_LICENSE_URI,
    creditLine: KARTVERKET_CREDIT_LINE,
  };
}

/**
 * Build source metadata for a tool response
 *
 * @param mode - Registry source the data was read from
 * @returns Provider, product and license for the structured result
 */
export function buildSourceMetadata(mode: SourceMode): SourceMetadata {
  const attribution = getAttribution();

  return {
    provider: 'Kartverket',
    product: PRODUCTS[mode],
    licenseUri: attribution.licenseUri,
    creditLine: attribution.creditLine,
    mode,
  };
}
