/**
 * License resource for Kartverket attribution
 */

import type { ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import { getAttribution } from '../domain/attribution.js';

export const LICENSE_RESOURCE_URI = 'ssr://license';

export const LICENSE_RESOURCE_NAME = 'Kartverket Place Names License & Attribution';

export const LICENSE_RESOURCE_DESCRIPTION =
  'License and attribution requirements for data from the Norwegian central place name register (SSR)';

function licenseContent(): string {
  const { licenseUri, creditLine } = getAttribution();

  return `# Kartverket Place Names License & Attribution

## Data Source

Place names from **Sentralt stedsnavnregister (SSR)**, maintained by Kartverket
(the Norwegian Mapping Authority).

- **Static extracts**: Stedsnavn for vanlig bruk, Basisdata GML per county or municipality (EPSG:25833)
- **WFS**: Stedsnavn WFS at wfs.geonorge.no (EPSG:4326)

## License

**Creative Commons Attribution 4.0 International (CC BY 4.0)**

License URL: ${licenseUri}

## Required Attribution

\`\`\`
${creditLine}
\`\`\`

For OpenStreetMap imports, record the source on the changeset (\`source=Kartverket\`)
and make sure the import follows the OSM import guidelines. Kartverket has granted
permission for OSM use of SSR data under these terms.

## Output Files

Converted GeoJSON files carry the SSR place number in \`ssr:stedsnr\` on every
feature, so each place can be traced back to the register.
`;
}

export function readLicenseResource(): ReadResourceResult {
  return {
    contents: [
      {
        uri: LICENSE_RESOURCE_URI,
        mimeType: 'text/markdown',
        text: licenseContent(),
      },
    ],
  };
}
