/**
 * Name Types Resource
 * Lists the SSR name types known to the catalog with their OSM tagging
 */

import type { ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import type { NameTypeCatalog } from '../catalog/name-types.js';

export const NAME_TYPES_RESOURCE_URI = 'ssr://name-types';
export const NAME_TYPES_RESOURCE_NAME = 'SSR Name Types';
export const NAME_TYPES_RESOURCE_DESCRIPTION =
  'SSR name-type codes grouped by main group and group, with the OSM tags each one converts to';

interface NameTypeListing {
  code: string;
  description: string;
  category: string;
  tags: Readonly<Record<string, string>>;
}

interface GroupListing {
  mainGroup: string;
  group: string;
  nameTypes: NameTypeListing[];
}

export function listNameTypes(catalog: NameTypeCatalog): GroupListing[] {
  const groups = new Map<string, GroupListing>();

  for (const rule of catalog.list()) {
    const key = `${rule.mainGroup}/${rule.group}`;
    let listing = groups.get(key);
    if (!listing) {
      listing = { mainGroup: rule.mainGroup, group: rule.group, nameTypes: [] };
      groups.set(key, listing);
    }
    listing.nameTypes.push({
      code: rule.code,
      description: rule.description,
      category: rule.category,
      tags: rule.tags,
    });
  }

  return [...groups.values()];
}

export function readNameTypesResource(catalog: NameTypeCatalog): ReadResourceResult {
  return {
    contents: [
      {
        uri: NAME_TYPES_RESOURCE_URI,
        mimeType: 'application/json',
        text: JSON.stringify({ nameTypes: catalog.size, groups: listNameTypes(catalog) }, null, 2),
      },
    ],
  };
}
