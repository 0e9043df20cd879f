/**
 * Unit tests for the name types resource
 */

import { describe, it, expect, vi } from 'vitest';
import { NameTypeCatalog } from '../catalog/name-types.js';
import { listNameTypes, readNameTypesResource } from './name-types.js';

vi.mock('../domain/logger.js', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
  },
}));

const catalog = NameTypeCatalog.fromTable({
  mainGroups: [
    {
      name: 'vann',
      groups: [
        {
          name: 'rennendeVann',
          nameTypes: [
            { code: 'elv', description: 'Elv', category: 'waterway', priority: 1, tags: { waterway: 'river' } },
            { code: 'bekk', description: 'Bekk', category: 'waterway', priority: 2, tags: { waterway: 'stream' } },
          ],
        },
        {
          name: 'stilleståendeVann',
          nameTypes: [
            { code: 'tjern', description: 'Tjern', category: 'other', priority: 1, tags: { natural: 'water' } },
          ],
        },
      ],
    },
  ],
});

describe('listNameTypes', () => {
  it('should group name types by main group and group', () => {
    expect(listNameTypes(catalog)).toEqual([
      {
        mainGroup: 'vann',
        group: 'rennendeVann',
        nameTypes: [
          { code: 'elv', description: 'Elv', category: 'waterway', tags: { waterway: 'river' } },
          { code: 'bekk', description: 'Bekk', category: 'waterway', tags: { waterway: 'stream' } },
        ],
      },
      {
        mainGroup: 'vann',
        group: 'stilleståendeVann',
        nameTypes: [{ code: 'tjern', description: 'Tjern', category: 'other', tags: { natural: 'water' } }],
      },
    ]);
  });
});

describe('readNameTypesResource', () => {
  it('should return the listing as JSON', () => {
    const result = readNameTypesResource(catalog);

    expect(result.contents[0].uri).toBe('ssr://name-types');
    expect(result.contents[0].mimeType).toBe('application/json');
    const [content] = result.contents;
    const text = 'text' in content && typeof content.text === 'string' ? content.text : '{}';
    expect(JSON.parse(text)).toMatchObject({ nameTypes: 3 });
  });
});
