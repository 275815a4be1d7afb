import { normalizeRegistryTags, parseCreatedOn } from '../inventory/registry';
import { InventoryError, RawRepositoryListing } from '../types';

describe('normalizeRegistryTags', () => {
  const listings: RawRepositoryListing[] = [
    {
      repository: 'app',
      tags: [
        { name: 'v1', createdOn: new Date('2024-01-01T00:00:00Z') },
        { name: 'latest', createdOn: new Date('2024-01-01T00:00:00Z') },
        { name: 'v2', createdOn: '2024-02-01T00:00:00Z' },
        { name: 'v3' },
        { name: 'v4', createdOn: 'not a date' },
      ],
    },
    { repository: 'empty', tags: [] },
  ];

  it('should emit one tag per repository and tag with its creation time', () => {
    const inventory = normalizeRegistryTags(listings, { protectedTags: ['latest'] });

    expect(inventory.tags).toEqual([
      { repository: 'app', tag: 'v1', createdAt: new Date('2024-01-01T00:00:00Z') },
      { repository: 'app', tag: 'v2', createdAt: new Date('2024-02-01T00:00:00Z') },
    ]);
    expect(inventory.protectedCount).toBe(1);
  });

  it('should exclude and report tags with missing or unparsable timestamps', () => {
    const inventory = normalizeRegistryTags(listings, { protectedTags: ['latest'] });

    expect(inventory.warnings).toEqual([
      { kind: 'unparsable-tag', subject: 'app:v3', message: 'Tag app:v3 has no creation timestamp' },
      {
        kind: 'unparsable-tag',
        subject: 'app:v4',
        message: 'Tag app:v4 has an unparsable creation timestamp: not a date',
      },
    ]);
  });

  it('should include every tag when nothing is protected', () => {
    const inventory = normalizeRegistryTags(listings);

    expect(inventory.tags.map((t) => t.tag)).toEqual(['v1', 'latest', 'v2']);
    expect(inventory.protectedCount).toBe(0);
  });

  it('should collapse duplicate tags', () => {
    const inventory = normalizeRegistryTags([
      { repository: 'app', tags: [{ name: 'v1', createdOn: '2024-01-01T00:00:00Z' }] },
      { repository: 'app', tags: [{ name: 'v1', createdOn: '2024-03-01T00:00:00Z' }] },
    ]);

    expect(inventory.tags).toEqual([
      { repository: 'app', tag: 'v1', createdAt: new Date('2024-01-01T00:00:00Z') },
    ]);
  });

  it('should return nothing for an empty registry', () => {
    expect(normalizeRegistryTags([])).toEqual({ tags: [], warnings: [], protectedCount: 0 });
  });
});

describe('parseCreatedOn', () => {
  it('should accept dates and ISO strings', () => {
    const date = new Date('2024-05-05T10:00:00Z');
    expect(parseCreatedOn(date, 'app:v1')).toBe(date);
    expect(parseCreatedOn('2024-05-05T10:00:00Z', 'app:v1')).toEqual(date);
  });

  it('should reject null, empty and invalid dates', () => {
    expect(() => parseCreatedOn(null, 'app:v1')).toThrow(InventoryError);
    expect(() => parseCreatedOn('', 'app:v1')).toThrow(InventoryError);
    expect(() => parseCreatedOn(new Date('nope'), 'app:v1')).toThrow(InventoryError);
  });
});
