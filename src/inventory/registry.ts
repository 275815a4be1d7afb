import { InventoryError, RawRepositoryListing, RegistryTag, RunWarning } from '../types';

export interface RegistryInventoryOptions {
  /**
   * Tags that never take part in reconciliation
   */
  protectedTags?: string[];
}

export interface RegistryInventory {
  tags: RegistryTag[];
  warnings: RunWarning[];
  protectedCount: number;
}

/**
 * Convert a raw creation timestamp into a Date
 * @throws InventoryError when the timestamp is missing or unparsable
 */
export function parseCreatedOn(value: Date | string | null | undefined, subject: string): Date {
  if (value === undefined || value === null || value === '') {
    throw new InventoryError(`Tag ${subject} has no creation timestamp`, subject);
  }
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InventoryError(`Tag ${subject} has an unparsable creation timestamp: ${String(value)}`, subject);
  }
  return date;
}

/**
 * Flatten registry listings into one RegistryTag per repository and tag.
 * A tag with a bad timestamp is left out and reported; the rest of the registry is kept.
 */
export function normalizeRegistryTags(
  listings: RawRepositoryListing[],
  options: RegistryInventoryOptions = {}
): RegistryInventory {
  const protectedTags = new Set(options.protectedTags ?? []);
  const seen = new Set<string>();
  const tags: RegistryTag[] = [];
  const warnings: RunWarning[] = [];
  let protectedCount = 0;

  for (const listing of listings) {
    for (const rawTag of listing.tags) {
      const subject = `${listing.repository}:${rawTag.name}`;
      if (seen.has(subject)) {
        continue;
      }
      seen.add(subject);

      if (protectedTags.has(rawTag.name)) {
        protectedCount++;
        continue;
      }

      try {
        tags.push({
          repository: listing.repository,
          tag: rawTag.name,
          createdAt: parseCreatedOn(rawTag.createdOn, subject),
        });
      } catch (error) {
        if (!(error instanceof InventoryError)) {
          throw error;
        }
        warnings.push({ kind: 'unparsable-tag', subject, message: error.message });
      }
    }
  }

  return { tags, warnings, protectedCount };
}
