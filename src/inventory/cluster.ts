import { ClusterImageSet, ImageReference, InventoryError, ParsedImageReference, RunWarning } from '../types';
import { isSameRegistryHost } from '../utils/validation';
import { parseImageReference } from './image-reference';

export interface ClusterInventory {
  images: ClusterImageSet;
  warnings: RunWarning[];
  /**
   * References that point at other registries and were dropped
   */
  foreignCount: number;
}

function tryParseImageReference(image: string): ParsedImageReference | InventoryError {
  try {
    return parseImageReference(image);
  } catch (error) {
    if (error instanceof InventoryError) {
      return error;
    }
    throw error;
  }
}

/**
 * Turn the raw image strings of one cluster into the set of references to the
 * configured registry. Malformed strings and digest-only references are skipped and
 * reported; references to any other registry host are dropped.
 */
export function buildClusterImageSet(cluster: string, images: string[], registryHost: string): ClusterInventory {
  const references = new Map<string, ImageReference>();
  const warnings: RunWarning[] = [];
  let foreignCount = 0;

  for (const image of images) {
    const parsed = tryParseImageReference(image);
    if (parsed instanceof InventoryError) {
      warnings.push({ kind: 'unparsable-image', subject: `${cluster}: ${image}`, message: parsed.message });
      continue;
    }

    if (!isSameRegistryHost(parsed.registryHost, registryHost)) {
      foreignCount++;
      continue;
    }

    if (parsed.tag === undefined) {
      warnings.push({
        kind: 'unparsable-image',
        subject: `${cluster}: ${image}`,
        message: `Digest-only reference ${image} names no tag and is ignored`,
      });
      continue;
    }

    const key = `${parsed.repository}:${parsed.tag}`;
    if (!references.has(key)) {
      references.set(key, {
        registryHost: parsed.registryHost,
        repository: parsed.repository,
        tag: parsed.tag,
      });
    }
  }

  return {
    images: { cluster, references: [...references.values()] },
    warnings,
    foreignCount,
  };
}
