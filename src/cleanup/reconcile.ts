import { DELETION_REASON, DeletionDecision, InUseIndex, RegistryTag, RetentionVerdict } from '../types';
import { isIndexComplete, isRepositoryInUse, isTagInUse } from './aggregator';
import { isOldEnough } from './retention';

/**
 * Decide what happens to one registry tag.
 *
 * Rules are applied in order:
 * 1. every cluster must have reported, otherwise nothing is provably unused
 * 2. the repository must be running somewhere; repositories no cluster uses belong to
 *    other consumers of the registry and are never touched
 * 3. the exact tag must be running nowhere
 * 4. the tag must be older than the retention threshold
 */
export function evaluateTag(
  registryTag: RegistryTag,
  inUse: InUseIndex,
  thresholdDays: number,
  now: Date
): RetentionVerdict {
  if (!isIndexComplete(inUse)) {
    return 'inventory-incomplete';
  }
  if (!isRepositoryInUse(inUse, registryTag.repository)) {
    return 'repository-not-in-use';
  }
  if (isTagInUse(inUse, registryTag.repository, registryTag.tag)) {
    return 'tag-in-use';
  }
  if (!isOldEnough(registryTag.createdAt, now, thresholdDays)) {
    return 'too-recent';
  }
  return 'delete';
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

export function compareDecisions(a: DeletionDecision, b: DeletionDecision): number {
  return compareCodeUnits(a.repository, b.repository) || compareCodeUnits(a.tag, b.tag);
}

/**
 * Compute the deletion decision list. Pure: the same inputs always give the same
 * list, ordered by repository then tag.
 */
export function reconcile(
  registryTags: RegistryTag[],
  inUse: InUseIndex,
  thresholdDays: number,
  now: Date
): DeletionDecision[] {
  return registryTags
    .filter((registryTag) => evaluateTag(registryTag, inUse, thresholdDays, now) === 'delete')
    .map((registryTag): DeletionDecision => ({
      repository: registryTag.repository,
      tag: registryTag.tag,
      createdAt: registryTag.createdAt,
      reason: DELETION_REASON,
    }))
    .sort(compareDecisions);
}
