import { ClusterInventoryResult, InUseIndex } from '../types';

/**
 * Key of a repository/tag pair in InUseIndex.tagsInUse.
 * Repository names cannot contain ':', so the key is unambiguous.
 */
export function tagKey(repository: string, tag: string): string {
  return `${repository}:${tag}`;
}

export function isRepositoryInUse(index: InUseIndex, repository: string): boolean {
  return index.repositoriesInUse.has(repository);
}

export function isTagInUse(index: InUseIndex, repository: string, tag: string): boolean {
  return index.tagsInUse.has(tagKey(repository, tag));
}

/**
 * The index only proves a tag unused when every configured cluster reported
 */
export function isIndexComplete(index: InUseIndex): boolean {
  return index.unavailableClusters.length === 0;
}

/**
 * Union the images of every cluster that reported into one in-use index.
 * Clusters that could not be queried are listed, never treated as running nothing.
 */
export function aggregate(results: ClusterInventoryResult[]): InUseIndex {
  const index: InUseIndex = {
    repositoriesInUse: new Set<string>(),
    tagsInUse: new Set<string>(),
    clusters: [],
    unavailableClusters: [],
  };

  for (const result of results) {
    if (result.status === 'unavailable') {
      index.unavailableClusters.push(result.cluster);
      continue;
    }

    index.clusters.push(result.images.cluster);
    for (const reference of result.images.references) {
      index.repositoriesInUse.add(reference.repository);
      index.tagsInUse.add(tagKey(reference.repository, reference.tag));
    }
  }

  return index;
}
