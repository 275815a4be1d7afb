import {
  ClusterInventoryResult,
  ClusterUnavailableError,
  IClusterProvider,
  IRegistryProvider,
  InUseIndex,
  ReconcileConfig,
  RegistryTag,
  RegistryUnavailableError,
  RunCancelledError,
  RunSummary,
  RunWarning,
} from '../types';
import { Logger } from '../logger';
import { buildClusterImageSet } from '../inventory/cluster';
import { normalizeRegistryTags } from '../inventory/registry';
import { aggregate } from './aggregator';
import { evaluateTag, reconcile } from './reconcile';
import { ageInDays } from './retention';
import { CleanupExecutor } from './executor';
import { buildRunSummary, countVerdict, emptyRetainedCounts } from './summary';

export interface CleanupEngineOptions {
  now?: () => Date;
}

/**
 * Runs one reconciliation: inventory, decide, delete.
 * Deletions only start once every cluster fetch has settled and the decision list is final.
 */
export class CleanupEngine {
  private readonly registry: IRegistryProvider;
  private readonly clusters: IClusterProvider[];
  private readonly config: ReconcileConfig;
  private readonly logger: Logger;
  private readonly executor: CleanupExecutor;
  private readonly now: () => Date;

  constructor(
    registry: IRegistryProvider,
    clusters: IClusterProvider[],
    config: ReconcileConfig,
    logger: Logger,
    options: CleanupEngineOptions = {}
  ) {
    this.registry = registry;
    this.clusters = clusters;
    this.config = config;
    this.logger = logger;
    this.executor = new CleanupExecutor(registry, logger);
    this.now = options.now ?? (() => new Date());
  }

  async run(signal?: AbortSignal): Promise<RunSummary> {
    const warnings: RunWarning[] = [];

    // Discovery phase
    this.logger.info(`Starting discovery phase (${this.clusters.length} clusters, registry ${this.registry.host})...`);
    const [clusterResults, registryTags] = await Promise.all([
      this.discoverRunningImages(warnings, signal),
      this.discoverRegistryTags(warnings, signal),
    ]);
    this.throwIfCancelled(signal);

    const inUse = aggregate(clusterResults);
    this.logger.info(
      `Discovered ${inUse.tagsInUse.size} running tags across ${inUse.repositoriesInUse.size} repositories ` +
        `in ${inUse.clusters.length} clusters`
    );
    this.handleUnavailableClusters(clusterResults, inUse, warnings);

    // Decision phase
    this.logger.info('Starting decision phase...');
    const now = this.now();
    const retained = emptyRetainedCounts();
    for (const registryTag of registryTags) {
      countVerdict(retained, evaluateTag(registryTag, inUse, this.config.retentionDays, now));
    }
    const decisions = reconcile(registryTags, inUse, this.config.retentionDays, now);
    this.logger.info(`${decisions.length} tags approved for deletion`);
    for (const decision of decisions) {
      this.logger.verboseInfo(
        `  - ${decision.repository}:${decision.tag} (${ageInDays(decision.createdAt, now)} days old)`
      );
    }
    this.throwIfCancelled(signal);

    // Deletion phase
    let outcomes: RunSummary['outcomes'] = [];
    if (decisions.length > 0) {
      this.logger.info(this.config.dryRun ? 'Skipping deletion phase (dry run)...' : 'Starting deletion phase...');
      const execution = await this.logger.group('Deleting tags', () =>
        this.executor.execute(decisions, { dryRun: this.config.dryRun, signal })
      );
      outcomes = execution.outcomes;
      warnings.push(...execution.warnings);
    }

    return buildRunSummary({
      dryRun: this.config.dryRun,
      registryTagCount: registryTags.length,
      decisions,
      outcomes,
      retained,
      unavailableClusters: inUse.unavailableClusters,
      warnings,
    });
  }

  /**
   * Query every cluster concurrently; each fetch settles as available or unavailable
   */
  private async discoverRunningImages(warnings: RunWarning[], signal?: AbortSignal): Promise<ClusterInventoryResult[]> {
    const settled = await Promise.allSettled(
      this.clusters.map((cluster) => cluster.listRunningImages(signal))
    );

    return settled.map((result, i): ClusterInventoryResult => {
      const alias = this.clusters[i].alias;

      if (result.status === 'rejected') {
        const error =
          result.reason instanceof ClusterUnavailableError
            ? result.reason
            : new ClusterUnavailableError(
                `Cluster ${alias} could not be queried: ${result.reason instanceof Error ? result.reason.message : String(result.reason)}`,
                [alias]
              );
        return { status: 'unavailable', cluster: alias, error };
      }

      const inventory = buildClusterImageSet(alias, result.value, this.registry.host);
      warnings.push(...inventory.warnings);
      this.logger.info(
        `Cluster ${alias}: ${inventory.images.references.length} running tags from ${this.registry.host}` +
          (inventory.foreignCount > 0 ? `, ${inventory.foreignCount} images from other registries ignored` : '')
      );
      for (const warning of inventory.warnings) {
        this.logger.warning(warning.message);
      }
      return { status: 'available', images: inventory.images };
    });
  }

  private async discoverRegistryTags(warnings: RunWarning[], signal?: AbortSignal): Promise<RegistryTag[]> {
    const listings = await this.registry.listRepositories(signal).catch((error: unknown) => {
      this.throwIfCancelled(signal);
      throw new RegistryUnavailableError(
        `Failed to list registry ${this.registry.host}: ${error instanceof Error ? error.message : String(error)}`
      );
    });

    const inventory = normalizeRegistryTags(listings, { protectedTags: this.config.protectedTags });
    warnings.push(...inventory.warnings);
    for (const warning of inventory.warnings) {
      this.logger.warning(warning.message);
    }
    this.logger.info(
      `Registry ${this.registry.host}: ${inventory.tags.length} tags in ${listings.length} repositories` +
        (inventory.protectedCount > 0 ? ` (${inventory.protectedCount} protected tags skipped)` : '')
    );
    return inventory.tags;
  }

  /**
   * Abort, or continue flagged as degraded, when a cluster did not report
   */
  private handleUnavailableClusters(
    results: ClusterInventoryResult[],
    inUse: InUseIndex,
    warnings: RunWarning[]
  ): void {
    if (inUse.unavailableClusters.length === 0) {
      return;
    }

    const aborting = this.config.onClusterFailure === 'abort';
    for (const result of results) {
      if (result.status === 'unavailable') {
        if (aborting) {
          this.logger.error(result.error.message);
        } else {
          this.logger.warning(result.error.message);
        }
        warnings.push({ kind: 'cluster-unavailable', subject: result.cluster, message: result.error.message });
      }
    }

    const names = inUse.unavailableClusters.join(', ');
    if (aborting) {
      throw new ClusterUnavailableError(
        `Aborting: cannot prove any tag unused while clusters are unreachable (${names})`,
        inUse.unavailableClusters
      );
    }

    this.logger.warning(`Run degraded: clusters unreachable (${names}); no tags will be deleted`);
  }

  private throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new RunCancelledError('Run cancelled before any deletion was issued');
    }
  }
}
