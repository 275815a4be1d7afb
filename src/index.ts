import * as core from '@actions/core';
import { getInputs } from './config';
import { CleanupEngine } from './cleanup/engine';
import { formatSummary, summaryCounts } from './cleanup/summary';
import { createAzureCredential, resolveAzureCloud } from './providers/azure';
import { createClusterProviders, createRegistryProvider } from './providers/factory';
import { RetryRunner } from './utils/retry';

/**
 * Main entry point for the action
 */
async function run(): Promise<void> {
  const controller = new AbortController();
  const cancel = (): void => controller.abort();
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  try {
    const { document, reconcileConfig, logger } = getInputs();

    const cloud = resolveAzureCloud();
    logger.debug(`Using Azure ${cloud.name} cloud (${cloud.resourceManager})`);
    const deps = {
      credential: createAzureCredential(cloud),
      cloud,
      retry: new RetryRunner(logger, { retry: reconcileConfig.retry, throttle: reconcileConfig.throttle }),
    };

    const registry = createRegistryProvider(logger, document.registry, deps);
    const clusters = createClusterProviders(logger, document.clusters, deps);

    logger.info(
      `Reconciling ${registry.host} against ${clusters.length} clusters ` +
        `(retention ${reconcileConfig.retentionDays} days, on cluster failure: ${reconcileConfig.onClusterFailure})`
    );
    const engine = new CleanupEngine(registry, clusters, reconcileConfig, logger);
    const summary = await engine.run(controller.signal);

    core.setOutput('deleted-count', summary.deleted.length);
    core.setOutput('failed-count', summary.failed.length);
    core.setOutput('decision-count', summary.decisions.length);
    core.setOutput('deleted-tags', summary.deleted.join(','));
    core.setOutput('degraded', summary.status === 'degraded');
    core.setOutput('summary', JSON.stringify(summaryCounts(summary)));

    for (const line of formatSummary(summary)) {
      logger.info(line);
    }

    if (summary.status === 'degraded') {
      logger.warning(`Run degraded: ${summary.unavailableClusters.join(', ')} unreachable, nothing was deleted`);
    }

    if (summary.failed.length > 0 && !reconcileConfig.dryRun) {
      core.setFailed(`Cleanup completed with ${summary.failed.length} failed deletions`);
    }
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(error.message);
    } else {
      core.setFailed('Unknown error occurred');
    }
  } finally {
    process.off('SIGINT', cancel);
    process.off('SIGTERM', cancel);
  }
}

void run();
