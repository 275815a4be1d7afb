import { ContainerServiceClient } from '@azure/arm-containerservice';
import { AksClusterConfig, ClusterUnavailableError } from '../types';
import { Logger } from '../logger';
import { BaseClusterProvider, POD_IMAGES_JSONPATH } from './base';

export const CONTAINER_DISCOVERY_COMMAND = `kubectl get pod --all-namespaces -o jsonpath="${POD_IMAGES_JSONPATH}"`;

/**
 * AKS provider
 * Queries running pods through the managed cluster run command API, so the cluster
 * API server does not need to be reachable from the runner.
 */
export class AksClusterProvider extends BaseClusterProvider {
  private readonly config: AksClusterConfig;
  private readonly client: ContainerServiceClient;

  constructor(logger: Logger, config: AksClusterConfig, client: ContainerServiceClient) {
    super(logger, config.alias);
    this.config = config;
    this.client = client;
  }

  protected async queryImages(signal?: AbortSignal): Promise<string> {
    this.logger.debug(
      `Running pod discovery on ${this.config.resourceGroup}/${this.config.name} (subscription ${this.config.subscriptionId})`
    );

    const result = await this.client.managedClusters.beginRunCommandAndWait(
      this.config.resourceGroup,
      this.config.name,
      { command: CONTAINER_DISCOVERY_COMMAND },
      { abortSignal: signal }
    );

    if (result.exitCode !== undefined && result.exitCode !== 0) {
      throw new ClusterUnavailableError(
        `Pod discovery on cluster ${this.alias} exited with code ${result.exitCode}: ${result.reason ?? result.logs ?? 'no output'}`,
        [this.alias]
      );
    }

    return result.logs ?? '';
  }
}
