import { ContainerServiceClient } from '@azure/arm-containerservice';
import { TokenCredential } from '@azure/identity';
import { ClusterConfig, IClusterProvider, IRegistryProvider, RegistryConfig } from '../types';
import { Logger } from '../logger';
import { RetryRunner } from '../utils/retry';
import { AcrRegistryProvider } from './acr';
import { AksClusterProvider } from './aks';
import { AzureCloud } from './azure';
import { KubectlClusterProvider } from './kubectl';

export interface ProviderDependencies {
  credential: TokenCredential;
  cloud: AzureCloud;
  retry: RetryRunner;
}

/**
 * Create the registry provider for the configured ACR
 */
export function createRegistryProvider(
  logger: Logger,
  config: RegistryConfig,
  deps: ProviderDependencies
): IRegistryProvider {
  return new AcrRegistryProvider(logger, config, deps.credential, deps.cloud.registryAudience, deps.retry);
}

/**
 * Create one provider per configured cluster. AKS clusters in the same
 * subscription share a management client.
 */
export function createClusterProviders(
  logger: Logger,
  configs: ClusterConfig[],
  deps: ProviderDependencies
): IClusterProvider[] {
  const clients = new Map<string, ContainerServiceClient>();

  const clientFor = (subscriptionId: string): ContainerServiceClient => {
    let client = clients.get(subscriptionId);
    if (!client) {
      client = new ContainerServiceClient(deps.credential, subscriptionId, {
        endpoint: deps.cloud.resourceManager,
        credentialScopes: [`${deps.cloud.resourceManager}/.default`],
      });
      clients.set(subscriptionId, client);
    }
    return client;
  };

  return configs.map((config): IClusterProvider => {
    switch (config.type) {
      case 'aks':
        return new AksClusterProvider(logger, config, clientFor(config.subscriptionId));
      case 'kubectl':
        return new KubectlClusterProvider(logger, config);
      default: {
        const unknown: never = config;
        throw new Error(`Unknown cluster type: ${JSON.stringify(unknown)}`);
      }
    }
  });
}
