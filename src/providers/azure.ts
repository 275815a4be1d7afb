import { AzureAuthorityHosts, DefaultAzureCredential, TokenCredential } from '@azure/identity';
import { KnownContainerRegistryAudience } from '@azure/container-registry';

export interface AzureCloud {
  name: 'public' | 'usgovernment';
  authorityHost: string;
  resourceManager: string;
  registryAudience: string;
}

/**
 * Pick the Azure cloud from ARM_ENVIRONMENT; anything but `usgovernment` is the public cloud
 */
export function resolveAzureCloud(env: NodeJS.ProcessEnv = process.env): AzureCloud {
  if (env.ARM_ENVIRONMENT?.trim().toLowerCase() === 'usgovernment') {
    return {
      name: 'usgovernment',
      authorityHost: AzureAuthorityHosts.AzureGovernment,
      resourceManager: 'https://management.usgovcloudapi.net',
      registryAudience: KnownContainerRegistryAudience.AzureResourceManagerGovernment,
    };
  }

  return {
    name: 'public',
    authorityHost: AzureAuthorityHosts.AzurePublicCloud,
    resourceManager: 'https://management.azure.com',
    registryAudience: KnownContainerRegistryAudience.AzureResourceManagerPublicCloud,
  };
}

export function createAzureCredential(cloud: AzureCloud): TokenCredential {
  return new DefaultAzureCredential({ authorityHost: cloud.authorityHost });
}
