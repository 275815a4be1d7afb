import { ContainerRegistryClient } from '@azure/container-registry';
import { isRestError } from '@azure/core-rest-pipeline';
import { TokenCredential } from '@azure/identity';
import {
  DeletionError,
  IRegistryProvider,
  NotFoundError,
  RawRepositoryListing,
  RawTagListing,
  RegistryConfig,
  TransientError,
} from '../types';
import { Logger } from '../logger';
import { RetryRunner } from '../utils/retry';
import { extractHostname } from '../utils/validation';

/**
 * Azure Container Registry provider
 * Lists tags with their creation time and removes tags (untag), leaving manifests
 * to the registry's own untagged-manifest policy.
 */
export class AcrRegistryProvider implements IRegistryProvider {
  readonly host: string;
  private readonly logger: Logger;
  private readonly client: ContainerRegistryClient;
  private readonly retry: RetryRunner;

  constructor(
    logger: Logger,
    config: RegistryConfig,
    credential: TokenCredential,
    audience: string,
    retry: RetryRunner
  ) {
    this.logger = logger;
    this.host = extractHostname(config.url);
    this.retry = retry;
    this.client = new ContainerRegistryClient(`https://${this.host}`, credential, { audience });
  }

  async listRepositories(signal?: AbortSignal): Promise<RawRepositoryListing[]> {
    const listings: RawRepositoryListing[] = [];

    for await (const repository of this.client.listRepositoryNames({ abortSignal: signal })) {
      const tags: RawTagListing[] = [];
      const manifests = this.client.getRepository(repository).listManifestProperties({ abortSignal: signal });

      for await (const manifest of manifests) {
        if (manifest.tags.length === 0) {
          continue;
        }
        const artifact = this.client.getArtifact(repository, manifest.digest);
        for await (const tag of artifact.listTagProperties({ abortSignal: signal })) {
          tags.push({ name: tag.name, createdOn: tag.createdOn });
        }
      }

      this.logger.debug(`Repository ${repository}: ${tags.length} tags`);
      listings.push({ repository, tags });
    }

    return listings;
  }

  async deleteTag(repository: string, tag: string): Promise<void> {
    await this.retry.run(
      `delete ${repository}:${tag}`,
      async () => {
        try {
          await this.client.getArtifact(repository, tag).deleteTag(tag);
        } catch (error) {
          throw this.toDeletionError(error, repository, tag);
        }
      },
      (error) => error instanceof TransientError && !isClientError(error.statusCode)
    );
  }

  private toDeletionError(error: unknown, repository: string, tag: string): DeletionError {
    const message = error instanceof Error ? error.message : String(error);
    const statusCode = isRestError(error) ? error.statusCode : undefined;

    if (statusCode === 404) {
      return new NotFoundError(`Tag ${repository}:${tag} not found`, repository, tag);
    }
    return new TransientError(message, repository, tag, statusCode);
  }
}

function isClientError(statusCode?: number): boolean {
  return statusCode !== undefined && statusCode >= 400 && statusCode < 500 && statusCode !== 429;
}
