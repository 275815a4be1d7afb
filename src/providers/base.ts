import { ClusterUnavailableError, IClusterProvider } from '../types';
import { Logger } from '../logger';

/**
 * Images of every init container and container of every pod, space separated
 */
export const POD_IMAGES_JSONPATH = "{.items[*].spec['initContainers','containers'][*].image}";

/**
 * Base cluster provider: runs the provider's pod image query and splits its output.
 * Any failure surfaces as ClusterUnavailableError for this cluster.
 */
export abstract class BaseClusterProvider implements IClusterProvider {
  protected readonly logger: Logger;
  readonly alias: string;

  constructor(logger: Logger, alias: string) {
    this.logger = logger;
    this.alias = alias;
  }

  async listRunningImages(signal?: AbortSignal): Promise<string[]> {
    this.logger.info(`Retrieving images running on cluster ${this.alias}...`);

    const output = await this.queryImages(signal).catch((error: unknown) => {
      if (error instanceof ClusterUnavailableError) {
        throw error;
      }
      throw new ClusterUnavailableError(
        `Cluster ${this.alias} could not be queried: ${error instanceof Error ? error.message : String(error)}`,
        [this.alias]
      );
    });

    const images = this.parseImageList(output);
    this.logger.debug(`Cluster ${this.alias} reported ${images.length} container images`);
    return images;
  }

  protected parseImageList(output: string): string[] {
    return output.split(/\s+/).filter((image) => image.length > 0);
  }

  /**
   * Raw output of the pod image query
   */
  protected abstract queryImages(signal?: AbortSignal): Promise<string>;
}
