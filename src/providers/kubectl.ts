import * as exec from '@actions/exec';
import { ClusterUnavailableError, KubectlClusterConfig } from '../types';
import { Logger } from '../logger';
import { BaseClusterProvider, POD_IMAGES_JSONPATH } from './base';

/**
 * kubectl provider
 * Uses the kubectl CLI on the runner against a kubeconfig context (the current
 * context when none is configured). Useful for clusters outside Azure.
 */
export class KubectlClusterProvider extends BaseClusterProvider {
  private readonly context?: string;

  constructor(logger: Logger, config: KubectlClusterConfig) {
    super(logger, config.alias);
    this.context = config.context;
  }

  protected async queryImages(): Promise<string> {
    const args = ['get', 'pods', '--all-namespaces', '-o', `jsonpath=${POD_IMAGES_JSONPATH}`];
    if (this.context) {
      args.push('--context', this.context);
    }

    let output = '';
    let errors = '';

    const exitCode = await exec.exec('kubectl', args, {
      silent: !this.logger.verbose,
      ignoreReturnCode: true,
      listeners: {
        stdout: (data: Buffer) => {
          output += data.toString();
        },
        stderr: (data: Buffer) => {
          errors += data.toString();
        },
      },
    });

    if (exitCode !== 0) {
      throw new ClusterUnavailableError(
        `kubectl exited with code ${exitCode} for cluster ${this.alias}: ${errors.trim() || 'no output'}`,
        [this.alias]
      );
    }

    return output;
  }
}
