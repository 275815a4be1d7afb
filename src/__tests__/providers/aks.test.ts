import { ContainerServiceClient } from '@azure/arm-containerservice';
import { AksClusterProvider, CONTAINER_DISCOVERY_COMMAND } from '../../providers/aks';
import { Logger } from '../../logger';
import { AksClusterConfig, ClusterUnavailableError } from '../../types';

describe('AksClusterProvider', () => {
  let logger: Logger;
  let config: AksClusterConfig;
  let runCommand: jest.Mock;
  let provider: AksClusterProvider;

  beforeEach(() => {
    jest.clearAllMocks();
    logger = new Logger(false);
    config = {
      type: 'aks',
      alias: 'prod',
      name: 'aks-prod',
      subscriptionId: '00000000-0000-0000-0000-000000000001',
      resourceGroup: 'prod-rg',
    };
    runCommand = jest.fn();
    const client = { managedClusters: { beginRunCommandAndWait: runCommand } };
    provider = new AksClusterProvider(logger, config, client as unknown as ContainerServiceClient);
  });

  it('should run pod discovery through the run command API', async () => {
    const controller = new AbortController();
    runCommand.mockResolvedValue({
      exitCode: 0,
      logs: 'myacr.azurecr.io/app:v2 nginx:1.25\nmyacr.azurecr.io/init:v1 ',
    });

    const images = await provider.listRunningImages(controller.signal);

    expect(images).toEqual(['myacr.azurecr.io/app:v2', 'nginx:1.25', 'myacr.azurecr.io/init:v1']);
    expect(runCommand).toHaveBeenCalledWith(
      'prod-rg',
      'aks-prod',
      { command: CONTAINER_DISCOVERY_COMMAND },
      { abortSignal: controller.signal }
    );
  });

  it('should query init and regular containers of every namespace', () => {
    expect(CONTAINER_DISCOVERY_COMMAND).toBe(
      `kubectl get pod --all-namespaces -o jsonpath="{.items[*].spec['initContainers','containers'][*].image}"`
    );
  });

  it('should return no images for empty output', async () => {
    runCommand.mockResolvedValue({ exitCode: 0 });

    await expect(provider.listRunningImages()).resolves.toEqual([]);
  });

  it('should fail the cluster on a non-zero exit code', async () => {
    runCommand.mockResolvedValue({ exitCode: 1, logs: 'error: You must be logged in to the server' });

    await expect(provider.listRunningImages()).rejects.toThrow(
      new ClusterUnavailableError(
        'Pod discovery on cluster prod exited with code 1: error: You must be logged in to the server',
        ['prod']
      )
    );
  });

  it('should wrap API errors as ClusterUnavailableError', async () => {
    runCommand.mockRejectedValue(new Error('AuthorizationFailed'));

    const result = provider.listRunningImages();

    await expect(result).rejects.toBeInstanceOf(ClusterUnavailableError);
    await expect(result).rejects.toThrow('Cluster prod could not be queried: AuthorizationFailed');
  });
});
