import { buildClusterImageSet } from '../inventory/cluster';

const HOST = 'myacr.azurecr.io';
const DIGEST = `sha256:${'b'.repeat(64)}`;

describe('buildClusterImageSet', () => {
  it('should keep only references to the configured registry', () => {
    const inventory = buildClusterImageSet(
      'cluster1',
      ['myacr.azurecr.io/app:v2', 'nginx:1.25', 'otheracr.azurecr.io/app:v1', 'myacr.azurecr.io/web/api:2.0.1'],
      HOST
    );

    expect(inventory.images).toEqual({
      cluster: 'cluster1',
      references: [
        { registryHost: HOST, repository: 'app', tag: 'v2' },
        { registryHost: HOST, repository: 'web/api', tag: '2.0.1' },
      ],
    });
    expect(inventory.foreignCount).toBe(2);
    expect(inventory.warnings).toEqual([]);
  });

  it('should collapse duplicate references', () => {
    const inventory = buildClusterImageSet(
      'cluster1',
      ['myacr.azurecr.io/app:v2', 'myacr.azurecr.io/app:v2', 'MYACR.azurecr.io/app:v2'],
      HOST
    );

    expect(inventory.images.references).toHaveLength(1);
  });

  it('should match the configured host regardless of protocol and case', () => {
    const inventory = buildClusterImageSet('cluster1', ['myacr.azurecr.io/app:v2'], 'https://MyAcr.azurecr.io/');

    expect(inventory.images.references).toEqual([{ registryHost: HOST, repository: 'app', tag: 'v2' }]);
  });

  it('should skip and report malformed images', () => {
    const inventory = buildClusterImageSet('cluster1', ['Bad:Image!', 'myacr.azurecr.io/app:v2'], HOST);

    expect(inventory.images.references).toHaveLength(1);
    expect(inventory.warnings).toEqual([
      {
        kind: 'unparsable-image',
        subject: 'cluster1: Bad:Image!',
        message: 'Invalid image reference "Bad:Image!": malformed tag',
      },
    ]);
  });

  it('should skip and report digest-only references to the registry', () => {
    const image = `myacr.azurecr.io/app@${DIGEST}`;
    const inventory = buildClusterImageSet('cluster1', [image], HOST);

    expect(inventory.images.references).toEqual([]);
    expect(inventory.warnings).toEqual([
      {
        kind: 'unparsable-image',
        subject: `cluster1: ${image}`,
        message: `Digest-only reference ${image} names no tag and is ignored`,
      },
    ]);
  });

  it('should drop digest-only references to other registries silently', () => {
    const inventory = buildClusterImageSet('cluster1', [`nginx@${DIGEST}`], HOST);

    expect(inventory.warnings).toEqual([]);
    expect(inventory.foreignCount).toBe(1);
  });
});
