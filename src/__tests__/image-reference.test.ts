import { parseImageReference } from '../inventory/image-reference';
import { InventoryError } from '../types';

const DIGEST = `sha256:${'a'.repeat(64)}`;

describe('parseImageReference', () => {
  describe('explicit registry host', () => {
    it('should split host, repository and tag', () => {
      expect(parseImageReference('myacr.azurecr.io/team/app:v2')).toEqual({
        registryHost: 'myacr.azurecr.io',
        repository: 'team/app',
        tag: 'v2',
      });
    });

    it('should keep the port as part of the host', () => {
      expect(parseImageReference('localhost:5000/app:v1')).toEqual({
        registryHost: 'localhost:5000',
        repository: 'app',
        tag: 'v1',
      });
      expect(parseImageReference('registry.example.com:5000/tools/cli')).toEqual({
        registryHost: 'registry.example.com:5000',
        repository: 'tools/cli',
        tag: 'latest',
      });
    });

    it('should lowercase the host', () => {
      expect(parseImageReference('MyAcr.AzureCR.io/app:v1').registryHost).toBe('myacr.azurecr.io');
    });

    it('should keep both tag and digest', () => {
      expect(parseImageReference(`myacr.azurecr.io/app:v1@${DIGEST}`)).toEqual({
        registryHost: 'myacr.azurecr.io',
        repository: 'app',
        tag: 'v1',
        digest: DIGEST,
      });
    });

    it('should leave the tag empty for digest-only references', () => {
      const parsed = parseImageReference(`myacr.azurecr.io/app@${DIGEST}`);
      expect(parsed.tag).toBeUndefined();
      expect(parsed.digest).toBe(DIGEST);
    });
  });

  describe('implicit registry host', () => {
    it('should resolve official images to docker.io/library', () => {
      expect(parseImageReference('nginx:1.25')).toEqual({
        registryHost: 'docker.io',
        repository: 'library/nginx',
        tag: '1.25',
      });
    });

    it('should not treat a plain first component as a host', () => {
      expect(parseImageReference('bitnami/redis')).toEqual({
        registryHost: 'docker.io',
        repository: 'bitnami/redis',
        tag: 'latest',
      });
    });
  });

  describe('malformed references', () => {
    it.each([
      [''],
      ['app:'],
      ['App:v1'],
      ['myacr.azurecr.io//app:v1'],
      ['app@sha256:abc'],
      ['app:v1 extra'],
      ['Bad:Image!'],
    ])('should reject %p', (image) => {
      expect(() => parseImageReference(image)).toThrow(InventoryError);
    });

    it('should name the offending image in the error', () => {
      expect(() => parseImageReference('app:')).toThrow('Invalid image reference "app:": malformed tag');
    });
  });
});
