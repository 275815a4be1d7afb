import { InventoryError, ParsedImageReference } from '../types';

export const DEFAULT_REGISTRY_HOST = 'docker.io';
export const DEFAULT_TAG = 'latest';

const PATH_COMPONENT = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;
const TAG = /^[\w][\w.-]{0,127}$/;
const DIGEST = /^[a-z0-9]+(?:[.+_-][a-z0-9]+)*:[a-zA-Z0-9=_-]{32,}$/;
const HOST = /^[a-z0-9](?:[a-z0-9.-]*[a-z0-9])?(?::\d+)?$/i;

function isHostComponent(component: string): boolean {
  return component.includes('.') || component.includes(':') || component === 'localhost';
}

/**
 * Parse a container image string such as `myacr.azurecr.io/team/app:v2`,
 * `nginx:1.25` or `app@sha256:...` into its registry host, repository, tag and digest.
 *
 * The first path component is only treated as a host when it looks like one
 * (contains `.` or `:`, or is `localhost`); otherwise the image lives on Docker Hub.
 * A reference without tag or digest means `latest`.
 *
 * @throws InventoryError when the string is not a valid image reference
 */
export function parseImageReference(image: string): ParsedImageReference {
  const invalid = (why: string): InventoryError =>
    new InventoryError(`Invalid image reference "${image}": ${why}`, image);

  const value = image.trim();
  if (value === '' || /\s/.test(value)) {
    throw invalid('empty or contains whitespace');
  }

  let name = value;
  let digest: string | undefined;
  const at = value.indexOf('@');
  if (at !== -1) {
    digest = value.slice(at + 1);
    name = value.slice(0, at);
    if (!DIGEST.test(digest)) {
      throw invalid('malformed digest');
    }
  }

  let tag: string | undefined;
  const colon = name.lastIndexOf(':');
  if (colon > name.lastIndexOf('/')) {
    tag = name.slice(colon + 1);
    name = name.slice(0, colon);
    if (!TAG.test(tag)) {
      throw invalid('malformed tag');
    }
  }

  const [first, ...rest] = name.split('/');
  let registryHost = DEFAULT_REGISTRY_HOST;
  let components = [first, ...rest];
  if (rest.length > 0 && isHostComponent(first)) {
    if (!HOST.test(first)) {
      throw invalid('malformed registry host');
    }
    registryHost = first.toLowerCase();
    components = rest;
  }

  for (const component of components) {
    if (!PATH_COMPONENT.test(component)) {
      throw invalid(`malformed repository component "${component}"`);
    }
  }

  if (registryHost === DEFAULT_REGISTRY_HOST && components.length === 1) {
    components = ['library', ...components];
  }

  if (tag === undefined && digest === undefined) {
    tag = DEFAULT_TAG;
  }

  return {
    registryHost,
    repository: components.join('/'),
    tag,
    digest,
  };
}
