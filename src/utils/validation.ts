import {
  ClusterConfig,
  ClusterFailurePolicy,
  ConfigDocument,
  ConfigError,
  ReconcileConfig,
  RegistryConfig,
} from '../types';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate and parse the cluster failure policy
 */
export function validateFailurePolicy(policy: string): ClusterFailurePolicy {
  const policies: ClusterFailurePolicy[] = ['abort', 'degrade'];
  const match = policies.find((p) => p === policy.trim().toLowerCase());
  if (!match) {
    throw new ConfigError(`Invalid on-cluster-failure: ${policy}. Must be one of: ${policies.join(', ')}`);
  }
  return match;
}

/**
 * Parse a retention threshold given as whole days
 */
export function parseRetentionDays(value: string | number, path = 'retention-days'): number {
  const text = String(value).trim();
  if (!/^\d+$/.test(text)) {
    throw new ConfigError('must be a non-negative whole number of days', path);
  }
  return parseInt(text, 10);
}

/**
 * Split a comma separated input into trimmed, non-empty entries
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Validate reconciliation configuration
 */
export function validateReconcileConfig(config: Partial<ReconcileConfig>): void {
  if (config.retentionDays !== undefined && (!Number.isInteger(config.retentionDays) || config.retentionDays < 0)) {
    throw new ConfigError('must be a non-negative whole number of days', 'retention-days');
  }

  if (config.retry !== undefined && (Number.isNaN(config.retry) || config.retry < 0)) {
    throw new ConfigError('must be a non-negative number', 'retry');
  }

  if (config.throttle !== undefined && (Number.isNaN(config.throttle) || config.throttle < 0)) {
    throw new ConfigError('must be a non-negative number', 'throttle');
  }
}

/**
 * Normalize registry URL (remove protocol, trailing slashes)
 */
export function normalizeRegistryUrl(url: string): string {
  return url.trim().replace(/^https?:\/\//, '').replace(/\/+$/, '');
}

/**
 * Extract hostname (with port, if any) from a URL
 */
export function extractHostname(url: string): string {
  return normalizeRegistryUrl(url).split('/')[0].toLowerCase();
}

/**
 * Registry hosts match when their normalized hostnames are equal
 */
export function isSameRegistryHost(a: string, b: string): boolean {
  const left = extractHostname(a);
  return left.length > 0 && left === extractHostname(b);
}

function requireString(source: Record<string, unknown>, key: string, path: string): string {
  const value = source[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError('is required and must be a non-empty string', `${path}.${key}`);
  }
  return value.trim();
}

function requireUuid(source: Record<string, unknown>, key: string, path: string): string {
  const value = requireString(source, key, path);
  if (!UUID_PATTERN.test(value)) {
    throw new ConfigError(`must be a subscription UUID, got ${value}`, `${path}.${key}`);
  }
  return value;
}

function parseRegistry(raw: unknown): RegistryConfig {
  const path = 'container_registry';
  if (!isRecord(raw)) {
    throw new ConfigError('is required and must be an object', path);
  }
  return {
    url: normalizeRegistryUrl(requireString(raw, 'url', path)),
    subscriptionId: requireUuid(raw, 'subscription_id', path),
    resourceGroup: requireString(raw, 'resource_group', path),
  };
}

function parseCluster(alias: string, raw: unknown): ClusterConfig {
  const path = `kubernetes_clusters.${alias}`;
  if (!isRecord(raw)) {
    throw new ConfigError('must be an object', path);
  }

  const type = raw.type ?? 'aks';
  if (type === 'kubectl') {
    if (raw.context === undefined) {
      return { type: 'kubectl', alias };
    }
    const context = raw.context;
    if (typeof context !== 'string' || context.trim() === '') {
      throw new ConfigError('must be a non-empty string when given', `${path}.context`);
    }
    return { type: 'kubectl', alias, context: context.trim() };
  }
  if (type !== 'aks') {
    throw new ConfigError(`unknown cluster type ${String(type)}; expected aks or kubectl`, `${path}.type`);
  }

  return {
    type: 'aks',
    alias,
    name: requireString(raw, 'name', path),
    subscriptionId: requireUuid(raw, 'subscription_id', path),
    resourceGroup: requireString(raw, 'resource_group', path),
  };
}

/**
 * Validate the parsed JSON configuration document
 */
export function parseConfigDocument(raw: unknown): ConfigDocument {
  if (!isRecord(raw)) {
    throw new ConfigError('Configuration document must be a JSON object');
  }

  const registry = parseRegistry(raw.container_registry);

  const rawClusters = raw.kubernetes_clusters;
  if (!isRecord(rawClusters)) {
    throw new ConfigError('is required and must map cluster aliases to descriptors', 'kubernetes_clusters');
  }
  const clusters = Object.entries(rawClusters).map(([alias, cluster]) => parseCluster(alias, cluster));
  if (clusters.length === 0) {
    throw new ConfigError('must describe at least one cluster', 'kubernetes_clusters');
  }

  const document: ConfigDocument = { registry, clusters };
  if (raw.retention_days !== undefined) {
    const days = raw.retention_days;
    if (typeof days !== 'number' && typeof days !== 'string') {
      throw new ConfigError('must be a non-negative whole number of days', 'retention_days');
    }
    document.retentionDays = parseRetentionDays(days, 'retention_days');
  }

  return document;
}
