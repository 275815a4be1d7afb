/**
 * Type definitions for the ACR / AKS image reconciliation action
 */

export type ClusterFailurePolicy = 'abort' | 'degrade';

/**
 * Image reference observed in a running workload, scoped to a registry host
 */
export interface ImageReference {
  registryHost: string;
  repository: string;
  tag: string;
}

/**
 * Result of parsing an image string; tag is absent for digest-only references
 */
export interface ParsedImageReference {
  registryHost: string;
  repository: string;
  tag?: string;
  digest?: string;
}

/**
 * Tag stored in the container registry
 */
export interface RegistryTag {
  repository: string;
  tag: string;
  createdAt: Date;
}

/**
 * Raw tag listing as returned by a registry provider
 */
export interface RawTagListing {
  name: string;
  createdOn?: Date | string | null;
}

export interface RawRepositoryListing {
  repository: string;
  tags: RawTagListing[];
}

/**
 * Images observed running in one cluster (set semantics on repository + tag)
 */
export interface ClusterImageSet {
  cluster: string;
  references: ImageReference[];
}

export type ClusterInventoryResult =
  | { status: 'available'; images: ClusterImageSet }
  | { status: 'unavailable'; cluster: string; error: ClusterUnavailableError };

/**
 * Cross-cluster view of what is running
 */
export interface InUseIndex {
  repositoriesInUse: Set<string>;
  tagsInUse: Set<string>;
  clusters: string[];
  unavailableClusters: string[];
}

export const DELETION_REASON = 'repository-in-use+tag-not-in-use+age-exceeded' as const;

export type DeletionReason = typeof DELETION_REASON;

export interface DeletionDecision {
  repository: string;
  tag: string;
  createdAt: Date;
  reason: DeletionReason;
}

export type RetentionVerdict =
  | 'inventory-incomplete'
  | 'repository-not-in-use'
  | 'tag-in-use'
  | 'too-recent'
  | 'delete';

export type WarningKind = 'unparsable-tag' | 'unparsable-image' | 'cluster-unavailable' | 'deletion-failed';

export interface RunWarning {
  kind: WarningKind;
  subject: string;
  message: string;
}

export type DeletionStatus = 'deleted' | 'already-deleted' | 'failed' | 'dry-run';

export interface DeletionOutcome {
  decision: DeletionDecision;
  status: DeletionStatus;
  error?: string;
}

export type RunStatus = 'success' | 'degraded' | 'completed-with-errors';

export interface RunSummary {
  status: RunStatus;
  dryRun: boolean;
  registryTagCount: number;
  decisions: DeletionDecision[];
  outcomes: DeletionOutcome[];
  deleted: string[];
  alreadyDeleted: string[];
  failed: string[];
  retained: Record<Exclude<RetentionVerdict, 'delete'>, number>;
  unavailableClusters: string[];
  warnings: RunWarning[];
}

/**
 * Container registry provider interface
 */
export interface IRegistryProvider {
  /**
   * Registry host images reference, e.g. myacr.azurecr.io
   */
  readonly host: string;

  /**
   * List every repository with its tags and creation times
   */
  listRepositories(signal?: AbortSignal): Promise<RawRepositoryListing[]>;

  /**
   * Remove a tag; throws NotFoundError or TransientError
   */
  deleteTag(repository: string, tag: string): Promise<void>;
}

/**
 * Kubernetes cluster provider interface
 */
export interface IClusterProvider {
  readonly alias: string;

  /**
   * Image strings of every init and regular container of every pod
   */
  listRunningImages(signal?: AbortSignal): Promise<string[]>;
}

/**
 * Registry descriptor from the configuration document
 */
export interface RegistryConfig {
  url: string;
  subscriptionId: string;
  resourceGroup: string;
}

export interface AksClusterConfig {
  type: 'aks';
  alias: string;
  name: string;
  subscriptionId: string;
  resourceGroup: string;
}

export interface KubectlClusterConfig {
  type: 'kubectl';
  alias: string;
  context?: string;
}

export type ClusterConfig = AksClusterConfig | KubectlClusterConfig;

export interface ConfigDocument {
  registry: RegistryConfig;
  clusters: ClusterConfig[];
  retentionDays?: number;
}

/**
 * Reconciliation configuration
 */
export interface ReconcileConfig {
  retentionDays: number;
  onClusterFailure: ClusterFailurePolicy;
  protectedTags: string[];
  dryRun: boolean;
  retry: number;
  throttle: number;
  verbose: boolean;
}

export interface RetryOptions {
  retry?: number;
  throttle?: number;
}

/**
 * Error types
 */
export class ReconciliationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReconciliationError';
  }
}

export class InventoryError extends ReconciliationError {
  constructor(
    message: string,
    public readonly subject: string
  ) {
    super(message);
    this.name = 'InventoryError';
  }
}

export class ClusterUnavailableError extends ReconciliationError {
  constructor(
    message: string,
    public readonly clusters: string[]
  ) {
    super(message);
    this.name = 'ClusterUnavailableError';
  }
}

export class RegistryUnavailableError extends ReconciliationError {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryUnavailableError';
  }
}

export class DeletionError extends ReconciliationError {
  constructor(
    message: string,
    public readonly repository: string,
    public readonly tag: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'DeletionError';
  }
}

export class NotFoundError extends DeletionError {
  constructor(message: string, repository: string, tag: string) {
    super(message, repository, tag, 404);
    this.name = 'NotFoundError';
  }
}

export class TransientError extends DeletionError {
  constructor(message: string, repository: string, tag: string, statusCode?: number) {
    super(message, repository, tag, statusCode);
    this.name = 'TransientError';
  }
}

export class ConfigError extends ReconciliationError {
  constructor(
    message: string,
    public readonly path?: string
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

export class RunCancelledError extends ReconciliationError {
  constructor(message = 'Run cancelled') {
    super(message);
    this.name = 'RunCancelledError';
  }
}
