import * as core from '@actions/core';
import * as fs from 'fs';
import { ConfigDocument, ConfigError, ReconcileConfig } from './types';
import {
  parseConfigDocument,
  parseList,
  parseRetentionDays,
  validateFailurePolicy,
  validateReconcileConfig,
} from './utils/validation';
import { Logger } from './logger';

export const DEFAULT_RETENTION_DAYS = 7;
export const DEFAULT_CONFIG_FILE = 'cleanup_config.json';

export type ParsedInputs = {
  document: ConfigDocument;
  reconcileConfig: ReconcileConfig;
  logger: Logger;
};

function parseBoolean(val?: string): boolean {
  return val?.toLowerCase() === 'true' || val === '1';
}

/**
 * Read and validate the JSON configuration document
 */
export function loadConfigDocument(path: string): ConfigDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigError(
      `cannot read configuration document: ${error instanceof Error ? error.message : String(error)}`,
      path
    );
  }
  return parseConfigDocument(raw);
}

export function getInputs(): ParsedInputs {
  const configFile = core.getInput('config-file') || DEFAULT_CONFIG_FILE;
  const document = loadConfigDocument(configFile);

  const retentionInput = core.getInput('retention-days');
  const retentionDays = retentionInput
    ? parseRetentionDays(retentionInput)
    : document.retentionDays ?? DEFAULT_RETENTION_DAYS;

  const onClusterFailure = validateFailurePolicy(core.getInput('on-cluster-failure') || 'abort');
  const protectedTags = parseList(core.getInput('protected-tags'));
  const dryRun = core.getBooleanInput('dry-run');
  const retry = parseInt(core.getInput('retry') || '3', 10);
  const throttle = parseInt(core.getInput('throttle') || '1000', 10);
  const verboseInput = core.getBooleanInput('verbose');

  const debugMode =
    core.isDebug() ||
    parseBoolean(process.env.ACTIONS_STEP_DEBUG) ||
    parseBoolean(process.env.ACTIONS_RUNNER_DEBUG) ||
    parseBoolean(process.env.RUNNER_DEBUG);

  const verbose = verboseInput || debugMode;
  const logger = new Logger(verbose, debugMode);

  const reconcileConfig: ReconcileConfig = {
    retentionDays,
    onClusterFailure,
    protectedTags,
    dryRun,
    retry,
    throttle,
    verbose,
  };

  validateReconcileConfig(reconcileConfig);

  return {
    document,
    reconcileConfig,
    logger,
  };
}
