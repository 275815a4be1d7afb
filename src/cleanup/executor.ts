import { DeletionDecision, DeletionOutcome, IRegistryProvider, NotFoundError, RunCancelledError, RunWarning } from '../types';
import { Logger } from '../logger';

export interface ExecuteOptions {
  dryRun: boolean;
  signal?: AbortSignal;
}

export interface ExecutionResult {
  outcomes: DeletionOutcome[];
  warnings: RunWarning[];
}

/**
 * Issues one delete per decision. A failed delete is recorded and the next decision
 * is still attempted; a tag that is already gone counts as done.
 */
export class CleanupExecutor {
  private readonly provider: IRegistryProvider;
  private readonly logger: Logger;

  constructor(provider: IRegistryProvider, logger: Logger) {
    this.provider = provider;
    this.logger = logger;
  }

  async execute(decisions: DeletionDecision[], options: ExecuteOptions): Promise<ExecutionResult> {
    const outcomes: DeletionOutcome[] = [];
    const warnings: RunWarning[] = [];

    if (options.dryRun) {
      this.logger.info('DRY RUN: Would delete the following tags:');
      for (const decision of decisions) {
        this.logger.info(`  - ${decision.repository}:${decision.tag}`);
        outcomes.push({ decision, status: 'dry-run' });
      }
      return { outcomes, warnings };
    }

    for (const decision of decisions) {
      if (options.signal?.aborted) {
        throw new RunCancelledError(
          `Run cancelled after ${outcomes.length} of ${decisions.length} deletions`
        );
      }

      const subject = `${decision.repository}:${decision.tag}`;
      try {
        await this.provider.deleteTag(decision.repository, decision.tag);
        this.logger.info(`Deleted ${subject}`);
        outcomes.push({ decision, status: 'deleted' });
      } catch (error) {
        if (error instanceof NotFoundError) {
          this.logger.verboseInfo(`${subject} was already deleted`);
          outcomes.push({ decision, status: 'already-deleted' });
          continue;
        }

        const message = `Failed to delete ${subject}: ${error instanceof Error ? error.message : String(error)}`;
        this.logger.warning(message);
        outcomes.push({ decision, status: 'failed', error: message });
        warnings.push({ kind: 'deletion-failed', subject, message });
      }
    }

    return { outcomes, warnings };
  }
}
