import {
  DeletionDecision,
  DeletionOutcome,
  DeletionStatus,
  RetentionVerdict,
  RunSummary,
  RunWarning,
} from '../types';

export type RetainedCounts = RunSummary['retained'];

export function emptyRetainedCounts(): RetainedCounts {
  return {
    'inventory-incomplete': 0,
    'repository-not-in-use': 0,
    'tag-in-use': 0,
    'too-recent': 0,
  };
}

export function countVerdict(counts: RetainedCounts, verdict: RetentionVerdict): void {
  if (verdict !== 'delete') {
    counts[verdict]++;
  }
}

export interface RunSummaryInput {
  dryRun: boolean;
  registryTagCount: number;
  decisions: DeletionDecision[];
  outcomes: DeletionOutcome[];
  retained: RetainedCounts;
  unavailableClusters: string[];
  warnings: RunWarning[];
}

/**
 * Registry tags left out of reconciliation because their creation time could not be read
 */
export function countUnreadableTags(summary: RunSummary): number {
  return summary.warnings.filter((warning) => warning.kind === 'unparsable-tag').length;
}

function subjectsWithStatus(outcomes: DeletionOutcome[], status: DeletionStatus): string[] {
  return outcomes
    .filter((outcome) => outcome.status === status)
    .map((outcome) => `${outcome.decision.repository}:${outcome.decision.tag}`);
}

export function buildRunSummary(input: RunSummaryInput): RunSummary {
  const failed = subjectsWithStatus(input.outcomes, 'failed');

  let status: RunSummary['status'] = 'success';
  if (input.unavailableClusters.length > 0) {
    status = 'degraded';
  } else if (failed.length > 0) {
    status = 'completed-with-errors';
  }

  return {
    status,
    dryRun: input.dryRun,
    registryTagCount: input.registryTagCount,
    decisions: input.decisions,
    outcomes: input.outcomes,
    deleted: subjectsWithStatus(input.outcomes, 'deleted'),
    alreadyDeleted: subjectsWithStatus(input.outcomes, 'already-deleted'),
    failed,
    retained: input.retained,
    unavailableClusters: input.unavailableClusters,
    warnings: input.warnings,
  };
}

/**
 * Human readable summary lines; deletions, errors and degradation are reported separately
 */
export function formatSummary(summary: RunSummary): string[] {
  const lines = [`${summary.decisions.length} of ${summary.registryTagCount} tags approved for deletion`];

  if (summary.dryRun) {
    lines.push(`DRY RUN: ${summary.decisions.length} tags would be deleted`);
  } else {
    const alreadyGone = summary.alreadyDeleted.length;
    lines.push(
      `${summary.deleted.length} tags deleted` + (alreadyGone > 0 ? ` (${alreadyGone} already deleted)` : '')
    );
  }

  lines.push(`${summary.failed.length} tags skipped due to errors`);

  const unreadable = countUnreadableTags(summary);
  if (unreadable > 0) {
    lines.push(`${unreadable} tags skipped: unreadable timestamps`);
  }

  const kept = Object.entries(summary.retained)
    .filter(([, count]) => count > 0)
    .map(([verdict, count]) => `${count} ${verdict}`);
  if (kept.length > 0) {
    lines.push(`Kept: ${kept.join(', ')}`);
  }

  for (const cluster of summary.unavailableClusters) {
    lines.push(`run degraded: cluster ${cluster} unreachable`);
  }

  return lines;
}

/**
 * Counts for the action's summary output
 */
export function summaryCounts(summary: RunSummary): Record<string, unknown> {
  return {
    status: summary.status,
    dryRun: summary.dryRun,
    registryTags: summary.registryTagCount,
    decisions: summary.decisions.length,
    deleted: summary.deleted.length,
    alreadyDeleted: summary.alreadyDeleted.length,
    failed: summary.failed.length,
    unreadableTags: countUnreadableTags(summary),
    retained: summary.retained,
    unavailableClusters: summary.unavailableClusters,
    warnings: summary.warnings.length,
  };
}
