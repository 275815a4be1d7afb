export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * True when a tag is strictly older than the threshold.
 * Ages are compared in milliseconds: exactly thresholdDays old is not old enough.
 */
export function isOldEnough(createdAt: Date, now: Date, thresholdDays: number): boolean {
  if (!Number.isInteger(thresholdDays) || thresholdDays < 0) {
    throw new RangeError(`Retention threshold must be a non-negative whole number of days, got ${thresholdDays}`);
  }
  return now.getTime() - createdAt.getTime() > thresholdDays * MS_PER_DAY;
}

/**
 * Age in whole days, for reporting
 */
export function ageInDays(createdAt: Date, now: Date): number {
  return Math.floor((now.getTime() - createdAt.getTime()) / MS_PER_DAY);
}
