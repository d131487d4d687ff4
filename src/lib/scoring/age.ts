const DAY_MS = 86_400_000;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Whole days between `publishedAt` and `now`, floored. Null unless the timestamp
 * is an ISO-8601 date or date-time; callers score that as zero.
 */
export function ageInDays(publishedAt: string, now: Date): number | null {
  if (!ISO_DATE.test(publishedAt)) return null;
  const timestamp = Date.parse(publishedAt);
  if (Number.isNaN(timestamp)) return null;
  return Math.floor((now.getTime() - timestamp) / DAY_MS);
}
