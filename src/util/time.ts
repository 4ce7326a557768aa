/**
 * Render a time difference in human readable form
 */
export function prettyTimeDiffSec(secDiff: number): string {
  const minDiff = secDiff / 60;
  const hourDiff = minDiff / 60;
  const daysDiff = hourDiff / 24;

  if (daysDiff > 1) return `${+daysDiff.toPrecision(2)} days`;
  if (hourDiff > 1) return `${+hourDiff.toPrecision(2)} hours`;
  if (minDiff > 1) return `${+minDiff.toPrecision(2)} minutes`;
  return `${+secDiff.toPrecision(2)} seconds`;
}

/**
 * Format a date as `YYYY-MM-DD HH:mm` in UTC. Dates out of the representable range render as `never`
 */
export function formatUtcMinutes(date: Date): string {
  if (Number.isNaN(date.getTime())) return "never";
  const iso = date.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)}`;
}
