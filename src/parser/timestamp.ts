const TIMESTAMP_RX = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.\d+)?Z?$/;

/**
 * Parse a log timestamp `YYYY-MM-DD HH:MM:SS[.fff]` as UTC with second precision.
 * Returns null for malformed or calendar-invalid values like `2024-02-30 00:00:00`
 */
export function parseLogTimestamp(value: string): Date | null {
  const match = TIMESTAMP_RX.exec(value.trim());
  if (match === null) return null;

  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));

  // Date.UTC rolls over out of range fields, 2024-02-30 becomes 2024-03-01
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return null;
  }

  return date;
}
