/**
 * Formats a date as `YYYY-MM-DD HH:mm:ss` in UTC.
 */
export function formatDateTime(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

/**
 * Formats a date as `YYYYMMDD_HHMMSS` in UTC, for file names.
 */
export function formatFileStamp(date: Date): string {
  return formatDateTime(date).replace(/-/g, '').replace(/:/g, '').replace(' ', '_');
}

/**
 * Reformats an ISO timestamp as `YYYY-MM-DD HH:mm:ss`.
 * Unparseable input is returned unchanged.
 */
export function formatIsoTimestamp(iso: string): string {
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? iso : formatDateTime(date);
}
