function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Render an ISO timestamp as `YYYY-MM-DD HH:mm:ss` in UTC.
 * Unparseable input is returned unchanged.
 */
export function formatTimestamp(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return iso;

  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} `
    + `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}
