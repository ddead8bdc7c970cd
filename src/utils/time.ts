function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS` in local time.
 */
export function formatTimestamp(date: Date = new Date()): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
