/**
 * UTC `YYYY-MM-DD HH:MM:SS` text, the timestamp form bound to SQL.
 */

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

export function toSqlTimestamp(date: Date): string {
  return (
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

export function toSqlTimestampOrNull(date: Date | null): string | null {
  return date ? toSqlTimestamp(date) : null;
}

/**
 * Parse a timestamp read back from either store: SQL text (taken as
 * UTC), ISO strings, or a driver-provided Date.
 */
export function parseSqlTimestamp(value: unknown): Date | null {
  if (value == null) return null;
  if (value instanceof Date) return value;
  if (typeof value !== "string" || value === "") return null;
  const iso = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}(\.\d+)?$/.test(value)
    ? `${value.replace(" ", "T")}Z`
    : value;
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? null : date;
}
