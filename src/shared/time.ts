const pad = (n: number): string => String(n).padStart(2, "0");

/** Local time as YYYYMMDD_HHMMSS; the base form of every snapshot id. */
export function formatSnapshotStamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/** Local time as YYYY-MM-DD HH:MM:SS. */
export function formatDateTime(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
