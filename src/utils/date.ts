const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function toDate(iso: string): Date | null {
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** `Jan 05` style, in UTC. */
export function formatShortDate(iso: string): string {
  const date = toDate(iso);
  if (!date) return iso;
  return `${MONTHS[date.getUTCMonth()] ?? ''} ${pad(date.getUTCDate())}`;
}

/** `2024-01-05 14:03`, in UTC. */
export function formatDateTime(iso: string): string {
  const date = toDate(iso);
  if (!date) return iso;
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`
  );
}
