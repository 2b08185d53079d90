const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Local wall-clock time as `YYYY-MM-DD HH:mm:ss.SSS`
 */
export function formatTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
    `.${pad(date.getMilliseconds(), 3)}`
  );
}
