const pad = (n: number): string => String(n).padStart(2, "0");

/**
 * Local-time stamp used in backup file names, e.g. `20240307-091502`
 */
export function backupStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
