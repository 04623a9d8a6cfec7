function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/**
 * Format a bunyan `time` field: `YYYY-MM-DDTHH:mm:ss.SSSZ`.
 *
 * The components are the host's local wall-clock time; the trailing `Z` is a
 * literal and no conversion to UTC happens. Existing log consumers read the
 * stamps this way, so on a host not running in UTC they are off by the local offset.
 */
export function formatBunyanTime(date: Date): string {
  const year = pad(date.getFullYear(), 4);
  const month = pad(date.getMonth() + 1, 2);
  const day = pad(date.getDate(), 2);
  const hours = pad(date.getHours(), 2);
  const minutes = pad(date.getMinutes(), 2);
  const seconds = pad(date.getSeconds(), 2);
  const millis = pad(date.getMilliseconds(), 3);
  return `${year}-${month}-${day}T${hours}:${minutes}:${seconds}.${millis}Z`;
}
