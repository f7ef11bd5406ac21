const API_TIMESTAMP = /^(\d{1,2})\/(\d{1,2})\/(\d{4}) (\d{1,2}):(\d{2}):(\d{2}) (AM|PM)$/i;

/**
 * Parses the `M/D/YYYY h:mm:ss AM` timestamps the stats API returns. They carry no zone and
 * are read as UTC. Returns `null` for empty or malformed input.
 */
export function parseApiTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const match = API_TIMESTAMP.exec(value.trim());
  if (!match) return null;

  const [, month, day, year, hour, minute, second, meridiem] = match;
  let hours = Number(hour) % 12;
  if (meridiem.toUpperCase() === "PM") hours += 12;

  return new Date(
    Date.UTC(Number(year), Number(month) - 1, Number(day), hours, Number(minute), Number(second))
  );
}

/** `yyyyMMddHHmmss` in UTC, as used in request signatures. */
export function formatSignatureTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function formatApiDate(date: Date): string {
  return formatSignatureTimestamp(date).slice(0, 8);
}
