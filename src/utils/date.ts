const ISO_DATETIME =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?))?([+-]\d{2}:\d{2})?$/;

/**
 * Parses ISO-8601 text into a Date. A trailing "Z" is read as "+00:00" and
 * text without an offset is taken as UTC. Anything else, including days
 * missing from the calendar, yields null.
 */
export function parseIsoDate(raw: unknown): Date | null {
  if (typeof raw !== 'string') return null;

  let text = raw.trim();
  if (text.endsWith('Z') || text.endsWith('z')) text = `${text.slice(0, -1)}+00:00`;

  const match = ISO_DATETIME.exec(text);
  if (!match) return null;

  const [, date, time, offset] = match;
  // Date rolls impossible days forward ("02-30" becomes "03-02")
  const day = new Date(`${date}T00:00:00Z`);
  if (Number.isNaN(day.getTime()) || day.toISOString().slice(0, 10) !== date) return null;

  const parsed = new Date(`${date}T${time ?? '00:00:00'}${offset ?? '+00:00'}`);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/** Serializes an optional date for JSON documents. */
export function toIsoString(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}
