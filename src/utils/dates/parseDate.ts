/**
 * Provider date parsing
 */

/**
 * ISO-like date-time: date, optional time, optional fraction, optional zone
 */
const ISO_LIKE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}:\d{2})(:\d{2})?(\.\d+)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

/**
 * True when year-month-day names a real day (no 2024-02-30, no 2024-04-31)
 */
function isCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * Rewrite an ISO-like match into a form Date parses the same way on every
 * host: fraction cut to milliseconds, missing zone read as UTC.
 */
function canonicalIso(match: RegExpExecArray): string {
  const [, year, month, day, hm, seconds, fraction, zone] = match;
  const date = `${year}-${month}-${day}`;
  if (!hm) {
    return `${date}T00:00:00Z`;
  }
  const ms = fraction ? fraction.slice(0, 4).padEnd(4, "0") : "";
  let offset = zone ? zone.toUpperCase() : "Z";
  if (offset !== "Z" && !offset.includes(":")) {
    offset = `${offset.slice(0, 3)}:${offset.slice(3)}`;
  }
  return `${date}T${hm}${seconds ?? ":00"}${ms}${offset}`;
}

function toIsoOrNull(date: Date): string | null {
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

/**
 * Parse a provider date into an ISO-8601 UTC string
 *
 * Returns null for missing or unparseable values and for days that do not
 * exist; never throws. Other textual formats fall back to Date parsing.
 */
export function parseProviderDate(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    // Epoch seconds
    return toIsoOrNull(new Date(value * 1000));
  }
  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const match = ISO_LIKE.exec(trimmed);
  if (!match) {
    return toIsoOrNull(new Date(trimmed));
  }
  if (!isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))) {
    return null;
  }
  return toIsoOrNull(new Date(canonicalIso(match)));
}
