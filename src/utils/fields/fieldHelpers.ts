/**
 * Field extraction helpers for raw provider payloads
 *
 * Every helper accepts `unknown` and degrades to null instead of throwing,
 * so one malformed field never drops a record.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Text value of a scalar field; null for missing, empty and non-scalar values
 */
export function asText(value: unknown): string | null {
  if (typeof value === "string") {
    return value.length > 0 ? value : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === "bigint" || typeof value === "boolean") {
    return String(value);
  }
  return null;
}

/**
 * Read `key` from an object field, or use the field itself when it is a scalar
 *
 * Adzuna sends `{ display_name: "Acme" }` for company but older payloads
 * carry a bare string.
 */
export function pickText(value: unknown, key: string): string | null {
  return isRecord(value) ? asText(value[key]) : asText(value);
}

/**
 * Join the string elements of a list with ", "; null when nothing is left
 */
export function joinList(value: unknown): string | null {
  if (!Array.isArray(value)) {
    return null;
  }
  const parts = value
    .map((item) => asText(item))
    .filter((item): item is string => item !== null);
  return parts.length > 0 ? parts.join(", ") : null;
}
