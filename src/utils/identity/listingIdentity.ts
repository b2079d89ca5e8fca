/**
 * Listing identity — deterministic surrogate key for upserts
 *
 * The key is the SHA-256 hex digest of `"{company}-{position}-{location}"`
 * (UTF-8). Missing parts render as the empty string. There is no case,
 * whitespace or unicode normalization: "Acme" and "Acme " are different
 * listings, and two distinct listings sharing all three fields share a key
 * (the later one wins on upsert).
 */

import { createHash } from "node:crypto";
import type { KeyedListing, ListingRecord } from "@/types";

/**
 * Compute the surrogate key for one (company, position, location) triple
 *
 * @returns 64-char lowercase hex string
 */
export function computeListingKey(
  company: string | null,
  position: string | null,
  location: string | null,
): string {
  const input = `${company ?? ""}-${position ?? ""}-${location ?? ""}`;
  return createHash("sha256").update(input, "utf8").digest("hex");
}

/**
 * Attach a surrogate key to every record, preserving order
 */
export function assignListingKeys(records: readonly ListingRecord[]): KeyedListing[] {
  return records.map((record) => ({
    ...record,
    uniqueJobId: computeListingKey(record.company, record.position, record.location),
  }));
}
