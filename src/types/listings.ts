/**
 * Listing type definitions
 *
 * Provider-agnostic shapes shared by the client mappers, the identity
 * assigner and the listings repository.
 */

export type Provider = "adzuna" | "jooble" | "remoteok";

/**
 * One job listing mapped into the common schema
 *
 * `category` is only filled by Adzuna; `tags` only by Jooble and RemoteOK.
 */
export interface ListingRecord {
  providerId: string | null;
  /** ISO-8601 UTC timestamp */
  datePosted: string | null;
  company: string | null;
  position: string | null;
  location: string | null;
  category: string | null;
  tags: string | null;
  /** Non-negative integer, 0 when the provider gave no usable salary */
  salaryMin: number;
  salaryMax: number;
  url: string | null;
}

/**
 * Listing with its derived surrogate key
 */
export interface KeyedListing extends ListingRecord {
  uniqueJobId: string;
}

export type ListingField = keyof KeyedListing;

export type SqlColumnType = "TEXT" | "INTEGER";

export interface ListingColumn {
  name: string;
  field: ListingField;
  type: SqlColumnType;
}

/**
 * Destination table for one provider
 *
 * The first column is always the primary key (unique_job_id).
 */
export interface ListingTableSchema {
  name: string;
  columns: readonly ListingColumn[];
}

/**
 * Per-provider salary cleaning policy
 */
export interface SalaryPolicy {
  /** Inclusive upper clamp */
  max: number;
  /** "round" is half to even */
  rounding: "round" | "trunc";
}
