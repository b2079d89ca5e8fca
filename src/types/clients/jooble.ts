/**
 * Jooble raw API response types
 */

/**
 * One element of the search response `jobs` array
 *
 * `salary` is free text ("$50,000 - $70,000", "from 40k", "").
 */
export type JoobleJob = {
  /** Signed 64-bit; bigint when beyond 2^53 */
  id?: number | bigint | string;
  title?: string;
  location?: string;
  snippet?: string;
  salary?: string;
  source?: string;
  type?: string;
  link?: string;
  company?: string;
  updated?: string;
};

/**
 * POST /api/{apiKey} request body
 */
export type JoobleSearchRequest = {
  keywords: string;
  location: string;
};

export type JoobleSearchResponse = {
  totalCount?: number;
  jobs?: JoobleJob[];
};
