/**
 * JobBoardClient interface — provider-agnostic contract for listing sources
 *
 * Every job-board provider (Adzuna, Jooble, RemoteOK) implements this
 * interface so the generic pipeline can drive any of them.
 */

import type { ListingRecord, Provider } from "@/types";

export interface JobBoardClient {
  /**
   * Provider identifier
   */
  readonly provider: Provider;

  /**
   * Fetch the provider's listings and map them into the common schema
   *
   * Issues exactly one request. Transport failures, non-2xx statuses,
   * timeouts and empty or malformed responses resolve to an empty array;
   * this method does not reject for those.
   */
  fetchListings(): Promise<ListingRecord[]>;
}
