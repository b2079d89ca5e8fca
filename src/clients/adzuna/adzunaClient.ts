/**
 * AdzunaClient — API client for Adzuna job search
 *
 * Implements the JobBoardClient interface for the Adzuna provider.
 * Authentication is by app_id/app_key in the query string.
 */

import type { JobBoardClient } from "@/interfaces";
import type {
  AdzunaCredentials,
  HttpRequestFn,
  ListingRecord,
  Provider,
} from "@/types";
import type { AdzunaSearchResponse } from "@/types/clients/adzuna";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { fetchOrEmpty } from "@/clients/shared/fetchOrEmpty";
import {
  ADZUNA_KEYWORDS,
  ADZUNA_RESULTS_PER_PAGE,
  ADZUNA_SEARCH_URL,
  ADZUNA_TIMEOUT_MS,
} from "@/constants/clients/adzuna";
import { isAdzunaJob, mapAdzunaJob } from "./mappers";
import * as logger from "@/logger";

export interface AdzunaClientConfig {
  credentials: AdzunaCredentials;

  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;
}

export class AdzunaClient implements JobBoardClient {
  readonly provider: Provider = "adzuna";

  private readonly credentials: AdzunaCredentials;
  private readonly httpRequest: HttpRequestFn;

  constructor(config: AdzunaClientConfig) {
    this.credentials = config.credentials;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
  }

  async fetchListings(): Promise<ListingRecord[]> {
    logger.info("Fetching listings from Adzuna");

    const response = await fetchOrEmpty<AdzunaSearchResponse>(
      this.provider,
      this.httpRequest,
      {
        method: "GET",
        url: ADZUNA_SEARCH_URL,
        query: {
          app_id: this.credentials.appId,
          app_key: this.credentials.appKey,
          results_per_page: ADZUNA_RESULTS_PER_PAGE,
          what: ADZUNA_KEYWORDS,
          "content-type": "application/json",
        },
        timeoutMs: ADZUNA_TIMEOUT_MS,
        redact: [this.credentials.appId, this.credentials.appKey],
      },
    );
    if (response === null) {
      return [];
    }

    const results: unknown = response.results;
    if (!Array.isArray(results) || results.length === 0) {
      logger.warn("Adzuna API returned no jobs");
      return [];
    }

    const jobs = results.filter(isAdzunaJob);
    if (jobs.length < results.length) {
      logger.debug("Dropped non-object Adzuna results", {
        dropped: results.length - jobs.length,
      });
    }

    const listings = jobs.map(mapAdzunaJob);
    logger.info("Fetched and transformed Adzuna listings", { count: listings.length });
    return listings;
  }
}
