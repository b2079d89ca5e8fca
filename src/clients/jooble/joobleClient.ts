/**
 * JoobleClient — API client for Jooble job search
 *
 * Jooble takes its API key as the last URL path segment and the search as
 * a POSTed JSON body.
 */

import type { JobBoardClient } from "@/interfaces";
import type {
  HttpRequestFn,
  JoobleCredentials,
  ListingRecord,
  Provider,
} from "@/types";
import type {
  JoobleSearchRequest,
  JoobleSearchResponse,
} from "@/types/clients/jooble";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { fetchOrEmpty } from "@/clients/shared/fetchOrEmpty";
import {
  JOOBLE_API_BASE_URL,
  JOOBLE_SEARCH_BODY,
  JOOBLE_TIMEOUT_MS,
} from "@/constants/clients/jooble";
import { isJoobleJob, mapJoobleJob } from "./mappers";
import * as logger from "@/logger";

export interface JoobleClientConfig {
  credentials: JoobleCredentials;
  httpRequest?: HttpRequestFn;
  /** Search body override; defaults to JOOBLE_SEARCH_BODY */
  search?: JoobleSearchRequest;
}

export class JoobleClient implements JobBoardClient {
  readonly provider: Provider = "jooble";

  private readonly apiKey: string;
  private readonly search: JoobleSearchRequest;
  private readonly httpRequest: HttpRequestFn;

  constructor(config: JoobleClientConfig) {
    this.apiKey = config.credentials.apiKey;
    this.search = config.search ?? JOOBLE_SEARCH_BODY;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
  }

  async fetchListings(): Promise<ListingRecord[]> {
    logger.info("Fetching listings from Jooble", { keywords: this.search.keywords });

    const response = await fetchOrEmpty<JoobleSearchResponse>(
      this.provider,
      this.httpRequest,
      {
        method: "POST",
        url: `${JOOBLE_API_BASE_URL}${encodeURIComponent(this.apiKey)}`,
        json: this.search,
        timeoutMs: JOOBLE_TIMEOUT_MS,
        redact: [this.apiKey],
      },
    );
    if (response === null) {
      return [];
    }

    const jobs: unknown = response.jobs;
    if (!Array.isArray(jobs) || jobs.length === 0) {
      logger.warn("Jooble API returned no jobs");
      return [];
    }

    const listings = jobs.filter(isJoobleJob).map(mapJoobleJob);
    if (listings.length < jobs.length) {
      logger.debug("Dropped non-object Jooble jobs", {
        dropped: jobs.length - listings.length,
      });
    }

    logger.info("Fetched and transformed Jooble listings", { count: listings.length });
    return listings;
  }
}
