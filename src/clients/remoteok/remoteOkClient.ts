/**
 * RemoteOkClient — client for the public RemoteOK feed
 *
 * No authentication. The feed is an array whose first element is an API
 * notice, so a usable response has at least two elements.
 */

import type { JobBoardClient } from "@/interfaces";
import type { HttpRequestFn, ListingRecord, Provider } from "@/types";
import type { RemoteOkFeed } from "@/types/clients/remoteok";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { fetchOrEmpty } from "@/clients/shared/fetchOrEmpty";
import {
  REMOTEOK_API_URL,
  REMOTEOK_METADATA_ITEMS,
  REMOTEOK_TIMEOUT_MS,
  REMOTEOK_USER_AGENT,
} from "@/constants/clients/remoteok";
import { isRemoteOkJob, mapRemoteOkJob } from "./mappers";
import * as logger from "@/logger";

export interface RemoteOkClientConfig {
  httpRequest?: HttpRequestFn;
}

export class RemoteOkClient implements JobBoardClient {
  readonly provider: Provider = "remoteok";

  private readonly httpRequest: HttpRequestFn;

  constructor(config?: RemoteOkClientConfig) {
    this.httpRequest = config?.httpRequest ?? defaultHttpRequest;
  }

  async fetchListings(): Promise<ListingRecord[]> {
    logger.info("Fetching listings from RemoteOK");

    const feed = await fetchOrEmpty<RemoteOkFeed>(this.provider, this.httpRequest, {
      method: "GET",
      url: REMOTEOK_API_URL,
      headers: { "User-Agent": REMOTEOK_USER_AGENT },
      timeoutMs: REMOTEOK_TIMEOUT_MS,
    });
    if (feed === null) {
      return [];
    }

    if (!Array.isArray(feed) || feed.length <= REMOTEOK_METADATA_ITEMS) {
      logger.warn("RemoteOK API returned unexpected data format", {
        isArray: Array.isArray(feed),
      });
      return [];
    }

    const items = feed.slice(REMOTEOK_METADATA_ITEMS);
    const listings = items.filter(isRemoteOkJob).map(mapRemoteOkJob);
    if (listings.length < items.length) {
      logger.debug("Dropped non-object RemoteOK items", {
        dropped: items.length - listings.length,
      });
    }

    logger.info("Fetched and transformed RemoteOK listings", { count: listings.length });
    return listings;
  }
}
