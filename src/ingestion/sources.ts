/**
 * Provider adapters — what the generic pipeline needs to know per provider
 */

import type { ListingSource, Provider } from "@/types";
import { AdzunaClient } from "@/clients/adzuna";
import { JoobleClient } from "@/clients/jooble";
import { RemoteOkClient } from "@/clients/remoteok";
import { requireAdzunaCredentials, requireJoobleCredentials } from "@/config";
import { ADZUNA_TABLE, JOOBLE_TABLE, REMOTEOK_TABLE } from "@/constants";
import * as logger from "@/logger";

export const ADZUNA_SOURCE: ListingSource = {
  provider: "adzuna",
  table: ADZUNA_TABLE,
  createClient: (settings, httpRequest) =>
    new AdzunaClient({ credentials: requireAdzunaCredentials(settings), httpRequest }),
};

export const JOOBLE_SOURCE: ListingSource = {
  provider: "jooble",
  table: JOOBLE_TABLE,
  createClient: (settings, httpRequest) =>
    new JoobleClient({ credentials: requireJoobleCredentials(settings), httpRequest }),
};

export const REMOTEOK_SOURCE: ListingSource = {
  provider: "remoteok",
  table: REMOTEOK_TABLE,
  createClient: (_settings, httpRequest) => new RemoteOkClient({ httpRequest }),
};

export const LISTING_SOURCES: Record<Provider, ListingSource> = {
  adzuna: ADZUNA_SOURCE,
  jooble: JOOBLE_SOURCE,
  remoteok: REMOTEOK_SOURCE,
};

/**
 * Providers in the order a full run visits them
 */
export const ALL_PROVIDERS: readonly Provider[] = ["adzuna", "jooble", "remoteok"];

export function isProvider(value: string): value is Provider {
  return Object.prototype.hasOwnProperty.call(LISTING_SOURCES, value);
}

/**
 * Provider names from CLI arguments
 *
 * No arguments selects every provider (undefined). Unknown names are
 * reported and ignored, so a list of only unknown names selects none.
 */
export function parseProviderArgs(args: readonly string[]): Provider[] | undefined {
  if (args.length === 0) {
    return undefined;
  }

  const providers: Provider[] = [];
  for (const arg of args) {
    const name = arg.trim().toLowerCase();
    if (isProvider(name)) {
      if (!providers.includes(name)) {
        providers.push(name);
      }
    } else {
      logger.warn("Unknown provider ignored", {
        provider: arg,
        validProviders: [...ALL_PROVIDERS],
      });
    }
  }
  return providers;
}
