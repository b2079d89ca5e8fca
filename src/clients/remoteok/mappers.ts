/**
 * RemoteOK feed mappers — convert RemoteOK jobs to ListingRecord
 */

import type { ListingRecord } from "@/types";
import type { RemoteOkJob } from "@/types/clients/remoteok";
import { REMOTEOK_SALARY_POLICY } from "@/constants/clients/remoteok";
import {
  asText,
  cleanSalary,
  isRecord,
  joinList,
  parseProviderDate,
} from "@/utils";

export function isRemoteOkJob(value: unknown): value is RemoteOkJob {
  return isRecord(value);
}

/**
 * RemoteOK sends 0 for "not disclosed"; any falsy value counts as absent
 */
function mapSalary(value: unknown): number {
  return value ? cleanSalary(value, REMOTEOK_SALARY_POLICY) : 0;
}

/**
 * Map one RemoteOK job to the common schema
 */
export function mapRemoteOkJob(raw: RemoteOkJob): ListingRecord {
  return {
    providerId: asText(raw.id),
    datePosted: parseProviderDate(raw.date),
    company: asText(raw.company),
    position: asText(raw.position),
    location: asText(raw.location),
    category: null,
    tags: joinList(raw.tags),
    salaryMin: mapSalary(raw.salary_min),
    salaryMax: mapSalary(raw.salary_max),
    url: asText(raw.url),
  };
}
