/**
 * Adzuna API payload mappers — convert Adzuna search results to ListingRecord
 */

import type { ListingRecord } from "@/types";
import type { AdzunaJob } from "@/types/clients/adzuna";
import { ADZUNA_SALARY_POLICY } from "@/constants/clients/adzuna";
import {
  asText,
  cleanSalary,
  isRecord,
  joinList,
  parseProviderDate,
  pickText,
} from "@/utils";

/**
 * Flatten Adzuna's location object: the `area` hierarchy joined with ", "
 * ("India, Karnataka, Bangalore"). A bare string is kept as is.
 */
function mapLocation(raw: unknown): string | null {
  if (isRecord(raw)) {
    return joinList(raw.area);
  }
  return asText(raw);
}

/**
 * Narrow one element of `results` to an object we can map
 */
export function isAdzunaJob(value: unknown): value is AdzunaJob {
  return isRecord(value);
}

/**
 * Map one Adzuna search result to the common schema
 */
export function mapAdzunaJob(raw: AdzunaJob): ListingRecord {
  return {
    providerId: asText(raw.id),
    datePosted: parseProviderDate(raw.created),
    company: pickText(raw.company, "display_name"),
    position: asText(raw.title),
    location: mapLocation(raw.location),
    category: pickText(raw.category, "label"),
    tags: null,
    salaryMin: cleanSalary(raw.salary_min, ADZUNA_SALARY_POLICY),
    salaryMax: cleanSalary(raw.salary_max, ADZUNA_SALARY_POLICY),
    url: asText(raw.redirect_url),
  };
}
