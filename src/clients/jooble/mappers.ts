/**
 * Jooble API payload mappers — convert Jooble jobs to ListingRecord
 *
 * Jooble has no structured salary: the leading number of the free-text
 * `salary` field is used for both ends of the range.
 */

import type { ListingRecord } from "@/types";
import type { JoobleJob } from "@/types/clients/jooble";
import { JOOBLE_SALARY_POLICY } from "@/constants/clients/jooble";
import {
  asText,
  extractLeadingSalary,
  isRecord,
  parseProviderDate,
} from "@/utils";

export function isJoobleJob(value: unknown): value is JoobleJob {
  return isRecord(value);
}

/**
 * Map one Jooble job to the common schema
 */
export function mapJoobleJob(raw: JoobleJob): ListingRecord {
  const salary = extractLeadingSalary(raw.salary, JOOBLE_SALARY_POLICY);

  return {
    providerId: asText(raw.id),
    datePosted: parseProviderDate(raw.updated),
    company: asText(raw.company),
    position: asText(raw.title),
    location: asText(raw.location),
    category: null,
    tags: asText(raw.snippet),
    salaryMin: salary,
    salaryMax: salary,
    url: asText(raw.link),
  };
}
