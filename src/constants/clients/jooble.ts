/**
 * Jooble client constants
 */

import type { SalaryPolicy } from "@/types";
import type { JoobleSearchRequest } from "@/types/clients/jooble";
import { SALARY_INT_MAX } from "@/constants/salary";

/**
 * Search endpoint; the API key is appended as the last path segment
 */
export const JOOBLE_API_BASE_URL = "https://jooble.org/api/";

export const JOOBLE_SEARCH_BODY: JoobleSearchRequest = {
  keywords: "data engineer, python developer, software engineer, IT",
  location: "United States, India",
};

export const JOOBLE_TIMEOUT_MS = 15_000;

export const JOOBLE_SALARY_POLICY: SalaryPolicy = {
  max: SALARY_INT_MAX,
  rounding: "trunc",
};
