/**
 * Adzuna client constants — endpoint, search parameters, cleaning policy
 */

import type { SalaryPolicy } from "@/types";
import { SALARY_BIGINT_MAX } from "@/constants/salary";

/**
 * Search endpoint (India, first page)
 */
export const ADZUNA_SEARCH_URL = "http://api.adzuna.com/v1/api/jobs/in/search/1";

export const ADZUNA_RESULTS_PER_PAGE = 50;

/**
 * Keyword search sent as `what`
 */
export const ADZUNA_KEYWORDS = "IT or Data or AI";

export const ADZUNA_TIMEOUT_MS = 15_000;

export const ADZUNA_SALARY_POLICY: SalaryPolicy = {
  max: SALARY_BIGINT_MAX,
  rounding: "round",
};
