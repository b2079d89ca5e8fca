/**
 * RemoteOK client constants
 */

import type { SalaryPolicy } from "@/types";
import { SALARY_INT_MAX } from "@/constants/salary";

export const REMOTEOK_API_URL = "https://remoteok.com/api";

export const REMOTEOK_TIMEOUT_MS = 10_000;

/**
 * Feed element 0 is the API notice, not a job
 */
export const REMOTEOK_METADATA_ITEMS = 1;

/**
 * RemoteOK rejects requests without a user agent
 */
export const REMOTEOK_USER_AGENT = "jobboard-etl/1.0";

export const REMOTEOK_SALARY_POLICY: SalaryPolicy = {
  max: SALARY_INT_MAX,
  rounding: "trunc",
};
