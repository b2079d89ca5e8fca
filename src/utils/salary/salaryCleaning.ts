/**
 * Salary cleaning — coerce provider salary values to bounded non-negative integers
 *
 * Missing, unparseable and negative values all become 0; absence of a
 * salary is stored as 0, never NULL.
 */

import type { SalaryPolicy } from "@/types";
import {
  SALARY_TOKEN_PATTERN,
  SALARY_TOKEN_STRIP_PATTERN,
} from "@/constants/salary";

/**
 * Numeric value of a salary field, NaN when it has none
 *
 * Accepts numbers, bigints and plain numeric strings ("52000", " 52000.5 ");
 * formatted text such as "50,000" is not numeric here.
 */
function toNumeric(value: unknown): number {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (typeof value === "string" && value.trim().length > 0) {
    return Number(value.trim());
  }
  return Number.NaN;
}

/**
 * Round to the nearest integer, exact halves to the even neighbour
 * (850000.5 → 850000, 2.5 → 2, 3.5 → 4)
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) {
    return floor + 1;
  }
  if (diff < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Apply the policy's rounding and clamp to [0, policy.max]
 */
export function clampSalary(value: number, policy: SalaryPolicy): number {
  if (!Number.isFinite(value)) {
    // ±Infinity survives toNumeric("Infinity"); only +∞ maps to the bound
    return value === Number.POSITIVE_INFINITY ? policy.max : 0;
  }
  const whole = policy.rounding === "round" ? roundHalfEven(value) : Math.trunc(value);
  return Math.min(Math.max(whole, 0), policy.max);
}

/**
 * Clean a structured salary field (Adzuna, RemoteOK)
 */
export function cleanSalary(value: unknown, policy: SalaryPolicy): number {
  const numeric = toNumeric(value);
  if (Number.isNaN(numeric)) {
    return 0;
  }
  return clampSalary(numeric, policy);
}

/**
 * Clean a free-text salary (Jooble): take the leading numeric token,
 * drop separators, parse.
 *
 * "$50,000 - $70,000" → 50000, "up to 1.5k" → 1, "" → 0.
 * A token left with more than one "." ("1.234.567") is unparseable → 0.
 */
export function extractLeadingSalary(value: unknown, policy: SalaryPolicy): number {
  if (value === null || value === undefined) {
    return 0;
  }
  const match = SALARY_TOKEN_PATTERN.exec(String(value));
  if (!match) {
    return 0;
  }
  const digits = match[1].replace(SALARY_TOKEN_STRIP_PATTERN, "");
  return cleanSalary(digits, policy);
}
