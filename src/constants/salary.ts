/**
 * Salary cleaning bounds
 */

/**
 * Upper clamp for BIGINT salary columns
 *
 * A signed 64-bit maximum is not representable as a JS number; the largest
 * exact integer is the effective bound.
 */
export const SALARY_BIGINT_MAX = Number.MAX_SAFE_INTEGER;

/**
 * Upper clamp for INT salary columns (signed 32-bit)
 */
export const SALARY_INT_MAX = 2_147_483_647;

/**
 * Leading numeric token in free-text salary strings ("$50,000 - $70,000" → "50,000")
 */
export const SALARY_TOKEN_PATTERN = /(\d[\d,.]*)/;

/**
 * Characters stripped from an extracted salary token before parsing
 */
export const SALARY_TOKEN_STRIP_PATTERN = /[^\d.]/g;
