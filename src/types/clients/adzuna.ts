/**
 * Adzuna raw API response types — minimal shapes for mapping
 *
 * Only the fields the mapper reads. Values are not trusted at runtime:
 * every field goes through the field helpers before it reaches a record.
 */

type AdzunaCompany = {
  display_name?: string;
};

type AdzunaLocation = {
  display_name?: string;
  area?: string[];
};

type AdzunaCategory = {
  label?: string;
  tag?: string;
};

/**
 * One element of the search response `results` array
 */
export type AdzunaJob = {
  id?: string;
  created?: string;
  title?: string;
  company?: AdzunaCompany | string;
  location?: AdzunaLocation | string;
  category?: AdzunaCategory | string;
  salary_min?: number | string;
  salary_max?: number | string;
  redirect_url?: string;
};

/**
 * GET /v1/api/jobs/{country}/search/{page}
 */
export type AdzunaSearchResponse = {
  count?: number;
  results?: AdzunaJob[];
};
