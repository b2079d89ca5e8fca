/**
 * RemoteOK raw API response types
 *
 * The public feed is a JSON array whose first element is a legal/metadata
 * notice; every following element is a job.
 */

export type RemoteOkJob = {
  id?: string | number | bigint;
  date?: string;
  company?: string;
  position?: string;
  location?: string;
  tags?: string[];
  salary_min?: number | string | null;
  salary_max?: number | string | null;
  url?: string;
};

export type RemoteOkFeed = unknown[];
