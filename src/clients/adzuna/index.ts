export { AdzunaClient } from "./adzunaClient";
export type { AdzunaClientConfig } from "./adzunaClient";
export { mapAdzunaJob, isAdzunaJob } from "./mappers";
