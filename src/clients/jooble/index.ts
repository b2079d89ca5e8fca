export { JoobleClient } from "./joobleClient";
export type { JoobleClientConfig } from "./joobleClient";
export { mapJoobleJob, isJoobleJob } from "./mappers";
