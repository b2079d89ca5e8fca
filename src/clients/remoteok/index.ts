export { RemoteOkClient } from "./remoteOkClient";
export type { RemoteOkClientConfig } from "./remoteOkClient";
export { mapRemoteOkJob, isRemoteOkJob } from "./mappers";
