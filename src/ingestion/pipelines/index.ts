export { runListingPipeline } from "./listingPipeline";
export { runAdzunaPipeline } from "./adzuna";
export { runJooblePipeline } from "./jooble";
export { runRemoteOkPipeline } from "./remoteok";
