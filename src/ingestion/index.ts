/**
 * Ingestion module barrel exports
 */

export {
  runListingPipeline,
  runAdzunaPipeline,
  runJooblePipeline,
  runRemoteOkPipeline,
} from "./pipelines";

export { runAllPipelines } from "./runAllPipelines";

export {
  ADZUNA_SOURCE,
  JOOBLE_SOURCE,
  REMOTEOK_SOURCE,
  LISTING_SOURCES,
  ALL_PROVIDERS,
  isProvider,
  parseProviderArgs,
} from "./sources";
