export { parseProviderDate } from "./parseDate";
