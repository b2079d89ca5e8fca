export * from "./logger";
export * from "./config";
export * from "./db";
export * from "./listings";
export * from "./pipeline";
export * from "./clients/http";
// Provider raw payload types are intentionally NOT exported from the global barrel.
// Import directly from "@/types/clients/<provider>" within src/clients/<provider>/ only.
