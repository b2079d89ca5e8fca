/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./errors";
export * from "./repos/listingsRepo";
