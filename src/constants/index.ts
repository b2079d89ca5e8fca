/**
 * Constants barrel exports
 */

export * from "./logger";
export * from "./config";
export * from "./salary";
export * from "./tables";
