/**
 * Utils barrel exports
 */

export * from "./identity/listingIdentity";
export * from "./fields/fieldHelpers";
export * from "./salary";
export * from "./dates";
export * from "./dbErrors";
