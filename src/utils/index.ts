/**
 * Utils barrel exports
 */

export * from "./dates/dateKey";
export * from "./catalogValidation";
export * from "./dbErrors";
export * from "./concurrency";
