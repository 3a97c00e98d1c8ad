/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./verify";
export * from "./repos/healthRecordsRepo";
