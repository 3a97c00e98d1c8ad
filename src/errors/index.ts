/**
 * Error classes barrel exports
 */

export * from "./fetchErrors";
