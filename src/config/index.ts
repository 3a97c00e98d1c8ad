export { loadAppConfig, ConfigValidationError } from "./appConfig";
export type { ConfigIssue, LoadAppConfigOptions } from "./appConfig";
