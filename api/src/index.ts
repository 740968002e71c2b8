/**
 * Search repository package entry point.
 */

export { createRepositoryRouter } from "./search";
export { EnvironmentConfig, loadEnvironment } from "./services/environment";
export type { Environment } from "./services/environment";
export { createLogger } from "./services/logger";
export type { LogAnnotations, ServiceLogger } from "./services/logger";
export * from "./services/search";
