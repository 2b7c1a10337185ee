/**
 * slack-link-enricher — link summaries for Slack channels.
 * @module slack-link-enricher
 */

// Links
export * from "./links/index.js";

// Slack
export * from "./slack/index.js";

// Enrichment
export * from "./enrich/index.js";

// Bookmarks
export * from "./bookmarks/index.js";

// Worker
export {
    EnrichmentWorker,
    DEFAULT_MESSAGE_LIMIT,
    DEFAULT_POLLING_INTERVAL_MS,
    DEFAULT_POST_DELAY_MS,
} from "./worker.js";
export type { BatchResult, EnrichmentWorkerOptions, PassOptions, UrlsResolver } from "./worker.js";

// Utilities
export { Logger, LogLevel, createLogger, setGlobalLogLevel, parseLogLevel, describeError } from "./utils/logger.js";
export { loadConfig, loadAppConfig, loadEnvConfig, parseAppConfig, ConfigError } from "./utils/config.js";
export type { Config, AppConfig, EnvConfig } from "./utils/config.js";
export { sleep, withTimeout, isAbortError } from "./utils/sleep.js";
export type { SleepFunction } from "./utils/sleep.js";

export const VERSION = "0.1.0";
