/**
 * Links — public API.
 */

export { extractUrls, findUrls } from "./extract.js";
export type { ExtractedUrls, ResolvedUrls } from "./extract.js";
export { UrlResolver, isGoogleNewsUrl, isHttpUrl, DEFAULT_DECODE_TIMEOUT_MS } from "./resolve.js";
export type { DecodeResult, RedirectDecoder, ResolveOutcome, UrlResolverOptions } from "./resolve.js";
export { GoogleNewsDecoder } from "./google-news.js";
export { FetchUrlStatusChecker, PERMANENT_FAILURE_STATUSES, isPermanentFailure } from "./status.js";
export type { UrlStatusChecker } from "./status.js";
