/**
 * Links — redirect resolution.
 *
 * Google News RSS items link to news.google.com/rss/articles/<id> instead of
 * the article itself. Those URLs are decoded to the publisher URL before the
 * agent sees them. Resolution is fail-open: any decoder problem leaves the
 * original URL in place.
 */

import { createLogger, describeError, type Logger } from "../utils/logger.js";
import { withTimeout } from "../utils/sleep.js";
import type { ExtractedUrls, ResolvedUrls } from "./extract.js";

const GOOGLE_NEWS_HOST = "news.google.com";
const GOOGLE_NEWS_ARTICLE_PATH = "/rss/articles/";

export const DEFAULT_DECODE_TIMEOUT_MS = 10_000;

// ── Types ──────────────────────────────────────────────────────

export interface DecodeResult {
    status: boolean;
    decodedUrl?: string;
    message?: string;
}

/** Turns a redirector URL into its destination. */
export interface RedirectDecoder {
    decode(url: string, signal: AbortSignal): Promise<DecodeResult>;
}

/**
 * What happened to one URL. Every variant carries the URL to use downstream;
 * `degraded` is a normal input, not an error.
 */
export type ResolveOutcome =
    | { kind: "resolved"; url: string; original: string }
    | { kind: "passthrough"; url: string }
    | { kind: "degraded"; url: string; reason: string };

export interface UrlResolverOptions {
    decoder: RedirectDecoder;
    timeoutMs?: number;
    logger?: Logger;
}

// ── Eligibility ────────────────────────────────────────────────

/**
 * True for news.google.com/rss/articles/... URLs. /topics/, /topstories and
 * the home page cannot be decoded and are not eligible.
 */
export function isGoogleNewsUrl(url: string): boolean {
    if (!url) return false;
    try {
        const parsed = new URL(url);
        return parsed.hostname === GOOGLE_NEWS_HOST && parsed.pathname.includes(GOOGLE_NEWS_ARTICLE_PATH);
    } catch {
        return false;
    }
}

export function isHttpUrl(value: string | undefined): value is string {
    if (!value) return false;
    try {
        const parsed = new URL(value);
        return parsed.protocol === "http:" || parsed.protocol === "https:";
    } catch {
        return false;
    }
}

// ── Resolver ───────────────────────────────────────────────────

export class UrlResolver {
    private readonly decoder: RedirectDecoder;
    private readonly timeoutMs: number;
    private readonly log: Logger;

    constructor(opts: UrlResolverOptions) {
        this.decoder = opts.decoder;
        this.timeoutMs = opts.timeoutMs ?? DEFAULT_DECODE_TIMEOUT_MS;
        this.log = opts.logger ?? createLogger("UrlResolver");
    }

    async resolve(url: string): Promise<ResolveOutcome> {
        if (!isGoogleNewsUrl(url)) {
            return { kind: "passthrough", url };
        }

        let result: DecodeResult;
        try {
            result = await withTimeout((signal) => this.decoder.decode(url, signal), this.timeoutMs);
        } catch (err) {
            return this.degrade(url, describeError(err));
        }

        if (!result.status) {
            return this.degrade(url, result.message ?? "decoder reported failure");
        }
        if (!isHttpUrl(result.decodedUrl)) {
            return this.degrade(url, `decoder returned an invalid URL: ${result.decodedUrl ?? "(none)"}`);
        }

        this.log.debug(`Resolved ${url} -> ${result.decodedUrl}`);
        return { kind: "resolved", url: result.decodedUrl, original: url };
    }

    /**
     * Resolve the main URL, then each supplementary URL in order, and drop
     * what became a duplicate. Sequential so decoder calls are deterministic.
     */
    async resolveUrls(extracted: ExtractedUrls): Promise<ResolvedUrls> {
        if (extracted.mainUrl === null) return extracted;

        const mainUrl = (await this.resolve(extracted.mainUrl)).url;

        const resolved: string[] = [];
        for (const url of extracted.supplementaryUrls) {
            resolved.push((await this.resolve(url)).url);
        }

        const seen = new Set<string>([mainUrl]);
        const supplementaryUrls: string[] = [];
        for (const url of resolved) {
            if (seen.has(url)) continue;
            seen.add(url);
            supplementaryUrls.push(url);
        }

        return { mainUrl, supplementaryUrls };
    }

    private degrade(url: string, reason: string): ResolveOutcome {
        this.log.warn(`Could not resolve ${url}, keeping the original URL (${reason})`);
        return { kind: "degraded", url, reason };
    }
}
