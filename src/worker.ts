/**
 * Enrichment worker — one pass over unreplied channel messages, or a polling
 * loop of passes.
 *
 * Per message: extract URLs → resolve redirects → [status check] →
 * [bookmark lookup] → agent → render → three thread replies.
 * A failure ends only the current message; an abort ends everything.
 */

import type { BookmarkClient } from "./bookmarks/client.js";
import type { BookmarkEntry } from "./bookmarks/models.js";
import type { AgentQuery } from "./enrich/agent.js";
import { renderEnrichResult, type EnrichResult } from "./enrich/render.js";
import { fetchAndSummarize } from "./enrich/summarizer.js";
import { extractUrls, type ExtractedUrls, type ResolvedUrls } from "./links/extract.js";
import { isPermanentFailure, type UrlStatusChecker } from "./links/status.js";
import type { ChannelClient, ChannelMessage } from "./slack/client.js";
import { createLogger, describeError, type Logger } from "./utils/logger.js";
import { sleep as defaultSleep, throwIfAborted, type SleepFunction } from "./utils/sleep.js";

export const DEFAULT_MESSAGE_LIMIT = 10;
export const DEFAULT_POLLING_INTERVAL_MS = 600_000;
/** Pause between the three replies of one message. */
export const DEFAULT_POST_DELAY_MS = 1_000;

// ── Types ──────────────────────────────────────────────────────

export interface BatchResult {
    readonly processedCount: number;
    readonly successCount: number;
    readonly errorCount: number;
    readonly skippedCount: number;
    readonly timedOut: boolean;
    readonly remainingCount: number;
}

export interface PassOptions {
    /** Budget for the pass, checked before each message. */
    timeoutMs?: number;
    signal?: AbortSignal;
}

/** The part of UrlResolver the worker uses. */
export interface UrlsResolver {
    resolveUrls(extracted: ExtractedUrls): Promise<ResolvedUrls>;
}

export interface EnrichmentWorkerOptions {
    channelClient: ChannelClient;
    channelId: string;
    agentQuery: AgentQuery;
    resolver: UrlsResolver;
    messageLimit?: number;
    bookmarkClient?: BookmarkClient;
    urlStatusChecker?: UrlStatusChecker;
    pollingIntervalMs?: number;
    postDelayMs?: number;
    now?: () => number;
    sleep?: SleepFunction;
    logger?: Logger;
}

type ItemOutcome = "success" | "skipped";

// ── Worker ─────────────────────────────────────────────────────

export class EnrichmentWorker {
    private readonly channelClient: ChannelClient;
    private readonly channelId: string;
    private readonly agentQuery: AgentQuery;
    private readonly resolver: UrlsResolver;
    private readonly messageLimit: number;
    private readonly bookmarkClient?: BookmarkClient;
    private readonly urlStatusChecker?: UrlStatusChecker;
    private readonly pollingIntervalMs: number;
    private readonly postDelayMs: number;
    private readonly now: () => number;
    private readonly sleep: SleepFunction;
    private readonly log: Logger;

    constructor(opts: EnrichmentWorkerOptions) {
        this.channelClient = opts.channelClient;
        this.channelId = opts.channelId;
        this.agentQuery = opts.agentQuery;
        this.resolver = opts.resolver;
        this.messageLimit = opts.messageLimit ?? DEFAULT_MESSAGE_LIMIT;
        this.bookmarkClient = opts.bookmarkClient;
        this.urlStatusChecker = opts.urlStatusChecker;
        this.pollingIntervalMs = opts.pollingIntervalMs ?? DEFAULT_POLLING_INTERVAL_MS;
        this.postDelayMs = opts.postDelayMs ?? DEFAULT_POST_DELAY_MS;
        this.now = opts.now ?? Date.now;
        this.sleep = opts.sleep ?? defaultSleep;
        this.log = opts.logger ?? createLogger("Worker");
    }

    /**
     * Process the unreplied messages once. The budget is only checked between
     * messages, so a pass can overrun it by one message.
     */
    async enrichAndReplyPendingMessages(opts: PassOptions = {}): Promise<BatchResult> {
        const { timeoutMs, signal } = opts;

        const messages = await this.channelClient.fetchUnrepliedMessages(this.channelId, this.messageLimit);
        this.log.info(`${messages.length} unreplied message(s) in ${this.channelId}`);
        // The history fetch does not count against the budget
        const startedAt = this.now();

        let processedCount = 0;
        let successCount = 0;
        let errorCount = 0;
        let skippedCount = 0;
        let timedOut = false;

        for (const [i, message] of messages.entries()) {
            throwIfAborted(signal);

            if (timeoutMs !== undefined && this.now() - startedAt >= timeoutMs) {
                timedOut = true;
                processedCount = i;
                this.log.warn(`Pass budget of ${timeoutMs}ms used up; ${messages.length - i} message(s) left`);
                break;
            }
            processedCount = i + 1;

            try {
                const outcome = await this.processMessage(message, signal);
                if (outcome === "success") successCount++;
                else skippedCount++;
            } catch (err) {
                if (signal?.aborted) throw err;
                errorCount++;
                this.log.error(`Failed to enrich message ${message.ts}: ${describeError(err)}`);
            }
        }

        const result: BatchResult = Object.freeze({
            processedCount,
            successCount,
            errorCount,
            skippedCount,
            timedOut,
            remainingCount: messages.length - processedCount,
        });
        this.log.info(
            `Pass done: processed=${result.processedCount} success=${result.successCount} ` +
                `error=${result.errorCount} skipped=${result.skippedCount} remaining=${result.remainingCount}`,
        );
        return result;
    }

    /**
     * Post meta, summary and detail into the thread, pausing between them.
     * Returns the three reply timestamps.
     */
    async sendEnrichedMessages(threadTs: string, result: EnrichResult, signal?: AbortSignal): Promise<string[]> {
        const parts = [
            { text: result.metaText, blocks: result.metaBlocks },
            { text: result.summaryText, blocks: result.summaryBlocks },
            { text: result.detailText, blocks: result.detailBlocks },
        ];

        const timestamps: string[] = [];
        for (const [i, part] of parts.entries()) {
            if (i > 0) await this.sleep(this.postDelayMs, signal);
            timestamps.push(
                await this.channelClient.postThreadReply({
                    channelId: this.channelId,
                    threadTs,
                    text: part.text,
                    blocks: part.blocks,
                }),
            );
        }
        return timestamps;
    }

    /**
     * Run passes until `signal` aborts. Each pass gets the polling interval
     * as its budget. Rejects with the abort reason when cancelled.
     */
    async run(signal: AbortSignal): Promise<void> {
        this.log.info(`Polling ${this.channelId} every ${this.pollingIntervalMs}ms`);
        try {
            for (;;) {
                throwIfAborted(signal);
                await this.enrichAndReplyPendingMessages({ timeoutMs: this.pollingIntervalMs, signal });
                await this.sleep(this.pollingIntervalMs, signal);
            }
        } catch (err) {
            if (signal.aborted) this.log.info("Polling loop cancelled");
            throw err;
        } finally {
            this.log.info("Polling loop stopped");
        }
    }

    // ── Per message ────────────────────────────────────────────

    private async processMessage(message: ChannelMessage, signal?: AbortSignal): Promise<ItemOutcome> {
        const extracted = extractUrls(message.text);
        if (extracted.mainUrl === null) {
            this.log.debug(`No URL in message ${message.ts}, skipping`);
            return "skipped";
        }

        const urls = await this.resolver.resolveUrls(extracted);
        const mainUrl = urls.mainUrl ?? extracted.mainUrl;

        if (this.urlStatusChecker) {
            const status = await this.urlStatusChecker.check(mainUrl);
            if (isPermanentFailure(status)) {
                this.log.info(`${mainUrl} answered ${status}, skipping message ${message.ts}`);
                return "skipped";
            }
        }

        const bookmarkEntry = await this.lookupBookmarks(mainUrl);
        throwIfAborted(signal);

        const output = await fetchAndSummarize(this.agentQuery, mainUrl, {
            supplementaryUrls: urls.supplementaryUrls,
            bookmarkEntry,
            logger: this.log.child("Summarizer"),
            signal,
        });
        throwIfAborted(signal);

        await this.sendEnrichedMessages(message.ts, renderEnrichResult(output, bookmarkEntry), signal);
        this.log.info(`Replied to ${message.ts} with "${output.meta.title}"`);
        return "success";
    }

    /** Bookmark data is optional: a failed lookup continues without it. */
    private async lookupBookmarks(url: string): Promise<BookmarkEntry | null> {
        if (!this.bookmarkClient) return null;
        try {
            return await this.bookmarkClient.fetchEntry(url);
        } catch (err) {
            this.log.warn(`Bookmark lookup failed for ${url}, continuing without it: ${describeError(err)}`);
            return null;
        }
    }
}
