/**
 * Tests for the enrichment worker.
 */

import { describe, it, expect, vi } from "vitest";
import type { BookmarkClient } from "../src/bookmarks/client.js";
import type { AgentQuery } from "../src/enrich/agent.js";
import type { StructuredOutput } from "../src/enrich/schema.js";
import type { UrlStatusChecker } from "../src/links/status.js";
import type { ChannelClient, ChannelMessage, ThreadReply } from "../src/slack/client.js";
import { SlackApiError } from "../src/slack/errors.js";
import { Logger, LogLevel } from "../src/utils/logger.js";
import { isAbortError, sleep as realSleep } from "../src/utils/sleep.js";
import { EnrichmentWorker, type EnrichmentWorkerOptions } from "../src/worker.js";

const OUTPUT: StructuredOutput = {
    meta: {
        title: "Sample Article",
        url: "https://example.com/a",
        author: null,
        category_large: null,
        category_medium: null,
        published_at: null,
    },
    summary: { points: ["first"] },
    detail: "Body",
};

// ── Fakes ──────────────────────────────────────────────────────

class FakeChannel implements ChannelClient {
    readonly posts: ThreadReply[] = [];
    failOnThread?: string;

    constructor(private readonly messages: ChannelMessage[]) {}

    async fetchUnrepliedMessages(): Promise<ChannelMessage[]> {
        return this.messages;
    }

    async postThreadReply(reply: ThreadReply): Promise<string> {
        if (reply.threadTs === this.failOnThread) {
            throw new SlackApiError("chat.postMessage failed", "msg_too_long");
        }
        this.posts.push(reply);
        return `reply-${this.posts.length}`;
    }
}

function messages(count: number): ChannelMessage[] {
    return Array.from({ length: count }, (_, i) => ({
        ts: String(i + 1),
        text: `New post <https://example.com/${i + 1}>`,
        replyCount: 0,
    }));
}

function agentReturning(onCall: () => void = () => {}): AgentQuery & { prompts: string[] } {
    const prompts: string[] = [];
    const agent = async function* (params: { prompt: string }) {
        prompts.push(params.prompt);
        onCall();
        yield { type: "result", subtype: "success", is_error: false, result: "ok", structured_output: OUTPUT };
    };
    return Object.assign(agent, { prompts });
}

function makeWorker(channel: ChannelClient, overrides: Partial<EnrichmentWorkerOptions> = {}) {
    const sleep = vi.fn(async () => {});
    const worker = new EnrichmentWorker({
        channelClient: channel,
        channelId: "C123",
        agentQuery: agentReturning(),
        resolver: { resolveUrls: async (extracted) => extracted },
        now: () => 0,
        sleep,
        logger: new Logger("test", LogLevel.SILENT),
        ...overrides,
    });
    return { worker, sleep };
}

// ── Passes ─────────────────────────────────────────────────────

describe("EnrichmentWorker.enrichAndReplyPendingMessages", () => {
    it("should post meta, summary and detail into each thread", async () => {
        const channel = new FakeChannel(messages(1));
        const { worker, sleep } = makeWorker(channel);

        const result = await worker.enrichAndReplyPendingMessages();

        expect(result).toEqual({
            processedCount: 1,
            successCount: 1,
            errorCount: 0,
            skippedCount: 0,
            timedOut: false,
            remainingCount: 0,
        });
        expect(channel.posts.map((p) => [p.threadTs, p.text])).toEqual([
            ["1", "*Sample Article*\nURL: https://example.com/a\nAuthor: Unknown\nCategory: Unknown\nPublished: Unknown"],
            ["1", "- first"],
            ["1", "Body"],
        ]);
        expect(sleep).toHaveBeenCalledTimes(2);
        expect(sleep).toHaveBeenNthCalledWith(1, 1000, undefined);
    });

    it("should return a frozen result", async () => {
        const { worker } = makeWorker(new FakeChannel([]));

        const result = await worker.enrichAndReplyPendingMessages();

        expect(Object.isFrozen(result)).toBe(true);
        expect(result.processedCount).toBe(0);
    });

    it("should stop at the budget but finish the message in progress", async () => {
        let clock = 0;
        const channel = new FakeChannel(messages(5));
        const { worker } = makeWorker(channel, {
            now: () => clock,
            agentQuery: agentReturning(() => {
                clock += 2000;
            }),
        });

        const result = await worker.enrichAndReplyPendingMessages({ timeoutMs: 1000 });

        expect(result).toEqual({
            processedCount: 1,
            successCount: 1,
            errorCount: 0,
            skippedCount: 0,
            timedOut: true,
            remainingCount: 4,
        });
        expect(channel.posts).toHaveLength(3);
    });

    it("should not count the history fetch against the budget", async () => {
        let clock = 0;
        const channel = new FakeChannel(messages(2));
        vi.spyOn(channel, "fetchUnrepliedMessages").mockImplementation(async () => {
            clock += 5000;
            return messages(2);
        });
        const { worker } = makeWorker(channel, { now: () => clock });

        const result = await worker.enrichAndReplyPendingMessages({ timeoutMs: 1000 });

        expect(result.processedCount).toBe(2);
        expect(result.successCount).toBe(2);
        expect(result.timedOut).toBe(false);
    });

    it("should count a posting failure and go on with the next message", async () => {
        const channel = new FakeChannel(messages(3));
        channel.failOnThread = "2";
        const { worker } = makeWorker(channel);

        const result = await worker.enrichAndReplyPendingMessages();

        expect(result).toEqual({
            processedCount: 3,
            successCount: 2,
            errorCount: 1,
            skippedCount: 0,
            timedOut: false,
            remainingCount: 0,
        });
        expect(new Set(channel.posts.map((p) => p.threadTs))).toEqual(new Set(["1", "3"]));
    });

    it("should skip messages without a URL", async () => {
        const agent = agentReturning();
        const { worker } = makeWorker(new FakeChannel([{ ts: "1", text: "just chatting", replyCount: 0 }]), {
            agentQuery: agent,
        });

        const result = await worker.enrichAndReplyPendingMessages();

        expect(result.skippedCount).toBe(1);
        expect(result.processedCount).toBe(1);
        expect(agent.prompts).toHaveLength(0);
    });

    it("should count an agent failure as an error", async () => {
        const failing: AgentQuery = async function* () {
            yield { type: "result", subtype: "error_during_execution", is_error: true, result: "crashed" };
        };
        const channel = new FakeChannel(messages(2));
        const { worker } = makeWorker(channel, { agentQuery: failing });

        const result = await worker.enrichAndReplyPendingMessages();

        expect(result.errorCount).toBe(2);
        expect(channel.posts).toHaveLength(0);
    });

    it("should hand the resolved URLs to the agent", async () => {
        const agent = agentReturning();
        const { worker } = makeWorker(new FakeChannel(messages(1)), {
            agentQuery: agent,
            resolver: {
                resolveUrls: async () => ({
                    mainUrl: "https://publisher.example/story",
                    supplementaryUrls: ["https://b.example"],
                }),
            },
        });

        await worker.enrichAndReplyPendingMessages();

        expect(agent.prompts[0]).toContain("Main URL (the article): https://publisher.example/story");
        expect(agent.prompts[0]).toContain("Supplementary URLs:\n- https://b.example\n");
    });

    it("should skip a main URL that is permanently gone", async () => {
        const agent = agentReturning();
        const checker: UrlStatusChecker = { check: async () => 404 };
        const { worker } = makeWorker(new FakeChannel(messages(1)), { agentQuery: agent, urlStatusChecker: checker });

        const result = await worker.enrichAndReplyPendingMessages();

        expect(result.skippedCount).toBe(1);
        expect(agent.prompts).toHaveLength(0);
    });

    it("should not skip when the status could not be determined", async () => {
        const checker: UrlStatusChecker = { check: async () => null };
        const { worker } = makeWorker(new FakeChannel(messages(1)), { urlStatusChecker: checker });

        expect((await worker.enrichAndReplyPendingMessages()).successCount).toBe(1);
    });

    it("should include bookmark data when available", async () => {
        const bookmarks: BookmarkClient = {
            fetchEntry: async () => ({ count: 5, bookmarks: [{ user: "u1", comment: "useful", timestamp: "" }] }),
        };
        const agent = agentReturning();
        const channel = new FakeChannel(messages(1));
        const { worker } = makeWorker(channel, { agentQuery: agent, bookmarkClient: bookmarks });

        await worker.enrichAndReplyPendingMessages();

        expect(agent.prompts[0]).toContain("- u1: useful");
        expect(channel.posts[0].text.split("\n").pop()).toBe("Hatena Bookmark: 📚 5 users / 💬 1 comments");
        expect(channel.posts[2].text).toBe("Body\n\n*Hatena Bookmark Comments*\n\n• *u1*: useful");
    });

    it("should carry on without bookmark data when the lookup fails", async () => {
        const bookmarks: BookmarkClient = {
            fetchEntry: async () => {
                throw new Error("lookup failed");
            },
        };
        const logger = new Logger("test", LogLevel.SILENT);
        const warn = vi.spyOn(logger, "warn");
        const { worker } = makeWorker(new FakeChannel(messages(1)), { bookmarkClient: bookmarks, logger });

        const result = await worker.enrichAndReplyPendingMessages();

        expect(result.successCount).toBe(1);
        expect(warn).toHaveBeenCalledTimes(1);
    });

    it("should let an abort escape the per-message handling", async () => {
        const controller = new AbortController();
        const aborting: AgentQuery = async function* () {
            controller.abort();
            throw new Error("interrupted");
        };
        const channel = new FakeChannel(messages(2));
        const { worker } = makeWorker(channel, { agentQuery: aborting });

        await expect(worker.enrichAndReplyPendingMessages({ signal: controller.signal })).rejects.toThrow(
            "interrupted",
        );
        expect(channel.posts).toHaveLength(0);
    });
});

describe("EnrichmentWorker cancellation of the agent", () => {
    it("should abort the running agent when the pass signal aborts", async () => {
        const controller = new AbortController();
        let agentAborted: boolean | undefined;
        const agent: AgentQuery = async function* (params) {
            controller.abort();
            agentAborted = params.options.abortController?.signal.aborted;
            yield { type: "result", subtype: "success", is_error: false, result: "ok", structured_output: OUTPUT };
        };
        const channel = new FakeChannel(messages(1));
        const { worker } = makeWorker(channel, { agentQuery: agent });

        const err = await worker
            .enrichAndReplyPendingMessages({ signal: controller.signal })
            .catch((e: unknown) => e);

        expect(isAbortError(err)).toBe(true);
        expect(agentAborted).toBe(true);
        expect(channel.posts).toHaveLength(0);
    });
});

// ── Sending ────────────────────────────────────────────────────

describe("EnrichmentWorker.sendEnrichedMessages", () => {
    it("should return the reply timestamps in order", async () => {
        const channel = new FakeChannel([]);
        const { worker } = makeWorker(channel);

        const ts = await worker.sendEnrichedMessages("1", {
            metaText: "meta",
            metaBlocks: [],
            summaryText: "summary",
            summaryBlocks: [],
            detailText: "detail",
            detailBlocks: [],
        });

        expect(ts).toEqual(["reply-1", "reply-2", "reply-3"]);
        expect(channel.posts.map((p) => p.text)).toEqual(["meta", "summary", "detail"]);
    });

    it("should stop at the first failed post", async () => {
        const channel = new FakeChannel([]);
        channel.failOnThread = "1";
        const { worker } = makeWorker(channel);

        await expect(
            worker.sendEnrichedMessages("1", {
                metaText: "meta",
                metaBlocks: [],
                summaryText: "summary",
                summaryBlocks: [],
                detailText: "detail",
                detailBlocks: [],
            }),
        ).rejects.toBeInstanceOf(SlackApiError);
        expect(channel.posts).toHaveLength(0);
    });
});

// ── Polling loop ───────────────────────────────────────────────

describe("EnrichmentWorker.run", () => {
    it("should poll until aborted and then reject with the abort", async () => {
        const controller = new AbortController();
        const channel = new FakeChannel([]);
        const fetchSpy = vi.spyOn(channel, "fetchUnrepliedMessages");
        let waits = 0;
        const { worker } = makeWorker(channel, {
            pollingIntervalMs: 60_000,
            sleep: async (ms, signal) => {
                waits++;
                if (waits === 2) controller.abort();
                return realSleep(0, signal);
            },
        });

        const err = await worker.run(controller.signal).catch((e: unknown) => e);

        expect(isAbortError(err)).toBe(true);
        expect(fetchSpy).toHaveBeenCalledTimes(2);
    });

    it("should give each pass the polling interval as its budget", async () => {
        const controller = new AbortController();
        const { worker } = makeWorker(new FakeChannel([]), {
            pollingIntervalMs: 60_000,
            sleep: async (_ms, signal) => {
                controller.abort();
                return realSleep(0, signal);
            },
        });
        const pass = vi.spyOn(worker, "enrichAndReplyPendingMessages");

        const err = await worker.run(controller.signal).catch((e: unknown) => e);

        expect(isAbortError(err)).toBe(true);
        expect(pass).toHaveBeenCalledWith({ timeoutMs: 60_000, signal: controller.signal });
    });
});
