/**
 * Slack channel client — history fetch and thread replies over the Web API.
 */

import { ErrorCode, type WebClient } from "@slack/web-api";
import { createLogger, describeError, type Logger } from "../utils/logger.js";
import type { SlackBlock } from "./blocks.js";
import { SlackApiError } from "./errors.js";

export interface ChannelMessage {
    /** Message timestamp; used as thread_ts when replying. */
    ts: string;
    /** Message body, scanned for URLs. */
    text: string;
    /** Number of thread replies; 0 means not yet handled. */
    replyCount: number;
}

export interface ThreadReply {
    channelId: string;
    threadTs: string;
    /** Notification / fallback text. */
    text: string;
    blocks?: SlackBlock[];
}

/** What the worker needs from the chat platform. */
export interface ChannelClient {
    fetchUnrepliedMessages(channelId: string, limit: number): Promise<ChannelMessage[]>;
    /** Post into a thread and return the reply's ts. */
    postThreadReply(reply: ThreadReply): Promise<string>;
}

/** Slack's error code from a Web API failure, or a fallback for non-platform errors. */
export function slackErrorCode(err: unknown): string {
    if (err instanceof Error && "code" in err && err.code === ErrorCode.PlatformError && "data" in err) {
        const data = err.data;
        if (typeof data === "object" && data !== null && "error" in data && typeof data.error === "string") {
            return data.error;
        }
    }
    if (err instanceof Error && "code" in err && typeof err.code === "string") {
        return err.code;
    }
    return "unknown_error";
}

export class SlackClient implements ChannelClient {
    private readonly client: WebClient;
    private readonly log: Logger;

    constructor(client: WebClient, opts: { logger?: Logger } = {}) {
        this.client = client;
        this.log = opts.logger ?? createLogger("Slack");
    }

    /** The latest `limit` channel messages, newest first. */
    async fetchChannelHistory(channelId: string, limit = 100): Promise<ChannelMessage[]> {
        const response = await this.client.conversations.history({ channel: channelId, limit }).catch((err: unknown) => {
            throw new SlackApiError(
                `conversations.history failed for ${channelId}: ${describeError(err)}`,
                slackErrorCode(err),
                { cause: err },
            );
        });

        const messages: ChannelMessage[] = [];
        for (const msg of response.messages ?? []) {
            if (!msg.ts) continue;
            messages.push({ ts: msg.ts, text: msg.text ?? "", replyCount: msg.reply_count ?? 0 });
        }
        return messages;
    }

    async fetchUnrepliedMessages(channelId: string, limit = 100): Promise<ChannelMessage[]> {
        const history = await this.fetchChannelHistory(channelId, limit);
        const unreplied = history.filter((msg) => msg.replyCount === 0);
        this.log.debug(`${unreplied.length}/${history.length} messages in ${channelId} have no replies`);
        return unreplied;
    }

    async postThreadReply(reply: ThreadReply): Promise<string> {
        const response = await this.client.chat
            .postMessage({
                channel: reply.channelId,
                thread_ts: reply.threadTs,
                text: reply.text,
                blocks: reply.blocks,
            })
            .catch((err: unknown) => {
                throw new SlackApiError(
                    `chat.postMessage failed in thread ${reply.threadTs}: ${describeError(err)}`,
                    slackErrorCode(err),
                    { cause: err },
                );
            });

        if (!response.ts) {
            throw new SlackApiError(`chat.postMessage returned no ts for thread ${reply.threadTs}`, "missing_ts");
        }
        return response.ts;
    }
}
