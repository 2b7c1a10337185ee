/**
 * Hatena Bookmark client — entry lookup through the public jsonlite API.
 */

import { z } from "zod";
import { createLogger, describeError, type Logger } from "../utils/logger.js";
import type { BookmarkEntry } from "./models.js";

const JSONLITE_BASE_URL = "https://b.hatena.ne.jp/entry/jsonlite/";

export const DEFAULT_BOOKMARK_TIMEOUT_MS = 10_000;

const jsonliteSchema = z.object({
    count: z.number().int().nonnegative().default(0),
    bookmarks: z
        .array(
            z.object({
                user: z.string(),
                comment: z.string().default(""),
                timestamp: z.string().default(""),
            }),
        )
        .default([]),
});

export interface BookmarkClient {
    /** The entry for `url`, or null when there is none or it could not be fetched. */
    fetchEntry(url: string): Promise<BookmarkEntry | null>;
}

export class HatenaBookmarkClient implements BookmarkClient {
    private readonly timeoutMs: number;
    private readonly log: Logger;

    constructor(opts: { timeoutMs?: number; logger?: Logger } = {}) {
        this.timeoutMs = opts.timeoutMs ?? DEFAULT_BOOKMARK_TIMEOUT_MS;
        this.log = opts.logger ?? createLogger("Bookmarks");
    }

    async fetchEntry(url: string): Promise<BookmarkEntry | null> {
        const apiUrl = `${JSONLITE_BASE_URL}?url=${encodeURIComponent(url)}`;
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.timeoutMs);

        try {
            const response = await fetch(apiUrl, { signal: controller.signal });
            if (response.status === 404) return null;
            if (!response.ok) {
                this.log.warn(`Hatena API returned HTTP ${response.status} for ${url}`);
                return null;
            }

            const data: unknown = await response.json();
            if (data === null) return null;

            const parsed = jsonliteSchema.safeParse(data);
            if (!parsed.success) {
                this.log.warn(`Unexpected Hatena API payload for ${url}: ${parsed.error.message}`);
                return null;
            }
            return parsed.data;
        } catch (err) {
            this.log.debug(`Hatena lookup failed for ${url}: ${describeError(err)}`);
            return null;
        } finally {
            clearTimeout(timer);
        }
    }
}
