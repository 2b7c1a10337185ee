/**
 * Links — Google News article URL decoder.
 *
 * 1. GET the article page and read its signature and timestamp attributes
 * 2. POST a "garturlreq" batchexecute request with them
 * 3. Read the publisher URL out of the batch response
 */

import type { DecodeResult, RedirectDecoder } from "./resolve.js";

const ARTICLE_PAGE_BASE = "https://news.google.com/rss/articles/";
const BATCH_EXECUTE_URL = "https://news.google.com/_/DotsSplashUi/data/batchexecute";
const USER_AGENT = "Mozilla/5.0 (compatible; slack-link-enricher)";

const SIGNATURE_RE = /data-n-a-sg="([^"]+)"/;
const TIMESTAMP_RE = /data-n-a-ts="([^"]+)"/;

export interface DecodingParams {
    articleId: string;
    signature: string;
    timestamp: string;
}

/** The last path segment of an /rss/articles/ URL, or null. */
export function articleIdOf(url: string): string | null {
    try {
        const path = new URL(url).pathname;
        const idx = path.indexOf("/articles/");
        if (idx === -1) return null;
        const id = path.slice(idx + "/articles/".length).split("/")[0];
        return id || null;
    } catch {
        return null;
    }
}

export function parseDecodingParams(articleId: string, html: string): DecodingParams | null {
    const signature = SIGNATURE_RE.exec(html)?.[1];
    const timestamp = TIMESTAMP_RE.exec(html)?.[1];
    if (!signature || !timestamp) return null;
    return { articleId, signature, timestamp };
}

export function buildBatchExecuteBody(params: DecodingParams): string {
    const inner =
        `["garturlreq",[["X","X",["X","X"],null,null,1,1,"US:en",null,1,null,null,null,null,null,0,1],` +
        `"X","X",1,[1,1,1],1,1,null,0,0,null,0],"${params.articleId}",${params.timestamp},"${params.signature}"]`;
    const request = [[["Fbv4je", inner]]];
    return `f.req=${encodeURIComponent(JSON.stringify(request))}`;
}

/**
 * The response is a ")]}'" guard line followed by length-prefixed JSON
 * chunks. The first chunk holds [["wrb.fr","Fbv4je","[\"garturlres\",\"<url>\",1]",...]].
 */
export function parseBatchExecuteResponse(body: string): string | null {
    const parts = body.split("\n\n");
    if (parts.length < 2) return null;

    let envelope: unknown;
    try {
        envelope = JSON.parse(parts[1]);
    } catch {
        return null;
    }
    if (!Array.isArray(envelope)) return null;

    for (const entry of envelope) {
        if (!Array.isArray(entry) || typeof entry[2] !== "string") continue;
        let payload: unknown;
        try {
            payload = JSON.parse(entry[2]);
        } catch {
            continue;
        }
        if (Array.isArray(payload) && typeof payload[1] === "string") {
            return payload[1];
        }
    }
    return null;
}

export class GoogleNewsDecoder implements RedirectDecoder {
    async decode(url: string, signal: AbortSignal): Promise<DecodeResult> {
        const articleId = articleIdOf(url);
        if (!articleId) {
            return { status: false, message: "no article id in URL" };
        }

        const page = await fetch(`${ARTICLE_PAGE_BASE}${articleId}`, {
            signal,
            headers: { "User-Agent": USER_AGENT },
        });
        if (!page.ok) {
            return { status: false, message: `article page returned HTTP ${page.status}` };
        }

        const params = parseDecodingParams(articleId, await page.text());
        if (!params) {
            return { status: false, message: "signature or timestamp missing from article page" };
        }

        const response = await fetch(BATCH_EXECUTE_URL, {
            method: "POST",
            signal,
            headers: {
                "Content-Type": "application/x-www-form-urlencoded;charset=UTF-8",
                "User-Agent": USER_AGENT,
            },
            body: buildBatchExecuteBody(params),
        });
        if (!response.ok) {
            return { status: false, message: `batchexecute returned HTTP ${response.status}` };
        }

        const decodedUrl = parseBatchExecuteResponse(await response.text());
        if (!decodedUrl) {
            return { status: false, message: "no URL in batchexecute response" };
        }
        return { status: true, decodedUrl };
    }
}
