/**
 * Links — URL extraction from Slack message text.
 *
 * Slack delivers links in two notations that can be interleaved:
 *   - wrapped: <https://example.com> or <https://example.com|label>
 *   - plain:   https://example.com
 *
 * The first URL in document order is the main URL; the rest are
 * supplementary context for the summary.
 */

// ── Regexes ────────────────────────────────────────────────────

/** Slack wrapped link: <url> or <url|label> */
const SLACK_LINK_RE = /<(https?:\/\/[^|>]+)(?:\|[^>]+)?>/g;

/** Plain URL */
const PLAIN_URL_RE = /https?:\/\/[^\s<>]+/g;

// ── Types ──────────────────────────────────────────────────────

export interface ExtractedUrls {
    /** First URL in the message, null when the message has none. */
    mainUrl: string | null;
    /** Every other distinct URL, in order of first appearance. */
    supplementaryUrls: string[];
}

/** Resolution keeps the same shape; it only rewrites the URLs. */
export type ResolvedUrls = ExtractedUrls;

interface UrlMatch {
    url: string;
    start: number;
}

// ── Core ───────────────────────────────────────────────────────

/**
 * Collect the URLs of `text` in document order, without duplicates.
 * A plain match starting inside a wrapped link is the same URL and is ignored.
 */
export function findUrls(text: string): string[] {
    if (!text) return [];

    const matches: UrlMatch[] = [];
    const wrappedSpans: Array<[number, number]> = [];

    for (const match of text.matchAll(SLACK_LINK_RE)) {
        const start = match.index ?? 0;
        wrappedSpans.push([start, start + match[0].length]);
        matches.push({ url: match[1], start });
    }

    for (const match of text.matchAll(PLAIN_URL_RE)) {
        const start = match.index ?? 0;
        const insideWrapped = wrappedSpans.some(([from, to]) => start >= from && start < to);
        if (!insideWrapped) {
            matches.push({ url: match[0], start });
        }
    }

    // Array.prototype.sort is stable, so equal offsets keep insertion order.
    matches.sort((a, b) => a.start - b.start);

    const seen = new Set<string>();
    const urls: string[] = [];
    for (const { url } of matches) {
        if (seen.has(url)) continue;
        seen.add(url);
        urls.push(url);
    }
    return urls;
}

/**
 * Split the URLs of a message into the main URL and supplementary URLs.
 */
export function extractUrls(text: string): ExtractedUrls {
    const urls = findUrls(text);
    if (urls.length === 0) {
        return { mainUrl: null, supplementaryUrls: [] };
    }
    const [mainUrl, ...supplementaryUrls] = urls;
    return { mainUrl, supplementaryUrls };
}
