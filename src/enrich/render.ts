/**
 * Enrichment — turn the agent's structured output into the three thread replies.
 */

import { commentCountOf, commentsOf, type BookmarkEntry } from "../bookmarks/models.js";
import { isHttpUrl } from "../links/resolve.js";
import {
    bulletListBlock,
    fieldsBlock,
    headerBlock,
    mrkdwn,
    plainText,
    sectionBlock,
    type SlackBlock,
    type SlackTextObject,
} from "../slack/blocks.js";
import { splitMrkdwnText } from "../slack/chunker.js";
import { convertMarkdownToMrkdwn, escapeMrkdwnText } from "../slack/markdown.js";
import type { Meta, StructuredOutput, Summary } from "./schema.js";

const UNKNOWN = "Unknown";

export interface EnrichResult {
    metaText: string;
    metaBlocks: SlackBlock[];
    summaryText: string;
    summaryBlocks: SlackBlock[];
    detailText: string;
    detailBlocks: SlackBlock[];
}

function categoryOf(meta: Meta): string | null {
    const parts = [meta.category_large, meta.category_medium].filter((c): c is string => !!c);
    return parts.length > 0 ? parts.join(" / ") : null;
}

function bookmarkStats(entry: BookmarkEntry): string {
    return `📚 ${entry.count} users / 💬 ${commentCountOf(entry)} comments`;
}

// ── Meta ───────────────────────────────────────────────────────

/** Notification text for the meta reply. */
export function formatMetaText(meta: Meta, bookmarkEntry?: BookmarkEntry | null): string {
    const lines = [
        `*${escapeMrkdwnText(meta.title)}*`,
        `URL: ${escapeMrkdwnText(meta.url)}`,
        `Author: ${escapeMrkdwnText(meta.author ?? UNKNOWN)}`,
        `Category: ${escapeMrkdwnText(categoryOf(meta) ?? UNKNOWN)}`,
        `Published: ${escapeMrkdwnText(meta.published_at ?? UNKNOWN)}`,
    ];
    if (bookmarkEntry) {
        lines.push(`Hatena Bookmark: ${bookmarkStats(bookmarkEntry)}`);
    }
    return lines.join("\n");
}

/** A link token for http(s) URLs that cannot break out of `<...>`; plain text otherwise. */
function urlField(url: string): SlackTextObject {
    if (isHttpUrl(url) && !/[<>|\s]/.test(url)) return mrkdwn(`<${url}>`);
    return plainText(url);
}

export function buildMetaBlocks(meta: Meta, bookmarkEntry?: BookmarkEntry | null): SlackBlock[] {
    const fields: SlackTextObject[] = [mrkdwn("*URL*"), urlField(meta.url)];
    const category = categoryOf(meta);

    if (meta.author) fields.push(mrkdwn("*Author*"), plainText(meta.author));
    if (category) fields.push(mrkdwn("*Category*"), plainText(category));
    if (meta.published_at) fields.push(mrkdwn("*Published*"), plainText(meta.published_at));
    if (bookmarkEntry) fields.push(mrkdwn("*Hatena Bookmark*"), plainText(bookmarkStats(bookmarkEntry)));

    return [headerBlock(meta.title), fieldsBlock(fields)];
}

// ── Summary ────────────────────────────────────────────────────

export function formatSummaryText(summary: Summary): string {
    return summary.points.map((point) => `- ${point}`).join("\n");
}

export function buildSummaryBlocks(summary: Summary): SlackBlock[] {
    return [headerBlock("Summary"), bulletListBlock(summary.points)];
}

// ── Detail ─────────────────────────────────────────────────────

/** Detail markdown with the bookmark comments appended as their own section. */
export function buildDetailMarkdown(detail: string, bookmarkEntry?: BookmarkEntry | null): string {
    const comments = bookmarkEntry ? commentsOf(bookmarkEntry) : [];
    if (comments.length === 0) return detail;

    const lines = comments.map((b) => {
        const when = b.timestamp ? ` (${b.timestamp})` : "";
        return `- **${b.user}**${when}: ${b.comment.trim()}`;
    });
    return `${detail}\n\n## Hatena Bookmark Comments\n\n${lines.join("\n")}`;
}

/**
 * One header plus a section per chunk. Chunk-trailing newlines are dropped
 * for display and chunks left empty are skipped.
 */
export function buildDetailBlocks(detailMrkdwn: string): SlackBlock[] {
    const sections = splitMrkdwnText(detailMrkdwn)
        .map((chunk) => chunk.replace(/\n+$/, ""))
        .filter((chunk) => chunk.trim() !== "")
        .map((chunk) => sectionBlock(chunk));
    return [headerBlock("Details"), ...sections];
}

// ── All three ──────────────────────────────────────────────────

export function renderEnrichResult(output: StructuredOutput, bookmarkEntry?: BookmarkEntry | null): EnrichResult {
    const detailText = convertMarkdownToMrkdwn(buildDetailMarkdown(output.detail, bookmarkEntry));
    return {
        metaText: formatMetaText(output.meta, bookmarkEntry),
        metaBlocks: buildMetaBlocks(output.meta, bookmarkEntry),
        summaryText: formatSummaryText(output.summary),
        summaryBlocks: buildSummaryBlocks(output.summary),
        detailText,
        detailBlocks: buildDetailBlocks(detailText),
    };
}
