/**
 * Enrichment — the instruction sent to the agent for one article.
 */

import { commentsOf, type BookmarkEntry } from "../bookmarks/models.js";

/** Bookmark comments inlined into one prompt. */
export const MAX_PROMPT_COMMENTS = 50;

/** Soft cap on the detail section; the agent is asked to respect it. */
export const DETAIL_MAX_CHARS = 40_000;

const INSTRUCTIONS = `Fetch the following URL with WebFetch and extract the fields below.

Fields:
- meta.title: the article title
- meta.url: the article URL
- meta.author: the author (handle or real name), null if unknown
- meta.category_large: a broad category such as "Data Engineering", null if unknown
- meta.category_medium: a narrower category such as "BigQuery", null if unknown
- meta.published_at: the publication time in ISO 8601, null if unknown
- summary.points: 1 to 5 short bullet points with the core of the article
- detail: a structured, detailed explanation of the article in markdown (at most ${DETAIL_MAX_CHARS} characters)`;

function supplementarySection(urls: string[]): string {
    const list = urls.map((url) => `- ${url}`).join("\n");
    return (
        "\n\nSupplementary URLs:\n" +
        list +
        "\n\nThe main URL is the primary source. The supplementary URLs describe tools or sources " +
        "the article mentions; use them to add context where it helps."
    );
}

function bookmarkSection(entry: BookmarkEntry): string {
    const comments = commentsOf(entry).slice(0, MAX_PROMPT_COMMENTS);
    if (comments.length === 0) return "";
    const list = comments.map((b) => `- ${b.user}: ${b.comment.trim()}`).join("\n");
    return (
        "\n\nHatena Bookmark comments on this article:\n" +
        list +
        "\n\nTreat these comments as reader reactions when writing the summary and detail."
    );
}

export function buildSummaryPrompt(
    mainUrl: string,
    supplementaryUrls: string[] = [],
    bookmarkEntry?: BookmarkEntry | null,
): string {
    let prompt = `${INSTRUCTIONS}\n\nMain URL (the article): ${mainUrl}`;
    if (supplementaryUrls.length > 0) {
        prompt += supplementarySection(supplementaryUrls);
    }
    if (bookmarkEntry) {
        prompt += bookmarkSection(bookmarkEntry);
    }
    return prompt;
}
