/**
 * Slack mrkdwn chunker.
 *
 * A section block holds at most 3000 characters. Long mrkdwn is cut into
 * chunks that never split:
 *   - a fenced code block (it is closed and reopened across the cut)
 *   - a <url|label> link token
 *   - an &amp; / &lt; / &gt; entity
 *
 * Cuts prefer the last newline outside code; otherwise the text is cut at
 * the limit and the cut is moved back to the nearest safe position.
 */

export const SLACK_TEXT_LIMIT = 3000;

export const FENCE = "```";
/** Appended to a chunk that ends inside a code block. */
export const FENCE_CLOSE = "\n```";
/** Prepended to a chunk that starts inside a code block. */
export const FENCE_REOPEN = "```\n";

const LINK_TOKEN_RE = /<(?:https?:\/\/|mailto:)[^<>\n]*>/g;
const ENTITY_RE = /^&(?:amp|lt|gt);/;
const MAX_ENTITY_LENGTH = 5;

export interface Chunk {
    text: string;
    /** Starts with an injected FENCE_REOPEN. */
    reopensFence: boolean;
    /** Ends with an injected FENCE_CLOSE. */
    closesFence: boolean;
}

interface Span {
    start: number;
    end: number;
}

interface FenceSpan extends Span {
    /** False when the block runs to the end of the text. */
    terminated: boolean;
}

// ── Scanning ───────────────────────────────────────────────────

/**
 * Pair fence markers left to right. An unpaired opener runs to the end.
 */
export function findFenceSpans(text: string): FenceSpan[] {
    const spans: FenceSpan[] = [];
    let pos = 0;

    while (pos < text.length) {
        const open = text.indexOf(FENCE, pos);
        if (open === -1) break;
        const close = text.indexOf(FENCE, open + FENCE.length);
        if (close === -1) {
            spans.push({ start: open, end: text.length, terminated: false });
            break;
        }
        spans.push({ start: open, end: close + FENCE.length, terminated: true });
        pos = close + FENCE.length;
    }

    return spans;
}

/** Link tokens outside code blocks. */
function findLinkSpans(text: string, fences: FenceSpan[]): Span[] {
    const spans: Span[] = [];
    for (const match of text.matchAll(LINK_TOKEN_RE)) {
        const start = match.index ?? 0;
        if (fences.some((f) => start >= f.start && start < f.end)) continue;
        spans.push({ start, end: start + match[0].length });
    }
    return spans;
}

/** The span a cut at `pos` would break, if any. Cutting at either edge is fine. */
function spanAround<T extends Span>(spans: T[], pos: number): T | undefined {
    return spans.find((s) => s.start < pos && pos < s.end);
}

/** Start of an entity that a cut at `pos` would break, or -1. */
function entityStartAround(text: string, pos: number, floor: number): number {
    for (let i = pos - 1; i >= Math.max(floor, pos - MAX_ENTITY_LENGTH + 1); i--) {
        if (text[i] !== "&") continue;
        const match = ENTITY_RE.exec(text.slice(i, i + MAX_ENTITY_LENGTH));
        if (match && i + match[0].length > pos) return i;
        return -1;
    }
    return -1;
}

/**
 * Cut just after the last newline before `limit` that is outside code.
 * A newline at `cursor` itself would produce a chunk of one newline and is ignored.
 */
function newlineCut(text: string, cursor: number, limit: number, fences: FenceSpan[]): number {
    for (let i = limit - 1; i > cursor; i--) {
        if (text[i] !== "\n") continue;
        if (spanAround(fences, i + 1)) continue;
        return i + 1;
    }
    return -1;
}

// ── Forced cut ─────────────────────────────────────────────────

/**
 * Where to cut when no newline qualifies, and whether that cut lands inside
 * a code block (so the chunk needs FENCE_CLOSE).
 */
function forcedCut(
    text: string,
    cursor: number,
    limit: number,
    fences: FenceSpan[],
    links: Span[],
): { cut: number; inCode: boolean } {
    let cut = limit;

    // Leave room for the closing fence
    if (spanAround(fences, cut)) {
        cut = limit - FENCE_CLOSE.length;
    }

    // Never cut through a fence marker itself
    const fence = spanAround(fences, cut);
    if (fence) {
        if (cut < fence.start + FENCE.length && fence.start > cursor) {
            cut = fence.start;
        } else if (fence.terminated && cut > fence.end - FENCE.length) {
            cut = fence.end - FENCE.length;
        }
    }

    const link = spanAround(links, cut);
    if (link) {
        if (link.start > cursor) {
            cut = link.start;
        } else if (link.end <= limit) {
            cut = link.end;
        }
        // Otherwise the token alone exceeds the limit: the size limit wins.
    }

    const entity = entityStartAround(text, cut, cursor + 1);
    if (entity !== -1) {
        cut = entity;
    }

    // The adjustments can move the cut out of (or into) a code block
    let inCode = spanAround(fences, cut) !== undefined;
    if (inCode && cut + FENCE_CLOSE.length > limit) {
        cut = limit - FENCE_CLOSE.length;
        inCode = spanAround(fences, cut) !== undefined;
    }

    if (cut <= cursor) {
        cut = inCode ? limit - FENCE_CLOSE.length : limit;
    }

    return { cut, inCode };
}

// ── Public API ─────────────────────────────────────────────────

/**
 * Split `text` into chunks of at most `maxLength` characters, with the
 * injected fence markers reported per chunk.
 */
export function chunkMrkdwnText(text: string, maxLength: number = SLACK_TEXT_LIMIT): Chunk[] {
    if (maxLength <= FENCE_REOPEN.length + FENCE_CLOSE.length) {
        throw new RangeError(`maxLength must exceed ${FENCE_REOPEN.length + FENCE_CLOSE.length}, got ${maxLength}`);
    }
    if (text.length <= maxLength) {
        return [{ text, reopensFence: false, closesFence: false }];
    }

    const fences = findFenceSpans(text);
    const links = findLinkSpans(text, fences);
    const chunks: Chunk[] = [];

    let cursor = 0;
    let reopen = false;

    while (cursor < text.length) {
        const prefix = reopen ? FENCE_REOPEN : "";
        const effectiveMax = maxLength - prefix.length;

        if (text.length - cursor <= effectiveMax) {
            chunks.push({ text: prefix + text.slice(cursor), reopensFence: reopen, closesFence: false });
            break;
        }

        const limit = cursor + effectiveMax;
        let cut = newlineCut(text, cursor, limit, fences);
        let inCode = false;
        if (cut === -1) {
            ({ cut, inCode } = forcedCut(text, cursor, limit, fences, links));
        }

        const suffix = inCode ? FENCE_CLOSE : "";
        chunks.push({
            text: prefix + text.slice(cursor, cut) + suffix,
            reopensFence: reopen,
            closesFence: inCode,
        });

        cursor = cut;
        reopen = inCode;
    }

    return chunks;
}

/**
 * Split `text` into Slack-sized mrkdwn strings.
 */
export function splitMrkdwnText(text: string, maxLength: number = SLACK_TEXT_LIMIT): string[] {
    return chunkMrkdwnText(text, maxLength).map((chunk) => chunk.text);
}

/**
 * Undo the injected fence markers and join the chunks back into the source text.
 */
export function joinChunks(chunks: Chunk[]): string {
    return chunks
        .map((chunk) => {
            let text = chunk.text;
            if (chunk.reopensFence) text = text.slice(FENCE_REOPEN.length);
            if (chunk.closesFence) text = text.slice(0, text.length - FENCE_CLOSE.length);
            return text;
        })
        .join("");
}
