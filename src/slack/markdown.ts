/**
 * Markdown → Slack mrkdwn conversion.
 *
 * The agent writes GitHub-flavoured markdown; Slack reads mrkdwn:
 *   **text** / __text__ → *text*
 *   *text*              → _text_
 *   ~~text~~            → ~text~
 *   [text](url)         → <url|text>
 *   # text              → *text*
 *   - item / * item     → • item
 *   | a | b |           → *a* | *b* (header row), a | b (body rows)
 *
 * After conversion, &, < and > are escaped everywhere except inside code
 * spans and the URL half of link tokens.
 */

const PLACEHOLDER_RE = /\x00PH(\d+)\x00/g;
const LINK_SLOT_RE = /\x00LK(\d+)\x00/g;

/** ```lang\n ... ``` or ``` ... ``` */
const FENCED_CODE_RE = /```(?:([\w+.-]*)\n)?([\s\S]*?)```/g;
const INLINE_CODE_RE = /`([^`\n]+)`/g;
const TABLE_BLOCK_RE = /(?:^[ \t]*\|.*\|[ \t]*(?:\n|$))+/gm;
const TABLE_SEPARATOR_RE = /^[ \t]*\|(?:[ \t]*:?-+:?[ \t]*\|)+[ \t]*$/;
const MARKDOWN_LINK_RE = /\[([^\]]+)\]\(([^)\s]+)\)/g;

/** Protected spans for escaping: fenced blocks first, then inline code. */
const CODE_SPAN_RE = /(```[\s\S]*?```|`[^`]+`)/;

const LINK_SCHEMES = ["http://", "https://", "mailto:"];

interface LinkToken {
    url: string;
    label: string;
}

interface Converted {
    /** mrkdwn with every converted link left as an \x00LK<n>\x00 slot. */
    text: string;
    links: LinkToken[];
}

// ── Conversion ─────────────────────────────────────────────────

function tableCells(row: string): string[] {
    return row
        .trim()
        .replace(/^\|/, "")
        .replace(/\|$/, "")
        .split("|")
        .map((cell) => cell.trim());
}

function convertConstructs(text: string): Converted {
    const placeholders: string[] = [];
    const links: LinkToken[] = [];

    const ph = (content: string): string => {
        placeholders.push(content);
        return `\x00PH${placeholders.length - 1}\x00`;
    };
    // Placeholders may nest (a header holding bold text)
    const restore = (value: string): string => {
        let out = value;
        for (let pass = 0; pass <= placeholders.length && out.includes("\x00PH"); pass++) {
            out = out.replace(PLACEHOLDER_RE, (_match, idx: string) => placeholders[Number(idx)] ?? "");
        }
        return out;
    };

    let out = text;

    // Code is copied through untouched
    out = out.replace(FENCED_CODE_RE, (_match, lang: string | undefined, code: string) =>
        ph("```" + (lang ?? "") + "\n" + code.replace(/\n$/, "") + "\n```"),
    );
    out = out.replace(INLINE_CODE_RE, (match) => ph(match));

    // Tables: bold header cells, body cells joined by " | "
    out = out.replace(TABLE_BLOCK_RE, (block: string) => {
        const rows = block
            .split("\n")
            .filter((row) => row.trim() !== "" && !TABLE_SEPARATOR_RE.test(row))
            .map(tableCells);
        if (rows.length === 0) return block;

        const [header, ...body] = rows;
        const lines = [header.map((cell) => ph(`*${cell}*`)).join(" | "), ...body.map((cells) => cells.join(" | "))];
        return lines.join("\n") + (block.endsWith("\n") ? "\n" : "");
    });

    // Links keep their exact label; the label is escaped when the slot is filled
    out = out.replace(MARKDOWN_LINK_RE, (_match, label: string, url: string) => {
        links.push({ url, label: restore(label) });
        return `\x00LK${links.length - 1}\x00`;
    });

    out = out.replace(/\*{3}(.+?)\*{3}/g, (_match, content: string) => ph(`*_${content}_*`));
    out = out.replace(/\*{2}(.+?)\*{2}/g, (_match, content: string) => ph(`*${content}*`));
    out = out.replace(/_{2}(.+?)_{2}/g, (_match, content: string) => ph(`*${content}*`));
    out = out.replace(/^#{1,6}\s+(.+)$/gm, (_match, content: string) => ph(`*${content.trim()}*`));

    // Bullets before italics so "* item" is not read as emphasis
    out = out.replace(/^([ \t]*)[-*+][ \t]+/gm, "$1• ");
    out = out.replace(/(?<![\w*])\*(?!\s)(.+?)(?<!\s)\*(?![\w*])/g, "_$1_");
    out = out.replace(/~~(.+?)~~/g, "~$1~");

    return { text: restore(out), links };
}

function fillLinkSlots(text: string, links: LinkToken[], formatLabel: (label: string) => string): string {
    return text.replace(LINK_SLOT_RE, (_match, idx: string) => {
        const link = links[Number(idx)];
        return link ? `<${link.url}|${formatLabel(link.label)}>` : "";
    });
}

/**
 * Convert markdown constructs to mrkdwn. Does not escape.
 */
export function markdownToMrkdwn(text: string): string {
    if (!text) return text;
    const converted = convertConstructs(text);
    return fillLinkSlots(converted.text, converted.links, (label) => label);
}

// ── Escaping ───────────────────────────────────────────────────

/** Escape the three characters Slack reserves. */
export function escapeMrkdwnText(text: string): string {
    return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function startsWithLinkScheme(text: string): boolean {
    return LINK_SCHEMES.some((scheme) => text.startsWith(scheme));
}

/**
 * Escape text outside code. Link tokens are parsed by hand because a label
 * may itself contain < or >: the token ends at the last > on its line
 * before the next link opening.
 */
function escapeOutsideCode(text: string): string {
    const out: string[] = [];
    let pos = 0;

    while (pos < text.length) {
        const open = text.indexOf("<", pos);
        if (open === -1) {
            out.push(escapeMrkdwnText(text.slice(pos)));
            break;
        }
        out.push(escapeMrkdwnText(text.slice(pos, open)));

        const pipe = text.indexOf("|", open + 1);
        const close = text.indexOf(">", open + 1);

        if (
            pipe !== -1 &&
            close !== -1 &&
            pipe < close &&
            startsWithLinkScheme(text.slice(open + 1)) &&
            !/\s/.test(text.slice(open + 1, pipe))
        ) {
            // <url|label>
            let searchEnd = text.length;
            let from = pipe + 1;
            for (;;) {
                const next = text.indexOf("<", from);
                if (next === -1) break;
                if (startsWithLinkScheme(text.slice(next + 1))) {
                    searchEnd = next;
                    break;
                }
                from = next + 1;
            }
            const newline = text.indexOf("\n", pipe + 1);
            if (newline !== -1 && newline < searchEnd) searchEnd = newline;

            const finalClose = text.lastIndexOf(">", searchEnd - 1);
            if (finalClose > pipe) {
                const url = text.slice(open + 1, pipe);
                const label = text.slice(pipe + 1, finalClose);
                out.push(`<${url}|${escapeMrkdwnText(label)}>`);
                pos = finalClose + 1;
                continue;
            }
        } else if (close !== -1 && startsWithLinkScheme(text.slice(open + 1, close))) {
            // <url>
            out.push(text.slice(open, close + 1));
            pos = close + 1;
            continue;
        }

        out.push("&lt;");
        pos = open + 1;
    }

    return out.join("");
}

/**
 * Escape &, < and > outside fenced code, inline code and link URLs.
 */
export function escapeSlackSpecialChars(text: string): string {
    // split() with a capture group puts the code spans at odd indices
    return text
        .split(CODE_SPAN_RE)
        .map((part, i) => (i % 2 === 1 ? part : escapeOutsideCode(part)))
        .join("");
}

/**
 * Markdown in, escaped mrkdwn out. Converted links stay as slots while the
 * surrounding text is escaped, so their labels cannot absorb later text.
 */
export function convertMarkdownToMrkdwn(text: string): string {
    if (!text) return text;
    const converted = convertConstructs(text);
    return fillLinkSlots(escapeSlackSpecialChars(converted.text), converted.links, escapeMrkdwnText);
}
