/**
 * Slack Block Kit — the subset of blocks the enricher posts.
 */

export const HEADER_TEXT_LIMIT = 150;
export const SECTION_FIELDS_LIMIT = 10;

export interface SlackTextObject {
    type: "plain_text" | "mrkdwn";
    text: string;
}

export interface SlackHeaderBlock {
    type: "header";
    text: SlackTextObject & { type: "plain_text" };
}

export interface SlackSectionBlock {
    type: "section";
    text?: SlackTextObject;
    fields?: SlackTextObject[];
}

export interface SlackTextElement {
    type: "text";
    text: string;
}

export interface SlackRichTextSection {
    type: "rich_text_section";
    elements: SlackTextElement[];
}

export interface SlackRichTextList {
    type: "rich_text_list";
    style: "bullet" | "ordered";
    elements: SlackRichTextSection[];
}

export interface SlackRichTextBlock {
    type: "rich_text";
    elements: Array<SlackRichTextSection | SlackRichTextList>;
}

export type SlackBlock =
    | SlackHeaderBlock
    | SlackSectionBlock
    | SlackRichTextBlock;

// ── Builders ───────────────────────────────────────────────────

export function plainText(text: string): SlackTextObject & { type: "plain_text" } {
    return { type: "plain_text", text };
}

export function mrkdwn(text: string): SlackTextObject {
    return { type: "mrkdwn", text };
}

/** Header text is plain text capped at 150 characters. */
export function headerBlock(text: string): SlackHeaderBlock {
    return { type: "header", text: plainText(Array.from(text).slice(0, HEADER_TEXT_LIMIT).join("")) };
}

export function sectionBlock(text: string): SlackSectionBlock {
    return { type: "section", text: mrkdwn(text) };
}

export function fieldsBlock(fields: SlackTextObject[]): SlackSectionBlock {
    if (fields.length > SECTION_FIELDS_LIMIT) {
        throw new RangeError(`A section holds at most ${SECTION_FIELDS_LIMIT} fields, got ${fields.length}`);
    }
    return { type: "section", fields };
}

export function bulletListBlock(items: string[]): SlackRichTextBlock {
    return {
        type: "rich_text",
        elements: [
            {
                type: "rich_text_list",
                style: "bullet",
                elements: items.map((item) => ({
                    type: "rich_text_section",
                    elements: [{ type: "text", text: item }],
                })),
            },
        ],
    };
}
