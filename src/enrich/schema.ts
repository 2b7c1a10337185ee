/**
 * Enrichment — structured output the agent must return.
 */

import { z } from "zod";

export const MAX_SUMMARY_POINTS = 5;

export const metaSchema = z.object({
    title: z.string().min(1),
    url: z.string().min(1),
    author: z.string().nullish(),
    category_large: z.string().nullish(),
    category_medium: z.string().nullish(),
    published_at: z.string().nullish(),
});

export const summarySchema = z.object({
    points: z.array(z.string()).min(1).max(MAX_SUMMARY_POINTS),
});

export const structuredOutputSchema = z.object({
    meta: metaSchema,
    summary: summarySchema,
    detail: z.string(),
});

export type Meta = z.infer<typeof metaSchema>;
export type Summary = z.infer<typeof summarySchema>;
export type StructuredOutput = z.infer<typeof structuredOutputSchema>;

const nullableString = (description: string) => ({ type: ["string", "null"], description });

/** JSON Schema handed to the agent as its output format. Mirrors structuredOutputSchema. */
export const OUTPUT_JSON_SCHEMA: Record<string, unknown> = {
    type: "object",
    properties: {
        meta: {
            type: "object",
            properties: {
                title: { type: "string", description: "Article title" },
                url: { type: "string", description: "Article URL" },
                author: nullableString("Author name, null when unknown"),
                category_large: nullableString("Broad category, null when unknown"),
                category_medium: nullableString("Narrower category, null when unknown"),
                published_at: nullableString("Publication time in ISO 8601, null when unknown"),
            },
            required: ["title", "url", "author", "category_large", "category_medium", "published_at"],
        },
        summary: {
            type: "object",
            properties: {
                points: {
                    type: "array",
                    items: { type: "string" },
                    minItems: 1,
                    maxItems: MAX_SUMMARY_POINTS,
                    description: "Short bullet points with the core of the article",
                },
            },
            required: ["points"],
        },
        detail: { type: "string", description: "Structured detailed explanation in markdown" },
    },
    required: ["meta", "summary", "detail"],
};
