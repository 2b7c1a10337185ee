/**
 * Enrichment — public API.
 */

export { claudeAgentQuery } from "./agent.js";
export type { AgentQuery, AgentQueryOptions } from "./agent.js";
export {
    EnrichmentError,
    InvalidInputError,
    NoResultMessageError,
    AgentResultError,
    StructuredOutputError,
} from "./errors.js";
export { buildSummaryPrompt, MAX_PROMPT_COMMENTS } from "./prompt.js";
export {
    buildDetailBlocks,
    buildDetailMarkdown,
    buildMetaBlocks,
    buildSummaryBlocks,
    formatMetaText,
    formatSummaryText,
    renderEnrichResult,
} from "./render.js";
export type { EnrichResult } from "./render.js";
export { OUTPUT_JSON_SCHEMA, structuredOutputSchema } from "./schema.js";
export type { Meta, StructuredOutput, Summary } from "./schema.js";
export { fetchAndSummarize, buildAgentOptions, DEFAULT_MAX_TURNS } from "./summarizer.js";
export type { SummarizeOptions } from "./summarizer.js";
