/**
 * Enrichment — ask the agent to read an article and return structured output.
 */

import { z } from "zod";
import type { BookmarkEntry } from "../bookmarks/models.js";
import { createLogger, type Logger } from "../utils/logger.js";
import type { AgentQuery, AgentQueryOptions } from "./agent.js";
import {
    AgentResultError,
    InvalidInputError,
    NoResultMessageError,
    StructuredOutputError,
} from "./errors.js";
import { buildSummaryPrompt } from "./prompt.js";
import { OUTPUT_JSON_SCHEMA, structuredOutputSchema, type StructuredOutput } from "./schema.js";

export const DEFAULT_MAX_TURNS = 10;
export const ALLOWED_TOOLS = ["WebFetch", "WebSearch"];

const resultMessageSchema = z.object({
    type: z.literal("result"),
    subtype: z.string(),
    is_error: z.boolean(),
    result: z.string().optional(),
    errors: z.array(z.string()).optional(),
    structured_output: z.unknown().optional(),
});

type ResultMessage = z.infer<typeof resultMessageSchema>;

export interface SummarizeOptions {
    supplementaryUrls?: string[];
    bookmarkEntry?: BookmarkEntry | null;
    maxTurns?: number;
    logger?: Logger;
    signal?: AbortSignal;
}

export function buildAgentOptions(
    maxTurns: number = DEFAULT_MAX_TURNS,
    abortController?: AbortController,
): AgentQueryOptions {
    return {
        maxTurns,
        allowedTools: [...ALLOWED_TOOLS],
        permissionMode: "acceptEdits",
        outputFormat: { type: "json_schema", schema: OUTPUT_JSON_SCHEMA },
        ...(abortController ? { abortController } : {}),
    };
}

function diagnosticOf(message: ResultMessage): string {
    if (message.result) return message.result;
    if (message.errors && message.errors.length > 0) return message.errors.join("; ");
    return "";
}

/**
 * Run the agent on `url` and validate what it returns.
 *
 * @throws InvalidInputError when `url` is empty
 * @throws NoResultMessageError when the stream ends without a result
 * @throws AgentResultError when the result carries the error flag
 * @throws StructuredOutputError when the structured output is missing or invalid
 */
export async function fetchAndSummarize(
    agentQuery: AgentQuery,
    url: string,
    opts: SummarizeOptions = {},
): Promise<StructuredOutput> {
    if (url.trim() === "") {
        throw new InvalidInputError("URL must not be empty");
    }
    const log = opts.logger ?? createLogger("Summarizer");
    const prompt = buildSummaryPrompt(url, opts.supplementaryUrls, opts.bookmarkEntry);

    // The agent gets its own controller, aborted together with the caller's signal
    const controller = new AbortController();
    const { signal } = opts;
    const onAbort = (): void => controller.abort(signal?.reason);
    if (signal?.aborted) onAbort();
    else signal?.addEventListener("abort", onAbort, { once: true });

    let last: ResultMessage | undefined;
    try {
        const options = buildAgentOptions(opts.maxTurns, controller);
        for await (const message of agentQuery({ prompt, options })) {
            const parsed = resultMessageSchema.safeParse(message);
            if (parsed.success) last = parsed.data;
        }
    } finally {
        signal?.removeEventListener("abort", onAbort);
    }

    if (!last) {
        throw new NoResultMessageError(`Agent returned no result message for ${url}`);
    }
    const diagnostic = diagnosticOf(last);
    if (last.is_error) {
        throw new AgentResultError(`Agent failed for ${url} (subtype=${last.subtype}): ${diagnostic}`, diagnostic);
    }
    if (last.structured_output === undefined || last.structured_output === null) {
        throw new StructuredOutputError(
            `Agent returned no structured output for ${url} (subtype=${last.subtype}, result=${diagnostic})`,
        );
    }

    const output = structuredOutputSchema.safeParse(last.structured_output);
    if (!output.success) {
        const issues = output.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
        throw new StructuredOutputError(`Structured output for ${url} failed validation: ${issues}`, {
            cause: output.error,
        });
    }

    log.debug(`Summarized ${url}: "${output.data.meta.title}"`);
    return output.data;
}
