/**
 * Enrichment errors.
 */

export class EnrichmentError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "EnrichmentError";
    }
}

/** The caller passed something the enrichment cannot work with (an empty URL). */
export class InvalidInputError extends EnrichmentError {
    constructor(message: string) {
        super(message);
        this.name = "InvalidInputError";
    }
}

/** The agent stream ended without a result message. */
export class NoResultMessageError extends EnrichmentError {
    constructor(message: string) {
        super(message);
        this.name = "NoResultMessageError";
    }
}

/** The agent finished with its error flag set. */
export class AgentResultError extends EnrichmentError {
    /** Diagnostic text the agent returned. */
    readonly result: string;

    constructor(message: string, result: string) {
        super(message);
        this.name = "AgentResultError";
        this.result = result;
    }
}

/** The agent produced no structured output, or output that fails validation. */
export class StructuredOutputError extends EnrichmentError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "StructuredOutputError";
    }
}
