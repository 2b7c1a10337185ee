/**
 * Slack API errors.
 */

export class SlackError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "SlackError";
    }
}

/** A Slack Web API call failed; `errorCode` is Slack's machine-readable code. */
export class SlackApiError extends SlackError {
    readonly errorCode: string;

    constructor(message: string, errorCode: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "SlackApiError";
        this.errorCode = errorCode;
    }
}
