/**
 * Links — reachability check before handing a URL to the agent.
 */

import { createLogger, describeError, type Logger } from "../utils/logger.js";

/** Statuses that will not change on retry; the agent is not called for them. */
export const PERMANENT_FAILURE_STATUSES: ReadonlySet<number> = new Set([403, 404, 410]);

export const DEFAULT_STATUS_TIMEOUT_MS = 10_000;

export interface UrlStatusChecker {
    /** HTTP status of `url`, or null when it could not be determined. */
    check(url: string): Promise<number | null>;
}

export function isPermanentFailure(status: number | null): boolean {
    return status !== null && PERMANENT_FAILURE_STATUSES.has(status);
}

/**
 * HEAD request following redirects. Network errors and timeouts yield null
 * so an unreachable-for-us URL is still offered to the agent.
 */
export class FetchUrlStatusChecker implements UrlStatusChecker {
    private readonly timeoutMs: number;
    private readonly log: Logger;

    constructor(opts: { timeoutMs?: number; logger?: Logger } = {}) {
        this.timeoutMs = opts.timeoutMs ?? DEFAULT_STATUS_TIMEOUT_MS;
        this.log = opts.logger ?? createLogger("UrlStatus");
    }

    async check(url: string): Promise<number | null> {
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.timeoutMs);

        try {
            const response = await fetch(url, {
                method: "HEAD",
                redirect: "follow",
                signal: controller.signal,
            });
            return response.status;
        } catch (err) {
            this.log.debug(`Status check failed for ${url}: ${describeError(err)}`);
            return null;
        } finally {
            clearTimeout(timer);
        }
    }
}
