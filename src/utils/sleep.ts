/**
 * Abortable timers shared by the worker and the resolver.
 */

export type SleepFunction = (ms: number, signal?: AbortSignal) => Promise<void>;

/** The error a cancelled wait rejects with. Matches what `fetch` throws on abort. */
export function abortError(signal?: AbortSignal): Error {
    if (signal?.reason instanceof Error) return signal.reason;
    const err = new Error("The operation was aborted");
    err.name = "AbortError";
    return err;
}

export function isAbortError(err: unknown): boolean {
    return err instanceof Error && err.name === "AbortError";
}

export function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) throw abortError(signal);
}

/**
 * Wait for `ms`, rejecting with an AbortError as soon as `signal` aborts.
 */
export const sleep: SleepFunction = (ms, signal) => {
    if (signal?.aborted) return Promise.reject(abortError(signal));

    return new Promise<void>((resolve, reject) => {
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(abortError(signal));
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve();
        }, ms);
        signal?.addEventListener("abort", onAbort, { once: true });
    });
};

/**
 * Race `task` against a deadline. On expiry `controller` is aborted so a
 * cooperative task can stop its I/O, and the returned promise rejects with
 * a TimeoutError even if the task ignores the signal.
 */
export async function withTimeout<T>(
    task: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
): Promise<T> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const err = new Error(`Timed out after ${timeoutMs}ms`);
            err.name = "TimeoutError";
            controller.abort(err);
            reject(err);
        }, timeoutMs);
    });

    try {
        return await Promise.race([task(controller.signal), deadline]);
    } finally {
        clearTimeout(timer);
    }
}
