/**
 * Tests for the URL status check.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { FetchUrlStatusChecker, isPermanentFailure } from "../src/links/status.js";
import { Logger, LogLevel } from "../src/utils/logger.js";

const logger = new Logger("test", LogLevel.SILENT);

afterEach(() => {
    vi.unstubAllGlobals();
});

describe("isPermanentFailure", () => {
    it("should flag 403, 404 and 410 only", () => {
        expect([403, 404, 410].map(isPermanentFailure)).toEqual([true, true, true]);
        expect(isPermanentFailure(200)).toBe(false);
        expect(isPermanentFailure(500)).toBe(false);
        expect(isPermanentFailure(null)).toBe(false);
    });
});

describe("FetchUrlStatusChecker", () => {
    it("should return the status of a HEAD request", async () => {
        const fetchMock = vi.fn().mockResolvedValue(new Response(null, { status: 404 }));
        vi.stubGlobal("fetch", fetchMock);

        expect(await new FetchUrlStatusChecker({ logger }).check("https://example.com/gone")).toBe(404);
        expect(fetchMock).toHaveBeenCalledWith(
            "https://example.com/gone",
            expect.objectContaining({ method: "HEAD", redirect: "follow" }),
        );
    });

    it("should return null when the request fails", async () => {
        vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));

        expect(await new FetchUrlStatusChecker({ logger }).check("https://unreachable.example")).toBeNull();
    });
});
