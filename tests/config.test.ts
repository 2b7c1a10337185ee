/**
 * Tests for configuration loading.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { mkdtempSync, writeFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError, loadAppConfig, loadConfig, loadEnvConfig, parseAppConfig } from "../src/utils/config.js";
import { LogLevel, setGlobalLogLevel } from "../src/utils/logger.js";

const dirs: string[] = [];

function tempConfig(content: string): string {
    const dir = mkdtempSync(join(tmpdir(), "enricher-config-"));
    dirs.push(dir);
    const path = join(dir, "config.yaml");
    writeFileSync(path, content);
    return path;
}

afterEach(() => {
    vi.unstubAllEnvs();
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
});

describe("parseAppConfig", () => {
    it("should apply defaults", () => {
        expect(parseAppConfig("polling_interval: 300\n")).toEqual({
            polling_interval: 300,
            message_limit: 10,
            hatena_bookmark: false,
            check_url_status: true,
        });
    });

    it("should read every key", () => {
        const raw = "polling_interval: 60\nmessage_limit: 5\nhatena_bookmark: true\ncheck_url_status: false\n";
        expect(parseAppConfig(raw)).toEqual({
            polling_interval: 60,
            message_limit: 5,
            hatena_bookmark: true,
            check_url_status: false,
        });
    });

    it("should reject unknown keys", () => {
        expect(() => parseAppConfig("polling_interval: 60\nchannel: general\n")).toThrow(ConfigError);
    });

    it("should reject non-positive numbers", () => {
        expect(() => parseAppConfig("message_limit: 0\n")).toThrow(ConfigError);
    });

    it("should reject an empty file", () => {
        expect(() => parseAppConfig("", "config.yaml")).toThrow("Config file is empty: config.yaml");
    });

    it("should reject invalid YAML", () => {
        expect(() => parseAppConfig("polling_interval: [1, 2\n", "config.yaml")).toThrow("Invalid YAML in config.yaml");
    });
});

describe("loadAppConfig", () => {
    it("should read the file from disk", () => {
        expect(loadAppConfig(tempConfig("message_limit: 3\n")).message_limit).toBe(3);
    });

    it("should fail for a missing file", () => {
        expect(() => loadAppConfig(join(tmpdir(), "enricher-missing", "config.yaml"))).toThrow(ConfigError);
    });
});

describe("loadEnvConfig", () => {
    it("should read the Slack settings", () => {
        expect(loadEnvConfig({ SLACK_BOT_TOKEN: "xoxb-test", SLACK_CHANNEL_ID: "C123" })).toEqual({
            SLACK_BOT_TOKEN: "xoxb-test",
            SLACK_CHANNEL_ID: "C123",
        });
    });

    it("should name the missing variable", () => {
        expect(() => loadEnvConfig({ SLACK_CHANNEL_ID: "C123" })).toThrow(/SLACK_BOT_TOKEN/);
    });
});

describe("loadConfig", () => {
    it("should combine the file and the environment", () => {
        vi.stubEnv("SLACK_BOT_TOKEN", "xoxb-test");
        vi.stubEnv("SLACK_CHANNEL_ID", "C123");

        expect(loadConfig(tempConfig("polling_interval: 120\nhatena_bookmark: true\n"))).toEqual({
            slackBotToken: "xoxb-test",
            channelId: "C123",
            pollingIntervalSeconds: 120,
            messageLimit: 10,
            hatenaBookmark: true,
            checkUrlStatus: true,
        });
    });

    it("should log the .env it loads at the level set after import", () => {
        vi.stubEnv("SLACK_BOT_TOKEN", "xoxb-test");
        vi.stubEnv("SLACK_CHANNEL_ID", "C123");
        const path = tempConfig("polling_interval: 120\n");
        const envPath = join(path, "..", ".env");
        writeFileSync(envPath, "SLACK_CHANNEL_ID=C999\n");
        const log = vi.spyOn(console, "log").mockImplementation(() => {});
        setGlobalLogLevel(LogLevel.DEBUG);

        try {
            expect(loadConfig(path).channelId).toBe("C123");
            const lines = log.mock.calls.map((call) => String(call[0]));
            expect(lines.some((line) => line.includes(`Loaded .env from ${envPath}`))).toBe(true);
        } finally {
            setGlobalLogLevel(LogLevel.INFO);
            log.mockRestore();
        }
    });
});
