#!/usr/bin/env node

/**
 * slack-link-enricher CLI — poll a channel and reply with link summaries.
 */

import { Command } from "commander";
import chalk from "chalk";
import { WebClient } from "@slack/web-api";
import { HatenaBookmarkClient } from "../bookmarks/client.js";
import { claudeAgentQuery } from "../enrich/agent.js";
import { GoogleNewsDecoder } from "../links/google-news.js";
import { UrlResolver } from "../links/resolve.js";
import { FetchUrlStatusChecker } from "../links/status.js";
import { SlackClient } from "../slack/client.js";
import { loadConfig, type Config } from "../utils/config.js";
import { describeError, parseLogLevel, setGlobalLogLevel } from "../utils/logger.js";
import { EnrichmentWorker, type BatchResult } from "../worker.js";
import { VERSION } from "../index.js";

const program: Command = new Command();

// ── Helpers ───────────────────────────────────────────────────

function success(msg: string): void { console.log(chalk.green(`  ✓ ${msg}`)); }
function fail(msg: string): void { console.error(chalk.red(`  ✗ ${msg}`)); }

function buildWorker(config: Config): EnrichmentWorker {
    return new EnrichmentWorker({
        channelClient: new SlackClient(new WebClient(config.slackBotToken)),
        channelId: config.channelId,
        messageLimit: config.messageLimit,
        agentQuery: claudeAgentQuery,
        resolver: new UrlResolver({ decoder: new GoogleNewsDecoder() }),
        bookmarkClient: config.hatenaBookmark ? new HatenaBookmarkClient() : undefined,
        urlStatusChecker: config.checkUrlStatus ? new FetchUrlStatusChecker() : undefined,
        pollingIntervalMs: config.pollingIntervalSeconds * 1000,
    });
}

function loadWorker(configFile: string): EnrichmentWorker | undefined {
    try {
        return buildWorker(loadConfig(configFile));
    } catch (err) {
        fail(`Config error: ${describeError(err)}`);
        process.exitCode = 1;
        return undefined;
    }
}

function printResult(result: BatchResult): void {
    const rows: Array<[string, string]> = [
        ["processed", String(result.processedCount)],
        ["success", String(result.successCount)],
        ["error", String(result.errorCount)],
        ["skipped", String(result.skippedCount)],
        ["timed out", String(result.timedOut)],
        ["remaining", String(result.remainingCount)],
    ];
    for (const [label, value] of rows) {
        console.log(`  ${chalk.dim(label.padEnd(10))} ${value}`);
    }
}

// ── CLI Setup ─────────────────────────────────────────────────

program
    .name("slack-link-enricher")
    .description("Reply to links posted in a Slack channel with a structured summary")
    .version(VERSION)
    .option("-l, --log-level <level>", "Log level (debug, info, warn, error, silent)")
    .hook("preAction", () => {
        const name = program.opts<{ logLevel?: string }>().logLevel;
        if (name === undefined) return;
        const level = parseLogLevel(name);
        if (level === undefined) {
            program.error(`Unknown log level: ${name}`);
        }
        setGlobalLogLevel(level);
    });

// ── Run ───────────────────────────────────────────────────────

program
    .command("run")
    .description("Poll the channel until interrupted")
    .argument("[config]", "Path to config.yaml", "config.yaml")
    .action(async (configFile: string) => {
        const worker = loadWorker(configFile);
        if (!worker) return;

        const controller = new AbortController();
        const stop = (): void => controller.abort();
        process.once("SIGINT", stop);
        process.once("SIGTERM", stop);

        try {
            await worker.run(controller.signal);
        } catch (err) {
            if (!controller.signal.aborted) throw err;
            success("Stopped");
        } finally {
            process.off("SIGINT", stop);
            process.off("SIGTERM", stop);
        }
    });

// ── Once ──────────────────────────────────────────────────────

program
    .command("once")
    .description("Process the unreplied messages once and print the counts")
    .argument("[config]", "Path to config.yaml", "config.yaml")
    .action(async (configFile: string) => {
        const worker = loadWorker(configFile);
        if (!worker) return;

        const result = await worker.enrichAndReplyPendingMessages();
        success("Pass complete");
        printResult(result);
        if (result.errorCount > 0) process.exitCode = 1;
    });

// ── Parse ─────────────────────────────────────────────────────

program.parseAsync().catch((err: unknown) => {
    fail(describeError(err));
    process.exitCode = 1;
});
