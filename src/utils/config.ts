/**
 * Config Loader — config.yaml for behaviour, .env / environment for secrets.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve, dirname, join } from "node:path";
import YAML from "yaml";
import dotenv from "dotenv";
import { z } from "zod";
import { createLogger } from "./logger.js";

export class ConfigError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ConfigError";
    }
}

// ── Schemas ────────────────────────────────────────────────────

export const appConfigSchema = z
    .object({
        polling_interval: z.number().int().positive().default(600),
        message_limit: z.number().int().positive().default(10),
        hatena_bookmark: z.boolean().default(false),
        check_url_status: z.boolean().default(true),
    })
    .strict();

export const envConfigSchema = z.object({
    SLACK_BOT_TOKEN: z.string().min(1, "SLACK_BOT_TOKEN is required"),
    SLACK_CHANNEL_ID: z.string().min(1, "SLACK_CHANNEL_ID is required"),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type EnvConfig = z.infer<typeof envConfigSchema>;

export interface Config {
    slackBotToken: string;
    channelId: string;
    pollingIntervalSeconds: number;
    messageLimit: number;
    hatenaBookmark: boolean;
    checkUrlStatus: boolean;
}

function describeIssues(error: z.ZodError): string {
    return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

// ── Loaders ────────────────────────────────────────────────────

/**
 * Parse and validate config.yaml text. Unknown keys are rejected.
 */
export function parseAppConfig(raw: string, source = "config"): AppConfig {
    let data: unknown;
    try {
        data = YAML.parse(raw);
    } catch (err) {
        throw new ConfigError(`Invalid YAML in ${source}`, { cause: err });
    }
    if (data === null || data === undefined) {
        throw new ConfigError(`Config file is empty: ${source}`);
    }

    const parsed = appConfigSchema.safeParse(data);
    if (!parsed.success) {
        throw new ConfigError(`Invalid config in ${source}: ${describeIssues(parsed.error)}`, {
            cause: parsed.error,
        });
    }
    return parsed.data;
}

export function loadAppConfig(path: string): AppConfig {
    const fullPath = resolve(path);
    if (!existsSync(fullPath)) {
        throw new ConfigError(`Config not found: ${fullPath}`);
    }
    return parseAppConfig(readFileSync(fullPath, "utf-8"), fullPath);
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
    const parsed = envConfigSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(`Invalid environment: ${describeIssues(parsed.error)}`, { cause: parsed.error });
    }
    return parsed.data;
}

/**
 * Load config.yaml and the environment. A .env beside the config file wins
 * over one in the working directory; variables already set are kept.
 */
export function loadConfig(path: string): Config {
    const log = createLogger("Config");
    const fullPath = resolve(path);

    const envPath = join(dirname(fullPath), ".env");
    if (existsSync(envPath)) {
        dotenv.config({ path: envPath });
        log.debug(`Loaded .env from ${envPath}`);
    } else {
        dotenv.config();
    }

    const app = loadAppConfig(fullPath);
    const secrets = loadEnvConfig(process.env);

    return {
        slackBotToken: secrets.SLACK_BOT_TOKEN,
        channelId: secrets.SLACK_CHANNEL_ID,
        pollingIntervalSeconds: app.polling_interval,
        messageLimit: app.message_limit,
        hatenaBookmark: app.hatena_bookmark,
        checkUrlStatus: app.check_url_status,
    };
}
