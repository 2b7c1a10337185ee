/**
 * Enricher Logger — Structured logging with levels and color output.
 */

import chalk from "chalk";

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    SILENT = 4,
}

const LEVEL_LABELS: Record<LogLevel, string> = {
    [LogLevel.DEBUG]: chalk.dim("DEBUG"),
    [LogLevel.INFO]: chalk.cyan("INFO "),
    [LogLevel.WARN]: chalk.yellow("WARN "),
    [LogLevel.ERROR]: chalk.red("ERROR"),
    [LogLevel.SILENT]: "",
};

export class Logger {
    private level: LogLevel;
    private readonly prefix: string;

    constructor(prefix: string, level: LogLevel = LogLevel.INFO) {
        this.prefix = prefix;
        this.level = level;
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    getLevel(): LogLevel {
        return this.level;
    }

    private format(level: LogLevel, msg: string): string {
        const ts = new Date().toISOString().slice(11, 23);
        return `${chalk.dim(ts)} ${LEVEL_LABELS[level]} ${chalk.dim("[")}${chalk.bold(this.prefix)}${chalk.dim("]")} ${msg}`;
    }

    debug(msg: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.DEBUG) {
            console.log(this.format(LogLevel.DEBUG, msg), ...args);
        }
    }

    info(msg: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.INFO) {
            console.log(this.format(LogLevel.INFO, msg), ...args);
        }
    }

    warn(msg: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.WARN) {
            console.warn(this.format(LogLevel.WARN, msg), ...args);
        }
    }

    error(msg: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.ERROR) {
            console.error(this.format(LogLevel.ERROR, msg), ...args);
        }
    }

    child(prefix: string): Logger {
        return new Logger(`${this.prefix}:${prefix}`, this.level);
    }
}

/** Parse a level name such as "debug" or "WARN". Unknown names yield undefined. */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
    switch (name?.trim().toUpperCase()) {
        case "DEBUG": return LogLevel.DEBUG;
        case "INFO": return LogLevel.INFO;
        case "WARN": return LogLevel.WARN;
        case "ERROR": return LogLevel.ERROR;
        case "SILENT": return LogLevel.SILENT;
        default: return undefined;
    }
}

/** Global log level — set via ENRICHER_LOG_LEVEL env or programmatically */
let globalLevel = parseLogLevel(process.env.ENRICHER_LOG_LEVEL) ?? LogLevel.INFO;

export function createLogger(prefix: string): Logger {
    return new Logger(prefix, globalLevel);
}

export function setGlobalLogLevel(level: LogLevel): void {
    globalLevel = level;
}

/** Render an unknown thrown value for a log line. */
export function describeError(err: unknown): string {
    if (err instanceof Error) return `${err.name}: ${err.message}`;
    return String(err);
}
