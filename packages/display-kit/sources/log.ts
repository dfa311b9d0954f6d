import { createRequire } from "node:module";

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

import { sliceDisplay } from "./slice/sliceDisplay.js";
import { UNIX_TIMESTAMP_MAX_MILLIS, unixTimestampDisplayShort } from "./timestamp/unixTimestampDisplay.js";
import { valueDebug } from "./value/valueDebug.js";

export type LogFormat = "pretty" | "json";
export type LogDestination = "stdout" | "stderr" | string;

export type LogConfig = {
    level: string;
    format: LogFormat;
    destination: LogDestination;
    service: string;
};

const PRETTY_RESERVED_FIELDS = new Set(["pid", "hostname", "level", "time", "service", "module", "msg"]);
const nodeRequire = createRequire(import.meta.url);

let rootLogger: Logger | null = null;

export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (rootLogger) {
        return rootLogger;
    }

    rootLogger = buildLogger(resolveLogConfig(overrides));
    return rootLogger;
}

export function getLogger(moduleName?: string): Logger {
    const logger = rootLogger ?? initLogging();
    return logger.child({ module: normalizeModule(moduleName) });
}

export function resetLogging(): void {
    rootLogger = null;
}

export function resolveLogConfig(overrides: Partial<LogConfig> = {}): LogConfig {
    const isDev = process.env.NODE_ENV !== "production";
    const level =
        overrides.level ??
        envValue("DISPLAY_KIT_LOG_LEVEL") ??
        envValue("LOG_LEVEL") ??
        (isUnitTestRun() ? "silent" : isDev ? "debug" : "info");
    const destination = overrides.destination ?? envValue("DISPLAY_KIT_LOG_DEST") ?? "stderr";
    let format =
        overrides.format ??
        parseFormat(envValue("DISPLAY_KIT_LOG_FORMAT")) ??
        parseFormat(envValue("LOG_FORMAT")) ??
        "pretty";
    const service = overrides.service ?? "display-kit";

    if (destination !== "stdout" && destination !== "stderr") {
        format = "json";
    }

    return { level, format, destination, service };
}

function buildLogger(config: LogConfig): Logger {
    const options = buildLoggerOptions(config);

    if (config.format === "pretty") {
        const prettyStream = createPrettyStream({
            colorize: true,
            destination: config.destination === "stderr" ? 2 : 1
        });
        if (prettyStream) {
            return pino(options, prettyStream);
        }
    }

    const destination = resolveDestination(config.destination);
    return destination ? pino(options, destination) : pino(options);
}

export function buildLoggerOptions(config: LogConfig): LoggerOptions {
    return {
        level: config.level,
        timestamp: pino.stdTimeFunctions.epochTime,
        base: { service: config.service },
        errorKey: "error",
        serializers: {
            error: pino.stdSerializers.err
        }
    };
}

/**
 * Builds a pino-pretty stream whose whole line comes from formatPrettyMessage.
 * Level and time keys point at fields pino never writes, so pino-pretty adds no prefix of its own.
 * Returns null when pino-pretty cannot be loaded.
 */
export function createPrettyStream(target: {
    colorize: boolean;
    destination: number | NodeJS.WritableStream;
}): DestinationStream | null {
    const prettyFactory = resolvePrettyFactory();
    if (!prettyFactory) {
        return null;
    }
    return prettyFactory({
        colorize: target.colorize,
        translateTime: false,
        ignore: "pid,hostname,level,time,service,module",
        hideObject: true,
        levelKey: "__level",
        timestampKey: "__time",
        messageFormat: formatPrettyMessage,
        singleLine: false,
        destination: target.destination
    });
}

/**
 * Renders a log record as "[HH:mm:ss.SSS] [module] message key=value".
 * Array fields are rendered with sliceDisplay, so long lists stay short.
 */
export function formatPrettyMessage(log: Record<string, unknown>, messageKey: string): string {
    const time = formatLogTime(log.time);
    const module = normalizeModule(typeof log.module === "string" ? log.module : undefined);
    const messageValue = log[messageKey];
    const message = messageValue === undefined || messageValue === null ? "" : String(messageValue);
    const details = formatPrettyDetails(log, messageKey);
    const parts = [`[${time}]`, `[${module}]`, message, details].filter((part) => part.length > 0);
    return parts.join(" ");
}

function formatPrettyDetails(log: Record<string, unknown>, messageKey: string): string {
    const details: string[] = [];
    for (const [key, value] of Object.entries(log)) {
        if (key === messageKey || PRETTY_RESERVED_FIELDS.has(key) || value === undefined) {
            continue;
        }
        details.push(`${key}=${formatPrettyDetailValue(value)}`);
    }
    return details.join(" ");
}

function formatPrettyDetailValue(value: unknown): string {
    if (Array.isArray(value)) {
        return sliceDisplay(value.map((entry: unknown) => formatPrettyDetailValue(entry)));
    }
    if (typeof value === "string") {
        return /[=\s]/.test(value) || value.length === 0 ? JSON.stringify(value) : value;
    }
    return valueDebug(value);
}

function formatLogTime(value: unknown): string {
    const millis =
        typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= UNIX_TIMESTAMP_MAX_MILLIS
            ? value
            : Date.now();
    return unixTimestampDisplayShort(millis).slice("yyyy-MM-ddT".length);
}

function normalizeModule(moduleName?: string): string {
    const trimmed = moduleName?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : "unknown";
}

function resolveDestination(destination: LogDestination): DestinationStream | undefined {
    if (destination === "stdout") {
        return undefined;
    }
    if (destination === "stderr") {
        return pino.destination(2);
    }
    return pino.destination({ dest: destination, mkdir: true, sync: false });
}

function resolvePrettyFactory(): ((options: Record<string, unknown>) => DestinationStream) | null {
    try {
        return nodeRequire("pino-pretty");
    } catch {
        return null;
    }
}

function parseFormat(value: string | null): LogFormat | null {
    const normalized = value?.toLowerCase().trim();
    return normalized === "pretty" || normalized === "json" ? normalized : null;
}

function envValue(key: string): string | null {
    const value = process.env[key]?.trim();
    return value ? value : null;
}

function isUnitTestRun(): boolean {
    return process.env.VITEST === "true" || process.env.VITEST === "1";
}
