import { createRequire } from "node:module";

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogFormat = "pretty" | "json";
export type LogDestination = "stdout" | "stderr" | string;

export type LogConfig = {
    level: string;
    format: LogFormat;
    destination: LogDestination;
    redact: string[];
    service: string;
};

const DEFAULT_REDACT = ["token", "password", "secret", "apiKey", "*.token", "*.password", "*.secret", "*.apiKey"];
const MODULE_WIDTH = 16;
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
    const isUnitTest = process.env.VITEST === "true" || process.env.VITEST === "1";
    const level =
        overrides.level ??
        envValue("CLIBRIDGE_LOG_LEVEL") ??
        envValue("LOG_LEVEL") ??
        (isUnitTest ? "silent" : process.env.NODE_ENV === "production" ? "info" : "warn");
    // stdout carries command output, so logs default to stderr
    const destination = overrides.destination ?? envValue("CLIBRIDGE_LOG_DEST") ?? envValue("LOG_DEST") ?? "stderr";
    const forceJson = parseBooleanFlag(envValue("CLIBRIDGE_LOG_JSON")) ?? false;
    let format =
        overrides.format ??
        parseFormat(envValue("CLIBRIDGE_LOG_FORMAT")) ??
        parseFormat(envValue("LOG_FORMAT")) ??
        (forceJson ? "json" : "pretty");
    if (destination !== "stdout" && destination !== "stderr") {
        format = "json";
    }

    return {
        level,
        format,
        destination,
        redact: overrides.redact ?? DEFAULT_REDACT,
        service: overrides.service ?? envValue("CLIBRIDGE_LOG_SERVICE") ?? "clibridge"
    };
}

function buildLogger(config: LogConfig): Logger {
    const options: LoggerOptions = {
        level: config.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: { service: config.service },
        redact: config.redact.length > 0 ? { paths: config.redact, censor: "[REDACTED]" } : undefined,
        errorKey: "error",
        serializers: {
            error: pino.stdSerializers.err
        }
    };

    if (config.format === "pretty") {
        const prettyFactory = resolvePrettyFactory();
        if (prettyFactory) {
            return pino(
                options,
                prettyFactory({
                    colorize: !process.env.NO_COLOR,
                    ignore: "pid,hostname,service,module",
                    messageFormat: formatPrettyMessage,
                    destination: config.destination === "stdout" ? 1 : 2
                })
            );
        }
    }

    const destination = resolveDestination(config.destination);
    return destination ? pino(options, destination) : pino(options);
}

export function formatPrettyMessage(log: Record<string, unknown>, messageKey: string): string {
    const module = normalizeModule(typeof log.module === "string" ? log.module : undefined);
    const label = module.length >= MODULE_WIDTH ? module.slice(0, MODULE_WIDTH) : module.padEnd(MODULE_WIDTH, " ");
    const message = log[messageKey];
    return `[${label}] ${message === undefined || message === null ? "" : String(message)}`;
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
    if (!value) {
        return null;
    }
    const normalized = value.toLowerCase();
    return normalized === "pretty" || normalized === "json" ? normalized : null;
}

function parseBooleanFlag(value: string | null): boolean | null {
    if (!value) {
        return null;
    }
    const normalized = value.toLowerCase();
    if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on") {
        return true;
    }
    if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off") {
        return false;
    }
    return null;
}

function envValue(key: string): string | null {
    const value = process.env[key]?.trim();
    return value ? value : null;
}
