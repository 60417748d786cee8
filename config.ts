import { ConfigurationError } from "./errors";
import { isLogLevel, type LogLevel } from "./logger";
import type { TwitterCredentials } from "./types";

export const DEFAULT_WAIT_TIMES_URL = "https://www.atl.com/times/";
export const DEFAULT_LOG_FILE = "logs/checkpoint-wait-bot.log";
export const MAX_POST_LENGTH = 280;

const CREDENTIAL_VARS = {
    apiKey: "TWITTER_API_KEY",
    apiSecret: "TWITTER_API_SECRET",
    accessToken: "TWITTER_ACCESS_TOKEN",
    accessTokenSecret: "TWITTER_ACCESS_TOKEN_SECRET",
} as const satisfies Record<keyof TwitterCredentials, string>;

export interface AppConfig {
    credentials: TwitterCredentials | null;
    waitTimesUrl: string;
    scrapeIntervalMs: number;
    requestTimeoutMs: number;
    maxRetries: number;
    retryBackoffMs: number;
    shutdownCheckMs: number;
    postWhenUnavailable: boolean;
    maxPostLength: number;
    logLevel: LogLevel;
    logFile: string | null;
    logMaxBytes: number;
    logBackupCount: number;
    healthPort: number | null;
}

export interface LoadConfigOptions {
    /** Dry runs never post, so they may run without credentials. */
    requireCredentials?: boolean;
}

type Env = Record<string, string | undefined>;

/**
 * Read configuration from environment variables. Every problem found is
 * collected and reported in a single ConfigurationError.
 */
export function loadConfig(env: Env = process.env, options: LoadConfigOptions = {}): AppConfig {
    const { requireCredentials = true } = options;
    const problems: string[] = [];

    const readInt = (key: string, fallback: number, min: number): number => {
        const raw = env[key]?.trim();
        if (!raw) return fallback;
        if (!/^-?\d+$/.test(raw)) {
            problems.push(`${key} must be an integer (got "${raw}")`);
            return fallback;
        }
        const value = parseInt(raw, 10);
        if (value < min) {
            problems.push(`${key} must be at least ${min} (got ${value})`);
            return fallback;
        }
        return value;
    };

    const readSeconds = (key: string, fallback: number): number => {
        const raw = env[key]?.trim();
        if (!raw) return fallback;
        const value = Number(raw);
        if (!Number.isFinite(value) || value <= 0) {
            problems.push(`${key} must be a positive number of seconds (got "${raw}")`);
            return fallback;
        }
        return value;
    };

    const readCredential = (key: string): string => env[key]?.trim() ?? "";
    const missing = Object.values(CREDENTIAL_VARS).filter((key) => !readCredential(key));
    let credentials: TwitterCredentials | null = null;
    if (missing.length === 0) {
        credentials = {
            apiKey: readCredential(CREDENTIAL_VARS.apiKey),
            apiSecret: readCredential(CREDENTIAL_VARS.apiSecret),
            accessToken: readCredential(CREDENTIAL_VARS.accessToken),
            accessTokenSecret: readCredential(CREDENTIAL_VARS.accessTokenSecret),
        };
    } else if (requireCredentials) {
        problems.push(`Missing required environment variables: ${missing.join(", ")}`);
    }

    const waitTimesUrl = env.WAIT_TIMES_URL?.trim() || DEFAULT_WAIT_TIMES_URL;
    if (!isHttpUrl(waitTimesUrl)) {
        problems.push(`WAIT_TIMES_URL is not a valid URL (got "${waitTimesUrl}")`);
    }

    const rawLogLevel = env.LOG_LEVEL?.trim().toLowerCase() || "info";
    let logLevel: LogLevel = "info";
    if (isLogLevel(rawLogLevel)) {
        logLevel = rawLogLevel;
    } else {
        problems.push(`LOG_LEVEL must be one of debug, info, warn, error (got "${rawLogLevel}")`);
    }

    const healthPortRaw = env.HEALTH_PORT?.trim();
    const healthPort = healthPortRaw ? readInt("HEALTH_PORT", 0, 1) : null;

    const config: AppConfig = {
        credentials,
        waitTimesUrl,
        scrapeIntervalMs: readInt("SCRAPE_INTERVAL_MINUTES", 30, 1) * 60_000,
        requestTimeoutMs: readInt("REQUEST_TIMEOUT_SECONDS", 10, 1) * 1000,
        maxRetries: readInt("MAX_RETRIES", 3, 0),
        retryBackoffMs: readSeconds("RETRY_BACKOFF_SECONDS", 2) * 1000,
        shutdownCheckMs: readInt("SHUTDOWN_CHECK_SECONDS", 10, 1) * 1000,
        postWhenUnavailable: parseBoolean(env.POST_WHEN_UNAVAILABLE),
        maxPostLength: MAX_POST_LENGTH,
        logLevel,
        logFile: env.LOG_FILE === undefined ? DEFAULT_LOG_FILE : env.LOG_FILE.trim() || null,
        logMaxBytes: readInt("LOG_MAX_BYTES", 10 * 1024 * 1024, 0),
        logBackupCount: readInt("LOG_BACKUP_COUNT", 5, 0),
        healthPort,
    };

    if (problems.length > 0) {
        throw new ConfigurationError(problems);
    }

    return config;
}

function isHttpUrl(value: string): boolean {
    try {
        const { protocol } = new URL(value);
        return protocol === "http:" || protocol === "https:";
    } catch {
        return false;
    }
}

function parseBoolean(value: string | undefined): boolean {
    if (!value) return false;
    return ["true", "1", "yes", "on"].includes(value.trim().toLowerCase());
}
