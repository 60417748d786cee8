import "dotenv/config";
import type { Server } from "http";
import { loadConfig, type AppConfig } from "./config";
import { ConfigurationError } from "./errors";
import { WaitTimeFetcher } from "./fetcher";
import { createLogger, type Logger } from "./logger";
import { StatusPublisher, createTwitterClient } from "./publisher";
import { checkSourceConnectivity, createHealthApp } from "./routes/health";
import { WaitTimesRunner } from "./runner";

export function createAppLogger(config: AppConfig): Logger {
    return createLogger("checkpoint-wait-bot", {
        consoleLevel: config.logLevel,
        file: config.logFile
            ? {
                  path: config.logFile,
                  maxBytes: config.logMaxBytes,
                  backupCount: config.logBackupCount,
              }
            : undefined,
    });
}

function startHealthServer(port: number, runner: WaitTimesRunner, config: AppConfig, logger: Logger): Server {
    const app = createHealthApp({
        getStatus: () => runner.status(),
        sourceUrl: config.waitTimesUrl,
        timeoutMs: config.requestTimeoutMs,
    });
    return app.listen(port, () => {
        logger.info(`Health endpoint listening at http://localhost:${port}/health`);
    });
}

async function main(): Promise<void> {
    const config = loadConfig();
    const logger = createAppLogger(config);

    logger.info("Starting checkpoint wait-times bot");

    if (!config.credentials) {
        throw new ConfigurationError(["Posting credentials are required"]);
    }

    const connectivity = await checkSourceConnectivity(config.waitTimesUrl, config.requestTimeoutMs);
    if (connectivity.status === "healthy") {
        logger.info(`Source page reachable in ${connectivity.responseTime}ms`);
    } else {
        logger.warn(`Source page check failed: ${connectivity.error ?? "unknown error"}`);
    }

    const shutdown = new AbortController();
    const onSignal = (signal: NodeJS.Signals) => {
        logger.info(`Received ${signal}. Initiating graceful shutdown...`);
        shutdown.abort();
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);

    const runner = new WaitTimesRunner({
        url: config.waitTimesUrl,
        source: new WaitTimeFetcher({
            timeoutMs: config.requestTimeoutMs,
            maxRetries: config.maxRetries,
            baseDelayMs: config.retryBackoffMs,
            jitter: true,
            logger: logger.child("fetcher"),
        }),
        publisher: new StatusPublisher(createTwitterClient(config.credentials), {
            maxLength: config.maxPostLength,
            logger: logger.child("publisher"),
        }),
        logger,
        signal: shutdown.signal,
        intervalMs: config.scrapeIntervalMs,
        shutdownCheckMs: config.shutdownCheckMs,
        maxPostLength: config.maxPostLength,
        postWhenUnavailable: config.postWhenUnavailable,
    });

    const server = config.healthPort ? startHealthServer(config.healthPort, runner, config, logger) : null;

    try {
        await runner.run();
    } finally {
        server?.close();
        process.off("SIGINT", onSignal);
        process.off("SIGTERM", onSignal);
    }
}

if (require.main === module) {
    main().catch((error) => {
        if (error instanceof ConfigurationError) {
            console.error(error.message);
            console.error("Please ensure all variables are set in your .env file");
        } else {
            console.error("Fatal error:", error);
        }
        process.exit(1);
    });
}
