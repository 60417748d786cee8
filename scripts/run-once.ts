/**
 * One-shot run
 *
 * Fetches the wait-times page once, prints what was parsed and the composed
 * post, then publishes it.
 *
 * Run: npx tsx scripts/run-once.ts [--dry-run]
 *
 * --dry-run skips publishing and needs no posting credentials.
 */

import "dotenv/config";
import { loadConfig } from "../config";
import { ConfigurationError } from "../errors";
import { WaitTimeFetcher } from "../fetcher";
import { formatStatus } from "../formatter";
import { createAppLogger } from "../index";
import { StatusPublisher, createTwitterClient } from "../publisher";
import { WaitTimesRunner } from "../runner";
import { parseWaitTimes } from "../scraping";

async function main() {
    const dryRun = process.argv.includes("--dry-run");
    const config = loadConfig(process.env, { requireCredentials: !dryRun });
    const logger = createAppLogger(config);

    const fetcher = new WaitTimeFetcher({
        timeoutMs: config.requestTimeoutMs,
        maxRetries: config.maxRetries,
        baseDelayMs: config.retryBackoffMs,
        logger: logger.child("fetcher"),
    });

    if (dryRun) {
        const html = await fetcher.fetch(config.waitTimesUrl);
        const snapshot = parseWaitTimes(html, { logger: logger.child("parser") });

        console.log("=".repeat(60));
        console.table(snapshot);
        console.log("=".repeat(60));
        console.log(formatStatus(snapshot, { sourceUrl: config.waitTimesUrl, maxLength: config.maxPostLength }));
        console.log("=".repeat(60));
        return;
    }

    if (!config.credentials) {
        throw new ConfigurationError(["Posting credentials are required unless --dry-run is given"]);
    }

    const publisher = new StatusPublisher(createTwitterClient(config.credentials), {
        maxLength: config.maxPostLength,
        logger: logger.child("publisher"),
    });

    const runner = new WaitTimesRunner({
        url: config.waitTimesUrl,
        source: fetcher,
        publisher,
        logger,
        signal: new AbortController().signal,
        intervalMs: config.scrapeIntervalMs,
        shutdownCheckMs: config.shutdownCheckMs,
        maxPostLength: config.maxPostLength,
        postWhenUnavailable: config.postWhenUnavailable,
    });

    const result = await runner.runCycle();
    console.log(JSON.stringify(result, null, 2));

    if (result.outcome === "failed") {
        process.exitCode = 1;
    }
}

main().catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
});
