import { AuthError, RateLimitError, ValidationError, errorMessage } from "./errors";
import type { MarkupSource } from "./fetcher";
import { formatStatus } from "./formatter";
import type { Logger } from "./logger";
import type { StatusSink } from "./publisher";
import { parseWaitTimes } from "./scraping";
import type { CycleResult, CycleStage, RunnerState } from "./types";
import { sleep as defaultSleep } from "./utils";

export interface RunnerOptions {
    url: string;
    source: MarkupSource;
    publisher: StatusSink;
    logger: Logger;
    /** Fires when the process should stop. */
    signal: AbortSignal;
    intervalMs: number;
    /** Longest single sleep step; bounds how long a shutdown can go unnoticed. */
    shutdownCheckMs: number;
    maxPostLength?: number;
    postWhenUnavailable?: boolean;
    sleep?: (ms: number) => Promise<void>;
    now?: () => Date;
}

export interface RunnerStatus {
    state: RunnerState;
    iteration: number;
    lastCycle: CycleResult | null;
    nextRunAt: string | null;
}

/**
 * Drives fetch -> parse -> format -> publish once per interval until the
 * shutdown signal fires. A failing cycle is logged and never stops the loop.
 */
export class WaitTimesRunner {
    private state: RunnerState = "idle";
    private iteration = 0;
    private lastCycle: CycleResult | null = null;
    private nextRunAt: Date | null = null;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly now: () => Date;

    constructor(private readonly options: RunnerOptions) {
        this.sleep = options.sleep ?? defaultSleep;
        this.now = options.now ?? (() => new Date());
    }

    status(): RunnerStatus {
        return {
            state: this.state,
            iteration: this.iteration,
            lastCycle: this.lastCycle,
            nextRunAt: this.nextRunAt ? this.nextRunAt.toISOString() : null,
        };
    }

    async run(): Promise<void> {
        const { logger, signal, intervalMs } = this.options;
        logger.info(`Checking wait times every ${intervalMs / 60_000} minutes`);

        while (!signal.aborted) {
            await this.runCycle();

            if (signal.aborted) break;
            await this.sleepUntilNextCycle();
        }

        this.state = "stopped";
        this.nextRunAt = null;
        logger.info("Shutdown completed gracefully");
    }

    /**
     * Run a single cycle. Always resolves; failures are reported in the result.
     */
    async runCycle(): Promise<CycleResult> {
        const { url, source, publisher, logger, maxPostLength, postWhenUnavailable = false } = this.options;

        this.iteration += 1;
        const iteration = this.iteration;
        const startedAt = this.now().toISOString();
        let stage: CycleStage = "fetching";

        logger.info(`Starting iteration ${iteration}`);

        const finish = (result: Omit<CycleResult, "iteration" | "startedAt" | "finishedAt">): CycleResult => {
            const cycle: CycleResult = {
                iteration,
                startedAt,
                finishedAt: this.now().toISOString(),
                ...result,
            };
            this.lastCycle = cycle;
            this.state = "idle";
            return cycle;
        };

        try {
            this.state = stage = "fetching";
            const html = await source.fetch(url);

            this.state = stage = "parsing";
            const snapshot = parseWaitTimes(html, { logger: logger.child("parser") });

            this.state = stage = "formatting";
            const message = formatStatus(snapshot, {
                now: this.now(),
                maxLength: maxPostLength,
                sourceUrl: url,
                logger: logger.child("formatter"),
            });

            if (snapshot.length === 0 && !postWhenUnavailable) {
                logger.warn("No wait times retrieved. Skipping post.");
                return finish({ outcome: "skipped", stage });
            }

            logger.info(`Formatted post:\n${message}`);

            this.state = stage = "publishing";
            const post = await publisher.publish(message);

            logger.info("Iteration completed successfully");
            return finish({ outcome: "posted", postId: post.id });
        } catch (error) {
            this.logStageFailure(stage, error);
            return finish({ outcome: "failed", stage, error: errorMessage(error) });
        }
    }

    private logStageFailure(stage: CycleStage, error: unknown): void {
        const { logger } = this.options;

        if (error instanceof RateLimitError) {
            const reset = error.resetAt ? ` (limit resets at ${error.resetAt.toISOString()})` : "";
            logger.warn(`Rate limited by posting API${reset}; will try again next cycle`, error);
        } else if (error instanceof AuthError) {
            logger.error("Authentication with posting API failed; skipping this cycle", error);
        } else if (error instanceof ValidationError) {
            logger.error("Posting API rejected the post; skipping this cycle", error);
        } else {
            logger.error(`Iteration failed while ${stage}; skipping remaining stages`, error);
        }
    }

    private async sleepUntilNextCycle(): Promise<void> {
        const { logger, signal, intervalMs, shutdownCheckMs } = this.options;

        this.state = "sleeping";
        this.nextRunAt = new Date(this.now().getTime() + intervalMs);
        logger.info(`Sleeping for ${intervalMs / 60_000} minutes until next check`);

        let remaining = intervalMs;
        while (remaining > 0 && !signal.aborted) {
            const step = Math.min(shutdownCheckMs, remaining);
            await this.sleep(step);
            remaining -= step;
        }

        if (!signal.aborted) {
            this.state = "idle";
        }
    }
}
