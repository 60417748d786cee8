import { FetchError, HttpStatusError, NetworkError, UnexpectedContentError } from "./errors";
import type { Logger } from "./logger";
import { sleep as defaultSleep } from "./utils";

export type HttpGet = (url: string, init: RequestInit) => Promise<Response>;

export interface FetcherOptions {
    timeoutMs: number;
    maxRetries: number;
    /** Delay before the first retry; each later retry doubles it. */
    baseDelayMs: number;
    /** Add a random [0, baseDelayMs) to each backoff delay. Default: false */
    jitter?: boolean;
    logger?: Logger;
    httpGet?: HttpGet;
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

export interface MarkupSource {
    fetch(url: string): Promise<string>;
}

const REQUEST_HEADERS: Record<string, string> = {
    "User-Agent": "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
    Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
};

/**
 * Delay before retry number `attempt` (1-based): base, 2*base, 4*base, ...
 */
export function backoffDelay(attempt: number, baseDelayMs: number): number {
    if (attempt < 1) return 0;
    return baseDelayMs * 2 ** (attempt - 1);
}

/**
 * Downloads the wait-times page. One instance lives for the whole process;
 * Node's fetch keeps the underlying connections alive between calls.
 */
export class WaitTimeFetcher implements MarkupSource {
    private readonly httpGet: HttpGet;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly random: () => number;

    constructor(private readonly options: FetcherOptions) {
        this.httpGet = options.httpGet ?? ((url, init) => fetch(url, init));
        this.sleep = options.sleep ?? defaultSleep;
        this.random = options.random ?? Math.random;
    }

    async fetch(url: string): Promise<string> {
        const { maxRetries, baseDelayMs, jitter = false, logger } = this.options;

        for (let attempt = 1; ; attempt++) {
            try {
                logger?.info(`Downloading HTML from ${url} (attempt ${attempt}/${maxRetries + 1})`);
                const html = await this.fetchOnce(url);
                logger?.info("Successfully downloaded HTML");
                return html;
            } catch (error) {
                const failure = toFetchError(error, this.options.timeoutMs);

                if (!failure.retryable || attempt > maxRetries) {
                    throw failure;
                }

                const delay = backoffDelay(attempt, baseDelayMs) + (jitter ? Math.floor(this.random() * baseDelayMs) : 0);
                logger?.warn(`${failure.message}; retrying in ${delay}ms`);
                await this.sleep(delay);
            }
        }
    }

    private async fetchOnce(url: string): Promise<string> {
        const response = await this.httpGet(url, {
            headers: REQUEST_HEADERS,
            redirect: "follow",
            signal: AbortSignal.timeout(this.options.timeoutMs),
        });

        if (!response.ok) {
            await response.body?.cancel();
            throw new HttpStatusError(response.status, url);
        }

        const contentType = response.headers.get("content-type") ?? "";
        if (!contentType.includes("text/html")) {
            await response.body?.cancel();
            throw new UnexpectedContentError(contentType);
        }

        return response.text();
    }
}

function toFetchError(error: unknown, timeoutMs: number): FetchError {
    if (error instanceof FetchError) return error;

    if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
        return new NetworkError(`Request timed out after ${timeoutMs / 1000} seconds`, { cause: error });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new NetworkError(`Connection error occurred: ${message}`, { cause: error });
}
