import express, { Router } from "express";
import type { HttpGet } from "../fetcher";
import type { RunnerStatus } from "../runner";

export interface ConnectivityResult {
    status: "healthy" | "unhealthy";
    responseTime: number;
    error?: string;
}

export interface HealthReport {
    server: {
        status: "healthy";
        timestamp: string;
        uptime: number;
    };
    runner: RunnerStatus;
    source: ConnectivityResult;
    overall: "healthy" | "degraded";
}

export const checkSourceConnectivity = async (
    url: string,
    timeoutMs: number,
    httpGet: HttpGet = (target, init) => fetch(target, init)
): Promise<ConnectivityResult> => {
    const startTime = Date.now();

    try {
        const response = await httpGet(url, {
            method: "HEAD",
            headers: {
                "User-Agent": "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
            },
            signal: AbortSignal.timeout(timeoutMs),
        });

        const responseTime = Date.now() - startTime;

        if (response.ok) {
            return { status: "healthy", responseTime };
        }
        return {
            status: "unhealthy",
            responseTime,
            error: `HTTP ${response.status}: ${response.statusText}`,
        };
    } catch (error) {
        return {
            status: "unhealthy",
            responseTime: Date.now() - startTime,
            error: error instanceof Error ? error.message : "Unknown error",
        };
    }
};

/**
 * Degraded when the source page is unreachable or the latest cycle failed.
 */
export function buildHealthReport(runner: RunnerStatus, source: ConnectivityResult, now: Date = new Date()): HealthReport {
    const lastCycleFailed = runner.lastCycle?.outcome === "failed";

    return {
        server: {
            status: "healthy",
            timestamp: now.toISOString(),
            uptime: process.uptime(),
        },
        runner,
        source,
        overall: source.status === "healthy" && !lastCycleFailed ? "healthy" : "degraded",
    };
}

export interface HealthRouterOptions {
    getStatus: () => RunnerStatus;
    sourceUrl: string;
    timeoutMs: number;
    httpGet?: HttpGet;
}

export function createHealthRouter(options: HealthRouterOptions): Router {
    const router = Router();

    router.get("/health", async (req, res) => {
        try {
            const source = await checkSourceConnectivity(options.sourceUrl, options.timeoutMs, options.httpGet);
            const report = buildHealthReport(options.getStatus(), source);
            res.status(report.overall === "healthy" ? 200 : 503).json(report);
        } catch (error) {
            res.status(500).json({
                overall: "unhealthy",
                error: error instanceof Error ? error.message : "Unknown error",
            });
        }
    });

    return router;
}

export function createHealthApp(options: HealthRouterOptions): express.Express {
    const app = express();
    app.get("/", (req, res) => {
        res.send("Checkpoint wait-times bot is running.");
    });
    app.use(createHealthRouter(options));
    return app;
}
