import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createLogger } from "../logger";

const clock = () => new Date(2026, 0, 2, 3, 4, 5);
const PREFIX = "2026-01-02 03:04:05 - test";

describe("logger", () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(path.join(tmpdir(), "checkpoint-wait-bot-"));
    });

    afterEach(() => {
        vi.restoreAllMocks();
        rmSync(dir, { recursive: true, force: true });
    });

    it("should print lines at or above the console level", () => {
        const log = vi.spyOn(console, "log").mockImplementation(() => {});
        const error = vi.spyOn(console, "error").mockImplementation(() => {});
        const logger = createLogger("test", { consoleLevel: "warn", clock });

        logger.info("routine");
        logger.warn("careful");

        expect(log).not.toHaveBeenCalled();
        expect(error).toHaveBeenCalledWith(`${PREFIX} - WARN - careful`);
    });

    it("should write debug lines to the file but not the console", () => {
        const log = vi.spyOn(console, "log").mockImplementation(() => {});
        const file = path.join(dir, "bot.log");
        const logger = createLogger("test", { clock, file: { path: file, maxBytes: 1024, backupCount: 1 } });

        logger.debug("details");

        expect(log).not.toHaveBeenCalled();
        expect(readFileSync(file, "utf8")).toBe(`${PREFIX} - DEBUG - details\n`);
    });

    it("should include the stack of logged errors in the file", () => {
        vi.spyOn(console, "error").mockImplementation(() => {});
        const file = path.join(dir, "bot.log");
        const logger = createLogger("test", { clock, file: { path: file, maxBytes: 4096, backupCount: 1 } });

        logger.error("failed", new Error("boom"));

        expect(readFileSync(file, "utf8")).toContain(`${PREFIX} - ERROR - failed\nError: boom\n`);
    });

    it("should prefix child logger names", () => {
        const log = vi.spyOn(console, "log").mockImplementation(() => {});
        const logger = createLogger("test", { clock });

        logger.child("fetcher").info("hi");

        expect(log).toHaveBeenCalledWith("2026-01-02 03:04:05 - test.fetcher - INFO - hi");
    });

    it("should rotate the file and keep a bounded number of backups", () => {
        const file = path.join(dir, "logs", "bot.log");
        const logger = createLogger("test", {
            consoleLevel: false,
            clock,
            file: { path: file, maxBytes: 100, backupCount: 2 },
        });

        // Each line is 61 bytes, so every write after the first rotates.
        for (const letter of ["a", "b", "c", "d"]) {
            logger.info(letter.repeat(24));
        }

        expect(readFileSync(file, "utf8")).toBe(`${PREFIX} - INFO - ${"d".repeat(24)}\n`);
        expect(readFileSync(`${file}.1`, "utf8")).toBe(`${PREFIX} - INFO - ${"c".repeat(24)}\n`);
        expect(readFileSync(`${file}.2`, "utf8")).toBe(`${PREFIX} - INFO - ${"b".repeat(24)}\n`);
        expect(existsSync(`${file}.3`)).toBe(false);
    });

    it("should truncate instead of keeping backups when backupCount is 0", () => {
        const file = path.join(dir, "bot.log");
        const logger = createLogger("test", {
            consoleLevel: false,
            clock,
            file: { path: file, maxBytes: 100, backupCount: 0 },
        });

        logger.info("a".repeat(24));
        logger.info("b".repeat(24));

        expect(readFileSync(file, "utf8")).toBe(`${PREFIX} - INFO - ${"b".repeat(24)}\n`);
        expect(existsSync(`${file}.1`)).toBe(false);
    });
});
