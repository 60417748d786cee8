import { appendFileSync, existsSync, mkdirSync, renameSync, statSync, unlinkSync } from "fs";
import { format } from "date-fns";
import path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

export interface LogFileOptions {
    path: string;
    maxBytes: number;
    backupCount: number;
    level?: LogLevel;
}

export interface LoggerOptions {
    /** Console threshold. Default: info. `false` disables console output. */
    consoleLevel?: LogLevel | false;
    file?: LogFileOptions;
    clock?: () => Date;
}

/**
 * Size-bounded append-only log file. When the next line would push the file
 * past maxBytes, file.log becomes file.log.1, file.log.1 becomes file.log.2 and
 * so on, dropping anything past backupCount.
 */
export class RotatingFile {
    constructor(private readonly options: LogFileOptions) {
        const dir = path.dirname(options.path);
        if (!existsSync(dir)) {
            mkdirSync(dir, { recursive: true });
        }
    }

    write(line: string): void {
        if (this.shouldRotate(Buffer.byteLength(line))) {
            this.rotate();
        }
        appendFileSync(this.options.path, line);
    }

    private shouldRotate(incoming: number): boolean {
        if (this.options.maxBytes <= 0 || !existsSync(this.options.path)) return false;
        const size = statSync(this.options.path).size;
        return size > 0 && size + incoming > this.options.maxBytes;
    }

    private rotate(): void {
        const { path: filePath, backupCount } = this.options;

        if (backupCount <= 0) {
            unlinkSync(filePath);
            return;
        }

        const oldest = `${filePath}.${backupCount}`;
        if (existsSync(oldest)) {
            unlinkSync(oldest);
        }
        for (let i = backupCount - 1; i >= 1; i--) {
            const source = `${filePath}.${i}`;
            if (existsSync(source)) {
                renameSync(source, `${filePath}.${i + 1}`);
            }
        }
        renameSync(filePath, `${filePath}.1`);
    }
}

export class Logger {
    private readonly file: RotatingFile | null;
    private readonly clock: () => Date;

    constructor(
        readonly name: string,
        private readonly options: LoggerOptions = {},
        file?: RotatingFile | null
    ) {
        this.clock = options.clock ?? (() => new Date());
        this.file = file !== undefined ? file : options.file ? new RotatingFile(options.file) : null;
    }

    /** Logger for a sub-component that shares this logger's outputs. */
    child(component: string): Logger {
        return new Logger(`${this.name}.${component}`, this.options, this.file);
    }

    debug(message: string, error?: unknown): void {
        this.log("debug", message, error);
    }

    info(message: string, error?: unknown): void {
        this.log("info", message, error);
    }

    warn(message: string, error?: unknown): void {
        this.log("warn", message, error);
    }

    error(message: string, error?: unknown): void {
        this.log("error", message, error);
    }

    log(level: LogLevel, message: string, error?: unknown): void {
        const timestamp = format(this.clock(), "yyyy-MM-dd HH:mm:ss");
        const line = `${timestamp} - ${this.name} - ${level.toUpperCase()} - ${message}`;

        const consoleLevel = this.options.consoleLevel ?? "info";
        if (consoleLevel !== false && LEVEL_ORDER[level] >= LEVEL_ORDER[consoleLevel]) {
            const detail = error instanceof Error ? `: ${error.message}` : error !== undefined ? `: ${String(error)}` : "";
            const write = level === "error" || level === "warn" ? console.error : console.log;
            write(line + detail);
        }

        const fileLevel = this.options.file?.level ?? "debug";
        if (this.file && LEVEL_ORDER[level] >= LEVEL_ORDER[fileLevel]) {
            this.file.write(`${line}${formatErrorForFile(error)}\n`);
        }
    }
}

function formatErrorForFile(error: unknown): string {
    if (error === undefined) return "";
    if (error instanceof Error) {
        return `\n${error.stack ?? `${error.name}: ${error.message}`}`;
    }
    return `: ${String(error)}`;
}

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
    return new Logger(name, options);
}
