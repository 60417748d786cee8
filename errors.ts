export class WaitTimesError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

// Statuses worth another attempt; anything else fails the fetch straight away
export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export abstract class FetchError extends WaitTimesError {
    abstract readonly retryable: boolean;
}

export class NetworkError extends FetchError {
    readonly retryable = true;
}

export class HttpStatusError extends FetchError {
    readonly retryable: boolean;

    constructor(
        readonly status: number,
        readonly url: string
    ) {
        super(`Failed to fetch ${url}: Status ${status}`);
        this.retryable = RETRYABLE_STATUS_CODES.has(status);
    }
}

export class UnexpectedContentError extends FetchError {
    readonly retryable = false;

    constructor(readonly contentType: string) {
        super(`Response content type is not HTML: ${contentType || "(none)"}`);
    }
}

export class ParseError extends WaitTimesError {}

export class FormatOverflowError extends WaitTimesError {
    constructor(
        readonly length: number,
        readonly limit: number
    ) {
        super(`Message length ${length} exceeds limit of ${limit}`);
    }
}

export class PublishError extends WaitTimesError {}

export class AuthError extends PublishError {}

export class RateLimitError extends PublishError {
    constructor(
        message: string,
        readonly resetAt?: Date,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export class ValidationError extends PublishError {}

export class ConfigurationError extends WaitTimesError {
    constructor(readonly problems: string[]) {
        super(`Invalid configuration: ${problems.join("; ")}`);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
