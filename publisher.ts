import { ApiRequestError, ApiResponseError, TwitterApi } from "twitter-api-v2";
import { MAX_POST_LENGTH } from "./config";
import { postLength } from "./formatter";
import { AuthError, PublishError, RateLimitError, ValidationError, WaitTimesError, errorMessage } from "./errors";
import type { Logger } from "./logger";
import type { PostResult, StatusMessage, TwitterCredentials } from "./types";

/** The slice of the v2 client the publisher needs. */
export interface PostingClient {
    tweet(text: string): Promise<{ data?: { id: string; text: string } }>;
}

export interface StatusSink {
    publish(message: StatusMessage): Promise<PostResult>;
}

export type PostFailureKind = "auth" | "rate-limit" | "validation" | "unknown";

export function createTwitterClient(credentials: TwitterCredentials): PostingClient {
    const client = new TwitterApi({
        appKey: credentials.apiKey,
        appSecret: credentials.apiSecret,
        accessToken: credentials.accessToken,
        accessSecret: credentials.accessTokenSecret,
    });
    return client.readWrite.v2;
}

export function classifyPostStatus(status: number): PostFailureKind {
    if (status === 401) return "auth";
    if (status === 420 || status === 429) return "rate-limit";
    if (status === 400 || status === 403 || status === 422) return "validation";
    return "unknown";
}

/**
 * Map whatever the posting client threw onto the publish error taxonomy.
 */
export function toPublishError(error: unknown): PublishError {
    if (error instanceof PublishError) return error;

    if (error instanceof ApiResponseError) {
        const detail = `Posting API responded ${error.code}: ${error.message}`;
        if (error.isAuthError) {
            return new AuthError(detail, { cause: error });
        }
        if (error.rateLimitError) {
            const resetAt = error.rateLimit ? new Date(error.rateLimit.reset * 1000) : undefined;
            return new RateLimitError(detail, resetAt, { cause: error });
        }
        return fromStatus(classifyPostStatus(error.code), detail, error);
    }

    if (error instanceof ApiRequestError) {
        return new PublishError(`Request to posting API failed: ${error.message}`, { cause: error });
    }

    if (error instanceof WaitTimesError) {
        return new PublishError(error.message, { cause: error });
    }

    return new PublishError(`Unexpected error sending post: ${errorMessage(error)}`, { cause: error });
}

function fromStatus(kind: PostFailureKind, message: string, cause: unknown): PublishError {
    switch (kind) {
        case "auth":
            return new AuthError(message, { cause });
        case "rate-limit":
            return new RateLimitError(message, undefined, { cause });
        case "validation":
            return new ValidationError(message, { cause });
        case "unknown":
            return new PublishError(message, { cause });
    }
}

export interface PublisherOptions {
    maxLength?: number;
    logger?: Logger;
}

export class StatusPublisher implements StatusSink {
    private readonly maxLength: number;

    constructor(
        private readonly client: PostingClient,
        private readonly options: PublisherOptions = {}
    ) {
        this.maxLength = options.maxLength ?? MAX_POST_LENGTH;
    }

    async publish(message: StatusMessage): Promise<PostResult> {
        const { logger } = this.options;

        if (!message.trim()) {
            throw new ValidationError("Cannot send an empty post");
        }
        const length = postLength(message);
        if (length > this.maxLength) {
            throw new ValidationError(`Post length (${length}) exceeds ${this.maxLength} characters`);
        }

        logger?.info("Sending post to posting API");

        let response: Awaited<ReturnType<PostingClient["tweet"]>>;
        try {
            response = await this.client.tweet(message);
        } catch (error) {
            throw toPublishError(error);
        }

        if (!response.data?.id) {
            throw new PublishError("Post response did not contain expected data");
        }

        logger?.info(`Post sent successfully! Post ID: ${response.data.id}`);
        return { id: response.data.id, text: response.data.text };
    }
}
