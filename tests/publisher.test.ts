import { ClientRequest, IncomingMessage } from "node:http";
import { Socket } from "node:net";
import { ApiRequestError, ApiResponseError, type TwitterRateLimit } from "twitter-api-v2";
import { describe, it, expect, vi } from "vitest";
import { AuthError, PublishError, RateLimitError, ValidationError } from "../errors";
import { StatusPublisher, classifyPostStatus, toPublishError, type PostingClient } from "../publisher";

// A request that is never sent: its socket never connects.
function idleRequest(): { request: ClientRequest; socket: Socket } {
    const socket = new Socket();
    const request = new ClientRequest({ createConnection: () => socket });
    request.on("error", () => {});
    return { request, socket };
}

function apiResponseError(code: number, rateLimit?: TwitterRateLimit): ApiResponseError {
    const { request, socket } = idleRequest();
    const error = new ApiResponseError(`Request failed with code ${code}`, {
        code,
        request,
        response: new IncomingMessage(socket),
        headers: {},
        rateLimit,
        data: {},
    });
    request.destroy();
    return error;
}

function fakeClient(tweet: PostingClient["tweet"] = async (text) => ({ data: { id: "1850000000000000001", text } })) {
    return { tweet: vi.fn(tweet) };
}

describe("StatusPublisher", () => {
    it("should return the created post", async () => {
        const client = fakeClient();
        const publisher = new StatusPublisher(client);

        await expect(publisher.publish("🟢 North: 10 min")).resolves.toEqual({
            id: "1850000000000000001",
            text: "🟢 North: 10 min",
        });
        expect(client.tweet).toHaveBeenCalledWith("🟢 North: 10 min");
    });

    it("should reject an empty message without calling the API", async () => {
        const client = fakeClient();
        const publisher = new StatusPublisher(client);

        await expect(publisher.publish("   ")).rejects.toBeInstanceOf(ValidationError);
        expect(client.tweet).not.toHaveBeenCalled();
    });

    it("should reject an oversized message without calling the API", async () => {
        const client = fakeClient();
        const publisher = new StatusPublisher(client);

        await expect(publisher.publish("a".repeat(281))).rejects.toThrow("Post length (281) exceeds 280 characters");
        expect(client.tweet).not.toHaveBeenCalled();
    });

    it("should count the ellipsis as two characters against the limit", async () => {
        const client = fakeClient();
        const publisher = new StatusPublisher(client);

        await expect(publisher.publish(`${"a".repeat(279)}…`)).rejects.toThrow("Post length (281) exceeds 280 characters");
        expect(client.tweet).not.toHaveBeenCalled();

        await expect(publisher.publish(`${"a".repeat(278)}…`)).resolves.toMatchObject({ id: "1850000000000000001" });
    });

    it("should honour a custom length limit", async () => {
        const publisher = new StatusPublisher(fakeClient(), { maxLength: 10 });

        await expect(publisher.publish("a".repeat(11))).rejects.toBeInstanceOf(ValidationError);
        await expect(publisher.publish("a".repeat(10))).resolves.toMatchObject({ text: "a".repeat(10) });
    });

    it("should surface authentication failures as AuthError", async () => {
        const publisher = new StatusPublisher(
            fakeClient(async () => {
                throw new AuthError("Posting API responded 401: Unauthorized");
            })
        );

        await expect(publisher.publish("hello")).rejects.toBeInstanceOf(AuthError);
    });

    it("should surface rate limiting as RateLimitError", async () => {
        const resetAt = new Date("2026-01-02T03:15:00Z");
        const publisher = new StatusPublisher(
            fakeClient(async () => {
                throw new RateLimitError("Posting API responded 429: Too Many Requests", resetAt);
            })
        );

        await expect(publisher.publish("hello")).rejects.toMatchObject({ name: "RateLimitError", resetAt });
    });

    it("should wrap unexpected client errors in PublishError", async () => {
        const publisher = new StatusPublisher(
            fakeClient(async () => {
                throw new Error("socket hang up");
            })
        );

        const failure = publisher.publish("hello");

        await expect(failure).rejects.toBeInstanceOf(PublishError);
        await expect(failure).rejects.toThrow("Unexpected error sending post: socket hang up");
    });

    it("should fail when the response carries no post id", async () => {
        const publisher = new StatusPublisher(fakeClient(async () => ({})));

        await expect(publisher.publish("hello")).rejects.toThrow("Post response did not contain expected data");
    });
});

describe("classifyPostStatus", () => {
    it.each([
        [401, "auth"],
        [420, "rate-limit"],
        [429, "rate-limit"],
        [400, "validation"],
        [403, "validation"],
        [422, "validation"],
        [500, "unknown"],
        [503, "unknown"],
    ])("should classify %i as %s", (status, kind) => {
        expect(classifyPostStatus(status)).toBe(kind);
    });
});

describe("toPublishError", () => {
    it("should pass publish errors through unchanged", () => {
        const error = new ValidationError("duplicate content");
        expect(toPublishError(error)).toBe(error);
    });

    it("should keep the original error as the cause", () => {
        const original = new Error("boom");
        const mapped = toPublishError(original);

        expect(mapped).toBeInstanceOf(PublishError);
        expect(mapped.cause).toBe(original);
    });

    it("should map a 401 response to AuthError", () => {
        const original = apiResponseError(401);
        const mapped = toPublishError(original);

        expect(mapped).toBeInstanceOf(AuthError);
        expect(mapped.message).toBe("Posting API responded 401: Request failed with code 401");
        expect(mapped.cause).toBe(original);
    });

    it("should map a 429 response to RateLimitError with the reset time", () => {
        const mapped = toPublishError(apiResponseError(429, { limit: 200, remaining: 0, reset: 1767323700 }));

        expect(mapped).toBeInstanceOf(RateLimitError);
        expect(mapped).toMatchObject({ resetAt: new Date("2026-01-02T03:15:00.000Z") });
    });

    it("should map a 429 response without rate limit headers to RateLimitError", () => {
        const mapped = toPublishError(apiResponseError(429));

        expect(mapped).toBeInstanceOf(RateLimitError);
        expect(mapped).toMatchObject({ resetAt: undefined });
    });

    it("should map a 403 response to ValidationError", () => {
        expect(toPublishError(apiResponseError(403))).toBeInstanceOf(ValidationError);
    });

    it("should map other response codes to a plain PublishError", () => {
        const mapped = toPublishError(apiResponseError(500));

        expect(mapped.name).toBe("PublishError");
        expect(mapped).not.toBeInstanceOf(ValidationError);
        expect(mapped.message).toBe("Posting API responded 500: Request failed with code 500");
    });

    it("should map transport failures to PublishError", () => {
        const { request } = idleRequest();
        const original = new ApiRequestError("Request failed", { request, error: new Error("ECONNRESET") });
        request.destroy();

        const mapped = toPublishError(original);

        expect(mapped.name).toBe("PublishError");
        expect(mapped.message).toBe("Request to posting API failed: Request failed");
        expect(mapped.cause).toBe(original);
    });
});
