import { afterEach, describe, expect, it, vi } from "vitest";
import { InboxError, toInboxError, withTimeout } from "./errors";

describe("toInboxError", () => {
    it("passes an InboxError through unchanged", () => {
        const original = new InboxError("send-blocked", "closed");
        expect(toInboxError("stale-write", original)).toBe(original);
    });

    it("maps a PostgrestError-shaped value", () => {
        const error = toInboxError("stale-write", { message: "permission denied", code: "42501" });

        expect(error).toBeInstanceOf(InboxError);
        expect(error.kind).toBe("stale-write");
        expect(error.message).toBe("permission denied");
        expect(error.code).toBe("42501");
        expect(error.retryable).toBe(false);
    });

    it("uses the fallback for values without a message", () => {
        const error = toInboxError("remote-unavailable", "boom", "Couldn't load conversations.");

        expect(error.message).toBe("Couldn't load conversations.");
        expect(error.retryable).toBe(true);
        expect(error.cause).toBe("boom");
    });
});

describe("withTimeout", () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it("resolves with the wrapped value", async () => {
        await expect(withTimeout(Promise.resolve(42), 1000, "load")).resolves.toBe(42);
    });

    it("rejects with a retryable error when the call hangs", async () => {
        vi.useFakeTimers();

        const pending = withTimeout(new Promise<never>(() => {}), 1000, "load");
        const assertion = expect(pending).rejects.toMatchObject({
            kind: "remote-unavailable",
            retryable: true,
            message: "load timed out after 1000ms",
        });

        await vi.advanceTimersByTimeAsync(1000);
        await assertion;
    });
});
