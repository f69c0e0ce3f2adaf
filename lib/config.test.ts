import { describe, expect, it } from "vitest";
import { assertEnv, DEFAULT_INBOX_OPTIONS, loadInboxConfig } from "./config";

describe("loadInboxConfig", () => {
    it("applies defaults to an empty environment", () => {
        const config = loadInboxConfig({});

        expect(config.variant).toBe("support");
        expect(config.supabaseUrl).toBeUndefined();
        expect(config.operatorId).toBeUndefined();
        expect(config.options).toEqual(DEFAULT_INBOX_OPTIONS);
    });

    it("coerces numeric variables", () => {
        const config = loadInboxConfig({
            SUPABASE_URL: "http://localhost:54321",
            SUPABASE_ANON_KEY: "test-anon-key",
            INBOX_OPERATOR_ID: "admin-1",
            INBOX_VARIANT: "peer",
            INBOX_PAGE_SIZE: "50",
            INBOX_RECONNECT_DELAY_MS: "1000",
        });

        expect(config.variant).toBe("peer");
        expect(config.supabaseAnonKey).toBe("test-anon-key");
        expect(config.options.pageSize).toBe(50);
        expect(config.options.reconnectDelayMs).toBe(1000);
        expect(config.options.searchDebounceMs).toBe(300);
    });

    it("rejects an unknown variant", () => {
        expect(() => loadInboxConfig({ INBOX_VARIANT: "group" })).toThrow(/^Invalid inbox configuration: INBOX_VARIANT/);
    });

    it("rejects a malformed URL", () => {
        expect(() => loadInboxConfig({ SUPABASE_URL: "not-a-url" })).toThrow(/SUPABASE_URL/);
    });
});

describe("assertEnv", () => {
    it("returns a present value", () => {
        expect(assertEnv("SUPABASE_URL", "http://localhost:54321")).toBe("http://localhost:54321");
    });

    it("names the missing variable", () => {
        expect(() => assertEnv("INBOX_OPERATOR_ID", undefined)).toThrow("Missing environment variable: INBOX_OPERATOR_ID");
        expect(() => assertEnv("INBOX_OPERATOR_ID", "")).toThrow("Missing environment variable: INBOX_OPERATOR_ID");
    });
});
