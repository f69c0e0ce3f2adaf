import { describe, expect, it } from "vitest";
import {
    canSendWithStatus,
    describeEmptyInbox,
    formatStatusFilter,
    isTerminalStatus,
    matchesStatusFilter,
    parseStatusFilter,
} from "./status";

describe("parseStatusFilter", () => {
    it("reads a comma-separated set", () => {
        expect(parseStatusFilter("resolved,closed")).toEqual(["resolved", "closed"]);
    });

    it("treats empty and 'all' as any status", () => {
        expect(parseStatusFilter("")).toBeNull();
        expect(parseStatusFilter("all")).toBeNull();
        expect(parseStatusFilter(" ALL ")).toBeNull();
        expect(parseStatusFilter(undefined)).toBeNull();
    });

    it("drops unknown entries and duplicates", () => {
        expect(parseStatusFilter("open,pending,open")).toEqual(["open"]);
        expect(parseStatusFilter(" Closed ")).toEqual(["closed"]);
        expect(parseStatusFilter("pending")).toBeNull();
    });

    it("round-trips through formatStatusFilter", () => {
        expect(formatStatusFilter(parseStatusFilter("resolved,closed"))).toBe("resolved,closed");
        expect(formatStatusFilter(null)).toBe("all");
    });
});

describe("send gating", () => {
    it("locks terminal statuses only", () => {
        expect(isTerminalStatus("open")).toBe(false);
        expect(isTerminalStatus("resolved")).toBe(true);
        expect(isTerminalStatus("closed")).toBe(true);
    });

    it("always allows peer chats", () => {
        expect(canSendWithStatus(null)).toBe(true);
        expect(canSendWithStatus("open")).toBe(true);
        expect(canSendWithStatus("closed")).toBe(false);
    });
});

describe("matchesStatusFilter", () => {
    it("passes everything when the filter is null", () => {
        expect(matchesStatusFilter(null, null)).toBe(true);
        expect(matchesStatusFilter("closed", null)).toBe(true);
    });

    it("rejects a missing status under a set filter", () => {
        expect(matchesStatusFilter(null, ["open"])).toBe(false);
        expect(matchesStatusFilter("resolved", ["resolved", "closed"])).toBe(true);
    });
});

describe("describeEmptyInbox", () => {
    it("names the open and resolved tabs", () => {
        expect(describeEmptyInbox(["open"], null)).toBe("No active support tickets");
        expect(describeEmptyInbox(["open"], "driver")).toBe("No active driver support tickets");
        expect(describeEmptyInbox(["resolved", "closed"], "all")).toBe("No resolved support tickets");
    });

    it("falls back to a generic message", () => {
        expect(describeEmptyInbox(null, null)).toBe("No support conversations found");
    });
});
