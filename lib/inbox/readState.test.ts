import { describe, expect, it, vi } from "vitest";
import { InboxError } from "@/lib/messaging/errors";
import { MockInboxStore } from "@/lib/messaging/mock";
import { makeMessage, makeProfile, makeSupportRow, OPERATOR_ID } from "@/lib/testing/fixtures";
import { countUnread, markIdsRead, mergeReadState, ReadStateTracker } from "./readState";

describe("countUnread", () => {
    it("counts unread, undeleted messages from the other side only", () => {
        const messages = [
            makeMessage("m1", "c1", "user-1", 40),
            makeMessage("m2", "c1", "user-1", 30, { is_read: true }),
            makeMessage("m3", "c1", OPERATOR_ID, 20),
            makeMessage("m4", "c1", "user-1", 10, { is_deleted: true }),
        ];

        expect(countUnread(messages, OPERATOR_ID)).toBe(1);
    });
});

describe("mergeReadState", () => {
    it("never turns a read message back to unread", () => {
        const current = makeMessage("m1", "c1", OPERATOR_ID, 10, { is_read: true });
        const stale = { ...current, is_read: false };

        expect(mergeReadState(current, stale).is_read).toBe(true);
        expect(mergeReadState(stale, current).is_read).toBe(true);
    });
});

describe("markIdsRead", () => {
    it("flags only the listed messages", () => {
        const messages = [makeMessage("m1", "c1", "u", 2), makeMessage("m2", "c1", "u", 1)];

        expect(markIdsRead(messages, ["m2"]).map((m) => m.is_read)).toEqual([false, true]);
    });
});

describe("ReadStateTracker", () => {
    function setup() {
        const store = new MockInboxStore("support", {
            profiles: [makeProfile("user-1", "Ana", "driver")],
            conversations: [makeSupportRow("c1", "user-1", "open", 100)],
            messages: [
                makeMessage("m1", "c1", "user-1", 30),
                makeMessage("m2", "c1", "user-1", 20),
                makeMessage("m3", "c1", OPERATOR_ID, 10),
            ],
        });
        const notify = vi.fn();
        const tracker = new ReadStateTracker(store, OPERATOR_ID, notify, 1000);
        return { store, notify, tracker };
    }

    it("marks the other side's messages and notifies", async () => {
        const { store, notify, tracker } = setup();

        const result = await tracker.markConversationRead("c1");

        expect(result).toEqual({ messageIds: ["m1", "m2"], error: null });
        expect(notify).toHaveBeenCalledWith("c1", ["m1", "m2"]);
        expect(store.snapshotMessages("c1").map((m) => m.is_read)).toEqual([true, true, false]);
    });

    it("is idempotent", async () => {
        const { store, tracker } = setup();

        await tracker.markConversationRead("c1");
        const afterOnce = store.snapshotMessages("c1");
        const second = await tracker.markConversationRead("c1");

        expect(second.messageIds).toEqual([]);
        expect(store.snapshotMessages("c1")).toEqual(afterOnce);
    });

    it("reports a failure without notifying", async () => {
        const { store, notify, tracker } = setup();
        store.failNext("markConversationRead", new InboxError("stale-write", "denied"));

        const result = await tracker.markConversationRead("c1");

        expect(result.messageIds).toEqual([]);
        expect(result.error?.kind).toBe("stale-write");
        expect(notify).not.toHaveBeenCalled();
    });
});
