import { afterEach, describe, expect, it, vi } from "vitest";
import { MockInboxStore, type MockSeed } from "@/lib/messaging/mock";
import { NO_MESSAGES_YET, type InboxVariant, type Message } from "@/lib/messaging/types";
import {
    makeMessage,
    makeProfile,
    makeSupportRow,
    minutesBefore,
    OPERATOR_ID,
} from "@/lib/testing/fixtures";
import { ConversationRepository } from "./conversations";
import { countUnread } from "./readState";

function seedStore() {
    return new MockInboxStore("support", {
        profiles: [
            makeProfile("driver-1", "Ramon Cruz", "driver"),
            makeProfile("owner-1", "Liza Santos", "owner"),
        ],
        conversations: [
            makeSupportRow("c-active", "driver-1", "open", 120, "Payout"),
            makeSupportRow("c-new", "owner-1", "open", 15),
            makeSupportRow("c-empty", "owner-1", "open", 60),
            makeSupportRow("c-resolved", "driver-1", "resolved", 500),
            // Assigned to another operator
            { ...makeSupportRow("c-foreign", "driver-1", "open", 5), participant_ids: ["driver-1", "admin-2"] },
        ],
        messages: [
            makeMessage("m1", "c-active", "driver-1", 30, { is_read: true }),
            makeMessage("m2", "c-active", OPERATOR_ID, 20),
            makeMessage("m3", "c-active", "driver-1", 10, { text: "Any update?" }),
            makeMessage("m4", "c-active", "driver-1", 5, { is_deleted: true }),
        ],
    });
}

/** Truncates the latest-message lookup the way a server row limit would */
class RowCappedStore extends MockInboxStore {
    constructor(variant: InboxVariant, seed: MockSeed, private readonly maxRows: number) {
        super(variant, seed);
    }

    override async listLatestMessages(conversationIds: readonly string[]): Promise<Message[]> {
        const rows = await super.listLatestMessages(conversationIds);
        return rows.slice(0, this.maxRows);
    }
}

function repositoryFor(store: MockInboxStore, requestTimeoutMs = 1000) {
    return new ConversationRepository(store, OPERATOR_ID, { requestTimeoutMs });
}

describe("ConversationRepository.load", () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it("enriches and sorts by latest activity", async () => {
        const repo = repositoryFor(seedStore());

        const result = await repo.load({ role: null, status: ["open"] });

        expect(result.error).toBeNull();
        expect(result.conversations.map((c) => c.id)).toEqual(["c-active", "c-new", "c-empty"]);

        const active = result.conversations.find((c) => c.id === "c-active");
        expect(active?.last_message).toBe("Any update?");
        expect(active?.last_message_time).toBe(minutesBefore(10));
        expect(active?.unread_count).toBe(1);
        expect(active?.peer.name).toBe("Ramon Cruz");
    });

    it("uses the sentinel and creation time for conversations without messages", async () => {
        const repo = repositoryFor(seedStore());

        const { conversations } = await repo.load({ role: null, status: null });
        const empty = conversations.find((c) => c.id === "c-empty");

        expect(empty?.last_message).toBe(NO_MESSAGES_YET);
        expect(empty?.last_message_time).toBe(empty?.created_at);
        expect(empty?.has_messages).toBe(false);
    });

    it("finds the last message of a quiet conversation behind a busy one", async () => {
        const store = new RowCappedStore(
            "support",
            {
                profiles: [makeProfile("driver-1", "Ramon Cruz", "driver"), makeProfile("owner-1", "Liza Santos", "owner")],
                conversations: [
                    makeSupportRow("c-busy", "driver-1", "open", 600),
                    makeSupportRow("c-quiet", "owner-1", "open", 900),
                ],
                messages: [
                    makeMessage("a1", "c-busy", "driver-1", 50),
                    makeMessage("a2", "c-busy", OPERATOR_ID, 40),
                    makeMessage("a3", "c-busy", "driver-1", 30),
                    makeMessage("a4", "c-busy", OPERATOR_ID, 20),
                    makeMessage("a5", "c-busy", "driver-1", 10),
                    makeMessage("b1", "c-quiet", "owner-1", 300),
                ],
            },
            2
        );
        const repo = repositoryFor(store);

        const { conversations } = await repo.load({ role: null, status: null });
        const quiet = conversations.find((c) => c.id === "c-quiet");

        expect(conversations.map((c) => c.id)).toEqual(["c-busy", "c-quiet"]);
        expect(quiet?.last_message).toBe("text of b1");
        expect(quiet?.has_messages).toBe(true);
        expect(quiet?.last_message_time).toBe(minutesBefore(300));
    });

    it("keeps unread counts equal to the defining count", async () => {
        const store = seedStore();
        const repo = repositoryFor(store);

        const { conversations } = await repo.load({ role: null, status: null });

        for (const conversation of conversations) {
            expect(conversation.unread_count).toBe(countUnread(store.snapshotMessages(conversation.id), OPERATOR_ID));
        }
    });

    it("pushes the status filter to the store", async () => {
        const repo = repositoryFor(seedStore());

        const { conversations } = await repo.load({ role: null, status: ["resolved", "closed"] });

        expect(conversations.map((c) => c.id)).toEqual(["c-resolved"]);
    });

    it("applies the role filter after the join but caches every row", async () => {
        const repo = repositoryFor(seedStore());

        const { conversations } = await repo.load({ role: "OWNER", status: ["open"] });

        expect(conversations.map((c) => c.id)).toEqual(["c-new", "c-empty"]);
        expect(repo.getCached()).toHaveLength(3);
    });

    it("substitutes a placeholder for a missing profile", async () => {
        const store = new MockInboxStore("support", {
            conversations: [makeSupportRow("c-ghost", "ghost-user-42", "open", 10)],
        });
        const repo = repositoryFor(store);

        const { conversations, error } = await repo.load({ role: null, status: null });

        expect(error).toBeNull();
        expect(conversations[0].peer).toEqual({
            id: "ghost-user-42",
            name: "User ghost-us...",
            email: null,
            role: "Unknown",
            profile_photo_url: null,
            is_placeholder: true,
        });
    });

    it("degrades to placeholders when the profile lookup fails", async () => {
        const store = seedStore();
        store.failNext("getProfiles");
        const repo = repositoryFor(store);

        const { conversations, error } = await repo.load({ role: null, status: ["open"] });

        expect(error).toBeNull();
        expect(conversations).toHaveLength(3);
        expect(conversations.every((c) => c.peer.is_placeholder)).toBe(true);
    });

    it("returns an empty result with the error on failure", async () => {
        const store = seedStore();
        const repo = repositoryFor(store);
        await repo.load({ role: null, status: null });

        store.failNext("listLatestMessages");
        const result = await repo.load({ role: null, status: null });

        expect(result.conversations).toEqual([]);
        expect(result.error?.kind).toBe("remote-unavailable");
        expect(repo.getCached()).toEqual([]);
    });

    it("times out a hanging call", async () => {
        vi.useFakeTimers();
        const store = seedStore();
        store.hold("listConversations");
        const repo = repositoryFor(store, 1000);

        const pending = repo.load({ role: null, status: null });
        await vi.advanceTimersByTimeAsync(1000);
        const result = await pending;

        expect(result.error?.kind).toBe("remote-unavailable");
        expect(result.error?.retryable).toBe(true);
    });

    it("discards a load superseded by a newer one", async () => {
        const store = seedStore();
        const repo = repositoryFor(store);

        const release = store.hold("listConversations");
        const first = repo.load({ role: null, status: ["resolved"] });
        const second = await repo.load({ role: null, status: ["open"] });
        release();
        const stale = await first;

        expect(repo.isLatest(stale.seq)).toBe(false);
        expect(repo.isLatest(second.seq)).toBe(true);
        expect(stale.conversations.map((c) => c.id)).toEqual(["c-resolved"]);
        expect(repo.getCached().map((c) => c.id)).toEqual(second.conversations.map((c) => c.id));
    });
});

describe("ConversationRepository.patch", () => {
    it("updates in place and re-sorts", async () => {
        const repo = repositoryFor(seedStore());
        await repo.load({ role: null, status: ["open"] });

        const patched = repo.patch("c-empty", (c) => ({ ...c, last_message: "hi", last_message_time: minutesBefore(1), has_messages: true }));

        expect(patched?.last_message).toBe("hi");
        expect(repo.getCached().map((c) => c.id)).toEqual(["c-empty", "c-active", "c-new"]);
        expect(repo.patch("missing", (c) => c)).toBeUndefined();
    });

    it("sums unread counts", async () => {
        const repo = repositoryFor(seedStore());
        await repo.load({ role: null, status: null });

        expect(repo.totalUnread()).toBe(1);
    });
});
