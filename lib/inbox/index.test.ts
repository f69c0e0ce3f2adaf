import { describe, expect, it } from "vitest";
import { loadInboxConfig } from "@/lib/config";
import { settle } from "@/lib/testing/fixtures";
import { createDevInbox } from "./index";

async function devInbox(variant: "peer" | "support") {
    const inbox = createDevInbox(loadInboxConfig({ INBOX_VARIANT: variant, INBOX_OPERATOR_ID: "dev-admin" }));
    await inbox.start();
    await settle();
    return inbox;
}

describe("createDevInbox", () => {
    it("seeds peer chats for the peer variant", async () => {
        const inbox = await devInbox("peer");
        const { conversations } = inbox.getState();

        expect(conversations.map((c) => c.id)).toEqual(["dev-conv-1", "dev-conv-2", "dev-conv-3"]);
        expect(conversations.map((c) => c.status)).toEqual([null, null, null]);
        expect(conversations.map((c) => c.subject)).toEqual([null, null, null]);
        expect(conversations[0].participant_ids).toEqual(["dev-admin", "dev-driver-1"]);

        await inbox.dispose();
    });

    it("seeds open support tickets for the support variant", async () => {
        const inbox = await devInbox("support");
        const { conversations } = inbox.getState();

        expect(conversations.map((c) => c.id)).toEqual(["dev-conv-1", "dev-conv-2"]);
        expect(conversations[0].subject).toBe("Payout not received");
        expect(conversations[0].participant_ids).toEqual(["dev-driver-1", "dev-admin"]);

        await inbox.dispose();
    });
});
