// =============================================================================
// MESSAGE REPOSITORY
// Paged history for the active conversation. Pages are fetched newest first
// and returned oldest first; the cursor is the oldest created_at loaded.
// =============================================================================

import { inspectError, inspectLog } from "@/lib/inspect";
import type { InboxOptions } from "@/lib/config";
import { toInboxError, withTimeout, type InboxError } from "@/lib/messaging/errors";
import type { InboxStore } from "@/lib/messaging/store";
import type { MessagePage } from "@/lib/messaging/types";
import { markIdsRead, type ReadStateTracker } from "./readState";

export interface MessagePageResult extends MessagePage {
    error: InboxError | null;
    /** False when the active conversation changed while the page was loading */
    current: boolean;
}

export class MessageRepository {
    private conversationId: string | null = null;
    private cursor: string | null = null;

    constructor(
        private readonly store: InboxStore,
        private readonly readState: ReadStateTracker,
        private readonly options: Pick<InboxOptions, "pageSize" | "requestTimeoutMs">
    ) {}

    /**
     * One page of non-deleted messages, strictly older than `before` when given.
     * `hasMore` is true when the page came back full; the next page may still
     * turn out empty.
     */
    async loadPage(conversationId: string, before: string | null = null): Promise<MessagePage & { error: InboxError | null }> {
        try {
            const rows = await withTimeout(
                this.store.listMessages(conversationId, { before, limit: this.options.pageSize }),
                this.options.requestTimeoutMs,
                "listMessages"
            );

            return {
                messages: [...rows].reverse(),
                hasMore: rows.length === this.options.pageSize,
                error: null,
            };
        } catch (err) {
            const error = toInboxError("remote-unavailable", err, "Couldn't load messages.");
            inspectError("messages", "loadPage failed", error);
            return { messages: [], hasMore: false, error };
        }
    }

    /**
     * Full load of a conversation: resets the cursor, fetches the newest page,
     * then marks the conversation read.
     */
    async load(conversationId: string): Promise<MessagePageResult> {
        this.conversationId = conversationId;
        this.cursor = null;

        const page = await this.loadPage(conversationId);

        if (this.conversationId !== conversationId) {
            inspectLog("STALE_MESSAGES_DISCARDED", { conversation_id: conversationId });
            return { ...page, current: false };
        }

        this.advanceCursor(page.messages[0]?.created_at);

        if (page.error) {
            return { ...page, current: true };
        }

        const read = await this.readState.markConversationRead(conversationId);

        return {
            ...page,
            messages: markIdsRead(page.messages, read.messageIds),
            current: this.conversationId === conversationId,
        };
    }

    /**
     * Next older page of the current conversation. Empty with hasMore=false
     * when nothing has been loaded yet.
     */
    async loadOlder(): Promise<MessagePageResult> {
        const conversationId = this.conversationId;
        const before = this.cursor;

        if (conversationId === null || before === null) {
            return { messages: [], hasMore: false, error: null, current: true };
        }

        const page = await this.loadPage(conversationId, before);

        if (this.conversationId !== conversationId) {
            return { ...page, current: false };
        }

        this.advanceCursor(page.messages[0]?.created_at);
        return { ...page, current: true };
    }

    reset(): void {
        this.conversationId = null;
        this.cursor = null;
    }

    getCursor(): string | null {
        return this.cursor;
    }

    getConversationId(): string | null {
        return this.conversationId;
    }

    private advanceCursor(oldest: string | undefined): void {
        if (oldest === undefined) return;
        if (this.cursor === null || oldest < this.cursor) {
            this.cursor = oldest;
        }
    }
}
