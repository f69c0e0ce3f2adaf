// =============================================================================
// READ STATE
// Unread counting and mark-as-read. `is_read` only ever moves false -> true;
// every merge below keeps it that way.
// =============================================================================

import { inspectError, inspectLog } from "@/lib/inspect";
import { toInboxError, withTimeout, type InboxError } from "@/lib/messaging/errors";
import type { InboxStore } from "@/lib/messaging/store";
import type { Conversation, Message } from "@/lib/messaging/types";

/**
 * Messages that count towards a conversation's unread badge.
 */
export function isUnreadFor(message: Message, operatorId: string): boolean {
    return !message.is_read && !message.is_deleted && message.sender_id !== operatorId;
}

export function countUnread(messages: readonly Message[], operatorId: string): number {
    return messages.filter((m) => isUnreadFor(m, operatorId)).length;
}

/** Sidebar badge total */
export function totalUnread(conversations: readonly Conversation[]): number {
    return conversations.reduce((sum, c) => sum + Math.max(0, c.unread_count), 0);
}

/**
 * Merge a newer copy of a message into the one on screen.
 * A stale payload can never flip a read message back to unread.
 */
export function mergeReadState(current: Message, incoming: Message): Message {
    return {
        ...incoming,
        is_read: current.is_read || incoming.is_read,
        is_deleted: current.is_deleted || incoming.is_deleted,
    };
}

export function markIdsRead(messages: readonly Message[], ids: readonly string[]): Message[] {
    if (ids.length === 0) return [...messages];
    const read = new Set(ids);
    return messages.map((m) => (read.has(m.id) && !m.is_read ? { ...m, is_read: true } : m));
}

export interface MarkReadResult {
    messageIds: string[];
    error: InboxError | null;
}

export type ReadStateListener = (conversationId: string, messageIds: string[]) => void;

export class ReadStateTracker {
    constructor(
        private readonly store: InboxStore,
        private readonly operatorId: string,
        private readonly onMarkedRead: ReadStateListener,
        private readonly timeoutMs: number
    ) {}

    /**
     * Mark every unread message from the other side as read. Safe to repeat:
     * a second call finds nothing left to change.
     */
    async markConversationRead(conversationId: string): Promise<MarkReadResult> {
        try {
            const messageIds = await withTimeout(
                this.store.markConversationRead(conversationId, this.operatorId),
                this.timeoutMs,
                "markConversationRead"
            );

            inspectLog("MESSAGES_MARKED_READ", {
                conversation_id: conversationId,
                count: messageIds.length,
            });

            this.onMarkedRead(conversationId, messageIds);
            return { messageIds, error: null };
        } catch (err) {
            const error = toInboxError("stale-write", err, "Couldn't mark messages as read.");
            inspectError("readState", "markConversationRead failed", error);
            return { messageIds: [], error };
        }
    }
}
