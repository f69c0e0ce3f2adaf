// =============================================================================
// CONVERSATION REPOSITORY
// Loads the operator's conversations, joins peer profiles, last message and
// unread count, and keeps the sorted result as the in-memory cache.
// =============================================================================

import { inspectError, inspectLog, isInspectOn } from "@/lib/inspect";
import type { InboxOptions } from "@/lib/config";
import { toInboxError, withTimeout, type InboxError } from "@/lib/messaging/errors";
import { placeholderProfile, type InboxStore, type UnreadMarker } from "@/lib/messaging/store";
import {
    NO_MESSAGES_YET,
    type Conversation,
    type ConversationRow,
    type Message,
    type Profile,
} from "@/lib/messaging/types";
import type { StatusFilter } from "@/lib/status";
import { applyRoleFilter } from "./filters";
import { totalUnread } from "./readState";

export interface ConversationLoad {
    /** Sequence number of this load; see ConversationRepository.isLatest */
    seq: number;
    /** Role-filtered, sorted result */
    conversations: Conversation[];
    /** Set when the load failed and `conversations` is the empty fallback */
    error: InboxError | null;
}

/**
 * Sort key: the later of last message time and creation time.
 */
export function activityTime(conversation: Pick<Conversation, "last_message_time" | "created_at">): number {
    const last = Date.parse(conversation.last_message_time);
    const created = Date.parse(conversation.created_at);
    return Math.max(Number.isNaN(last) ? 0 : last, Number.isNaN(created) ? 0 : created);
}

export function sortByActivity(conversations: readonly Conversation[]): Conversation[] {
    return [...conversations].sort((a, b) => activityTime(b) - activityTime(a));
}

/**
 * Join rows with their peer profile, newest message and unread count.
 * When `latest` holds several messages of one conversation, the newest wins.
 */
export function enrichConversations(
    rows: readonly ConversationRow[],
    profiles: readonly Profile[],
    latest: readonly Message[],
    unread: readonly UnreadMarker[]
): Conversation[] {
    const profileMap = new Map(profiles.map((p) => [p.id, p]));

    const lastMessageMap = new Map<string, Message>();
    for (const message of latest) {
        if (message.is_deleted) continue;
        const seen = lastMessageMap.get(message.conversation_id);
        if (!seen || message.created_at > seen.created_at) {
            lastMessageMap.set(message.conversation_id, message);
        }
    }

    const unreadMap = new Map<string, number>();
    for (const marker of unread) {
        unreadMap.set(marker.conversation_id, (unreadMap.get(marker.conversation_id) ?? 0) + 1);
    }

    return rows.map((row) => {
        const lastMessage = lastMessageMap.get(row.id);
        return {
            ...row,
            peer: profileMap.get(row.peer_id) ?? placeholderProfile(row.peer_id),
            last_message: lastMessage?.text ?? NO_MESSAGES_YET,
            last_message_time: lastMessage?.created_at ?? row.created_at,
            has_messages: lastMessage !== undefined,
            unread_count: unreadMap.get(row.id) ?? 0,
        };
    });
}

export class ConversationRepository {
    private seq = 0;
    private cache: Conversation[] = [];

    constructor(
        private readonly store: InboxStore,
        private readonly operatorId: string,
        private readonly options: Pick<InboxOptions, "requestTimeoutMs">
    ) {}

    /**
     * Load conversations for the status filter, then apply the role filter.
     * Never throws: a failure yields an empty list with `error` set.
     * Only the most recently issued load may replace the cache.
     */
    async load(filter: { role: string | null; status: StatusFilter }): Promise<ConversationLoad> {
        const seq = ++this.seq;
        let conversations: Conversation[] = [];
        let error: InboxError | null = null;

        try {
            conversations = await this.fetch(filter.status);
        } catch (err) {
            error = toInboxError("remote-unavailable", err, "Couldn't load conversations.");
            inspectError("conversations", "load failed", error);
        }

        if (seq !== this.seq) {
            inspectLog("STALE_LOAD_DISCARDED", { seq, latest: this.seq });
            return { seq, conversations: applyRoleFilter(conversations, filter.role), error };
        }

        this.cache = conversations;

        if (isInspectOn()) {
            inspectLog("CONVERSATIONS_LOADED", {
                seq,
                count: conversations.length,
                unread: totalUnread(conversations),
                failed: error !== null,
            });
        }

        return { seq, conversations: applyRoleFilter(conversations, filter.role), error };
    }

    isLatest(seq: number): boolean {
        return seq === this.seq;
    }

    /** Every cached conversation for the current status filter, sorted */
    getCached(): readonly Conversation[] {
        return this.cache;
    }

    find(conversationId: string): Conversation | undefined {
        return this.cache.find((c) => c.id === conversationId);
    }

    /**
     * Replace one cached conversation in place and re-sort.
     * Returns the updated entry, or undefined when it is not cached.
     */
    patch(conversationId: string, update: (conversation: Conversation) => Conversation): Conversation | undefined {
        const index = this.cache.findIndex((c) => c.id === conversationId);
        if (index === -1) return undefined;

        const patched = update(this.cache[index]);
        const next = [...this.cache];
        next[index] = patched;
        this.cache = sortByActivity(next);
        return patched;
    }

    totalUnread(): number {
        return totalUnread(this.cache);
    }

    private async fetch(status: StatusFilter): Promise<Conversation[]> {
        const timeout = this.options.requestTimeoutMs;

        const rows = await withTimeout(
            this.store.listConversations(this.operatorId, status),
            timeout,
            "listConversations"
        );

        if (rows.length === 0) return [];

        const ids = rows.map((r) => r.id);
        const peerIds = [...new Set(rows.map((r) => r.peer_id))];

        const [profiles, latest, unread] = await Promise.all([
            this.fetchProfiles(peerIds),
            withTimeout(this.store.listLatestMessages(ids), timeout, "listLatestMessages"),
            withTimeout(this.store.listUnreadMessages(ids, this.operatorId), timeout, "listUnreadMessages"),
        ]);

        return sortByActivity(enrichConversations(rows, profiles, latest, unread));
    }

    // A failed profile lookup degrades to placeholders instead of failing the load.
    private async fetchProfiles(ids: readonly string[]): Promise<Profile[]> {
        try {
            return await withTimeout(this.store.getProfiles(ids), this.options.requestTimeoutMs, "getProfiles");
        } catch (err) {
            inspectError("conversations", "profile lookup failed", toInboxError("missing-profile", err));
            return [];
        }
    }
}
