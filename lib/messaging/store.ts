// =============================================================================
// REMOTE STORE CONTRACT
// The inbox engine only talks to the backend through this interface.
// SupabaseInboxStore (data.ts) is the real one, MockInboxStore (mock.ts) the
// in-memory one.
// =============================================================================

import type { ConversationStatus } from "@/lib/status";
import type { ConversationRow, InboxVariant, Message, NewMessage, Profile } from "./types";

export type ChangeEventType = "INSERT" | "UPDATE" | "DELETE";

/**
 * A change pushed by the realtime backend, already mapped onto domain types.
 * `old` is partial: DELETE payloads usually carry only the primary key.
 */
export interface ChangeEvent<T> {
    eventType: ChangeEventType;
    new: T | null;
    old: Partial<T> | null;
}

/**
 * Channel lifecycle as reported by the backend.
 * "closed" covers CLOSED, CHANNEL_ERROR and TIMED_OUT.
 */
export type ChannelStatus = "subscribed" | "closed";

export interface SubscribeRequest {
    /** Unique channel name */
    name: string;
    /** Scope events to this operator where the table allows it */
    operatorId: string;
}

export interface ChannelHandlers<T> {
    onChange(event: ChangeEvent<T>): void;
    onStatus(status: ChannelStatus, error?: Error): void;
}

export interface ChannelHandle {
    unsubscribe(): Promise<void>;
}

export interface UnreadMarker {
    id: string;
    conversation_id: string;
}

export interface InboxStore {
    readonly variant: InboxVariant;

    /** Conversations the operator participates in; statuses=null means any */
    listConversations(operatorId: string, statuses: readonly ConversationStatus[] | null): Promise<ConversationRow[]>;

    /** Profiles for the given ids, one round trip. Missing ids are simply absent. */
    getProfiles(ids: readonly string[]): Promise<Profile[]>;

    /**
     * The newest non-deleted message of each given conversation, one round
     * trip. At most one message per conversation, so the result stays
     * bounded by the number of ids.
     */
    listLatestMessages(conversationIds: readonly string[]): Promise<Message[]>;

    /** Unread, non-deleted messages not sent by the operator */
    listUnreadMessages(conversationIds: readonly string[], operatorId: string): Promise<UnreadMarker[]>;

    /** Non-deleted messages newest first, strictly older than `before` when given */
    listMessages(conversationId: string, page: { before: string | null; limit: number }): Promise<Message[]>;

    /** Mark unread messages not sent by the operator as read; returns the ids changed */
    markConversationRead(conversationId: string, operatorId: string): Promise<string[]>;

    insertMessage(message: NewMessage): Promise<Message>;

    updateConversationStatus(conversationId: string, status: ConversationStatus): Promise<void>;

    /** Contacts directory for starting a new chat */
    listProfilesByRole(role: string): Promise<Profile[]>;

    /** Peer chats only: find a conversation in either participant order, or create it */
    findOrCreateConversation(operatorId: string, peerId: string): Promise<ConversationRow>;

    subscribeConversations(request: SubscribeRequest, handlers: ChannelHandlers<ConversationRow>): ChannelHandle;

    subscribeMessages(request: SubscribeRequest, handlers: ChannelHandlers<Message>): ChannelHandle;
}

/**
 * Placeholder profile for a participant whose profile row is missing.
 */
export function placeholderProfile(id: string): Profile {
    return {
        id,
        name: `User ${id.substring(0, 8)}...`,
        email: null,
        role: "Unknown",
        profile_photo_url: null,
        is_placeholder: true,
    };
}
