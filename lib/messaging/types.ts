// =============================================================================
// MESSAGING TYPES
// Domain shapes shared by both inbox variants. Kept separate from DB row
// types; lib/messaging/data.ts maps table columns onto these.
// =============================================================================

import type { ConversationStatus, StatusFilter } from "@/lib/status";

/**
 * "peer" = operator-to-user chat, "support" = support tickets.
 */
export type InboxVariant = "peer" | "support";

export interface Profile {
    id: string;
    name: string;
    email: string | null;
    role: string;
    profile_photo_url: string | null;
    /** True when the profile could not be resolved and was derived from the id */
    is_placeholder: boolean;
}

/**
 * A conversation as stored, before enrichment.
 */
export interface ConversationRow {
    id: string;
    participant_ids: readonly [string, string];
    /** The participant who is not the operator (peer) or the requester (support) */
    peer_id: string;
    subject: string | null;
    /** null for peer chats */
    status: ConversationStatus | null;
    created_at: string;
    updated_at: string;
}

/**
 * Conversation enriched for inbox display.
 */
export interface Conversation extends ConversationRow {
    peer: Profile;
    /** Last non-deleted message text, or NO_MESSAGES_YET */
    last_message: string;
    /** Last message time, or created_at when there are no messages */
    last_message_time: string;
    has_messages: boolean;
    unread_count: number;
}

export const NO_MESSAGES_YET = "No messages yet";

export interface Message {
    id: string;
    conversation_id: string;
    sender_id: string;
    text: string;
    created_at: string;
    is_read: boolean;
    is_deleted: boolean;
}

/**
 * A line in the open transcript: a stored message or a local system notice.
 * Notices are never persisted.
 */
export type TranscriptEntry =
    | { kind: "message"; message: Message }
    | { kind: "notice"; id: string; text: string; created_at: string };

export interface FilterState {
    /** Peer role category; null or "all" passes everything */
    role: string | null;
    status: StatusFilter;
    /** Lowercased, trimmed free-text query; "" = no query */
    query: string;
}

export interface MessagePage {
    /** Oldest first */
    messages: Message[];
    /** Heuristic: the page came back full */
    hasMore: boolean;
}

export interface NewMessage {
    conversation_id: string;
    sender_id: string;
    text: string;
}
