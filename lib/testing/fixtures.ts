import type { Conversation, ConversationRow, Message, Profile } from "@/lib/messaging/types";
import type { ConversationStatus } from "@/lib/status";

// Shared builders for the inbox tests.

export const OPERATOR_ID = "admin-1";

const BASE = Date.UTC(2024, 2, 15, 12, 0, 0);

/** ISO timestamp `minutes` before a fixed reference instant */
export function minutesBefore(minutes: number): string {
    return new Date(BASE - minutes * 60_000).toISOString();
}

export function makeProfile(id: string, name: string, role: string): Profile {
    return { id, name, email: null, role, profile_photo_url: null, is_placeholder: false };
}

export function makeSupportRow(
    id: string,
    requesterId: string,
    status: ConversationStatus,
    createdMinutesAgo: number,
    subject: string | null = null
): ConversationRow {
    const created = minutesBefore(createdMinutesAgo);
    return {
        id,
        participant_ids: [requesterId, OPERATOR_ID],
        peer_id: requesterId,
        subject,
        status,
        created_at: created,
        updated_at: created,
    };
}

export function makePeerRow(id: string, peerId: string, createdMinutesAgo: number): ConversationRow {
    const created = minutesBefore(createdMinutesAgo);
    return {
        id,
        participant_ids: [OPERATOR_ID, peerId],
        peer_id: peerId,
        subject: null,
        status: null,
        created_at: created,
        updated_at: created,
    };
}

export function makeMessage(
    id: string,
    conversationId: string,
    senderId: string,
    minutesAgo: number,
    overrides: Partial<Message> = {}
): Message {
    return {
        id,
        conversation_id: conversationId,
        sender_id: senderId,
        text: `text of ${id}`,
        created_at: minutesBefore(minutesAgo),
        is_read: false,
        is_deleted: false,
        ...overrides,
    };
}

/** An enriched conversation for the pure filter tests */
export function makeConversation(
    id: string,
    peer: Profile,
    overrides: Partial<Conversation> = {}
): Conversation {
    const created = minutesBefore(60);
    return {
        id,
        participant_ids: [peer.id, OPERATOR_ID],
        peer_id: peer.id,
        peer,
        subject: null,
        status: "open",
        created_at: created,
        updated_at: created,
        last_message: "No messages yet",
        last_message_time: created,
        has_messages: false,
        unread_count: 0,
        ...overrides,
    };
}

/** Let queued promise callbacks run; works with fake timers too */
export async function settle(rounds = 200): Promise<void> {
    for (let i = 0; i < rounds; i++) {
        await Promise.resolve();
    }
}
