// =============================================================================
// DB ROW SCHEMAS
// Table layouts of both inbox variants and their mapping onto domain types.
// Query results and realtime payloads both pass through here, so a malformed
// row is dropped before it reaches the engine.
// =============================================================================

import { z } from "zod";
import { inspectLog } from "@/lib/inspect";
import type { ConversationRow, InboxVariant, Message, Profile } from "./types";

/**
 * Table and column names per variant.
 */
export interface InboxTables {
    conversations: string;
    messages: string;
    profiles: string;
    /** Message column referencing the conversation */
    messageConversationColumn: string;
    /** Soft-delete flag column, when the table has one */
    messageDeletedColumn: string | null;
}

export const INBOX_TABLES: Record<InboxVariant, InboxTables> = {
    peer: {
        conversations: "conversations",
        messages: "messages",
        profiles: "users",
        messageConversationColumn: "conversation_id",
        messageDeletedColumn: "is_deleted",
    },
    support: {
        conversations: "support_conversations",
        messages: "support_messages",
        profiles: "public_user_profiles",
        messageConversationColumn: "support_conversation_id",
        messageDeletedColumn: null,
    },
};

const id = z.union([z.string().min(1), z.number()]).transform(String);
const timestamp = z.string().min(1);
const optionalText = z.string().nullish().transform((v) => v ?? null);
const flag = z.boolean().nullish().transform((v) => v ?? false);

const peerConversationSchema = z.object({
    id,
    user1_id: id,
    user2_id: id,
    created_at: timestamp,
    updated_at: timestamp.nullish(),
});

const supportConversationSchema = z.object({
    id,
    user_id: id,
    admin_id: id,
    subject: optionalText,
    status: z.enum(["open", "resolved", "closed"]),
    created_at: timestamp,
    updated_at: timestamp.nullish(),
});

const messageFields = {
    id,
    sender_id: id,
    message_text: z.string().nullish().transform((v) => v ?? ""),
    created_at: timestamp,
    is_read: flag,
    is_deleted: flag,
};

const peerMessageSchema = z.object({ ...messageFields, conversation_id: id });
const supportMessageSchema = z.object({ ...messageFields, support_conversation_id: id });

const profileSchema = z.object({
    id,
    name: optionalText,
    email: optionalText,
    role: optionalText,
    profile_photo_url: optionalText,
});

/**
 * Map a raw conversation row. The peer is whichever participant is not the
 * operator (peer chat) or the requester (support).
 */
export function toConversationRow(variant: InboxVariant, raw: unknown, operatorId: string): ConversationRow | null {
    if (variant === "peer") {
        const parsed = peerConversationSchema.safeParse(raw);
        if (!parsed.success) return dropRow("conversation", parsed.error);
        const row = parsed.data;
        return {
            id: row.id,
            participant_ids: [row.user1_id, row.user2_id],
            peer_id: row.user1_id === operatorId ? row.user2_id : row.user1_id,
            subject: null,
            status: null,
            created_at: row.created_at,
            updated_at: row.updated_at ?? row.created_at,
        };
    }

    const parsed = supportConversationSchema.safeParse(raw);
    if (!parsed.success) return dropRow("conversation", parsed.error);
    const row = parsed.data;
    return {
        id: row.id,
        participant_ids: [row.user_id, row.admin_id],
        peer_id: row.user_id,
        subject: row.subject,
        status: row.status,
        created_at: row.created_at,
        updated_at: row.updated_at ?? row.created_at,
    };
}

export function toMessage(variant: InboxVariant, raw: unknown): Message | null {
    if (variant === "peer") {
        const parsed = peerMessageSchema.safeParse(raw);
        if (!parsed.success) return dropRow("message", parsed.error);
        const row = parsed.data;
        return {
            id: row.id,
            conversation_id: row.conversation_id,
            sender_id: row.sender_id,
            text: row.message_text,
            created_at: row.created_at,
            is_read: row.is_read,
            is_deleted: row.is_deleted,
        };
    }

    const parsed = supportMessageSchema.safeParse(raw);
    if (!parsed.success) return dropRow("message", parsed.error);
    const row = parsed.data;
    return {
        id: row.id,
        conversation_id: row.support_conversation_id,
        sender_id: row.sender_id,
        text: row.message_text,
        created_at: row.created_at,
        is_read: row.is_read,
        is_deleted: row.is_deleted,
    };
}

export function toProfile(raw: unknown): Profile | null {
    const parsed = profileSchema.safeParse(raw);
    if (!parsed.success) return dropRow("profile", parsed.error);
    const row = parsed.data;
    return {
        id: row.id,
        name: row.name ?? "Unknown User",
        email: row.email,
        role: row.role ?? "Unknown",
        profile_photo_url: row.profile_photo_url,
        is_placeholder: false,
    };
}

// -----------------------------------------------------------------------------
// Partial rows (realtime "old" images)
// DELETE payloads only carry the primary key unless the table uses
// REPLICA IDENTITY FULL, so everything but the id is optional here.
// -----------------------------------------------------------------------------

const partialConversationSchema = z.object({
    id: id.optional(),
    status: z.enum(["open", "resolved", "closed"]).optional().catch(undefined),
});

const partialMessageSchema = z.object({
    id: id.optional(),
    conversation_id: id.optional(),
    support_conversation_id: id.optional(),
    sender_id: id.optional(),
    is_read: z.boolean().optional().catch(undefined),
    is_deleted: z.boolean().optional().catch(undefined),
});

export function toPartialConversation(raw: unknown): Partial<ConversationRow> | null {
    const parsed = partialConversationSchema.safeParse(raw);
    if (!parsed.success) return null;
    const { id: rowId, status } = parsed.data;
    const partial: Partial<ConversationRow> = {};
    if (rowId !== undefined) partial.id = rowId;
    if (status !== undefined) partial.status = status;
    return partial;
}

export function toPartialMessage(raw: unknown): Partial<Message> | null {
    const parsed = partialMessageSchema.safeParse(raw);
    if (!parsed.success) return null;
    const row = parsed.data;
    const partial: Partial<Message> = {};
    if (row.id !== undefined) partial.id = row.id;
    const conversationId = row.conversation_id ?? row.support_conversation_id;
    if (conversationId !== undefined) partial.conversation_id = conversationId;
    if (row.sender_id !== undefined) partial.sender_id = row.sender_id;
    if (row.is_read !== undefined) partial.is_read = row.is_read;
    if (row.is_deleted !== undefined) partial.is_deleted = row.is_deleted;
    return partial;
}

// -----------------------------------------------------------------------------
// Embedded rows
// A conversation row selected with its messages embedded, e.g.
// `id, messages(*)`; the messages arrive as an array under the table name.
// -----------------------------------------------------------------------------

const embeddingRowSchema = z.record(z.unknown());
const embeddedListSchema = z.array(z.unknown());

export function toEmbeddedMessages(variant: InboxVariant, raw: unknown, table: string): Message[] {
    const parent = embeddingRowSchema.safeParse(raw);
    if (!parent.success) return [];
    const nested = embeddedListSchema.safeParse(parent.data[table]);
    if (!nested.success) return [];
    return mapRows(nested.data, (row) => toMessage(variant, row));
}

/**
 * Map a list of rows, dropping the malformed ones.
 */
export function mapRows<T>(rows: readonly unknown[] | null, map: (raw: unknown) => T | null): T[] {
    const result: T[] = [];
    for (const raw of rows ?? []) {
        const mapped = map(raw);
        if (mapped !== null) result.push(mapped);
    }
    return result;
}

function dropRow(kind: string, error: z.ZodError): null {
    inspectLog("ROW_DROPPED", {
        kind,
        issues: error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
    return null;
}
