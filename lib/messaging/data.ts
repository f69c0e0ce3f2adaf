// =============================================================================
// MESSAGING DATA ADAPTER (SUPABASE)
// Real Supabase calls for conversations, messages, profiles and realtime
// channels. Both inbox variants share this adapter; INBOX_TABLES decides
// which tables and columns are used.
// =============================================================================

import {
    REALTIME_SUBSCRIBE_STATES,
    type RealtimeChannel,
    type RealtimePostgresChangesPayload,
    type SupabaseClient,
} from "@supabase/supabase-js";
import { inspectLog } from "@/lib/inspect";
import type { ConversationStatus } from "@/lib/status";
import { InboxError, toInboxError } from "./errors";
import {
    INBOX_TABLES,
    mapRows,
    toConversationRow,
    toEmbeddedMessages,
    toMessage,
    toPartialConversation,
    toPartialMessage,
    toProfile,
    type InboxTables,
} from "./rows";
import type {
    ChangeEvent,
    ChannelHandle,
    ChannelHandlers,
    ChannelStatus,
    InboxStore,
    SubscribeRequest,
    UnreadMarker,
} from "./store";
import type { ConversationRow, InboxVariant, Message, NewMessage, Profile } from "./types";

const PEER_CONVERSATION_COLUMNS = "id, created_at, updated_at, user1_id, user2_id";
const SUPPORT_CONVERSATION_COLUMNS = "id, user_id, admin_id, subject, status, created_at, updated_at";
const PROFILE_COLUMNS = "id, name, email, role, profile_photo_url";

type RowPayload = RealtimePostgresChangesPayload<Record<string, unknown>>;

export class SupabaseInboxStore implements InboxStore {
    private readonly tables: InboxTables;

    constructor(
        private readonly client: SupabaseClient,
        public readonly variant: InboxVariant
    ) {
        this.tables = INBOX_TABLES[variant];
    }

    // =========================================================================
    // CONVERSATIONS
    // =========================================================================

    async listConversations(
        operatorId: string,
        statuses: readonly ConversationStatus[] | null
    ): Promise<ConversationRow[]> {
        if (this.variant === "peer") {
            // Peer chats have no status column; the status filter never applies.
            const { data, error } = await this.client
                .from(this.tables.conversations)
                .select(PEER_CONVERSATION_COLUMNS)
                .or(`user1_id.eq.${operatorId},user2_id.eq.${operatorId}`);

            if (error) throw toInboxError("remote-unavailable", error);
            return mapRows(data, (raw) => toConversationRow("peer", raw, operatorId));
        }

        let query = this.client
            .from(this.tables.conversations)
            .select(SUPPORT_CONVERSATION_COLUMNS)
            .eq("admin_id", operatorId);

        if (statuses !== null) {
            query = statuses.length === 1
                ? query.eq("status", statuses[0])
                : query.in("status", [...statuses]);
        }

        const { data, error } = await query;

        if (error) throw toInboxError("remote-unavailable", error);
        return mapRows(data, (raw) => toConversationRow("support", raw, operatorId));
    }

    async updateConversationStatus(conversationId: string, status: ConversationStatus): Promise<void> {
        if (this.variant === "peer") {
            throw new InboxError("invalid-input", "Peer conversations have no status");
        }

        const { error } = await this.client
            .from(this.tables.conversations)
            .update({
                status,
                updated_at: new Date().toISOString(),
            })
            .eq("id", conversationId);

        if (error) throw toInboxError("stale-write", error, "Couldn't update the conversation status.");
    }

    async findOrCreateConversation(operatorId: string, peerId: string): Promise<ConversationRow> {
        if (this.variant === "support") {
            throw new InboxError("invalid-input", "Support tickets are opened by the requester");
        }

        const { data: existing, error: findError } = await this.client
            .from(this.tables.conversations)
            .select(PEER_CONVERSATION_COLUMNS)
            .or(
                `and(user1_id.eq.${operatorId},user2_id.eq.${peerId}),` +
                `and(user1_id.eq.${peerId},user2_id.eq.${operatorId})`
            )
            .limit(1);

        if (findError) throw toInboxError("remote-unavailable", findError);

        const found = mapRows(existing, (raw) => toConversationRow("peer", raw, operatorId));
        if (found.length > 0) {
            return found[0];
        }

        const { data: created, error: createError } = await this.client
            .from(this.tables.conversations)
            .insert({ user1_id: operatorId, user2_id: peerId })
            .select(PEER_CONVERSATION_COLUMNS)
            .single();

        if (createError) throw toInboxError("stale-write", createError, "Couldn't start conversation.");

        const row = toConversationRow("peer", created, operatorId);
        if (!row) throw new InboxError("stale-write", "Conversation was created but could not be read back");

        inspectLog("CONVERSATION_CREATED", { conversation_id: row.id, peer_id: peerId });
        return row;
    }

    // =========================================================================
    // PROFILES
    // =========================================================================

    async getProfiles(ids: readonly string[]): Promise<Profile[]> {
        if (ids.length === 0) return [];

        const { data, error } = await this.client
            .from(this.tables.profiles)
            .select(PROFILE_COLUMNS)
            .in("id", [...ids]);

        if (error) throw toInboxError("missing-profile", error);
        return mapRows(data, toProfile);
    }

    async listProfilesByRole(role: string): Promise<Profile[]> {
        const { data, error } = await this.client
            .from(this.tables.profiles)
            .select(PROFILE_COLUMNS)
            .eq("role", role)
            .order("name", { ascending: true });

        if (error) throw toInboxError("remote-unavailable", error);
        return mapRows(data, toProfile);
    }

    // =========================================================================
    // MESSAGES
    // =========================================================================

    /**
     * Newest message per conversation through the conversation -> message
     * foreign key: one row per conversation, each embedding at most one message.
     */
    async listLatestMessages(conversationIds: readonly string[]): Promise<Message[]> {
        if (conversationIds.length === 0) return [];

        const messages = this.tables.messages;

        let query = this.client
            .from(this.tables.conversations)
            .select(`id, ${messages}(*)`)
            .in("id", [...conversationIds]);

        if (this.tables.messageDeletedColumn) {
            query = query.eq(`${messages}.${this.tables.messageDeletedColumn}`, false);
        }

        const { data, error } = await query
            .order("created_at", { ascending: false, referencedTable: messages })
            .limit(1, { referencedTable: messages });

        if (error) throw toInboxError("remote-unavailable", error);
        const rows: readonly unknown[] = data ?? [];
        return rows.flatMap((raw) => toEmbeddedMessages(this.variant, raw, messages));
    }

    async listUnreadMessages(conversationIds: readonly string[], operatorId: string): Promise<UnreadMarker[]> {
        if (conversationIds.length === 0) return [];

        const column = this.tables.messageConversationColumn;

        let query = this.client
            .from(this.tables.messages)
            .select(`id, ${column}`)
            .eq("is_read", false)
            .neq("sender_id", operatorId)
            .in(column, [...conversationIds]);

        if (this.tables.messageDeletedColumn) {
            query = query.eq(this.tables.messageDeletedColumn, false);
        }

        const { data, error } = await query;

        if (error) throw toInboxError("remote-unavailable", error);

        return mapRows(data, (raw) => {
            const partial = toPartialMessage(raw);
            if (!partial?.id || !partial.conversation_id) return null;
            return { id: partial.id, conversation_id: partial.conversation_id };
        });
    }

    async listMessages(
        conversationId: string,
        page: { before: string | null; limit: number }
    ): Promise<Message[]> {
        let query = this.client
            .from(this.tables.messages)
            .select("*")
            .eq(this.tables.messageConversationColumn, conversationId);

        if (this.tables.messageDeletedColumn) {
            query = query.eq(this.tables.messageDeletedColumn, false);
        }

        if (page.before) {
            query = query.lt("created_at", page.before);
        }

        const { data, error } = await query
            .order("created_at", { ascending: false })
            .limit(page.limit);

        if (error) throw toInboxError("remote-unavailable", error);
        return mapRows(data, (raw) => toMessage(this.variant, raw));
    }

    async markConversationRead(conversationId: string, operatorId: string): Promise<string[]> {
        const { data, error } = await this.client
            .from(this.tables.messages)
            .update({ is_read: true })
            .eq(this.tables.messageConversationColumn, conversationId)
            .eq("is_read", false)
            .neq("sender_id", operatorId)
            .select("id");

        if (error) throw toInboxError("stale-write", error);

        return mapRows(data, (raw) => toPartialMessage(raw)?.id ?? null);
    }

    async insertMessage(message: NewMessage): Promise<Message> {
        const { data, error } = await this.client
            .from(this.tables.messages)
            .insert({
                [this.tables.messageConversationColumn]: message.conversation_id,
                sender_id: message.sender_id,
                message_text: message.text,
                is_read: false,
            })
            .select()
            .single();

        if (error) throw toInboxError("stale-write", error, "Message couldn't be sent. Please try again.");

        const created = toMessage(this.variant, data);
        if (!created) throw new InboxError("stale-write", "Message was sent but could not be read back");

        inspectLog("MESSAGE_SENT", {
            conversation_id: created.conversation_id,
            length: created.text.length,
        });

        return created;
    }

    // =========================================================================
    // REALTIME
    // =========================================================================

    subscribeConversations(request: SubscribeRequest, handlers: ChannelHandlers<ConversationRow>): ChannelHandle {
        const filters = this.variant === "peer"
            ? [`user1_id=eq.${request.operatorId}`, `user2_id=eq.${request.operatorId}`]
            : [`admin_id=eq.${request.operatorId}`];

        let channel = this.client.channel(request.name);

        for (const filter of filters) {
            channel = channel.on(
                "postgres_changes",
                { event: "*", schema: "public", table: this.tables.conversations, filter },
                (payload: RowPayload) => {
                    const event = this.toConversationEvent(payload, request.operatorId);
                    if (event) handlers.onChange(event);
                }
            );
        }

        return this.open(channel, request.name, handlers.onStatus);
    }

    subscribeMessages(request: SubscribeRequest, handlers: ChannelHandlers<Message>): ChannelHandle {
        // Message rows carry no operator column, so the channel sees every
        // message; the reconciler discards what is not ours.
        const channel = this.client
            .channel(request.name)
            .on(
                "postgres_changes",
                { event: "*", schema: "public", table: this.tables.messages },
                (payload: RowPayload) => {
                    const event = this.toMessageEvent(payload);
                    if (event) handlers.onChange(event);
                }
            );

        return this.open(channel, request.name, handlers.onStatus);
    }

    private open(
        channel: RealtimeChannel,
        name: string,
        onStatus: (status: ChannelStatus, error?: Error) => void
    ): ChannelHandle {
        channel.subscribe((status, err) => {
            inspectLog("REALTIME_CHANNEL_STATUS", { channel: name, status });
            if (status === REALTIME_SUBSCRIBE_STATES.SUBSCRIBED) {
                onStatus("subscribed");
            } else {
                onStatus("closed", err);
            }
        });

        return {
            unsubscribe: async () => {
                await this.client.removeChannel(channel);
            },
        };
    }

    private toConversationEvent(payload: RowPayload, operatorId: string): ChangeEvent<ConversationRow> | null {
        const next = payload.eventType === "DELETE"
            ? null
            : toConversationRow(this.variant, payload.new, operatorId);

        if (payload.eventType !== "DELETE" && !next) return null;

        return {
            eventType: payload.eventType,
            new: next,
            old: toPartialConversation(payload.old),
        };
    }

    private toMessageEvent(payload: RowPayload): ChangeEvent<Message> | null {
        const next = payload.eventType === "DELETE"
            ? null
            : toMessage(this.variant, payload.new);

        if (payload.eventType !== "DELETE" && !next) return null;

        return {
            eventType: payload.eventType,
            new: next,
            old: toPartialMessage(payload.old),
        };
    }
}
