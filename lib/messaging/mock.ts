// =============================================================================
// IN-MEMORY MESSAGING STORE
// Same contract as SupabaseInboxStore without a database. Used by the tests
// and by `npm run inbox:watch -- --mock` for local development.
// =============================================================================

import type { ConversationStatus } from "@/lib/status";
import { InboxError } from "./errors";
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

export type MockStoreMethod =
    | "listConversations"
    | "getProfiles"
    | "listLatestMessages"
    | "listUnreadMessages"
    | "listMessages"
    | "markConversationRead"
    | "insertMessage"
    | "updateConversationStatus"
    | "listProfilesByRole"
    | "findOrCreateConversation"
    | "subscribe"
    | "unsubscribe";

export type MockChannelKind = "conversations" | "messages";

export interface MockSeed {
    profiles?: Profile[];
    conversations?: ConversationRow[];
    messages?: Message[];
}

interface MockChannel<T> {
    name: string;
    active: boolean;
    handlers: ChannelHandlers<T>;
}

function emptyCounters(): Record<MockStoreMethod, number> {
    return {
        listConversations: 0,
        getProfiles: 0,
        listLatestMessages: 0,
        listUnreadMessages: 0,
        listMessages: 0,
        markConversationRead: 0,
        insertMessage: 0,
        updateConversationStatus: 0,
        listProfilesByRole: 0,
        findOrCreateConversation: 0,
        subscribe: 0,
        unsubscribe: 0,
    };
}

export class MockInboxStore implements InboxStore {
    /** Number of calls per method */
    readonly calls = emptyCounters();

    /** When true, every new channel reports "subscribed" on the next microtask */
    autoSubscribe = true;

    private profiles: Profile[];
    private conversations: ConversationRow[];
    private messages: Message[];
    private conversationChannels: MockChannel<ConversationRow>[] = [];
    private messageChannels: MockChannel<Message>[] = [];
    private failures = new Map<MockStoreMethod, InboxError[]>();
    private gates = new Map<MockStoreMethod, Promise<void>[]>();
    private nextId = 1;

    constructor(public readonly variant: InboxVariant, seed: MockSeed = {}) {
        this.profiles = [...(seed.profiles ?? [])];
        this.conversations = [...(seed.conversations ?? [])];
        this.messages = [...(seed.messages ?? [])];
    }

    // =========================================================================
    // TEST CONTROLS
    // =========================================================================

    /** The next call to `method` rejects with `error` */
    failNext(method: MockStoreMethod, error = new InboxError("remote-unavailable", `${method} failed`)): void {
        const queue = this.failures.get(method) ?? [];
        queue.push(error);
        this.failures.set(method, queue);
    }

    /**
     * The next call to `method` waits until the returned function is called.
     */
    hold(method: MockStoreMethod): () => void {
        let release = () => {};
        const gate = new Promise<void>((resolve) => {
            release = resolve;
        });
        const queue = this.gates.get(method) ?? [];
        queue.push(gate);
        this.gates.set(method, queue);
        return release;
    }

    /** Report a channel status on every open channel of a kind */
    setChannelStatus(kind: MockChannelKind, status: ChannelStatus, error?: Error): void {
        const channels = kind === "conversations" ? this.conversationChannels : this.messageChannels;
        for (const channel of channels.filter((c) => c.active)) {
            channel.handlers.onStatus(status, error);
        }
    }

    /** Names of the channels not yet unsubscribed */
    openChannels(kind?: MockChannelKind): string[] {
        const channels = [
            ...(kind === "messages" ? [] : this.conversationChannels),
            ...(kind === "conversations" ? [] : this.messageChannels),
        ];
        return channels.filter((c) => c.active).map((c) => c.name);
    }

    emitConversation(event: ChangeEvent<ConversationRow>): void {
        for (const channel of this.conversationChannels.filter((c) => c.active)) {
            channel.handlers.onChange(event);
        }
    }

    emitMessage(event: ChangeEvent<Message>): void {
        for (const channel of this.messageChannels.filter((c) => c.active)) {
            channel.handlers.onChange(event);
        }
    }

    /** Store a message sent by someone else and push its INSERT event */
    deliverMessage(message: Message): void {
        this.messages.push({ ...message });
        this.emitMessage({ eventType: "INSERT", new: { ...message }, old: null });
    }

    /** Apply a partial update to a stored message and push its UPDATE event */
    updateMessage(id: string, patch: Partial<Pick<Message, "is_read" | "is_deleted" | "text">>): void {
        const index = this.messages.findIndex((m) => m.id === id);
        if (index === -1) return;
        const before = this.messages[index];
        const after = { ...before, ...patch };
        this.messages[index] = after;
        this.emitMessage({
            eventType: "UPDATE",
            new: { ...after },
            old: { id: before.id, is_read: before.is_read, is_deleted: before.is_deleted },
        });
    }

    /** Change a conversation as another operator would and push its UPDATE event */
    changeConversationStatus(id: string, status: ConversationStatus): void {
        const index = this.conversations.findIndex((c) => c.id === id);
        if (index === -1) return;
        const before = this.conversations[index];
        const after = { ...before, status, updated_at: new Date().toISOString() };
        this.conversations[index] = after;
        this.emitConversation({
            eventType: "UPDATE",
            new: { ...after },
            old: { id: before.id, status: before.status },
        });
    }

    snapshotMessages(conversationId?: string): Message[] {
        return this.messages
            .filter((m) => conversationId === undefined || m.conversation_id === conversationId)
            .map((m) => ({ ...m }));
    }

    // =========================================================================
    // STORE CONTRACT
    // =========================================================================

    async listConversations(
        operatorId: string,
        statuses: readonly ConversationStatus[] | null
    ): Promise<ConversationRow[]> {
        await this.begin("listConversations");
        return this.conversations
            .filter((c) => this.isOperatorOf(c, operatorId))
            .filter((c) => statuses === null || (c.status !== null && statuses.includes(c.status)))
            .map((c) => ({ ...c }));
    }

    async getProfiles(ids: readonly string[]): Promise<Profile[]> {
        await this.begin("getProfiles");
        return this.profiles.filter((p) => ids.includes(p.id)).map((p) => ({ ...p }));
    }

    async listLatestMessages(conversationIds: readonly string[]): Promise<Message[]> {
        await this.begin("listLatestMessages");
        const latest = new Map<string, Message>();
        for (const message of this.visibleMessages().sort(newestFirst)) {
            if (conversationIds.includes(message.conversation_id) && !latest.has(message.conversation_id)) {
                latest.set(message.conversation_id, message);
            }
        }
        return [...latest.values()];
    }

    async listUnreadMessages(conversationIds: readonly string[], operatorId: string): Promise<UnreadMarker[]> {
        await this.begin("listUnreadMessages");
        return this.visibleMessages()
            .filter((m) => conversationIds.includes(m.conversation_id))
            .filter((m) => !m.is_read && m.sender_id !== operatorId)
            .map((m) => ({ id: m.id, conversation_id: m.conversation_id }));
    }

    async listMessages(
        conversationId: string,
        page: { before: string | null; limit: number }
    ): Promise<Message[]> {
        await this.begin("listMessages");
        const before = page.before;
        return this.visibleMessages()
            .filter((m) => m.conversation_id === conversationId)
            .filter((m) => before === null || m.created_at < before)
            .sort(newestFirst)
            .slice(0, page.limit);
    }

    async markConversationRead(conversationId: string, operatorId: string): Promise<string[]> {
        await this.begin("markConversationRead");
        const changed: string[] = [];
        this.messages = this.messages.map((m) => {
            if (m.conversation_id !== conversationId || m.is_read || m.sender_id === operatorId) return m;
            changed.push(m.id);
            return { ...m, is_read: true };
        });
        return changed;
    }

    async insertMessage(message: NewMessage): Promise<Message> {
        await this.begin("insertMessage");
        const created: Message = {
            id: `mock-msg-${this.nextId++}`,
            conversation_id: message.conversation_id,
            sender_id: message.sender_id,
            text: message.text,
            created_at: new Date().toISOString(),
            is_read: false,
            is_deleted: false,
        };
        this.messages.push(created);
        return { ...created };
    }

    async updateConversationStatus(conversationId: string, status: ConversationStatus): Promise<void> {
        await this.begin("updateConversationStatus");
        const index = this.conversations.findIndex((c) => c.id === conversationId);
        if (index === -1) {
            throw new InboxError("stale-write", "Conversation not found");
        }
        this.conversations[index] = {
            ...this.conversations[index],
            status,
            updated_at: new Date().toISOString(),
        };
    }

    async listProfilesByRole(role: string): Promise<Profile[]> {
        await this.begin("listProfilesByRole");
        return this.profiles
            .filter((p) => p.role === role)
            .sort((a, b) => a.name.localeCompare(b.name))
            .map((p) => ({ ...p }));
    }

    async findOrCreateConversation(operatorId: string, peerId: string): Promise<ConversationRow> {
        await this.begin("findOrCreateConversation");
        if (this.variant === "support") {
            throw new InboxError("invalid-input", "Support tickets are opened by the requester");
        }

        const existing = this.conversations.find(
            (c) => c.participant_ids.includes(operatorId) && c.participant_ids.includes(peerId)
        );
        if (existing) return { ...existing };

        const now = new Date().toISOString();
        const created: ConversationRow = {
            id: `mock-conv-${this.nextId++}`,
            participant_ids: [operatorId, peerId],
            peer_id: peerId,
            subject: null,
            status: null,
            created_at: now,
            updated_at: now,
        };
        this.conversations.push(created);
        return { ...created };
    }

    subscribeConversations(request: SubscribeRequest, handlers: ChannelHandlers<ConversationRow>): ChannelHandle {
        return this.open(this.conversationChannels, request, handlers);
    }

    subscribeMessages(request: SubscribeRequest, handlers: ChannelHandlers<Message>): ChannelHandle {
        return this.open(this.messageChannels, request, handlers);
    }

    // =========================================================================
    // INTERNALS
    // =========================================================================

    private open<T>(
        channels: MockChannel<T>[],
        request: SubscribeRequest,
        handlers: ChannelHandlers<T>
    ): ChannelHandle {
        this.calls.subscribe++;
        const channel: MockChannel<T> = { name: request.name, active: true, handlers };
        channels.push(channel);

        if (this.autoSubscribe) {
            queueMicrotask(() => {
                if (channel.active) channel.handlers.onStatus("subscribed");
            });
        }

        return {
            unsubscribe: async () => {
                if (!channel.active) return;
                this.calls.unsubscribe++;
                channel.active = false;
            },
        };
    }

    private async begin(method: MockStoreMethod): Promise<void> {
        this.calls[method]++;

        const gate = this.gates.get(method)?.shift();
        if (gate) await gate;

        const failure = this.failures.get(method)?.shift();
        if (failure) throw failure;
    }

    private isOperatorOf(conversation: ConversationRow, operatorId: string): boolean {
        if (this.variant === "support") {
            return conversation.participant_ids[1] === operatorId;
        }
        return conversation.participant_ids.includes(operatorId);
    }

    private visibleMessages(): Message[] {
        return this.messages.filter((m) => !m.is_deleted).map((m) => ({ ...m }));
    }
}

function newestFirst(a: Message, b: Message): number {
    return b.created_at.localeCompare(a.created_at);
}

// =============================================================================
// DEV SEED
// A small inbox for local development against the mock store. Support tickets
// carry a subject and status; peer chats carry neither.
// =============================================================================

function minutesAgo(minutes: number): string {
    return new Date(Date.now() - minutes * 60 * 1000).toISOString();
}

function devRow(
    variant: InboxVariant,
    operatorId: string,
    row: { id: string; peer: string; subject: string; status: ConversationStatus; created: number; updated: number }
): ConversationRow {
    if (variant === "peer") {
        return {
            id: row.id,
            participant_ids: [operatorId, row.peer],
            peer_id: row.peer,
            subject: null,
            status: null,
            created_at: minutesAgo(row.created),
            updated_at: minutesAgo(row.updated),
        };
    }
    return {
        id: row.id,
        participant_ids: [row.peer, operatorId],
        peer_id: row.peer,
        subject: row.subject,
        status: row.status,
        created_at: minutesAgo(row.created),
        updated_at: minutesAgo(row.updated),
    };
}

export function createDevSeed(operatorId: string, variant: InboxVariant = "support"): MockSeed {
    const profiles: Profile[] = [
        { id: "dev-driver-1", name: "Ramon Dela Cruz", email: "driver@example.com", role: "driver", profile_photo_url: null, is_placeholder: false },
        { id: "dev-owner-1", name: "Liza Santos", email: "owner@example.com", role: "owner", profile_photo_url: null, is_placeholder: false },
        { id: "dev-tourist-1", name: "Marco Reyes", email: "tourist@example.com", role: "tourist", profile_photo_url: null, is_placeholder: false },
    ];

    const conversations: ConversationRow[] = [
        devRow(variant, operatorId, { id: "dev-conv-1", peer: "dev-driver-1", subject: "Payout not received", status: "open", created: 600, updated: 20 }),
        devRow(variant, operatorId, { id: "dev-conv-2", peer: "dev-owner-1", subject: "Carriage inspection", status: "open", created: 90, updated: 90 }),
        devRow(variant, operatorId, { id: "dev-conv-3", peer: "dev-tourist-1", subject: "Refund request", status: "resolved", created: 4000, updated: 3000 }),
    ];

    const messages: Message[] = [
        { id: "dev-msg-1", conversation_id: "dev-conv-1", sender_id: "dev-driver-1", text: "Hi, my payout from last week hasn't arrived.", created_at: minutesAgo(40), is_read: true, is_deleted: false },
        { id: "dev-msg-2", conversation_id: "dev-conv-1", sender_id: operatorId, text: "Checking with finance now.", created_at: minutesAgo(30), is_read: true, is_deleted: false },
        { id: "dev-msg-3", conversation_id: "dev-conv-1", sender_id: "dev-driver-1", text: "Thanks, any update?", created_at: minutesAgo(20), is_read: false, is_deleted: false },
        { id: "dev-msg-4", conversation_id: "dev-conv-3", sender_id: "dev-tourist-1", text: "The tour was cancelled, can I get a refund?", created_at: minutesAgo(3100), is_read: true, is_deleted: false },
        { id: "dev-msg-5", conversation_id: "dev-conv-3", sender_id: operatorId, text: "Refund processed.", created_at: minutesAgo(3000), is_read: true, is_deleted: false },
    ];

    return { profiles, conversations, messages };
}
