// =============================================================================
// INBOX CONTROLLER
// Owns the operator's inbox state: filters, active conversation, transcript.
// Presentation reads getState() and listens via on(); no method throws, every
// failure ends up in state or as a notice.
// =============================================================================

import { DEFAULT_INBOX_OPTIONS, type InboxOptions } from "@/lib/config";
import { inspectError, inspectLog } from "@/lib/inspect";
import { InboxError, toInboxError, withTimeout, type InboxErrorKind } from "@/lib/messaging/errors";
import type { ChangeEvent, InboxStore } from "@/lib/messaging/store";
import type {
    Conversation,
    ConversationRow,
    FilterState,
    InboxVariant,
    Message,
    Profile,
    TranscriptEntry,
} from "@/lib/messaging/types";
import {
    canSendWithStatus,
    describeEmptyInbox,
    parseStatusFilter,
    type ConversationStatus,
    type StatusFilter,
} from "@/lib/status";
import { ConversationRepository } from "./conversations";
import { TypedEmitter } from "./events";
import {
    applyFilters,
    describeFilter,
    normalizeQuery,
    normalizeRole,
    SearchDebouncer,
} from "./filters";
import { MessageRepository } from "./messages";
import { mergeReadState, ReadStateTracker } from "./readState";
import {
    RealtimeReconciler,
    type ChannelKind,
    type ChannelState,
    type ReconcileContext,
    type ReconcileDecision,
} from "./realtime";

// =============================================================================
// PUBLIC TYPES
// =============================================================================

export interface InboxNotice {
    id: string;
    kind: InboxErrorKind | "info";
    message: string;
    dismissable: boolean;
}

export interface InboxState {
    readonly variant: InboxVariant;
    readonly operatorId: string;
    /** Conversations after status, role and search filters */
    readonly conversations: readonly Conversation[];
    readonly activeConversationId: string | null;
    readonly activeConversation: Conversation | null;
    /** Oldest first */
    readonly transcript: readonly TranscriptEntry[];
    readonly hasMore: boolean;
    readonly filters: FilterState;
    readonly canSend: boolean;
    readonly loading: boolean;
    readonly loadingMessages: boolean;
    /** Set when the last conversation load failed */
    readonly error: InboxError | null;
    readonly messagesError: InboxError | null;
    /** Copy for the empty list, null when the list has entries */
    readonly emptyMessage: string | null;
    readonly notices: readonly InboxNotice[];
    readonly realtime: Readonly<Record<ChannelKind, ChannelState>>;
    readonly totalUnread: number;
}

export type SendResult =
    | { ok: true; message: Message }
    | { ok: false; error: InboxError; restoreText: string };

export type StatusUpdateResult = { ok: true } | { ok: false; error: InboxError };

export type StartConversationResult =
    | { ok: true; conversationId: string }
    | { ok: false; error: InboxError };

export interface InboxEventMap {
    "conversations-loaded": { conversations: readonly Conversation[]; error: InboxError | null };
    "conversations-filtered": { conversations: readonly Conversation[]; filter: FilterState; descriptor: string };
    "conversation-selected": { id: string; peer: Profile; subject: string | null; status: ConversationStatus | null };
    "conversation-status-changed": { id: string; status: ConversationStatus };
    "message-received": { message: Message };
    "message-updated": { message: Message };
    "messages-marked-read": { conversationId: string; messageIds: readonly string[] };
    "transcript-changed": { conversationId: string | null; transcript: readonly TranscriptEntry[] };
    "notice": InboxNotice;
    "subscription-failed": { channel: ChannelKind; error: InboxError };
    "state-changed": InboxState;
}

export interface InboxControllerConfig {
    operatorId: string;
    options?: Partial<InboxOptions>;
    /** Initial filters; support inboxes default to open tickets */
    filters?: Partial<FilterState>;
}

export function statusNoticeText(status: ConversationStatus): string {
    return `Conversation marked as ${status} by admin`;
}

function messageEntry(message: Message): TranscriptEntry {
    return { kind: "message", message };
}

function hasMessage(transcript: readonly TranscriptEntry[], id: string): boolean {
    return transcript.some((e) => e.kind === "message" && e.message.id === id);
}

// =============================================================================
// CONTROLLER
// =============================================================================

export class InboxController {
    readonly variant: InboxVariant;
    readonly operatorId: string;

    private readonly options: InboxOptions;
    private readonly emitter = new TypedEmitter<InboxEventMap>();
    private readonly conversations: ConversationRepository;
    private readonly messages: MessageRepository;
    private readonly readState: ReadStateTracker;
    private readonly realtime: RealtimeReconciler;
    private readonly debouncer: SearchDebouncer;

    private filters: FilterState;
    private activeId: string | null = null;
    private transcript: TranscriptEntry[] = [];
    private state: InboxState;
    private started = false;
    private noticeSeq = 0;

    constructor(private readonly store: InboxStore, config: InboxControllerConfig) {
        this.variant = store.variant;
        this.operatorId = config.operatorId;
        this.options = { ...DEFAULT_INBOX_OPTIONS, ...config.options };

        this.filters = {
            role: normalizeRole(config.filters?.role),
            status: config.filters?.status !== undefined
                ? config.filters.status
                : store.variant === "support" ? ["open"] : null,
            query: normalizeQuery(config.filters?.query),
        };

        this.conversations = new ConversationRepository(store, this.operatorId, this.options);
        this.readState = new ReadStateTracker(
            store,
            this.operatorId,
            (conversationId, ids) => this.handleMarkedRead(conversationId, ids),
            this.options.requestTimeoutMs
        );
        this.messages = new MessageRepository(store, this.readState, this.options);
        this.realtime = new RealtimeReconciler(
            store,
            this.operatorId,
            this.options,
            () => this.reconcileContext(),
            {
                onConversationChange: (event, decision) => this.handleConversationChange(event, decision),
                onMessageChange: (event, decision) => this.handleMessageChange(event, decision),
                onChannelFailed: (channel, error) => {
                    this.emitter.emit("subscription-failed", { channel, error });
                    this.pushNotice(error.kind, "Live updates are unavailable. Reload to try again.");
                },
                onChannelState: (channel, channelState) => {
                    this.commit({ realtime: { ...this.state.realtime, [channel]: channelState } });
                },
            }
        );
        this.debouncer = new SearchDebouncer(this.options.searchDebounceMs, (query) => {
            this.run("search", () => this.applySearch(query));
        });

        this.state = {
            variant: this.variant,
            operatorId: this.operatorId,
            conversations: [],
            activeConversationId: null,
            activeConversation: null,
            transcript: [],
            hasMore: false,
            filters: this.filters,
            canSend: false,
            loading: false,
            loadingMessages: false,
            error: null,
            messagesError: null,
            emptyMessage: null,
            notices: [],
            realtime: { conversations: "idle", messages: "idle" },
            totalUnread: 0,
        };
    }

    // =========================================================================
    // LIFECYCLE
    // =========================================================================

    /** Initial load, then realtime. Calling it again while started does nothing. */
    async start(): Promise<void> {
        if (this.started) return;
        this.started = true;

        inspectLog("INBOX_STARTED", {
            variant: this.variant,
            operator_id: this.operatorId,
            filter: describeFilter(this.filters),
        });

        await this.reload();
        if (this.started) this.realtime.start();
    }

    /**
     * Unsubscribe realtime and cancel pending search. Listeners stay
     * registered until their own unsubscribe runs, so the controller can be
     * started again.
     */
    async dispose(): Promise<void> {
        this.started = false;
        this.debouncer.cancel();
        await this.realtime.stop();
        inspectLog("INBOX_DISPOSED", { operator_id: this.operatorId });
    }

    on<K extends keyof InboxEventMap>(event: K, listener: (payload: InboxEventMap[K]) => void): () => void {
        return this.emitter.on(event, listener);
    }

    /** Current snapshot; the same object until something changes */
    getState = (): InboxState => this.state;

    totalUnread(): number {
        return this.conversations.totalUnread();
    }

    // =========================================================================
    // CONVERSATION LIST
    // =========================================================================

    async reload(): Promise<void> {
        this.commit({ loading: true });

        const result = await this.conversations.load(this.filters);
        if (!this.conversations.isLatest(result.seq)) return;

        this.emitter.emit("conversations-loaded", {
            conversations: this.conversations.getCached(),
            error: result.error,
        });
        this.refreshVisible({ loading: false, error: result.error });
    }

    async changeStatusFilter(status: StatusFilter | string): Promise<void> {
        this.filters = {
            ...this.filters,
            status: typeof status === "string" ? parseStatusFilter(status) : status,
        };
        await this.reload();
    }

    async changeRoleFilter(role: string | null): Promise<void> {
        this.filters = { ...this.filters, role: normalizeRole(role) };
        await this.reload();
    }

    /** Debounced; an empty query reloads from the store */
    search(query: string): void {
        this.debouncer.push(query);
    }

    async listContacts(role: string): Promise<Profile[]> {
        try {
            return await withTimeout(
                this.store.listProfilesByRole(role),
                this.options.requestTimeoutMs,
                "listProfilesByRole"
            );
        } catch (err) {
            inspectError("inbox", "listContacts failed", toInboxError("remote-unavailable", err));
            return [];
        }
    }

    async startConversation(peerId: string): Promise<StartConversationResult> {
        if (this.variant !== "peer") {
            const error = new InboxError("invalid-input", "Support tickets can't be started from the inbox");
            this.pushNotice(error.kind, error.message);
            return { ok: false, error };
        }

        let row: ConversationRow;
        try {
            row = await withTimeout(
                this.store.findOrCreateConversation(this.operatorId, peerId),
                this.options.requestTimeoutMs,
                "findOrCreateConversation"
            );
        } catch (err) {
            const error = toInboxError("stale-write", err, "Couldn't start conversation.");
            inspectError("inbox", "startConversation failed", error);
            this.pushNotice(error.kind, error.message);
            return { ok: false, error };
        }

        await this.reload();
        await this.selectConversation(row.id);
        return { ok: true, conversationId: row.id };
    }

    // =========================================================================
    // ACTIVE CONVERSATION
    // =========================================================================

    async selectConversation(conversationId: string): Promise<void> {
        const conversation = this.conversations.find(conversationId);
        if (!conversation) {
            this.pushNotice("invalid-input", "Conversation not found");
            return;
        }

        this.activeId = conversationId;
        this.messages.reset();
        this.transcript = [];

        this.commit({
            activeConversationId: conversationId,
            activeConversation: conversation,
            transcript: [],
            hasMore: false,
            canSend: canSendWithStatus(conversation.status),
            loadingMessages: true,
            messagesError: null,
        });

        this.emitter.emit("conversation-selected", {
            id: conversation.id,
            peer: conversation.peer,
            subject: conversation.subject,
            status: conversation.status,
        });

        const page = await this.messages.load(conversationId);
        if (!page.current || this.activeId !== conversationId) return;

        // Keep anything realtime appended while the page was loading.
        const loaded = page.messages.map(messageEntry);
        const arrived = this.transcript.filter(
            (e) => e.kind === "notice" || !page.messages.some((m) => m.id === e.message.id)
        );
        this.transcript = [...loaded, ...arrived];

        this.commit({
            transcript: this.transcript,
            hasMore: page.hasMore,
            loadingMessages: false,
            messagesError: page.error,
        });
        this.emitTranscript();
    }

    async loadOlderMessages(): Promise<void> {
        const conversationId = this.activeId;
        if (conversationId === null || !this.state.hasMore) return;

        this.commit({ loadingMessages: true });
        const page = await this.messages.loadOlder();
        if (!page.current || this.activeId !== conversationId) return;

        if (page.error) {
            // Cursor is untouched; keep hasMore so the same page can be retried.
            this.commit({ loadingMessages: false, messagesError: page.error });
            return;
        }

        const older = page.messages
            .filter((m) => !hasMessage(this.transcript, m.id))
            .map(messageEntry);
        this.transcript = [...older, ...this.transcript];

        this.commit({
            transcript: this.transcript,
            hasMore: page.hasMore,
            loadingMessages: false,
            messagesError: page.error,
        });
        this.emitTranscript();
    }

    async sendMessage(text: string): Promise<SendResult> {
        const body = text.trim();

        if (body === "") {
            return { ok: false, error: new InboxError("invalid-input", "Message is empty"), restoreText: text };
        }

        const conversationId = this.activeId;
        if (conversationId === null || !this.state.canSend) {
            return {
                ok: false,
                error: new InboxError("send-blocked", "This conversation is closed to new messages"),
                restoreText: text,
            };
        }

        try {
            const message = await withTimeout(
                this.store.insertMessage({ conversation_id: conversationId, sender_id: this.operatorId, text: body }),
                this.options.requestTimeoutMs,
                "insertMessage"
            );
            this.appendMessage(message);
            return { ok: true, message };
        } catch (err) {
            const error = toInboxError("stale-write", err, "Message couldn't be sent. Please try again.");
            inspectError("inbox", "sendMessage failed", error);
            this.pushNotice(error.kind, error.message);
            return { ok: false, error, restoreText: text };
        }
    }

    async updateConversationStatus(conversationId: string, status: ConversationStatus): Promise<StatusUpdateResult> {
        if (this.variant !== "support") {
            const error = new InboxError("invalid-input", "Peer conversations have no status");
            this.pushNotice(error.kind, error.message);
            return { ok: false, error };
        }

        try {
            await withTimeout(
                this.store.updateConversationStatus(conversationId, status),
                this.options.requestTimeoutMs,
                "updateConversationStatus"
            );
        } catch (err) {
            const error = toInboxError("stale-write", err, "Couldn't update the conversation status.");
            inspectError("inbox", "updateConversationStatus failed", error);
            this.pushNotice(error.kind, error.message);
            return { ok: false, error };
        }

        inspectLog("CONVERSATION_STATUS_UPDATED", { conversation_id: conversationId, status });
        this.applyStatus(conversationId, status, true);
        await this.reload();
        return { ok: true };
    }

    dismissNotice(id: string): void {
        this.commit({ notices: this.state.notices.filter((n) => n.id !== id) });
    }

    // =========================================================================
    // REALTIME
    // =========================================================================

    private reconcileContext(): ReconcileContext {
        return {
            operatorId: this.operatorId,
            activeConversationId: this.activeId,
            activeStatus: this.state.activeConversation?.status ?? null,
            isCached: (id) => this.conversations.find(id) !== undefined,
        };
    }

    private handleConversationChange(event: ChangeEvent<ConversationRow>, decision: ReconcileDecision): void {
        switch (decision) {
            case "patch-status": {
                const row = event.new;
                if (row?.status) this.applyStatus(row.id, row.status, false);
                this.run("reload", () => this.reload());
                return;
            }
            case "reset-active":
                this.clearActive();
                this.pushNotice("info", "This conversation is no longer available");
                this.run("reload", () => this.reload());
                return;
            case "reload":
                this.run("reload", () => this.reload());
                return;
            default:
                return;
        }
    }

    private handleMessageChange(event: ChangeEvent<Message>, decision: ReconcileDecision): void {
        const message = event.new;

        switch (decision) {
            case "append":
                if (message && this.appendMessage(message)) {
                    this.run("markConversationRead", () => this.readState.markConversationRead(message.conversation_id));
                }
                return;
            case "patch-read":
                if (message) this.patchMessage(message);
                return;
            case "patch-removed":
                if (message) this.removeMessage(message.id);
                this.run("reload", () => this.reload());
                return;
            case "reload":
                this.run("reload", () => this.reload());
                return;
            default:
                return;
        }
    }

    private handleMarkedRead(conversationId: string, messageIds: string[]): void {
        this.conversations.patch(conversationId, (c) => ({ ...c, unread_count: 0 }));

        if (conversationId === this.activeId && messageIds.length > 0) {
            const read = new Set(messageIds);
            this.transcript = this.transcript.map((e) =>
                e.kind === "message" && read.has(e.message.id) && !e.message.is_read
                    ? messageEntry({ ...e.message, is_read: true })
                    : e
            );
            this.commit({ transcript: this.transcript });
        }

        this.emitter.emit("messages-marked-read", { conversationId, messageIds });
        this.refreshVisible();
    }

    // =========================================================================
    // INTERNALS
    // =========================================================================

    /** Append to the open transcript; false when it is not active or already there */
    private appendMessage(message: Message): boolean {
        this.conversations.patch(message.conversation_id, (c) => ({
            ...c,
            last_message: message.text,
            last_message_time: message.created_at,
            has_messages: true,
        }));

        if (message.conversation_id !== this.activeId || hasMessage(this.transcript, message.id)) {
            this.refreshVisible();
            return false;
        }

        this.transcript = [...this.transcript, messageEntry(message)];
        this.emitter.emit("message-received", { message });
        this.commit({ transcript: this.transcript });
        this.emitTranscript();
        this.refreshVisible();
        return true;
    }

    private patchMessage(incoming: Message): void {
        const index = this.transcript.findIndex((e) => e.kind === "message" && e.message.id === incoming.id);
        const current = this.transcript[index];
        if (index === -1 || current.kind !== "message") return;

        const updated = mergeReadState(current.message, incoming);
        this.transcript = [...this.transcript];
        this.transcript[index] = messageEntry(updated);

        this.emitter.emit("message-updated", { message: updated });
        this.commit({ transcript: this.transcript });
    }

    private removeMessage(messageId: string): void {
        if (!hasMessage(this.transcript, messageId)) return;
        this.transcript = this.transcript.filter((e) => e.kind !== "message" || e.message.id !== messageId);
        this.commit({ transcript: this.transcript });
        this.emitTranscript();
    }

    private applyStatus(conversationId: string, status: ConversationStatus, withNotice: boolean): void {
        const patched = this.conversations.patch(conversationId, (c) => ({ ...c, status }));

        if (conversationId === this.activeId) {
            const previous = this.state.activeConversation;
            const active = patched ?? (previous ? { ...previous, status } : null);

            if (withNotice) {
                this.transcript = [
                    ...this.transcript,
                    {
                        kind: "notice",
                        id: `status-${conversationId}-${++this.noticeSeq}`,
                        text: statusNoticeText(status),
                        created_at: new Date().toISOString(),
                    },
                ];
            }

            this.commit({
                activeConversation: active,
                canSend: canSendWithStatus(status),
                transcript: this.transcript,
            });
            if (withNotice) this.emitTranscript();
        }

        this.emitter.emit("conversation-status-changed", { id: conversationId, status });
    }

    private clearActive(): void {
        this.activeId = null;
        this.messages.reset();
        this.transcript = [];
        this.commit({
            activeConversationId: null,
            activeConversation: null,
            transcript: [],
            hasMore: false,
            canSend: false,
            messagesError: null,
        });
        this.emitTranscript();
    }

    private async applySearch(query: string): Promise<void> {
        this.filters = { ...this.filters, query: normalizeQuery(query) };

        if (this.filters.query === "") {
            await this.reload();
            return;
        }
        this.refreshVisible();
    }

    private refreshVisible(extra: Partial<InboxState> = {}): void {
        const visible = applyFilters(this.conversations.getCached(), this.filters);
        const active = this.activeId === null
            ? null
            : this.conversations.find(this.activeId) ?? this.state.activeConversation;
        const error = extra.error !== undefined ? extra.error : this.state.error;

        this.emitter.emit("conversations-filtered", {
            conversations: visible,
            filter: this.filters,
            descriptor: describeFilter(this.filters),
        });

        this.commit({
            conversations: visible,
            activeConversation: active,
            canSend: active !== null && canSendWithStatus(active.status),
            filters: this.filters,
            emptyMessage: visible.length === 0 ? this.describeEmpty(error) : null,
            totalUnread: this.conversations.totalUnread(),
            ...extra,
        });
    }

    private describeEmpty(error: InboxError | null): string {
        if (error) return "Couldn't load conversations. Please try again.";
        if (this.filters.query !== "") return "No conversations match your search";
        if (this.variant === "support") return describeEmptyInbox(this.filters.status, this.filters.role);
        return "No conversations yet";
    }

    private pushNotice(kind: InboxNotice["kind"], message: string): void {
        const notice: InboxNotice = {
            id: `notice-${++this.noticeSeq}`,
            kind,
            message,
            dismissable: true,
        };
        this.commit({ notices: [...this.state.notices, notice] });
        this.emitter.emit("notice", notice);
    }

    private emitTranscript(): void {
        this.emitter.emit("transcript-changed", {
            conversationId: this.activeId,
            transcript: this.transcript,
        });
    }

    private commit(patch: Partial<InboxState>): void {
        this.state = { ...this.state, ...patch };
        this.emitter.emit("state-changed", this.state);
    }

    private run(label: string, task: () => Promise<unknown>): void {
        void task().catch((error: unknown) => {
            inspectError("inbox", `${label} failed`, error);
        });
    }
}
