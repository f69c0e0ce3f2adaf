// =============================================================================
// REALTIME RECONCILER
// Subscribes to conversation and message changes, decides per event whether
// to ignore it, patch the open transcript or reload the conversation list,
// and keeps both channels alive with a fixed-delay resubscribe.
// =============================================================================

import { inspectError, inspectLog } from "@/lib/inspect";
import type { InboxOptions } from "@/lib/config";
import { InboxError } from "@/lib/messaging/errors";
import type { ChangeEvent, ChannelHandle, ChannelStatus, InboxStore } from "@/lib/messaging/store";
import type { ConversationRow, Message } from "@/lib/messaging/types";
import type { ConversationStatus } from "@/lib/status";

export type ReconcileDecision =
    | "ignore"
    | "reload"
    | "append"
    | "patch-read"
    | "patch-status"
    | "patch-removed"
    | "reset-active";

/**
 * What the reconciler needs to know about the screen to decide an event.
 */
export interface ReconcileContext {
    operatorId: string;
    activeConversationId: string | null;
    /** Status shown in the header of the active conversation */
    activeStatus: ConversationStatus | null;
    isCached(conversationId: string): boolean;
}

// =============================================================================
// DECISIONS
// =============================================================================

export function decideConversationChange(
    event: ChangeEvent<ConversationRow>,
    ctx: ReconcileContext
): ReconcileDecision {
    const id = event.new?.id ?? event.old?.id;
    const isActive = id !== undefined && id === ctx.activeConversationId;

    if (event.eventType === "DELETE") {
        return isActive ? "reset-active" : "reload";
    }

    if (isActive && event.new && event.new.status !== ctx.activeStatus) {
        return "patch-status";
    }

    return "reload";
}

export function decideMessageChange(event: ChangeEvent<Message>, ctx: ReconcileContext): ReconcileDecision {
    const message = event.new;

    if (event.eventType === "DELETE" || !message) {
        return "ignore";
    }

    const isActive = message.conversation_id === ctx.activeConversationId;
    const fromOperator = message.sender_id === ctx.operatorId;

    if (event.eventType === "INSERT") {
        if (isActive && !fromOperator) return "append";
        // The message channel is unfiltered; only conversations on screen matter.
        return ctx.isCached(message.conversation_id) ? "reload" : "ignore";
    }

    if (isActive && message.is_deleted && event.old?.is_deleted !== true) {
        return "patch-removed";
    }

    if (isActive && fromOperator) {
        return "patch-read";
    }

    if (!fromOperator && ctx.isCached(message.conversation_id)) {
        return "reload";
    }

    return "ignore";
}

// =============================================================================
// CHANNELS
// =============================================================================

export type ChannelKind = "conversations" | "messages";

export type ChannelState =
    | "idle"
    | "subscribing"
    | "active"
    | "closed"
    | "reconnect-pending"
    | "failed";

export interface ReconcilerHandlers {
    onConversationChange(event: ChangeEvent<ConversationRow>, decision: ReconcileDecision): void;
    onMessageChange(event: ChangeEvent<Message>, decision: ReconcileDecision): void;
    /** The channel gave up after maxReconnectAttempts */
    onChannelFailed(kind: ChannelKind, error: InboxError): void;
    onChannelState?(kind: ChannelKind, state: ChannelState): void;
}

interface ChannelSlot {
    kind: ChannelKind;
    state: ChannelState;
    /** Resubscriptions since the last SUBSCRIBED */
    attempts: number;
    /** Bumped on every subscribe; callbacks from older channels are ignored */
    generation: number;
    handle: ChannelHandle | null;
    timer: ReturnType<typeof setTimeout> | null;
}

function emptySlot(kind: ChannelKind): ChannelSlot {
    return { kind, state: "idle", attempts: 0, generation: 0, handle: null, timer: null };
}

export class RealtimeReconciler {
    private running = false;
    private readonly slots: Record<ChannelKind, ChannelSlot> = {
        conversations: emptySlot("conversations"),
        messages: emptySlot("messages"),
    };

    constructor(
        private readonly store: InboxStore,
        private readonly operatorId: string,
        private readonly options: Pick<InboxOptions, "reconnectDelayMs" | "maxReconnectAttempts">,
        private readonly getContext: () => ReconcileContext,
        private readonly handlers: ReconcilerHandlers
    ) {}

    start(): void {
        if (this.running) return;
        this.running = true;
        this.subscribe(this.slots.conversations);
        this.subscribe(this.slots.messages);
    }

    /**
     * Unsubscribe both channels and cancel pending resubscribes. Status
     * callbacks that arrive afterwards are ignored.
     */
    async stop(): Promise<void> {
        if (!this.running) return;
        this.running = false;

        const handles: ChannelHandle[] = [];
        for (const slot of Object.values(this.slots)) {
            if (slot.timer) clearTimeout(slot.timer);
            slot.timer = null;
            slot.generation++;
            slot.attempts = 0;
            if (slot.handle) handles.push(slot.handle);
            slot.handle = null;
            this.setState(slot, "idle");
        }

        await Promise.all(handles.map((handle) => this.release(handle)));
        inspectLog("REALTIME_STOPPED", { operator_id: this.operatorId });
    }

    getState(kind: ChannelKind): ChannelState {
        return this.slots[kind].state;
    }

    isRunning(): boolean {
        return this.running;
    }

    private subscribe(slot: ChannelSlot): void {
        const generation = ++slot.generation;
        const request = {
            name: `inbox-${this.store.variant}-${slot.kind}-${this.operatorId}-${generation}`,
            operatorId: this.operatorId,
        };
        const isCurrent = () => this.running && slot.generation === generation;

        this.setState(slot, "subscribing");

        const onStatus = (status: ChannelStatus, error?: Error) => {
            if (isCurrent()) this.handleStatus(slot, status, error);
        };

        slot.handle = slot.kind === "conversations"
            ? this.store.subscribeConversations(request, {
                onChange: (event) => {
                    if (!isCurrent()) return;
                    const decision = decideConversationChange(event, this.getContext());
                    inspectLog("REALTIME_CONVERSATION_EVENT", { type: event.eventType, decision });
                    this.handlers.onConversationChange(event, decision);
                },
                onStatus,
            })
            : this.store.subscribeMessages(request, {
                onChange: (event) => {
                    if (!isCurrent()) return;
                    const decision = decideMessageChange(event, this.getContext());
                    inspectLog("REALTIME_MESSAGE_EVENT", { type: event.eventType, decision });
                    this.handlers.onMessageChange(event, decision);
                },
                onStatus,
            });
    }

    private handleStatus(slot: ChannelSlot, status: ChannelStatus, error?: Error): void {
        if (status === "subscribed") {
            slot.attempts = 0;
            this.setState(slot, "active");
            return;
        }

        // CHANNEL_ERROR is usually followed by CLOSED for the same channel.
        if (slot.state === "reconnect-pending" || slot.state === "failed") return;

        this.setState(slot, "closed");
        if (error) inspectError("realtime", `${slot.kind} channel closed`, error);

        const dropped = slot.handle;
        slot.handle = null;
        // Invalidate the dropped channel before releasing it so its own
        // CLOSED callback is not taken for a new failure.
        slot.generation++;
        if (dropped) void this.release(dropped);

        if (slot.attempts >= this.options.maxReconnectAttempts) {
            this.setState(slot, "failed");
            const failure = new InboxError(
                "subscription-dropped",
                `Realtime ${slot.kind} channel failed after ${slot.attempts} reconnect attempts`,
                { retryable: true, cause: error }
            );
            inspectLog("REALTIME_FAILED", { channel: slot.kind, attempts: slot.attempts });
            this.handlers.onChannelFailed(slot.kind, failure);
            return;
        }

        slot.attempts++;
        this.setState(slot, "reconnect-pending");
        inspectLog("REALTIME_RECONNECT_SCHEDULED", {
            channel: slot.kind,
            attempt: slot.attempts,
            delay_ms: this.options.reconnectDelayMs,
        });

        slot.timer = setTimeout(() => {
            slot.timer = null;
            if (this.running) this.subscribe(slot);
        }, this.options.reconnectDelayMs);
    }

    private setState(slot: ChannelSlot, state: ChannelState): void {
        if (slot.state === state) return;
        slot.state = state;
        this.handlers.onChannelState?.(slot.kind, state);
    }

    private async release(handle: ChannelHandle): Promise<void> {
        try {
            await handle.unsubscribe();
        } catch (error) {
            inspectError("realtime", "unsubscribe failed", error);
        }
    }
}
