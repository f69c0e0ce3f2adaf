import type { Conversation, FilterState } from "@/lib/messaging/types";
import { formatStatusFilter, matchesStatusFilter, type StatusFilter } from "@/lib/status";

// -----------------------------------------------------------------------------
// Conversation filters
// Each step is a pure predicate over the cached list, so the order they run
// in does not change the result.
// -----------------------------------------------------------------------------

/** "" and "all" (any case) mean no role filter */
export function normalizeRole(role: string | null | undefined): string | null {
    const trimmed = role?.trim() ?? "";
    if (trimmed === "" || trimmed.toLowerCase() === "all") return null;
    return trimmed;
}

export function normalizeQuery(query: string | null | undefined): string {
    return (query ?? "").trim().toLowerCase();
}

export function applyStatusFilter(list: readonly Conversation[], status: StatusFilter): Conversation[] {
    return list.filter((c) => matchesStatusFilter(c.status, status));
}

export function applyRoleFilter(list: readonly Conversation[], role: string | null): Conversation[] {
    const wanted = normalizeRole(role)?.toLowerCase() ?? null;
    if (wanted === null) return [...list];
    return list.filter((c) => c.peer.role.toLowerCase() === wanted);
}

function matchesQuery(conversation: Conversation, query: string): boolean {
    return (
        conversation.peer.name.toLowerCase().includes(query) ||
        conversation.peer.role.toLowerCase().includes(query) ||
        (conversation.subject?.toLowerCase().includes(query) ?? false) ||
        (conversation.has_messages && conversation.last_message.toLowerCase().includes(query))
    );
}

export function applyQuery(list: readonly Conversation[], query: string): Conversation[] {
    const q = normalizeQuery(query);
    if (q === "") return [...list];
    return list.filter((c) => matchesQuery(c, q));
}

/**
 * status, then role, then free text.
 */
export function applyFilters(list: readonly Conversation[], filter: FilterState): Conversation[] {
    return applyQuery(applyRoleFilter(applyStatusFilter(list, filter.status), filter.role), filter.query);
}

/** Short descriptor for logs and the conversations-filtered event, e.g. "status=open role=driver q=refund" */
export function describeFilter(filter: FilterState): string {
    const parts = [`status=${formatStatusFilter(filter.status)}`, `role=${normalizeRole(filter.role) ?? "all"}`];
    const q = normalizeQuery(filter.query);
    if (q !== "") parts.push(`q=${q}`);
    return parts.join(" ");
}

// -----------------------------------------------------------------------------
// Search debounce
// -----------------------------------------------------------------------------

export class SearchDebouncer {
    private timer: ReturnType<typeof setTimeout> | null = null;
    private pending: string | null = null;

    constructor(
        private readonly delayMs: number,
        private readonly onQuery: (query: string) => void
    ) {}

    /** Restart the quiet period with the latest input */
    push(query: string): void {
        this.pending = query;
        if (this.timer) clearTimeout(this.timer);
        this.timer = setTimeout(() => this.fire(), this.delayMs);
    }

    cancel(): void {
        if (this.timer) clearTimeout(this.timer);
        this.timer = null;
        this.pending = null;
    }

    private fire(): void {
        if (this.timer) clearTimeout(this.timer);
        this.timer = null;
        const query = this.pending;
        this.pending = null;
        if (query !== null) this.onQuery(query);
    }
}
