/**
 * Shared status model for support conversations.
 * Single source of truth for status parsing, send gating and empty-state copy.
 */

/**
 * Support ticket status. Peer chats carry no status (null).
 */
export type ConversationStatus = "open" | "resolved" | "closed";

export const CONVERSATION_STATUSES: readonly ConversationStatus[] = ["open", "resolved", "closed"];

/**
 * Status filter for conversation loads.
 * null = any status; otherwise the set of statuses to include.
 */
export type StatusFilter = readonly ConversationStatus[] | null;

export function isConversationStatus(value: string): value is ConversationStatus {
    return (CONVERSATION_STATUSES as readonly string[]).includes(value);
}

/**
 * Terminal statuses lock the compose input.
 */
export function isTerminalStatus(status: ConversationStatus): boolean {
    switch (status) {
        case "open":
            return false;
        case "resolved":
        case "closed":
            return true;
    }
}

/**
 * Whether the operator may send into a conversation with this status.
 * Peer chats (null status) are always writable.
 */
export function canSendWithStatus(status: ConversationStatus | null): boolean {
    return status === null || !isTerminalStatus(status);
}

/**
 * Parse a status tab value such as "open" or "resolved,closed".
 * Unknown entries are dropped; "" and "all" mean any status.
 */
export function parseStatusFilter(input: string | null | undefined): StatusFilter {
    if (!input || input.trim().toLowerCase() === "all") return null;

    const statuses = input
        .split(",")
        .map((s) => s.trim().toLowerCase())
        .filter(isConversationStatus);

    if (statuses.length === 0) return null;
    return [...new Set(statuses)];
}

/**
 * Inverse of parseStatusFilter, used for logging and descriptors.
 */
export function formatStatusFilter(filter: StatusFilter): string {
    return filter === null ? "all" : filter.join(",");
}

export function matchesStatusFilter(status: ConversationStatus | null, filter: StatusFilter): boolean {
    if (filter === null) return true;
    if (status === null) return false;
    return filter.includes(status);
}

/**
 * Copy for the "no conversations" state of a status/role tab.
 */
export function describeEmptyInbox(filter: StatusFilter, role: string | null): string {
    const roleLabel = role && role.toLowerCase() !== "all" ? `${role} ` : "";
    const key = formatStatusFilter(filter);

    if (key === "open") return `No active ${roleLabel}support tickets`;
    if (key === "resolved,closed" || key === "closed,resolved") return `No resolved ${roleLabel}support tickets`;
    return "No support conversations found";
}
