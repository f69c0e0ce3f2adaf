import { differenceInCalendarDays, format, isSameYear, isValid, parseISO } from "date-fns";
import type { TranscriptEntry } from "@/lib/messaging/types";

// -----------------------------------------------------------------------------
// Message timestamps
// All formatting is in local time.
// -----------------------------------------------------------------------------

const TIME = "h:mm a";

function toDate(timestamp: string | Date | null | undefined): Date | null {
    if (!timestamp) return null;
    const date = typeof timestamp === "string" ? parseISO(timestamp) : timestamp;
    return isValid(date) ? date : null;
}

/**
 * Recency-bucketed label for a message or conversation timestamp:
 * - today: "2:45 PM"
 * - yesterday: "Yesterday, 2:45 PM"
 * - 2 to 6 days ago: "Monday, 2:45 PM"
 * - anything else: "Mar 3, 2024, 2:45 PM"
 *
 * Returns "" for missing or unparseable input.
 */
export function formatMessageTime(timestamp: string | Date | null | undefined, now: Date = new Date()): string {
    const date = toDate(timestamp);
    if (!date) return "";

    const days = differenceInCalendarDays(now, date);

    if (days === 0) return format(date, TIME);
    if (days === 1) return `Yesterday, ${format(date, TIME)}`;
    if (days > 1 && days <= 6) return format(date, `EEEE, ${TIME}`);
    return format(date, `MMM d, yyyy, ${TIME}`);
}

/**
 * Label for the separator line between transcript days.
 */
export function formatDaySeparator(timestamp: string | Date | null | undefined, now: Date = new Date()): string {
    const date = toDate(timestamp);
    if (!date) return "";

    const days = differenceInCalendarDays(now, date);

    if (days === 0) return "Today";
    if (days === 1) return "Yesterday";
    if (isSameYear(date, now)) return format(date, "EEEE, MMM d");
    return format(date, "EEEE, MMM d, yyyy");
}

export interface TranscriptDay {
    label: string;
    entries: TranscriptEntry[];
}

function entryTime(entry: TranscriptEntry): string {
    return entry.kind === "message" ? entry.message.created_at : entry.created_at;
}

/**
 * Group consecutive transcript entries by calendar day.
 * Entries are expected oldest first; order is preserved.
 */
export function groupByDay(entries: readonly TranscriptEntry[], now: Date = new Date()): TranscriptDay[] {
    const days: TranscriptDay[] = [];

    for (const entry of entries) {
        const label = formatDaySeparator(entryTime(entry), now);
        const current = days[days.length - 1];

        if (current && current.label === label) {
            current.entries.push(entry);
        } else {
            days.push({ label, entries: [entry] });
        }
    }

    return days;
}
