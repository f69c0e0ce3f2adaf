/**
 * Inspection mode helpers for debug logging.
 * Logs only fire when INBOX_INSPECT=true is set in the environment.
 */

/**
 * Check if inspection mode is enabled.
 * Safe to call where `process` is not defined (browser bundles).
 */
export function isInspectOn(): boolean {
    if (typeof process === "undefined") return false;
    return process.env.INBOX_INSPECT === "true";
}

/**
 * Log an inspection event with timestamp.
 * Only logs when inspect mode is on.
 */
export function inspectLog(event: string, payload: Record<string, unknown> = {}): void {
    if (!isInspectOn()) return;
    console.info("[INBOX_INSPECT]", {
        event,
        ts: new Date().toISOString(),
        ...payload,
    });
}

/**
 * Log an error under a module tag, e.g. "[conversations] load failed".
 * Only logs when inspect mode is on.
 */
export function inspectError(tag: string, message: string, error: unknown): void {
    if (!isInspectOn()) return;
    console.error(`[${tag}] ${message}:`, error);
}
