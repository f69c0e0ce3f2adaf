import { z } from "zod";

// -----------------------------------------------------------------------------
// Inbox configuration
// -----------------------------------------------------------------------------

/**
 * Tunables for the sync engine. Everything has a default so tests and the
 * in-memory store can run without an environment.
 */
export interface InboxOptions {
    /** Message page size for history loads */
    pageSize: number;
    /** Delay before a search query is applied */
    searchDebounceMs: number;
    /** Fixed delay between realtime resubscription attempts */
    reconnectDelayMs: number;
    /** Consecutive failed resubscriptions before the channel is given up */
    maxReconnectAttempts: number;
    /** Upper bound on any single remote call */
    requestTimeoutMs: number;
}

export const DEFAULT_INBOX_OPTIONS: InboxOptions = {
    pageSize: 20,
    searchDebounceMs: 300,
    reconnectDelayMs: 5000,
    maxReconnectAttempts: 5,
    requestTimeoutMs: 10_000,
};

const envSchema = z.object({
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_ANON_KEY: z.string().min(1).optional(),
    INBOX_OPERATOR_ID: z.string().min(1).optional(),
    INBOX_VARIANT: z.enum(["peer", "support"]).default("support"),
    INBOX_PAGE_SIZE: z.coerce.number().int().positive().default(DEFAULT_INBOX_OPTIONS.pageSize),
    INBOX_SEARCH_DEBOUNCE_MS: z.coerce.number().int().nonnegative().default(DEFAULT_INBOX_OPTIONS.searchDebounceMs),
    INBOX_RECONNECT_DELAY_MS: z.coerce.number().int().nonnegative().default(DEFAULT_INBOX_OPTIONS.reconnectDelayMs),
    INBOX_MAX_RECONNECT_ATTEMPTS: z.coerce.number().int().nonnegative().default(DEFAULT_INBOX_OPTIONS.maxReconnectAttempts),
    INBOX_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_INBOX_OPTIONS.requestTimeoutMs),
});

export interface InboxConfig {
    supabaseUrl: string | undefined;
    supabaseAnonKey: string | undefined;
    operatorId: string | undefined;
    variant: "peer" | "support";
    options: InboxOptions;
}

/**
 * Read inbox configuration from environment variables.
 * Throws with every invalid variable listed when the environment is malformed.
 */
export function loadInboxConfig(env: Record<string, string | undefined> = process.env): InboxConfig {
    const parsed = envSchema.safeParse(env);

    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ");
        throw new Error(`Invalid inbox configuration: ${issues}`);
    }

    const e = parsed.data;
    return {
        supabaseUrl: e.SUPABASE_URL,
        supabaseAnonKey: e.SUPABASE_ANON_KEY,
        operatorId: e.INBOX_OPERATOR_ID,
        variant: e.INBOX_VARIANT,
        options: {
            pageSize: e.INBOX_PAGE_SIZE,
            searchDebounceMs: e.INBOX_SEARCH_DEBOUNCE_MS,
            reconnectDelayMs: e.INBOX_RECONNECT_DELAY_MS,
            maxReconnectAttempts: e.INBOX_MAX_RECONNECT_ATTEMPTS,
            requestTimeoutMs: e.INBOX_REQUEST_TIMEOUT_MS,
        },
    };
}

export function assertEnv(name: string, value: string | undefined): string {
    if (!value) {
        throw new Error(`Missing environment variable: ${name}`);
    }
    return value;
}
