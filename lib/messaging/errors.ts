/**
 * Inbox error taxonomy.
 * Repository and reconciler failures become InboxErrors and are turned into
 * visible state at the controller boundary; nothing here is thrown past it.
 */

export type InboxErrorKind =
    /** Network or service failure during a load */
    | "remote-unavailable"
    /** A send or status update rejected by the remote store */
    | "stale-write"
    /** A participant id with no resolvable profile */
    | "missing-profile"
    /** Realtime channel closed and could not be re-established */
    | "subscription-dropped"
    /** Send attempted while the conversation is resolved/closed */
    | "send-blocked"
    /** Rejected locally before any remote call */
    | "invalid-input";

export class InboxError extends Error {
    public readonly kind: InboxErrorKind;
    public readonly retryable: boolean;
    public readonly code?: string;

    constructor(
        kind: InboxErrorKind,
        message: string,
        options: { retryable?: boolean; code?: string; cause?: unknown } = {}
    ) {
        super(message, { cause: options.cause });
        this.name = "InboxError";
        this.kind = kind;
        this.retryable = options.retryable ?? kind === "remote-unavailable";
        this.code = options.code;
    }
}

/**
 * Shape shared by PostgrestError and most thrown service errors.
 */
interface ErrorLike {
    message: string;
    code?: string;
}

function isErrorLike(value: unknown): value is ErrorLike {
    return typeof value === "object"
        && value !== null
        && "message" in value
        && typeof value.message === "string";
}

/**
 * Normalise anything thrown or returned by the store into an InboxError.
 * An InboxError passes through unchanged.
 */
export function toInboxError(kind: InboxErrorKind, error: unknown, fallback = "Something went wrong"): InboxError {
    if (error instanceof InboxError) return error;

    if (isErrorLike(error)) {
        return new InboxError(kind, error.message || fallback, {
            code: typeof error.code === "string" ? error.code : undefined,
            cause: error,
        });
    }

    return new InboxError(kind, fallback, { cause: error });
}

/**
 * Bound a remote call. Rejects with a retryable remote-unavailable error
 * when the call takes longer than `ms`.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new InboxError("remote-unavailable", `${label} timed out after ${ms}ms`, { retryable: true }));
        }, ms);
    });

    return Promise.race([promise, timeout]).finally(() => {
        clearTimeout(timer);
    });
}
