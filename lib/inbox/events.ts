import { inspectError } from "@/lib/inspect";

type Listener<T> = (payload: T) => void;

type ListenerTable<E> = { [K in keyof E]?: Set<Listener<E[K]>> };

/**
 * Small typed observer registry. A listener that throws is logged and does
 * not stop delivery to the others.
 */
export class TypedEmitter<E> {
    private readonly listeners: ListenerTable<E> = {};

    on<K extends keyof E>(event: K, listener: Listener<E[K]>): () => void {
        const set = this.listeners[event] ?? new Set<Listener<E[K]>>();
        set.add(listener);
        this.listeners[event] = set;

        return () => {
            set.delete(listener);
        };
    }

    emit<K extends keyof E>(event: K, payload: E[K]): void {
        const set = this.listeners[event];
        if (!set) return;

        for (const listener of [...set]) {
            try {
                listener(payload);
            } catch (error) {
                inspectError("inbox", `listener for "${String(event)}" threw`, error);
            }
        }
    }
}
