import { AsyncLocalStorage } from 'node:async_hooks';
import crypto from 'node:crypto';

/**
 * Trace Context
 * AsyncLocalStorage-backed correlation id for one logical request.
 *
 * The request boundary owns the lifecycle: begin() on entry, clear() on every
 * exit path (normal completion, error, closed connection). run() does both.
 * Downstream code only calls current().
 */

interface TraceScope {
    traceId: string | undefined;
}

const storage = new AsyncLocalStorage<TraceScope>();

function normalize(incomingId: string | null | undefined): string | undefined {
    if (typeof incomingId !== 'string') return undefined;
    const trimmed = incomingId.trim();
    return trimmed.length > 0 ? trimmed : undefined;
}

export class TraceContext {
    /**
     * Establish the trace id for the current execution scope.
     * Uses the supplied id when non-blank, otherwise generates a UUID.
     */
    public static begin(incomingId?: string | null): string {
        const traceId = normalize(incomingId) ?? crypto.randomUUID();
        const scope = storage.getStore();
        if (scope) {
            scope.traceId = traceId;
        } else {
            storage.enterWith({ traceId });
        }
        return traceId;
    }

    public static current(): string | undefined {
        return storage.getStore()?.traceId;
    }

    public static clear(): void {
        const scope = storage.getStore();
        if (scope) {
            scope.traceId = undefined;
        }
    }

    /**
     * Run fn inside a fresh trace scope. The id is cleared when fn settles,
     * whichever way it settles.
     */
    public static async run<T>(
        incomingId: string | null | undefined,
        fn: (traceId: string) => Promise<T> | T
    ): Promise<T> {
        return storage.run({ traceId: undefined }, async () => {
            const traceId = TraceContext.begin(incomingId);
            try {
                return await fn(traceId);
            } finally {
                TraceContext.clear();
            }
        });
    }
}
