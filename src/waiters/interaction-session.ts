import { WaiterRegistry, type WaiterRegistryOptions } from "./waiter-registry.js";

/**
 * Scope for one command invocation. Owns the registry its context's waiters live in; whatever happens in run(), the
 * session is closed on the way out and every waiter still pending is cancelled.
 */
export class InteractionSession<E> {
    readonly waiters: WaiterRegistry<E>;
    private closed = false;

    constructor(
        public readonly id: string,
        private readonly on_close: (session: InteractionSession<E>) => void = () => {},
        options: WaiterRegistryOptions = {},
    ) {
        this.waiters = new WaiterRegistry<E>(options);
    }

    get is_closed() {
        return this.closed;
    }

    async run<T>(body: (session: InteractionSession<E>) => Promise<T>): Promise<T> {
        try {
            return await body(this);
        } finally {
            this.close();
        }
    }

    // idempotent, returns the number of waiters cancelled by this call
    close(reason = `session ${this.id} ended`) {
        if (this.closed) {
            return 0;
        }
        this.closed = true;
        const cancelled = this.waiters.cancel_all(reason);
        this.on_close(this);
        return cancelled;
    }
}
