import { strict as assert } from "assert";

import { ignorable_error, M } from "../utils/debugging-and-logging.js";
import { clear_timeout, MAX_TIMEOUT, set_timeout } from "../utils/node.js";
import { RegistryClosedError } from "./errors.js";
import { OneShot } from "./one-shot.js";
import { Waiter, type WaiterOptions, type WaiterOutcome, type WaiterPredicate } from "./waiter.js";

type pending_waiter<E> = {
    predicate: WaiterPredicate<E>;
    resolver: OneShot<WaiterOutcome<E>>;
    timer: NodeJS.Timeout | null;
};

export type WaiterRegistryOptions = {
    // applied to waiters registered without their own timeout
    default_timeout?: number;
};

/**
 * Pending predicate waiters for one interaction session.
 *
 * Entries are matched in registration order and an event is consumed by at most one waiter. Everything that touches
 * `pending` runs synchronously, so a delivery's scan, removal and resolution can't interleave with a register or
 * another delivery. Whatever awaits the waiter runs afterwards, from the promise continuation.
 */
export class WaiterRegistry<E> {
    // Map iteration follows insertion order, which is the matching order
    private readonly pending = new Map<number, pending_waiter<E>>();
    private next_id = 0;
    private closed = false;

    constructor(private readonly options: WaiterRegistryOptions = {}) {
        if (options.default_timeout !== undefined) {
            WaiterRegistry.check_timeout(options.default_timeout);
        }
    }

    private static check_timeout(timeout: number) {
        assert(timeout >= 0, "waiter timeout must not be negative");
        assert(timeout <= MAX_TIMEOUT, `waiter timeout must not exceed ${MAX_TIMEOUT}ms`);
    }

    get size() {
        return this.pending.size;
    }

    get is_closed() {
        return this.closed;
    }

    pending_ids() {
        return [...this.pending.keys()];
    }

    register(predicate: WaiterPredicate<E>, options: WaiterOptions = {}): Waiter<E> {
        if (this.closed) {
            throw new RegistryClosedError();
        }
        const id = this.next_id++;
        const resolver = new OneShot<WaiterOutcome<E>>();
        const entry: pending_waiter<E> = { predicate, resolver, timer: null };
        const timeout = options.timeout ?? this.options.default_timeout;
        if (timeout !== undefined) {
            WaiterRegistry.check_timeout(timeout);
            entry.timer = set_timeout(() => {
                entry.timer = null;
                this.settle(id, { status: "timed_out", timeout });
            }, timeout);
        }
        this.pending.set(id, entry);
        return new Waiter(id, resolver, reason => this.settle(id, { status: "cancelled", reason }));
    }

    // Returns true if a waiter consumed the event
    deliver(event: E): boolean {
        // a predicate may register or cancel waiters, only the entries pending when delivery started are candidates
        for (const [id, entry] of [...this.pending]) {
            if (!this.pending.has(id)) {
                continue;
            }
            let matched: boolean;
            try {
                matched = entry.predicate(event);
            } catch (e) {
                ignorable_error(e);
                continue;
            }
            if (matched) {
                return this.settle(id, { status: "matched", event });
            }
        }
        return false;
    }

    // Closes the registry and cancels everything still pending, returns the number of waiters cancelled
    cancel_all(reason = "session ended"): number {
        this.closed = true;
        const ids = this.pending_ids();
        for (const id of ids) {
            this.settle(id, { status: "cancelled", reason });
        }
        if (ids.length > 0) {
            M.debug(`Cancelled ${ids.length} pending waiter(s): ${reason}`);
        }
        return ids.length;
    }

    // removes the entry before resolving it, so a settled waiter is never visible to a later delivery
    private settle(id: number, outcome: WaiterOutcome<E>) {
        const entry = this.pending.get(id);
        if (!entry) {
            return false;
        }
        this.pending.delete(id);
        if (entry.timer !== null) {
            clear_timeout(entry.timer);
            entry.timer = null;
        }
        entry.resolver.settle(outcome);
        return true;
    }
}
