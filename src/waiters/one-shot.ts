import { ResolutionConflictError } from "./errors.js";

type settle_state<T> = { settled: false } | { settled: true; value: T };

/**
 * Single-use completion handle. The promise settles with the first value passed to settle() and can never change
 * afterwards.
 */
export class OneShot<T> {
    readonly promise: Promise<T>;
    private resolve_promise: (value: T) => void = () => {};
    private state: settle_state<T> = { settled: false };

    constructor() {
        this.promise = new Promise<T>(resolve => {
            this.resolve_promise = resolve;
        });
    }

    get is_settled() {
        return this.state.settled;
    }

    get settled_value(): T | null {
        return this.state.settled ? this.state.value : null;
    }

    // throws ResolutionConflictError if already settled
    settle(value: T) {
        if (this.state.settled) {
            throw new ResolutionConflictError();
        }
        this.state = { settled: true, value };
        this.resolve_promise(value);
    }

    try_settle(value: T) {
        if (this.state.settled) {
            return false;
        }
        this.settle(value);
        return true;
    }
}
