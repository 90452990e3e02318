import { WaiterCancelledError, WaiterTimeoutError } from "./errors.js";
import { OneShot } from "./one-shot.js";

export type WaiterPredicate<E> = (event: E) => boolean;

export type WaiterOutcome<E> =
    | { status: "matched"; event: E }
    | { status: "cancelled"; reason: string }
    | { status: "timed_out"; timeout: number };

export type WaiterState = "pending" | WaiterOutcome<unknown>["status"];

export type WaiterOptions = {
    // ms, no timeout if omitted
    timeout?: number;
};

// Handle for a registered wait, created by WaiterRegistry.register
export class Waiter<E> {
    constructor(
        public readonly id: number,
        private readonly resolver: OneShot<WaiterOutcome<E>>,
        private readonly cancel_callback: (reason: string) => boolean,
    ) {}

    get state(): WaiterState {
        return this.resolver.settled_value?.status ?? "pending";
    }

    get outcome(): Promise<WaiterOutcome<E>> {
        return this.resolver.promise;
    }

    // Resolves with the matched event, rejects if the waiter was cancelled or timed out
    async event(): Promise<E> {
        const outcome = await this.outcome;
        switch (outcome.status) {
            case "matched":
                return outcome.event;
            case "cancelled":
                throw new WaiterCancelledError(outcome.reason);
            case "timed_out":
                throw new WaiterTimeoutError(outcome.timeout);
        }
    }

    // returns false if the waiter already reached a terminal state
    cancel(reason = "cancelled by caller") {
        return this.cancel_callback(reason);
    }
}
