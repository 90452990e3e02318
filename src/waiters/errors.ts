// A waiter was registered on a registry whose session already ended
export class RegistryClosedError extends Error {
    constructor(message = "Cannot register a waiter on a closed registry") {
        super(message);
        this.name = "RegistryClosedError";
    }
}

// Something attempted to settle a one-shot twice. This is a bug in the matching path, not a user error.
export class ResolutionConflictError extends Error {
    constructor(message = "Attempted to settle an already settled one-shot") {
        super(message);
        this.name = "ResolutionConflictError";
    }
}

export class WaiterCancelledError extends Error {
    constructor(public readonly reason: string) {
        super(`Waiter cancelled: ${reason}`);
        this.name = "WaiterCancelledError";
    }
}

export class WaiterTimeoutError extends Error {
    constructor(public readonly timeout: number) {
        super(`Waiter timed out after ${timeout}ms`);
        this.name = "WaiterTimeoutError";
    }
}
