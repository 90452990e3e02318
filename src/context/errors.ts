// A request to Discord made on behalf of an interaction failed
export class InteractionRequestError extends Error {
    constructor(
        public readonly operation: string,
        cause: unknown,
    ) {
        super(`Interaction request "${operation}" failed: ${cause instanceof Error ? cause.message : String(cause)}`, {
            cause,
        });
        this.name = "InteractionRequestError";
    }
}
