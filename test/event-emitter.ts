import { describe, expect, it, vi } from "vitest";

import { TypedEventEmitter } from "../src/utils/event-emitter.js";

describe("TypedEventEmitter", () => {
    it("should call listeners with the emitted arguments until removed", () => {
        const emitter = new TypedEventEmitter<{ ping: [number, string] }>();
        const listener = vi.fn();
        emitter.on("ping", listener);

        emitter.emit("ping", 1, "a");
        emitter.off("ping", listener);
        emitter.emit("ping", 2, "b");

        expect(listener).toHaveBeenCalledTimes(1);
        expect(listener).toHaveBeenCalledWith(1, "a");
    });
});
