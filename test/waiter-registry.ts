import { describe, expect, it, beforeEach, afterEach, vi } from "vitest";

import { WaiterRegistry } from "../src/waiters/waiter-registry.js";
import {
    RegistryClosedError,
    ResolutionConflictError,
    WaiterCancelledError,
    WaiterTimeoutError,
} from "../src/waiters/errors.js";
import { OneShot } from "../src/waiters/one-shot.js";

type test_event = {
    author_id: number;
    tag?: string;
};

describe("OneShot", () => {
    it("should settle exactly once", async () => {
        const shot = new OneShot<number>();
        expect(shot.is_settled).to.equal(false);
        expect(shot.settled_value).to.equal(null);
        shot.settle(1);
        expect(() => shot.settle(2)).toThrow(ResolutionConflictError);
        expect(shot.try_settle(3)).to.equal(false);
        expect(shot.settled_value).to.equal(1);
        expect(await shot.promise).to.equal(1);
    });

    it("try_settle should settle an open one-shot", async () => {
        const shot = new OneShot<string>();
        expect(shot.try_settle("a")).to.equal(true);
        expect(await shot.promise).to.equal("a");
    });
});

describe("WaiterRegistry", () => {
    it("should resolve the waiter whose predicate matches", async () => {
        const registry = new WaiterRegistry<test_event>();
        const waiter = registry.register(event => event.author_id === 42);

        expect(registry.deliver({ author_id: 7 })).to.equal(false);
        expect(waiter.state).to.equal("pending");
        expect(registry.size).to.equal(1);

        const event = { author_id: 42 };
        expect(registry.deliver(event)).to.equal(true);
        expect(waiter.state).to.equal("matched");
        expect(registry.size).to.equal(0);
        expect(await waiter.event()).to.equal(event);

        // the waiter is gone, a second matching event isn't consumed
        expect(registry.deliver({ author_id: 42 })).to.equal(false);
        expect(await waiter.outcome).to.deep.equal({ status: "matched", event });
    });

    it("should resolve only the first matching waiter", () => {
        const registry = new WaiterRegistry<test_event>();
        const waiters = [
            registry.register(event => event.tag === "p1"),
            registry.register(event => event.author_id === 2),
            registry.register(event => event.tag === "p3"),
            registry.register(event => event.author_id === 2),
        ];

        expect(registry.deliver({ author_id: 2 })).to.equal(true);

        expect(waiters.map(waiter => waiter.state)).to.deep.equal(["pending", "matched", "pending", "pending"]);
        expect(registry.pending_ids()).to.deep.equal([waiters[0].id, waiters[2].id, waiters[3].id]);
    });

    it("should leave the registry unchanged when nothing matches", () => {
        const registry = new WaiterRegistry<test_event>();
        registry.register(event => event.author_id === 1);
        registry.register(event => event.author_id === 2);
        registry.register(event => event.author_id === 3);
        const before = registry.pending_ids();

        expect(registry.deliver({ author_id: 4 })).to.equal(false);

        expect(registry.pending_ids()).to.deep.equal(before);
        expect(registry.size).to.equal(3);
    });

    it("should not deduplicate identical predicates", () => {
        const registry = new WaiterRegistry<test_event>();
        const predicate = (event: test_event) => event.author_id === 1;
        const first = registry.register(predicate);
        const second = registry.register(predicate);
        expect(first.id).not.to.equal(second.id);

        expect(registry.deliver({ author_id: 1 })).to.equal(true);
        expect(first.state).to.equal("matched");
        expect(second.state).to.equal("pending");
        expect(registry.deliver({ author_id: 1 })).to.equal(true);
        expect(second.state).to.equal("matched");
    });

    it("should never resolve a waiter twice across sequential deliveries", () => {
        const registry = new WaiterRegistry<test_event>();
        const consumed = new Map<number, number>();
        const waiters = Array.from({ length: 5 }, () => registry.register(() => true));
        for (const waiter of waiters) {
            waiter.outcome
                .then(() => consumed.set(waiter.id, (consumed.get(waiter.id) ?? 0) + 1))
                .catch(() => void 0);
        }
        const results = Array.from({ length: 8 }, (_, i) => registry.deliver({ author_id: i }));
        expect(results).to.deep.equal([true, true, true, true, true, false, false, false]);
        return Promise.all(waiters.map(waiter => waiter.outcome)).then(outcomes => {
            expect(outcomes.map(outcome => (outcome.status === "matched" ? outcome.event.author_id : -1))).to.deep.equal(
                [0, 1, 2, 3, 4],
            );
            expect([...consumed.values()]).to.deep.equal([1, 1, 1, 1, 1]);
        });
    });

    it("should not offer an event to waiters registered during its delivery", () => {
        const registry = new WaiterRegistry<test_event>();
        const late: ReturnType<typeof registry.register>[] = [];
        const early = registry.register(() => {
            late.push(registry.register(() => true));
            return false;
        });

        expect(registry.deliver({ author_id: 1 })).to.equal(false);
        expect(early.state).to.equal("pending");
        expect(late.map(waiter => waiter.state)).to.deep.equal(["pending"]);
        expect(registry.size).to.equal(2);
    });

    it("should skip waiters cancelled by an earlier predicate", () => {
        const registry = new WaiterRegistry<test_event>();
        let victim: ReturnType<typeof registry.register> | null = null;
        registry.register(() => {
            victim?.cancel("removed mid-delivery");
            return false;
        });
        victim = registry.register(() => true);
        const fallback = registry.register(() => true);

        expect(registry.deliver({ author_id: 1 })).to.equal(true);
        expect(victim.state).to.equal("cancelled");
        expect(fallback.state).to.equal("matched");
    });

    it("should treat a throwing predicate as a non-match", () => {
        const registry = new WaiterRegistry<test_event>();
        const broken = registry.register(() => {
            throw new Error("predicate failure");
        });
        const working = registry.register(event => event.author_id === 5);

        expect(registry.deliver({ author_id: 5 })).to.equal(true);
        expect(broken.state).to.equal("pending");
        expect(working.state).to.equal("matched");
    });

    it("should cancel every pending waiter on cancel_all", async () => {
        const registry = new WaiterRegistry<test_event>();
        const waiters = [registry.register(() => false), registry.register(() => false), registry.register(() => false)];

        expect(registry.cancel_all("test teardown")).to.equal(3);

        const outcomes = await Promise.all(waiters.map(waiter => waiter.outcome));
        expect(outcomes).to.deep.equal([
            { status: "cancelled", reason: "test teardown" },
            { status: "cancelled", reason: "test teardown" },
            { status: "cancelled", reason: "test teardown" },
        ]);
        expect(registry.size).to.equal(0);
        expect(registry.is_closed).to.equal(true);
        await expect(waiters[0].event()).rejects.toThrow(WaiterCancelledError);
    });

    it("should reject registration after teardown", () => {
        const registry = new WaiterRegistry<test_event>();
        registry.cancel_all();
        expect(() => registry.register(() => true)).toThrow(RegistryClosedError);
        expect(registry.cancel_all()).to.equal(0);
    });

    it("should remove a waiter cancelled by its holder", async () => {
        const registry = new WaiterRegistry<test_event>();
        const waiter = registry.register(() => true);

        expect(waiter.cancel("not needed")).to.equal(true);
        expect(waiter.cancel()).to.equal(false);
        expect(registry.size).to.equal(0);
        expect(registry.deliver({ author_id: 1 })).to.equal(false);
        expect(await waiter.outcome).to.deep.equal({ status: "cancelled", reason: "not needed" });
    });

    it("should not cancel a waiter that already matched", async () => {
        const registry = new WaiterRegistry<test_event>();
        const waiter = registry.register(() => true);
        registry.deliver({ author_id: 9 });

        expect(waiter.cancel()).to.equal(false);
        expect(registry.cancel_all()).to.equal(0);
        expect(await waiter.outcome).to.deep.equal({ status: "matched", event: { author_id: 9 } });
    });
});

describe("WaiterRegistry timeouts", () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });
    afterEach(() => {
        vi.useRealTimers();
    });

    it("should time out a waiter that never matches", async () => {
        const registry = new WaiterRegistry<test_event>();
        const waiter = registry.register(() => false, { timeout: 1000 });

        vi.advanceTimersByTime(999);
        expect(waiter.state).to.equal("pending");
        vi.advanceTimersByTime(1);

        expect(waiter.state).to.equal("timed_out");
        expect(registry.size).to.equal(0);
        expect(await waiter.outcome).to.deep.equal({ status: "timed_out", timeout: 1000 });
        await expect(waiter.event()).rejects.toThrow(WaiterTimeoutError);
    });

    it("should not time out a waiter that matched first", async () => {
        const registry = new WaiterRegistry<test_event>();
        const waiter = registry.register(event => event.author_id === 1, { timeout: 1000 });

        vi.advanceTimersByTime(500);
        expect(registry.deliver({ author_id: 1 })).to.equal(true);
        vi.advanceTimersByTime(1000);

        expect(waiter.state).to.equal("matched");
        expect(vi.getTimerCount()).to.equal(0);
    });

    it("should reject timeouts a timer can't hold", () => {
        const registry = new WaiterRegistry<test_event>();
        expect(() => registry.register(() => false, { timeout: 2592000000 })).toThrow(
            "waiter timeout must not exceed 2147483647ms",
        );
        expect(registry.size).to.equal(0);
        expect(() => new WaiterRegistry<test_event>({ default_timeout: 2592000000 })).toThrow(
            "waiter timeout must not exceed 2147483647ms",
        );
    });

    it("should apply the registry default timeout", () => {
        const registry = new WaiterRegistry<test_event>({ default_timeout: 200 });
        const defaulted = registry.register(() => false);
        const explicit = registry.register(() => false, { timeout: 500 });

        vi.advanceTimersByTime(200);
        expect(defaulted.state).to.equal("timed_out");
        expect(explicit.state).to.equal("pending");

        registry.cancel_all();
        expect(explicit.state).to.equal("cancelled");
        expect(vi.getTimerCount()).to.equal(0);
    });
});
