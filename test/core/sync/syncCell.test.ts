import { describe, it, expect } from "vitest";
import { asyncAs, asyncFlatMap, asyncForEach, asyncTotal } from "../../../src/core/types/asyncEffect";
import { Exit } from "../../../src/core/types/effect";
import { none } from "../../../src/core/types/option";
import { join, sleep } from "../../../src/core/runtime/runtime";
import { makeSyncCell, unsafeMakeSyncCell } from "../../../src/core/sync/syncCell";
import { delay, makeObservedRuntime, makeRuntime } from "../../helpers";

describe("SyncCell", () => {
    it("only the first fill wins", async () => {
        const rt = makeRuntime();

        const program = asyncFlatMap(makeSyncCell<string, number>(), (cell) =>
            asyncFlatMap(
                asyncForEach([cell.succeed(1), cell.succeed(2), cell.fail("late"), cell.die("later")], (op) => op),
                (results) => asyncFlatMap(cell.await(), (value) => asyncTotal(() => ({ results, value })))
            )
        );

        expect(await rt.toPromise(program)).toEqual({ results: [true, false, false, false], value: 1 });
    });

    it("releases every waiter with the same value", async () => {
        const rt = makeRuntime();
        const cell = unsafeMakeSyncCell<never, number>();

        const waiters = [1, 2, 3, 4, 5].map(() => rt.fork(cell.await()));
        await delay(5);
        expect(cell.unsafeWaiters()).toBe(5);
        expect(cell.unsafeIsDone()).toBe(false);

        expect(await rt.toPromise(cell.succeed(42))).toBe(true);
        const values = await Promise.all(waiters.map((f) => rt.toPromise(join(f))));

        expect(values).toEqual([42, 42, 42, 42, 42]);
        expect(cell.unsafeWaiters()).toBe(0);
    });

    it("propagates a failure as a typed error and a defect as a defect", async () => {
        const rt = makeRuntime();
        const failed = unsafeMakeSyncCell<string, number>();
        const died = unsafeMakeSyncCell<string, number>();
        const boom = new Error("boom");

        await rt.toPromise(failed.fail("nope"));
        await rt.toPromise(died.die(boom));

        expect(await rt.toPromiseExit(failed.await())).toEqual(Exit.fail("nope"));
        expect(await rt.toPromiseExit(died.await())).toEqual(Exit.die(boom));
    });

    it("complete runs the producer once and every await sees its result", async () => {
        const rt = makeRuntime();
        const cell = unsafeMakeSyncCell<never, number>();
        let runs = 0;

        const completed = await rt.toPromise(cell.complete(asyncTotal(() => ++runs * 7)));

        expect(completed).toBe(true);
        expect(await rt.toPromise(cell.await())).toBe(7);
        expect(await rt.toPromise(cell.await())).toBe(7);
        expect(runs).toBe(1);
    });

    it("complete stores a thrown defect", async () => {
        const rt = makeRuntime();
        const cell = unsafeMakeSyncCell<never, number>();
        const bug = new Error("bug");

        const completed = await rt.toPromise(
            cell.complete(
                asyncTotal((): number => {
                    throw bug;
                })
            )
        );

        expect(completed).toBe(true);
        expect(await rt.toPromiseExit(cell.await())).toEqual(Exit.die(bug));
    });

    it("completeWith re-runs the producer on every await", async () => {
        const rt = makeRuntime();
        const cell = unsafeMakeSyncCell<never, number>();
        let runs = 0;

        expect(await rt.toPromise(cell.completeWith(asyncTotal(() => ++runs)))).toBe(true);
        expect(runs).toBe(0);

        expect(await rt.toPromise(cell.await())).toBe(1);
        expect(await rt.toPromise(cell.await())).toBe(2);
        expect(runs).toBe(2);
    });

    it("complete on a filled cell still runs the producer but changes nothing", async () => {
        const rt = makeRuntime();
        const cell = unsafeMakeSyncCell<never, number>();
        let ran = 0;

        await rt.toPromise(cell.succeed(1));
        const completed = await rt.toPromise(
            cell.complete(
                asyncTotal(() => {
                    ran++;
                    return 2;
                })
            )
        );

        expect(completed).toBe(false);
        expect(ran).toBe(1);
        expect(await rt.toPromise(cell.await())).toBe(1);
    });

    it("poll reports empty and filled cells without blocking", async () => {
        const rt = makeRuntime();
        const cell = unsafeMakeSyncCell<string, number>();

        expect(await rt.toPromise(cell.poll())).toEqual(none);
        expect(await rt.toPromise(cell.isDone())).toBe(false);

        await rt.toPromise(cell.succeed(3));

        const polled = await rt.toPromise(cell.poll());
        expect(polled._tag).toBe("Some");
        if (polled._tag === "Some") expect(await rt.toPromise(polled.value)).toBe(3);
        expect(await rt.toPromise(cell.isDone())).toBe(true);
    });

    it("poll on a completeWith cell hands back the producer without running it", async () => {
        const rt = makeRuntime();
        const cell = unsafeMakeSyncCell<never, number>();
        let runs = 0;
        await rt.toPromise(
            cell.completeWith(asyncFlatMap(asyncTotal(() => ++runs), (n) => asyncAs(sleep(10_000), n)))
        );

        const poller = rt.fork(cell.poll());
        await delay(5);

        expect(poller.status()).toBe("Done");
        const exit = poller.poll();
        expect(exit?._tag === "Success" && exit.value._tag).toBe("Some");
        expect(runs).toBe(0);
    });

    it("an interrupted waiter leaves the wait list", async () => {
        const rt = makeRuntime();
        const cell = unsafeMakeSyncCell<never, string>();

        const waiter = rt.fork(cell.await());
        await delay(5);
        expect(cell.unsafeWaiters()).toBe(1);

        waiter.interrupt();
        expect(cell.unsafeWaiters()).toBe(0);

        expect(await rt.toPromiseExit(join(waiter))).toEqual(Exit.interrupt());
        expect(await rt.toPromise(cell.succeed("later"))).toBe(true);
    });

    it("concurrent completes: the first to finish wins", async () => {
        const rt = makeRuntime();
        const cell = unsafeMakeSyncCell<never, string>();

        const fast = rt.fork(cell.complete(asyncAs(sleep(1), "fast")));
        const slow = rt.fork(cell.complete(asyncAs(sleep(20), "slow")));

        const results = await Promise.all([rt.toPromise(join(fast)), rt.toPromise(join(slow))]);

        expect(results).toEqual([true, false]);
        expect(await rt.toPromise(cell.await())).toBe("fast");
    });

    it("emits cell.done with the outcome and the number of released waiters", async () => {
        const { rt, bus, events } = makeObservedRuntime();
        const cell = unsafeMakeSyncCell<string, number>();

        rt.fork(cell.await());
        rt.fork(cell.await());
        await delay(5);
        await rt.toPromise(cell.fail("e"));
        bus.flush();

        const done = events.filter((e) => e.type === "cell.done");
        expect(done).toHaveLength(1);
        expect(done[0]).toMatchObject({ cellId: cell.id, outcome: "failure", waiters: 2 });
    });
});
