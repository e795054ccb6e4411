import { describe, it, expect } from "vitest";
import { asyncFlatMap, asyncForEach, unit, type Async } from "../../../src/core/types/asyncEffect";
import { fork, join, yieldNow } from "../../../src/core/runtime/runtime";
import { makeRef, unsafeMakeRef, type Ref } from "../../../src/core/sync/ref";
import { makeRuntime } from "../../helpers";

const incrementTimes = (ref: Ref<number>, n: number): Async<unknown, never, void> =>
    n === 0 ? unit() : asyncFlatMap(ref.update((x) => x + 1), () => asyncFlatMap(yieldNow(), () => incrementTimes(ref, n - 1)));

describe("Ref", () => {
    it("concurrent updates never lose a write", async () => {
        const rt = makeRuntime();
        const workers = Array.from({ length: 100 }, (_, i) => i);

        const program = asyncFlatMap(makeRef(0), (ref) =>
            asyncFlatMap(
                asyncForEach(workers, () => fork(incrementTimes(ref, 10))),
                (fibers) => asyncFlatMap(asyncForEach(fibers, (f) => join(f)), () => ref.get())
            )
        );

        expect(await rt.toPromise(program)).toBe(1000);
    });

    it("modify returns a result and stores the next value in one step", async () => {
        const rt = makeRuntime();
        const ref = unsafeMakeRef(5);

        const out = await rt.toPromise(ref.modify((n) => [`was ${n}`, n * 2] as const));

        expect(out).toBe("was 5");
        expect(ref.unsafeGet()).toBe(10);
    });

    it("getAndUpdate and updateAndGet differ only in what they return", async () => {
        const rt = makeRuntime();
        const ref = unsafeMakeRef(1);

        expect(await rt.toPromise(ref.getAndUpdate((n) => n + 1))).toBe(1);
        expect(await rt.toPromise(ref.updateAndGet((n) => n + 1))).toBe(3);
        await rt.toPromise(ref.set(0));
        expect(await rt.toPromise(ref.get())).toBe(0);
    });
});
