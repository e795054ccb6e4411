import { describe, it, expect } from "vitest";
import { asyncFail, asyncFlatMap, asyncMap, asyncSucceed, asyncTotal, type Async } from "../../../src/core/types/asyncEffect";
import { Exit } from "../../../src/core/types/effect";
import { fork, interruptFiber, join, Runtime, sleep, yieldNow } from "../../../src/core/runtime/runtime";
import { delay, makeRuntime } from "../../helpers";

describe("RuntimeFiber", () => {
    it("forks a child and joins its value", async () => {
        const rt = makeRuntime();
        const program = asyncFlatMap(fork(asyncMap(sleep(5), () => 21)), (child) =>
            asyncMap(join(child), (n) => n * 2)
        );

        await expect(rt.toPromise(program)).resolves.toBe(42);
    });

    it("join adopts the child's failure", async () => {
        const rt = makeRuntime();
        const program = asyncFlatMap(fork(asyncFail("child failed")), (child) => join(child));

        await expect(rt.toPromiseExit(program)).resolves.toEqual(Exit.fail("child failed"));
    });

    it("interrupts a suspended fiber and runs its finalizers", async () => {
        const rt = makeRuntime();
        const fiber = rt.fork(asyncMap(sleep(1_000), () => "done"));
        const seen: Exit<never, string>[] = [];
        fiber.addFinalizer((exit) => {
            seen.push(exit);
        });

        await delay(5);
        expect(fiber.awaiting).toBe("sleep(1000)");
        fiber.interrupt();

        const exit = await new Promise<Exit<never, string>>((resolve) => fiber.join(resolve));
        expect(exit).toEqual(Exit.interrupt());
        expect(fiber.status()).toBe("Interrupted");
        expect(seen).toEqual([Exit.interrupt()]);
    });

    it("runs a finalizer that returns an effect in its own fiber", async () => {
        const rt = makeRuntime();
        let released = "";
        const fiber = rt.fork(asyncSucceed("resource"));
        fiber.addFinalizer((exit) =>
            asyncTotal(() => {
                released = exit._tag;
            })
        );

        await new Promise((resolve) => fiber.join(resolve));
        await delay(1);
        expect(released).toBe("Success");
    });

    it("runs a finalizer added after completion right away", async () => {
        const rt = makeRuntime();
        const fiber = rt.fork(asyncSucceed(1));
        await new Promise((resolve) => fiber.join(resolve));

        let ran = false;
        fiber.addFinalizer(() => {
            ran = true;
        });
        expect(ran).toBe(true);
    });

    it("interruptFiber interrupts and waits for the exit", async () => {
        const rt = makeRuntime();
        const program = asyncFlatMap(fork(sleep(1_000)), (child) =>
            asyncFlatMap(sleep(1), () => interruptFiber(child))
        );

        await expect(rt.toPromise(program)).resolves.toEqual(Exit.interrupt());
    });

    it("yieldNow lets other fibers run in between", async () => {
        const rt = makeRuntime();
        const log: string[] = [];
        const worker = (name: string) =>
            asyncFlatMap(
                asyncTotal(() => log.push(`${name}1`)),
                () => asyncFlatMap(yieldNow(), () => asyncTotal(() => log.push(`${name}2`)))
            );

        const program = asyncFlatMap(fork(worker("a")), (fa) =>
            asyncFlatMap(fork(worker("b")), (fb) => asyncFlatMap(join(fa), () => join(fb)))
        );

        await rt.toPromise(program);
        expect(log).toEqual(["a1", "b1", "a2", "b2"]);
    });

    it("splits long synchronous runs across scheduler steps by budget", async () => {
        const rt = new Runtime({ env: {}, budget: 8 });
        const loop = (n: number, acc: number): Async<unknown, never, number> =>
            n === 0 ? asyncSucceed(acc) : asyncFlatMap(asyncSucceed(n), (k) => loop(n - 1, acc + k));

        await expect(rt.toPromise(loop(100, 0))).resolves.toBe(5050);
    });

    it("rejects a non-positive budget", () => {
        expect(() => new Runtime({ env: {}, budget: 0 })).toThrow(RangeError);
    });
});
