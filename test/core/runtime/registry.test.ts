import { describe, it, expect } from "vitest";
import { Runtime } from "../../../src/core/runtime/runtime";
import { EventBus } from "../../../src/core/runtime/eventBus";
import { RuntimeRegistry } from "../../../src/core/runtime/registry";
import { dumpAllFibers } from "../../../src/core/runtime/dump";
import { makeQueue, QueuePolicy } from "../../../src/core/stream/queue";
import { delay } from "../../helpers";

describe("RuntimeRegistry", () => {
    it("shows which operation a blocked fiber is waiting on", async () => {
        const bus = new EventBus({ autoFlush: false });
        const registry = new RuntimeRegistry();
        bus.subscribe(registry.onEvent);
        const rt = new Runtime({ env: {}, hooks: bus });

        const q = makeQueue<number>(QueuePolicy.unbounded());
        const taker = rt.fork(q.take());
        await delay(5);
        bus.flush();

        const blocked = registry.blocked();
        expect(blocked.map((f) => [f.fiberId, f.awaiting])).toEqual([[taker.id, `queue.take#${q.id}`]]);
        expect(dumpAllFibers(registry).split("\n")).toContain(`  awaiting: queue.take#${q.id}`);

        taker.interrupt();
        await delay(5);
        bus.flush();

        expect(registry.blocked()).toEqual([]);
        expect(registry.fibers.get(taker.id)?.status).toBe("interrupted");
    });

    it("records queue shutdowns", async () => {
        const bus = new EventBus({ autoFlush: false });
        const registry = new RuntimeRegistry();
        bus.subscribe(registry.onEvent);
        const rt = new Runtime({ env: {}, hooks: bus });

        const q = makeQueue<string>(QueuePolicy.blocking(1), rt);
        await rt.toPromise(q.offer("x"));
        await rt.toPromise(q.shutdown());
        bus.flush();

        expect(registry.queues.get(q.id)).toMatchObject({ queueId: q.id, released: 0, discarded: 1 });
    });
});
