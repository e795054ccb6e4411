import type { RuntimeEventRecord } from "./events";
import { RingBuffer } from "./ringBuffer";

export type FiberRunState = "Running" | "Suspended" | "Done";

export type FiberInfo = {
    fiberId: number;
    parentFiberId?: number;
    name?: string;

    runState: FiberRunState;
    status: "running" | "success" | "failure" | "interrupted";

    createdAt: number;
    lastActiveAt: number;

    traceId?: string;
    spanId?: string;

    /** Label de la operación en la que está bloqueado (p.ej. "queue.take#3"). */
    awaiting?: string;
};

export type CellInfo = { cellId: number; outcome: string; waitersReleased: number; at: number };
export type QueueInfo = { queueId: number; shutdownAt: number; released: number; discarded: number };

/**
 * Vista en memoria del runtime armada a partir de los eventos.
 * Se engancha con `bus.subscribe(registry.onEvent)`.
 */
export class RuntimeRegistry {
    readonly fibers = new Map<number, FiberInfo>();
    readonly cells = new Map<number, CellInfo>();
    readonly queues = new Map<number, QueueInfo>();

    // eventos recientes (para dumps explicables)
    private readonly recent: RingBuffer<RuntimeEventRecord>;
    private readonly recentCap: number;

    constructor(recentCap = 2000) {
        this.recentCap = recentCap;
        this.recent = new RingBuffer<RuntimeEventRecord>(recentCap, recentCap);
    }

    readonly onEvent = (ev: RuntimeEventRecord): void => {
        if (this.recent.length >= this.recentCap) this.recent.shift();
        this.recent.push(ev);

        switch (ev.type) {
            case "fiber.start": {
                this.fibers.set(ev.fiberId, {
                    fiberId: ev.fiberId,
                    parentFiberId: ev.parentFiberId,
                    name: ev.name,
                    runState: "Running",
                    status: "running",
                    createdAt: ev.wallTs,
                    lastActiveAt: ev.wallTs,
                    traceId: ev.traceId,
                    spanId: ev.spanId,
                });
                break;
            }
            case "fiber.suspend": {
                const f = this.fibers.get(ev.fiberId);
                if (f) {
                    f.runState = "Suspended";
                    f.lastActiveAt = ev.wallTs;
                    f.awaiting = ev.reason ?? "unknown";
                }
                break;
            }
            case "fiber.resume": {
                const f = this.fibers.get(ev.fiberId);
                if (f) {
                    f.runState = "Running";
                    f.lastActiveAt = ev.wallTs;
                    f.awaiting = undefined;
                }
                break;
            }
            case "fiber.end": {
                const f = this.fibers.get(ev.fiberId);
                if (f) {
                    f.runState = "Done";
                    f.lastActiveAt = ev.wallTs;
                    f.status = ev.status;
                    f.awaiting = undefined;
                }
                break;
            }
            case "cell.done": {
                this.cells.set(ev.cellId, {
                    cellId: ev.cellId,
                    outcome: ev.outcome,
                    waitersReleased: ev.waiters,
                    at: ev.wallTs,
                });
                break;
            }
            case "queue.shutdown": {
                this.queues.set(ev.queueId, {
                    queueId: ev.queueId,
                    shutdownAt: ev.wallTs,
                    released: ev.releasedTakers + ev.releasedOfferers,
                    discarded: ev.discarded,
                });
                break;
            }
            case "log":
                break;
        }
    };

    /** Fibers que siguen bloqueados, con lo que esperan. */
    blocked(): FiberInfo[] {
        return Array.from(this.fibers.values()).filter((f) => f.runState === "Suspended");
    }

    getRecentEvents(): RuntimeEventRecord[] {
        return this.recent.toArray();
    }
}
