// src/core/stream/queue.ts
import { async, asyncMap, asyncForEach, asyncTotal, type Async } from "../types/asyncEffect";
import { Exit } from "../types/effect";
import { none, some, type Option } from "../types/option";
import type { Canceler } from "../types/cancel";
import { RingBuffer } from "../runtime/ringBuffer";
import { LinkedQueue } from "../runtime/linkedQueue";
import { currentServices, emitEvent } from "../runtime/runtime";
import type { RuntimeServices } from "../runtime/fiber";

export type Strategy = "backpressure" | "dropping" | "sliding";

export type QueuePolicy =
    | { readonly _tag: "Unbounded" }
    | { readonly _tag: "Blocking"; readonly capacity: number }
    | { readonly _tag: "Sliding"; readonly capacity: number }
    | { readonly _tag: "Dropping"; readonly capacity: number };

export const QueuePolicy = {
    unbounded: (): QueuePolicy => ({ _tag: "Unbounded" }),
    blocking: (capacity: number): QueuePolicy => ({ _tag: "Blocking", capacity }),
    sliding: (capacity: number): QueuePolicy => ({ _tag: "Sliding", capacity }),
    dropping: (capacity: number): QueuePolicy => ({ _tag: "Dropping", capacity }),

    fromStrategy: (capacity: number, strategy: Strategy): QueuePolicy => {
        switch (strategy) {
            case "backpressure":
                return QueuePolicy.blocking(capacity);
            case "sliding":
                return QueuePolicy.sliding(capacity);
            case "dropping":
                return QueuePolicy.dropping(capacity);
        }
    },
};

/** La operación llegó con la queue ya cerrada. */
export type QueueClosed = { readonly _tag: "QueueClosed" };
/** El caller estaba suspendido en `offer`/`take` cuando la queue se cerró. */
export type QueueInterrupted = { readonly _tag: "QueueInterrupted" };
export type QueueError = QueueClosed | QueueInterrupted;

export const QueueClosed: QueueClosed = { _tag: "QueueClosed" };
export const QueueInterrupted: QueueInterrupted = { _tag: "QueueInterrupted" };

export const isQueueClosed = (e: unknown): e is QueueClosed =>
    typeof e === "object" && e !== null && "_tag" in e && e._tag === "QueueClosed";

export const isQueueInterrupted = (e: unknown): e is QueueInterrupted =>
    typeof e === "object" && e !== null && "_tag" in e && e._tag === "QueueInterrupted";

export type QueueStatus = "Open" | "ShuttingDown" | "Closed";

export type SignalQueue<A> = {
    readonly id: number;
    readonly policy: QueuePolicy;
    /** `Infinity` para `Unbounded`. */
    readonly capacity: number;

    /** `false` solo si la política `Dropping` descartó el valor. */
    offer: (a: A) => Async<unknown, QueueError, boolean>;
    /** Igual que `offer` elemento por elemento; devuelve los valores que no entraron. */
    offerAll: (as: Iterable<A>) => Async<unknown, QueueError, A[]>;

    take: () => Async<unknown, QueueError, A>;
    /** Drena todo lo que hay, sin suspender. */
    takeAll: () => Async<unknown, QueueClosed, A[]>;
    takeUpTo: (max: number) => Async<unknown, QueueClosed, A[]>;
    poll: () => Async<unknown, QueueClosed, Option<A>>;

    size: () => number;
    isEmpty: () => boolean;
    isFull: () => boolean;
    status: () => QueueStatus;
    isShutdown: () => boolean;

    /** Libera a todos los suspendidos con `QueueInterrupted`. Idempotente. */
    shutdown: () => Async<unknown, never, void>;
    awaitShutdown: () => Async<unknown, never, void>;
};

let nextQueueId = 1;

export function unbounded<A>(): Async<unknown, never, SignalQueue<A>> {
    return asyncTotal(() => makeQueue<A>(QueuePolicy.unbounded()));
}

export function bounded<A>(
    capacity: number,
    strategy: Strategy = "backpressure"
): Async<unknown, never, SignalQueue<A>> {
    return asyncTotal(() => makeQueue<A>(QueuePolicy.fromStrategy(capacity, strategy)));
}

export const sliding = <A>(capacity: number) => bounded<A>(capacity, "sliding");
export const dropping = <A>(capacity: number) => bounded<A>(capacity, "dropping");

/** Constructor directo. Tira `RangeError` si la capacidad no es un entero positivo. */
export function makeQueue<A>(policy: QueuePolicy, services: RuntimeServices | undefined = currentServices()): SignalQueue<A> {
    const capacity = policy._tag === "Unbounded" ? Infinity : policy.capacity;
    if (policy._tag !== "Unbounded" && (!Number.isInteger(capacity) || capacity < 1)) {
        throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }

    const id = nextQueueId++;
    const items =
        policy._tag === "Unbounded"
            ? new RingBuffer<A>(16, Number.MAX_SAFE_INTEGER)
            : new RingBuffer<A>(capacity);
    let status: QueueStatus = "Open";

    type OfferWaiter = { a: A; cb: (exit: Exit<QueueError, boolean>) => void };
    type Taker = (exit: Exit<QueueError, A>) => void;

    // invariantes: takers.length > 0 => items vacío; offerWaiters.length > 0 => items lleno
    const offerWaiters = new LinkedQueue<OfferWaiter>();
    const takers = new LinkedQueue<Taker>();
    const shutdownWaiters = new LinkedQueue<() => void>();

    const immediate = <E, B>(label: string, f: () => Exit<E, B>): Async<unknown, E, B> =>
        async<unknown, E, B>((_env, cb) => cb(f()), label);

    // con espacio libre, los offers bloqueados entran en orden de llegada
    const admitWaitingOffers = () => {
        while (offerWaiters.length > 0 && items.length < capacity) {
            const w = offerWaiters.shift();
            if (!w) break;
            items.push(w.a);
            w.cb(Exit.succeed(true));
        }
    };

    const offer = (a: A): Async<unknown, QueueError, boolean> =>
        async<unknown, QueueError, boolean>((_env, cb): void | Canceler => {
            if (status !== "Open") {
                cb(Exit.fail(QueueClosed));
                return;
            }

            // si hay taker esperando, entrego directo
            const taker = takers.shift();
            if (taker) {
                taker(Exit.succeed(a));
                cb(Exit.succeed(true));
                return;
            }

            if (items.length < capacity) {
                items.push(a);
                cb(Exit.succeed(true));
                return;
            }

            // lleno: estrategia
            switch (policy._tag) {
                case "Dropping":
                    cb(Exit.succeed(false));
                    return;

                case "Sliding":
                    // drop oldest, keep newest
                    items.shift();
                    items.push(a);
                    cb(Exit.succeed(true));
                    return;

                case "Unbounded":
                case "Blocking": {
                    const node = offerWaiters.push({ a, cb });
                    return () => offerWaiters.remove(node);
                }
            }
        }, `queue.offer#${id}`);

    const take = (): Async<unknown, QueueError, A> =>
        async<unknown, QueueError, A>((_env, cb): void | Canceler => {
            if (status !== "Open") {
                cb(Exit.fail(QueueClosed));
                return;
            }

            if (items.length > 0) {
                cb(Exit.succeed(items.shiftOne()));
                admitWaitingOffers();
                return;
            }

            const node = takers.push(cb);
            return () => takers.remove(node);
        }, `queue.take#${id}`);

    const takeUpTo = (max: number): Async<unknown, QueueClosed, A[]> =>
        immediate<QueueClosed, A[]>(`queue.takeUpTo#${id}`, () => {
            if (status !== "Open") return Exit.fail(QueueClosed);
            const out = items.shiftUpTo(Math.max(0, Math.floor(max)));
            admitWaitingOffers();
            return Exit.succeed(out);
        });

    const shutdown = (): Async<unknown, never, void> =>
        asyncTotal(() => {
            if (status !== "Open") return;
            status = "ShuttingDown";

            const releasedTakers = takers.drain();
            const releasedOfferers = offerWaiters.drain();
            const discarded = items.length;
            items.clear();

            for (const t of releasedTakers) t(Exit.fail(QueueInterrupted));
            for (const w of releasedOfferers) w.cb(Exit.fail(QueueInterrupted));

            status = "Closed";

            emitEvent(
                {
                    type: "queue.shutdown",
                    queueId: id,
                    releasedTakers: releasedTakers.length,
                    releasedOfferers: releasedOfferers.length,
                    discarded,
                },
                services
            );

            for (const s of shutdownWaiters.drain()) s();
        });

    return {
        id,
        policy,
        capacity,

        offer,

        offerAll: (as) => {
            const values = Array.from(as);
            return asyncMap(
                asyncForEach(values, (a) => offer(a)),
                (accepted) => values.filter((_, i) => !accepted[i])
            );
        },

        take,

        takeAll: () => takeUpTo(Number.MAX_SAFE_INTEGER),

        takeUpTo,

        poll: () =>
            asyncMap(takeUpTo(1), (xs): Option<A> => (xs.length > 0 ? some(xs[0]) : none)),

        size: () => items.length,
        isEmpty: () => items.length === 0,
        isFull: () => items.length >= capacity,
        status: () => status,
        isShutdown: () => status !== "Open",

        shutdown,

        awaitShutdown: () =>
            async<unknown, never, void>((_env, cb): void | Canceler => {
                if (status === "Closed") {
                    cb(Exit.succeed(undefined));
                    return;
                }
                const node = shutdownWaiters.push(() => cb(Exit.succeed(undefined)));
                return () => shutdownWaiters.remove(node);
            }, `queue.awaitShutdown#${id}`),
    };
}
