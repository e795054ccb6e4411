// src/core/sync/syncCell.ts
import { async, asyncExit, asyncFlatMap, asyncTotal, fromExit, type Async } from "../types/asyncEffect";
import { Exit } from "../types/effect";
import { none, some, type Option } from "../types/option";
import { LinkedQueue } from "../runtime/linkedQueue";
import { currentServices, emitEvent } from "../runtime/runtime";
import type { RuntimeServices } from "../runtime/fiber";

/**
 * Lo que guarda una celda llena:
 * - `Done`: un resultado congelado (success, fail o die), igual para todos.
 * - `Lazy`: un efecto que cada `await` corre de nuevo, en su propio fiber.
 */
export type Filled<E, A> =
    | { readonly _tag: "Done"; readonly exit: Exit<E, A> }
    | { readonly _tag: "Lazy"; readonly effect: Async<unknown, E, A> };

type CellState<E, A> =
    | { readonly _tag: "Empty"; readonly waiters: LinkedQueue<(filled: Filled<E, A>) => void> }
    | Filled<E, A>;

/**
 * Celda de asignación única. Arranca vacía, se llena una sola vez y
 * a partir de ahí todos los `await` (actuales y futuros) ven lo mismo.
 *
 * Las operaciones de llenado devuelven `true` solo para quien ganó la carrera;
 * perder no es un error.
 */
export type SyncCell<E, A> = {
    readonly id: number;

    /** Suspende hasta que la celda se llene. `Fail` vuelve como error tipado; `Die` como defecto. */
    await: () => Async<unknown, E, A>;

    succeed: (value: A) => Async<unknown, never, boolean>;
    fail: (error: E) => Async<unknown, never, boolean>;
    die: (defect: unknown) => Async<unknown, never, boolean>;
    done: (exit: Exit<E, A>) => Async<unknown, never, boolean>;

    /**
     * Corre `producer` una vez, ya, en el fiber que llama, y guarda su `Exit`.
     * Si otra operación llenó la celda antes, el resultado se descarta.
     */
    complete: <R>(producer: Async<R, E, A>) => Async<R, never, boolean>;

    /** Asocia `producer` sin correrlo: cada `await` posterior lo ejecuta de nuevo. */
    completeWith: (producer: Async<unknown, E, A>) => Async<unknown, never, boolean>;

    isDone: () => Async<unknown, never, boolean>;

    /**
     * Nunca suspende. `None` si está vacía; si no, `Some` con el efecto que daría `await`
     * (el resultado congelado, o el productor de `completeWith` sin correrlo).
     */
    poll: () => Async<unknown, never, Option<Async<unknown, E, A>>>;

    /** Consulta sincrónica, para código fuera de un fiber. */
    unsafeIsDone: () => boolean;
    /** Cantidad de fibers bloqueados en `await`. */
    unsafeWaiters: () => number;
};

let nextCellId = 1;

const outcomeOf = <E, A>(filled: Filled<E, A>): "success" | "failure" | "defect" | "interrupt" | "lazy" => {
    if (filled._tag === "Lazy") return "lazy";
    const exit = filled.exit;
    if (exit._tag === "Success") return "success";
    switch (exit.cause._tag) {
        case "Fail":
            return "failure";
        case "Die":
            return "defect";
        case "Interrupt":
            return "interrupt";
    }
};

const resolve = <E, A>(filled: Filled<E, A>): Async<unknown, E, A> =>
    filled._tag === "Done" ? fromExit(filled.exit) : filled.effect;

export function unsafeMakeSyncCell<E, A>(services: RuntimeServices | undefined = currentServices()): SyncCell<E, A> {
    const id = nextCellId++;
    let state: CellState<E, A> = { _tag: "Empty", waiters: new LinkedQueue() };

    const fill = (next: Filled<E, A>): boolean => {
        if (state._tag !== "Empty") return false;

        const waiters = state.waiters.drain();
        state = next;

        emitEvent({ type: "cell.done", cellId: id, outcome: outcomeOf(next), waiters: waiters.length }, services);

        // broadcast: todos ven el mismo estado, en el orden en que llegaron
        for (const w of waiters) w(next);
        return true;
    };

    const awaitFilled = (): Async<unknown, never, Filled<E, A>> =>
        async<unknown, never, Filled<E, A>>((_env, cb) => {
            if (state._tag !== "Empty") {
                cb(Exit.succeed(state));
                return;
            }

            const waiters = state.waiters;
            const node = waiters.push((filled) => cb(Exit.succeed(filled)));

            // si el fiber que espera se interrumpe, sale de la lista
            return () => waiters.remove(node);
        }, `cell.await#${id}`);

    const done = (exit: Exit<E, A>) => asyncTotal(() => fill({ _tag: "Done", exit }));

    return {
        id,

        await: () => asyncFlatMap(awaitFilled(), resolve),

        succeed: (value) => done(Exit.succeed(value)),
        fail: (error) => done(Exit.fail(error)),
        die: (defect) => done(Exit.die(defect)),
        done,

        complete: <R>(producer: Async<R, E, A>) => asyncFlatMap(asyncExit(producer), done),

        completeWith: (producer) => asyncTotal(() => fill({ _tag: "Lazy", effect: producer })),

        isDone: () => asyncTotal(() => state._tag !== "Empty"),

        poll: () =>
            asyncTotal((): Option<Async<unknown, E, A>> => (state._tag === "Empty" ? none : some(resolve(state)))),

        unsafeIsDone: () => state._tag !== "Empty",
        unsafeWaiters: () => (state._tag === "Empty" ? state.waiters.length : 0),
    };
}

/** Crea una celda vacía (como efecto, para que quede atada al runtime que la crea). */
export const makeSyncCell = <E, A>(): Async<unknown, never, SyncCell<E, A>> =>
    asyncTotal(() => unsafeMakeSyncCell<E, A>());
