import type { Async } from "./asyncEffect";
import {
    asyncCatchAll,
    asyncDie,
    asyncFail,
    asyncFlatMap,
    asyncMap,
    asyncMapError,
    asyncSucceed,
    asyncSync,
    asyncTotal,
} from "./asyncEffect";

/**
 * Por qué terminó mal un efecto.
 *
 * - `Fail`: error tipado, recuperable (`catchAll` lo ve).
 * - `Die`: defecto, no recuperable por el canal tipado.
 * - `Interrupt`: el fiber fue interrumpido.
 */
export type Cause<E> =
    | { readonly _tag: "Fail"; readonly error: E }
    | { readonly _tag: "Interrupt" }
    | { readonly _tag: "Die"; readonly defect: unknown };

export const Cause = {
    fail: <E>(error: E): Cause<E> => ({ _tag: "Fail", error }),
    interrupt: <E = never>(): Cause<E> => ({ _tag: "Interrupt" }),
    die: <E = never>(defect: unknown): Cause<E> => ({ _tag: "Die", defect }),
};

export type Exit<E, A> =
    | { readonly _tag: "Success"; readonly value: A }
    | { readonly _tag: "Failure"; readonly cause: Cause<E> };

export const Exit = {
    succeed: <E = never, A = never>(value: A): Exit<E, A> => ({
        _tag: "Success",
        value,
    }),

    fail: <E, A = never>(error: E): Exit<E, A> => ({
        _tag: "Failure",
        cause: Cause.fail(error),
    }),

    die: <E = never, A = never>(defect: unknown): Exit<E, A> => ({
        _tag: "Failure",
        cause: Cause.die(defect),
    }),

    interrupt: <E = never, A = never>(): Exit<E, A> => ({
        _tag: "Failure",
        cause: Cause.interrupt(),
    }),

    failCause: <E = never, A = never>(cause: Cause<E>): Exit<E, A> => ({
        _tag: "Failure",
        cause,
    }),

    isSuccess: <E, A>(exit: Exit<E, A>): exit is { readonly _tag: "Success"; readonly value: A } =>
        exit._tag === "Success",
};

export function prettyCause<E>(cause: Cause<E>): string {
    switch (cause._tag) {
        case "Fail":
            return `Fail(${describe(cause.error)})`;
        case "Die":
            return `Die(${describe(cause.defect)})`;
        case "Interrupt":
            return "Interrupt";
    }
}

function describe(u: unknown): string {
    if (u instanceof Error) return `${u.name}: ${u.message}`;
    if (typeof u === "string") return u;
    try {
        return JSON.stringify(u) ?? String(u);
    } catch {
        return String(u);
    }
}

/**
 * Lo que rechaza `toPromise` cuando el fiber no terminó en `Success`.
 * Conserva el `Cause` original para poder distinguir fail / die / interrupt.
 */
export class FiberFailure<E = unknown> extends Error {
    readonly _tag = "FiberFailure";

    constructor(readonly cause: Cause<E>) {
        super(prettyCause(cause));
        this.name = "FiberFailure";
    }
}

export type ZIO<R, E, A> = Async<R, E, A>;

export const succeed = <A>(value: A): ZIO<unknown, never, A> => asyncSucceed(value);
export const fail = <E>(error: E): ZIO<unknown, E, never> => asyncFail(error);
export const die = (defect: unknown): ZIO<unknown, never, never> => asyncDie(defect);

export const sync = <R, A>(thunk: (env: R) => A): ZIO<R, unknown, A> => asyncSync(thunk);
export const total = <A>(thunk: () => A): ZIO<unknown, never, A> => asyncTotal(thunk);

export const map = <R, E, A, B>(fa: ZIO<R, E, A>, f: (a: A) => B): ZIO<R, E, B> => asyncMap(fa, f);

export const flatMap = <R, E, A, R2, E2, B>(
    fa: ZIO<R, E, A>,
    f: (a: A) => ZIO<R2, E2, B>
): ZIO<R & R2, E | E2, B> => asyncFlatMap(fa, f);

export const mapError = <R, E, E2, A>(fa: ZIO<R, E, A>, f: (e: E) => E2): ZIO<R, E2, A> =>
    asyncMapError(fa, f);

export const catchAll = <R, E, A, R2, E2, B>(
    fa: ZIO<R, E, A>,
    handler: (e: E) => ZIO<R2, E2, B>
): ZIO<R & R2, E2, A | B> => asyncCatchAll(fa, handler);
