// src/core/types/asyncEffect.ts
import type { Exit } from "./effect";
import type { Canceler } from "./cancel";

/**
 * Un efecto descripto como dato. El fiber (`RuntimeFiber`) es quien lo interpreta.
 *
 * Los parámetros de las continuaciones se declaran como `never`: el tipo real
 * del valor intermedio queda oculto dentro del nodo y solo el intérprete lo ve.
 */
export type Async<R, E, A> =
    | { readonly _tag: "Succeed"; readonly value: A }
    | { readonly _tag: "Fail"; readonly error: E }
    | { readonly _tag: "Die"; readonly defect: unknown }
    | { readonly _tag: "Sync"; readonly thunk: (env: R) => A; readonly onThrow: "Fail" | "Die" }
    | {
        readonly _tag: "Async";
        readonly register: (env: R, cb: (exit: Exit<E, A>) => void) => void | Canceler;
        readonly label?: string;
    }
    | { readonly _tag: "FlatMap"; readonly first: Async<R, unknown, unknown>; readonly andThen: (a: never) => Async<R, E, A> }
    | {
        readonly _tag: "Fold";
        readonly first: Async<R, unknown, unknown>;
        readonly onFailure: (e: never) => Async<R, E, A>;
        readonly onSuccess: (a: never) => Async<R, E, A>;
    }
    | {
        readonly _tag: "FoldCause";
        readonly first: Async<R, unknown, unknown>;
        readonly onCause: (exit: never) => Async<R, E, A>;
        readonly onSuccess: (a: never) => Async<R, E, A>;
    }
    | { readonly _tag: "Fork"; readonly effect: Async<R, unknown, unknown> };

export const asyncSucceed = <A>(value: A): Async<unknown, never, A> => ({
    _tag: "Succeed",
    value,
});

export const asyncFail = <E>(error: E): Async<unknown, E, never> => ({
    _tag: "Fail",
    error,
});

export const asyncDie = (defect: unknown): Async<unknown, never, never> => ({
    _tag: "Die",
    defect,
});

/** Un throw dentro del thunk termina como `Fail(error)`. */
export const asyncSync = <R, A>(thunk: (env: R) => A): Async<R, unknown, A> => ({
    _tag: "Sync",
    thunk,
    onThrow: "Fail",
});

/** Como `asyncSync`, pero un throw es un defecto (`Die`), no un error tipado. */
export const asyncTotal = <A>(thunk: () => A): Async<unknown, never, A> => ({
    _tag: "Sync",
    thunk: () => thunk(),
    onThrow: "Die",
});

export const unit = (): Async<unknown, never, void> => asyncSucceed<void>(undefined);

export const async = <R, E, A>(
    register: (env: R, cb: (exit: Exit<E, A>) => void) => void | Canceler,
    label?: string
): Async<R, E, A> => ({
    _tag: "Async",
    register,
    label,
});

export const fromExit = <E, A>(exit: Exit<E, A>): Async<unknown, E, A> => {
    if (exit._tag === "Success") return asyncSucceed(exit.value);
    switch (exit.cause._tag) {
        case "Fail":
            return asyncFail(exit.cause.error);
        case "Die":
            return asyncDie(exit.cause.defect);
        case "Interrupt":
            // no hay opcode de interrupción propia: se delega al runtime
            return async<unknown, E, A>((_env, cb) => cb(exit));
    }
};

export function asyncFlatMap<R, E, A, R2, E2, B>(
    fa: Async<R, E, A>,
    f: (a: A) => Async<R2, E2, B>
): Async<R & R2, E | E2, B> {
    return {
        _tag: "FlatMap",
        first: fa,
        andThen: f,
    };
}

export function asyncMap<R, E, A, B>(fa: Async<R, E, A>, f: (a: A) => B): Async<R, E, B> {
    return asyncFlatMap(fa, (a) => asyncSucceed(f(a)));
}

export function asyncAs<R, E, A, B>(fa: Async<R, E, A>, b: B): Async<R, E, B> {
    return asyncMap(fa, () => b);
}

export function asyncFold<R, E, A, R2, E2, B, C = B>(
    fa: Async<R, E, A>,
    onFailure: (e: E) => Async<R2, E2, B>,
    onSuccess: (a: A) => Async<R2, E2, C>
): Async<R & R2, E2, B | C> {
    return { _tag: "Fold", first: fa, onFailure, onSuccess };
}

/**
 * Igual que `asyncFold` pero ve la causa completa: `Fail` y `Die`.
 * La interrupción nunca llega al handler.
 */
export function asyncFoldCause<R, E, A, R2, E2, B, C = B>(
    fa: Async<R, E, A>,
    onCause: (exit: Exit<E, never>) => Async<R2, E2, B>,
    onSuccess: (a: A) => Async<R2, E2, C>
): Async<R & R2, E2, B | C> {
    return { _tag: "FoldCause", first: fa, onCause, onSuccess };
}

export function asyncCatchAll<R, E, A, R2, E2, B>(
    fa: Async<R, E, A>,
    handler: (e: E) => Async<R2, E2, B>
): Async<R & R2, E2, A | B> {
    return asyncFold<R, E, A, R2, E2, B, A>(fa, handler, (a: A) => asyncSucceed(a));
}

export function asyncMapError<R, E, E2, A>(fa: Async<R, E, A>, f: (e: E) => E2): Async<R, E2, A> {
    return asyncFold<R, E, A, unknown, E2, never, A>(
        fa,
        (e: E) => asyncFail(f(e)),
        (a: A) => asyncSucceed(a)
    );
}

/** Reifica el resultado: nunca falla, devuelve el `Exit` (salvo interrupción). */
export function asyncExit<R, E, A>(fa: Async<R, E, A>): Async<R, never, Exit<E, A>> {
    return asyncFoldCause<R, E, A, unknown, never, Exit<E, A>>(
        fa,
        (exit: Exit<E, never>) => asyncSucceed<Exit<E, A>>(exit),
        (value: A) => asyncSucceed<Exit<E, A>>({ _tag: "Success", value })
    );
}

/** Corre los efectos en orden, uno detrás del otro. */
export function asyncForEach<R, E, A, B>(
    as: ReadonlyArray<A>,
    f: (a: A, index: number) => Async<R, E, B>
): Async<R, E, B[]> {
    const loop = (i: number, out: B[]): Async<R, E, B[]> =>
        i >= as.length
            ? asyncSucceed(out)
            : asyncFlatMap(f(as[i], i), (b) => {
                out.push(b);
                return loop(i + 1, out);
            });
    // el acumulador se crea por ejecución, no por construcción
    return asyncFlatMap(unit(), () => loop(0, []));
}
