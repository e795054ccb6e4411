import { asyncTotal, type Async } from "../types/asyncEffect";

/**
 * Referencia mutable compartida entre fibers. Cada operación corre como un
 * único paso sincrónico del fiber, así que `modify` es atómico: nadie ve un
 * estado intermedio entre la lectura y la escritura.
 */
export type Ref<A> = {
    get: () => Async<unknown, never, A>;
    set: (a: A) => Async<unknown, never, void>;
    update: (f: (a: A) => A) => Async<unknown, never, void>;
    updateAndGet: (f: (a: A) => A) => Async<unknown, never, A>;
    getAndUpdate: (f: (a: A) => A) => Async<unknown, never, A>;
    /** Calcula un resultado y el próximo valor en la misma sección crítica. */
    modify: <B>(f: (a: A) => readonly [B, A]) => Async<unknown, never, B>;
    unsafeGet: () => A;
};

export function unsafeMakeRef<A>(initial: A): Ref<A> {
    let value = initial;

    const modify = <B>(f: (a: A) => readonly [B, A]): Async<unknown, never, B> =>
        asyncTotal(() => {
            const [b, next] = f(value);
            value = next;
            return b;
        });

    return {
        get: () => asyncTotal(() => value),
        set: (a) =>
            asyncTotal(() => {
                value = a;
            }),
        update: (f) =>
            asyncTotal(() => {
                value = f(value);
            }),
        updateAndGet: (f) => modify((a) => {
            const next = f(a);
            return [next, next] as const;
        }),
        getAndUpdate: (f) => modify((a) => [a, f(a)] as const),
        modify,
        unsafeGet: () => value,
    };
}

export const makeRef = <A>(initial: A): Async<unknown, never, Ref<A>> => asyncTotal(() => unsafeMakeRef(initial));
