import { asyncFlatMap, asyncMap, type Async } from "../types/asyncEffect";
import { fork } from "../runtime/runtime";
import { makeRef } from "./ref";
import { unsafeMakeSyncCell, type SyncCell } from "./syncCell";

/**
 * Cache de lookups por clave: una `SyncCell` por clave dentro de un `Ref<Map>`.
 *
 * El primero que pide una clave inserta la celda y arranca el lookup en un fiber
 * propio; el resto espera la misma celda. Como máximo hay un lookup en vuelo por
 * clave. Los errores quedan cacheados igual que los valores hasta `invalidate`.
 */
export type LookupCache<R, K, E, A> = {
    get: (key: K) => Async<R, E, A>;
    /** `true` si había una entrada para `key`. */
    invalidate: (key: K) => Async<unknown, never, boolean>;
    size: () => Async<unknown, never, number>;
};

type Slot<E, A> = { readonly cell: SyncCell<E, A>; readonly owner: boolean };

export function makeLookupCache<R, K, E, A>(
    lookup: (key: K) => Async<R, E, A>
): Async<unknown, never, LookupCache<R, K, E, A>> {
    return asyncMap(makeRef(new Map<K, SyncCell<E, A>>()), (ref): LookupCache<R, K, E, A> => {
        const slotFor = (key: K) =>
            ref.modify((entries): readonly [Slot<E, A>, Map<K, SyncCell<E, A>>] => {
                const existing = entries.get(key);
                if (existing) return [{ cell: existing, owner: false }, entries];

                const cell = unsafeMakeSyncCell<E, A>();
                const next = new Map(entries);
                next.set(key, cell);
                return [{ cell, owner: true }, next];
            });

        return {
            get: (key) =>
                asyncFlatMap(slotFor(key), ({ cell, owner }): Async<R, E, A> =>
                    owner
                        ? // el lookup corre aparte: si este caller se interrumpe, los demás no quedan colgados
                          asyncFlatMap(fork(cell.complete(lookup(key))), () => cell.await())
                        : cell.await()
                ),

            invalidate: (key) =>
                ref.modify((entries): readonly [boolean, Map<K, SyncCell<E, A>>] => {
                    if (!entries.has(key)) return [false, entries];
                    const next = new Map(entries);
                    next.delete(key);
                    return [true, next];
                }),

            size: () => asyncMap(ref.get(), (entries) => entries.size),
        };
    });
}
