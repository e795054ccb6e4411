import { async, asyncTotal, type Async } from "../types/asyncEffect";
import { globalScheduler, type Scheduler } from "./scheduler";
import { DEFAULT_BUDGET, getCurrentFiber, RuntimeFiber, type Fiber, type RuntimeServices } from "./fiber";
import { Exit, FiberFailure } from "../types/effect";
import type { Canceler } from "../types/cancel";
import { noopHooks, type LogLevel, type RuntimeEmitContext, type RuntimeEvent, type RuntimeHooks } from "./events";
import { annotate, type JSONValue } from "./context";
import { makeForkPolicy, type ForkPolicy } from "./forkPolicy";

export type RuntimeConfig<R> = {
    env: R;
    scheduler?: Scheduler;
    hooks?: RuntimeHooks;
    /** Opcodes sync por step antes de ceder (default 1024). */
    budget?: number;
};

/**
 * --- Runtime como objeto único (ZIO-style) ---
 * Un valor que representa "cómo" se ejecutan los efectos: scheduler + environment + hooks.
 */
export class Runtime<R> implements RuntimeServices {
    readonly env: R;
    readonly scheduler: Scheduler;
    readonly hooks: RuntimeHooks;
    readonly budget: number;
    private readonly forkPolicy: ForkPolicy;

    constructor(config: RuntimeConfig<R>) {
        this.env = config.env;
        this.scheduler = config.scheduler ?? globalScheduler;
        this.hooks = config.hooks ?? noopHooks;
        this.budget = config.budget ?? DEFAULT_BUDGET;
        if (!Number.isInteger(this.budget) || this.budget < 1) {
            throw new RangeError(`Runtime budget must be a positive integer, got ${this.budget}`);
        }
        this.forkPolicy = makeForkPolicy(this.env, this.hooks);
    }

    fork<E, A>(effect: Async<R, E, A>): RuntimeFiber<R, E, A> {
        const fiber = new RuntimeFiber(this, effect);

        this.forkPolicy.initChild(fiber, getCurrentFiber());

        fiber.schedule("initial-step");
        return fiber;
    }

    unsafeRunAsync<E, A>(effect: Async<R, E, A>, cb: (exit: Exit<E, A>) => void): void {
        this.fork(effect).join(cb);
    }

    /** Resuelve con el valor; rechaza con `FiberFailure` (fail, die o interrupt). */
    toPromise<E, A>(effect: Async<R, E, A>): Promise<A> {
        return new Promise((resolve, reject) => {
            this.fork(effect).join((exit) => {
                if (exit._tag === "Success") resolve(exit.value);
                else reject(new FiberFailure(exit.cause));
            });
        });
    }

    /** Nunca rechaza: resuelve con el `Exit` completo. */
    toPromiseExit<E, A>(effect: Async<R, E, A>): Promise<Exit<E, A>> {
        return new Promise((resolve) => {
            this.fork(effect).join(resolve);
        });
    }

    log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
        const f = getCurrentFiber();
        const annotations = f?.fiberContext.log;
        const merged = annotations && Object.keys(annotations).length > 0 ? { ...annotations, ...fields } : fields;
        this.emit({ type: "log", level, message, fields: merged });
    }

    emit(ev: RuntimeEvent): void {
        const f = getCurrentFiber();

        const ctx: RuntimeEmitContext = {
            fiberId: f?.id,
            traceId: f?.fiberContext.trace?.traceId,
            spanId: f?.fiberContext.trace?.spanId,
        };

        this.hooks.emit(ev, ctx);
    }
}

/**
 * ---------------------------------------------------------------------------
 * Efectos que hablan con el fiber / runtime actual
 * ---------------------------------------------------------------------------
 */

/** Arranca `effect` en un fiber hijo, en el mismo runtime que el padre. */
export const fork = <R, E, A>(effect: Async<R, E, A>): Async<R, never, Fiber<E, A>> => ({
    _tag: "Fork",
    effect,
});

/** Espera a que termine el fiber y adopta su resultado (interrupción incluida). */
export const join = <E, A>(fiber: Fiber<E, A>): Async<unknown, E, A> =>
    async<unknown, E, A>((_env, cb) => {
        fiber.join(cb);
    }, `fiber.join#${fiber.id}`);

/** Interrumpe y espera a que el fiber termine. */
export const interruptFiber = <E, A>(fiber: Fiber<E, A>): Async<unknown, never, Exit<E, A>> =>
    async<unknown, never, Exit<E, A>>((_env, cb) => {
        fiber.interrupt();
        fiber.join((exit) => cb(Exit.succeed(exit)));
    }, `fiber.interrupt#${fiber.id}`);

export const sleep = (ms: number): Async<unknown, never, void> =>
    async<unknown, never, void>((_env, cb): Canceler => {
        const id = setTimeout(() => cb(Exit.succeed(undefined)), ms);
        return () => clearTimeout(id);
    }, `sleep(${ms})`);

/** Cede el turno: el fiber vuelve a la cola del scheduler detrás de los demás. */
export const yieldNow = (): Async<unknown, never, void> =>
    async<unknown, never, void>((_env, cb) => {
        const scheduler = getCurrentFiber()?.services.scheduler ?? globalScheduler;
        scheduler.schedule(() => cb(Exit.succeed(undefined)), "yield");
    }, "yield");

export function fromPromise<R, E, A>(thunk: (env: R) => Promise<A>, onError: (e: unknown) => E): Async<R, E, A> {
    return async((env: R, cb: (exit: Exit<E, A>) => void) => {
        let p: Promise<A>;
        try {
            p = thunk(env);
        } catch (e) {
            cb(Exit.fail(onError(e)));
            return;
        }
        p.then(
            (value) => cb(Exit.succeed(value)),
            (err: unknown) => cb(Exit.fail(onError(err)))
        );
    }, "promise");
}

/** Loggea a través de los hooks del runtime que corre el fiber actual. */
export const logEffect = (
    level: LogLevel,
    message: string,
    fields?: Record<string, unknown>
): Async<unknown, never, void> =>
    asyncTotal(() => {
        getCurrentFiber()?.services.log(level, message, fields);
    });

/** Agrega campos al contexto de log del fiber actual (los hijos los heredan al forkear). */
export const annotateLogs = (patch: Record<string, JSONValue>): Async<unknown, never, void> =>
    asyncTotal(() => {
        const f = getCurrentFiber();
        if (f) f.fiberContext = { ...f.fiberContext, log: annotate(f.fiberContext.log, patch) };
    });

/**
 * Emite un evento del runtime con el contexto del fiber actual.
 * Fuera de un fiber usa `fallback` (p.ej. los servicios capturados al crear una queue), o no hace nada.
 */
export function emitEvent(ev: RuntimeEvent, fallback?: RuntimeServices): void {
    const f = getCurrentFiber();
    if (f) {
        f.services.hooks.emit(ev, {
            fiberId: f.id,
            traceId: f.fiberContext.trace?.traceId,
            spanId: f.fiberContext.trace?.spanId,
        });
        return;
    }
    fallback?.hooks.emit(ev, {});
}

/** Los servicios del runtime que corre el fiber actual, si hay uno. */
export const currentServices = (): RuntimeServices | undefined => getCurrentFiber()?.services;
