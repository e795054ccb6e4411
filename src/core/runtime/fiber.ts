// src/core/runtime/fiber.ts
import { Cause, Exit } from "../types/effect";
import type { Async } from "../types/asyncEffect";
import type { Canceler } from "../types/cancel";
import type { Runtime } from "./runtime";
import { rootFiberContext, type FiberContext } from "./context";
import type { LogLevel, RuntimeEvent, RuntimeHooks } from "./events";
import type { ForkTarget } from "./forkPolicy";
import type { Scheduler } from "./scheduler";

export type FiberId = number;
export type FiberStatus = "Running" | "Done" | "Interrupted";

type StepDecision = "Continue" | "Suspend" | "Done";
export type RunState = "Queued" | "Running" | "Suspended" | "Done";

type AnyAsync<R> = Async<R, unknown, unknown>;
type Cont<R> = (a: unknown) => AnyAsync<R>;

type Frame<R> =
    | { readonly _tag: "SuccessCont"; readonly k: Cont<R> }
    | { readonly _tag: "FoldCont"; readonly onFailure: Cont<R>; readonly onSuccess: Cont<R> }
    | { readonly _tag: "FoldCauseCont"; readonly onCause: (exit: Exit<unknown, never>) => AnyAsync<R>; readonly onSuccess: Cont<R> };

export type FiberFinalizer<R, E, A> = (exit: Exit<E, A>) => void | Async<R, unknown, unknown>;

/** Lo que un fiber en ejecución expone del runtime que lo corre (sin el tipo del env). */
export interface RuntimeServices {
    readonly hooks: RuntimeHooks;
    readonly scheduler: Scheduler;
    log(level: LogLevel, message: string, fields?: Record<string, unknown>): void;
}

export interface CurrentFiber extends ForkTarget {
    readonly services: RuntimeServices;
}

let _current: CurrentFiber | null = null;

const STEP = {
    CONTINUE: "Continue",
    SUSPEND: "Suspend",
    DONE: "Done",
} as const satisfies Record<string, StepDecision>;

const RUN = {
    QUEUED: "Queued",
    RUNNING: "Running",
    SUSPENDED: "Suspended",
    DONE: "Done",
} as const satisfies Record<string, RunState>;

export type Fiber<E, A> = {
    readonly id: FiberId;
    readonly status: () => FiberStatus;
    readonly join: (cb: (exit: Exit<E, A>) => void) => void;
    readonly interrupt: () => void;
};

let nextId: FiberId = 1;

// cuántos opcodes sync procesa un step antes de ceder el scheduler
export const DEFAULT_BUDGET = 1024;

// las continuaciones se guardan con el parámetro oculto (`never`); acá se recupera
const asCont = <R>(f: (a: never) => AnyAsync<R>): Cont<R> => f as Cont<R>;

// evita que un flatMap "left-associated" empuje N frames antes de correr
function reassociateFlatMap<R>(cur: AnyAsync<R>): AnyAsync<R> {
    let current = cur;

    while (current._tag === "FlatMap" && current.first._tag === "FlatMap") {
        const inner = current.first;
        const f = asCont(inner.andThen);
        const g = asCont(current.andThen);

        current = {
            _tag: "FlatMap",
            first: inner.first,
            andThen: (a: unknown): AnyAsync<R> => ({
                _tag: "FlatMap",
                first: f(a),
                andThen: g,
            }),
        };
    }

    return current;
}

export class RuntimeFiber<R, E, A> implements Fiber<E, A>, CurrentFiber {
    readonly id: FiberId;

    // 👇 el runtime vive en el fiber (env, hooks, scheduler)
    readonly runtime: Runtime<R>;

    private runState: RunState = RUN.RUNNING;

    private interrupted = false;
    // un callback async ya entregó su resultado: se consume antes de atender la interrupción
    private delivered = false;
    private result: Exit<E, A> | null = null;

    private readonly joiners: Array<(exit: Exit<E, A>) => void> = [];

    // estado de evaluación
    private current: AnyAsync<R>;
    private readonly stack: Frame<R>[] = [];

    // canceler de la operación en la que está suspendido (si hay)
    private pendingCanceler: Canceler | null = null;
    private suspendedOn: string | undefined;

    private readonly fiberFinalizers: Array<FiberFinalizer<R, E, A>> = [];

    fiberContext: FiberContext = rootFiberContext;
    name?: string;
    parentFiberId?: FiberId;

    constructor(runtime: Runtime<R>, effect: Async<R, E, A>) {
        this.id = nextId++;
        this.runtime = runtime;
        this.current = effect;
    }

    private get env(): R {
        return this.runtime.env;
    }

    get services(): RuntimeServices {
        return this.runtime;
    }

    private emit(ev: RuntimeEvent): void {
        // con el ctx del propio fiber: en callbacks async no hay "current fiber"
        this.runtime.hooks.emit(ev, {
            fiberId: this.id,
            traceId: this.fiberContext.trace?.traceId,
            spanId: this.fiberContext.trace?.spanId,
        });
    }

    /** Qué está esperando el fiber ahora mismo (label del `Async`), si está suspendido. */
    get awaiting(): string | undefined {
        return this.runState === RUN.SUSPENDED ? this.suspendedOn : undefined;
    }

    get state(): RunState {
        return this.runState;
    }

    addFinalizer(f: FiberFinalizer<R, E, A>): void {
        if (this.result != null) {
            this.runFinalizer(f, this.result);
            return;
        }
        this.fiberFinalizers.push(f);
    }

    status(): FiberStatus {
        if (this.result == null) return "Running";
        if (this.result._tag === "Failure" && this.result.cause._tag === "Interrupt") return "Interrupted";
        return "Done";
    }

    /** El `Exit` final, o `null` si todavía corre. */
    poll(): Exit<E, A> | null {
        return this.result;
    }

    join(cb: (exit: Exit<E, A>) => void): void {
        if (this.result != null) cb(this.result);
        else this.joiners.push(cb);
    }

    interrupt(): void {
        if (this.result != null) return;
        if (this.interrupted) return;
        this.interrupted = true;

        // si estaba bloqueado, sale de la wait-list de inmediato
        this.cancelPending();
        this.schedule("interrupt-step");
    }

    schedule(tag: string = "step"): void {
        // ya terminó o ya está en cola: no hacer nada
        if (this.runState === RUN.DONE || this.runState === RUN.QUEUED) return;

        if (this.runState === RUN.SUSPENDED) {
            this.emit({ type: "fiber.resume", fiberId: this.id });
        }

        this.runState = RUN.QUEUED;

        this.runtime.scheduler.schedule(
            () => {
                withCurrentFiber(this, () => {
                    if (this.runState === RUN.DONE) return;
                    this.runState = RUN.RUNNING;

                    const decision = this.step();

                    switch (decision) {
                        case STEP.CONTINUE:
                            this.schedule("continue");
                            return;

                        case STEP.SUSPEND:
                            this.runState = RUN.SUSPENDED;
                            this.emit({ type: "fiber.suspend", fiberId: this.id, reason: this.suspendedOn });
                            return;

                        case STEP.DONE:
                            this.runState = RUN.DONE;
                            return;
                    }
                });
            },
            `fiber#${this.id}.${tag}`
        );
    }

    private cancelPending(): void {
        const c = this.pendingCanceler;
        this.pendingCanceler = null;
        if (!c) return;
        try {
            c();
        } catch (e) {
            this.runtime.log("error", "fiber.canceler.failed", { fiberId: this.id, error: String(e) });
        }
    }

    private runFinalizer(fin: FiberFinalizer<R, E, A>, exit: Exit<E, A>): void {
        try {
            const eff = fin(exit);
            // si devolvió un Async, corre en su propio fiber
            if (eff !== undefined) this.runtime.fork(eff);
        } catch (e) {
            // un finalizer nunca tumba el fiber: se reporta y se sigue
            this.runtime.log("error", "fiber.finalizer.failed", { fiberId: this.id, error: String(e) });
        }
    }

    private notify(exit: Exit<unknown, unknown>): void {
        if (this.result != null) return;

        this.cancelPending();

        // el valor final es un A por construcción; el tipo se perdió al pasar por el stack
        const final = exit as Exit<E, A>;
        this.result = final;
        this.runState = RUN.DONE;

        // finalizers en LIFO
        while (this.fiberFinalizers.length > 0) {
            const fin = this.fiberFinalizers.pop();
            if (fin) this.runFinalizer(fin, final);
        }

        const status =
            exit._tag === "Success"
                ? "success"
                : exit.cause._tag === "Interrupt"
                    ? "interrupted"
                    : "failure";

        this.emit({
            type: "fiber.end",
            fiberId: this.id,
            status,
            error: exit._tag === "Failure" ? exit.cause : undefined,
        });

        const joiners = this.joiners.splice(0, this.joiners.length);
        for (const j of joiners) j(final);
    }

    private onSuccess(value: unknown): void {
        const frame = this.stack.pop();
        if (!frame) {
            this.notify(Exit.succeed(value));
            return;
        }

        const k = frame._tag === "SuccessCont" ? frame.k : frame.onSuccess;
        try {
            this.current = k(value);
        } catch (e) {
            // un throw dentro de una continuación es un defecto
            this.onDie(e);
        }
    }

    private onFailure(error: unknown): void {
        while (this.stack.length > 0) {
            const fr = this.stack.pop();
            if (!fr || fr._tag === "SuccessCont") continue;

            try {
                this.current =
                    fr._tag === "FoldCont" ? fr.onFailure(error) : fr.onCause(Exit.fail(error));
            } catch (e) {
                this.onDie(e);
            }
            return;
        }

        this.notify(Exit.fail(error));
    }

    private onDie(defect: unknown): void {
        // solo FoldCause ve los defectos
        while (this.stack.length > 0) {
            const fr = this.stack.pop();
            if (!fr || fr._tag !== "FoldCauseCont") continue;

            try {
                this.current = fr.onCause(Exit.die(defect));
                return;
            } catch (e) {
                defect = e;
            }
        }

        this.notify(Exit.die(defect));
    }

    private resumeFrom(exit: Exit<unknown, unknown>): void {
        if (exit._tag === "Success") {
            this.current = { _tag: "Succeed", value: exit.value };
            return;
        }
        switch (exit.cause._tag) {
            case "Fail":
                this.current = { _tag: "Fail", error: exit.cause.error };
                return;
            case "Die":
                this.current = { _tag: "Die", defect: exit.cause.defect };
                return;
            case "Interrupt":
                this.interrupted = true;
                return;
        }
    }

    private step(): StepDecision {
        if (this.result != null) return STEP.DONE;

        let budget = this.runtime.budget;

        while (budget-- > 0) {
            const delivered = this.delivered;
            this.delivered = false;

            // interrupción cooperativa
            if (this.interrupted && !delivered) {
                this.notify(Exit.failCause(Cause.interrupt()));
                return STEP.DONE;
            }

            this.current = reassociateFlatMap(this.current);

            const current = this.current;

            switch (current._tag) {
                case "Succeed": {
                    this.onSuccess(current.value);
                    break;
                }

                case "Fail": {
                    this.onFailure(current.error);
                    break;
                }

                case "Die": {
                    this.onDie(current.defect);
                    break;
                }

                case "FlatMap": {
                    this.stack.push({ _tag: "SuccessCont", k: asCont(current.andThen) });
                    this.current = current.first;
                    break;
                }

                case "Fold": {
                    this.stack.push({
                        _tag: "FoldCont",
                        onFailure: asCont(current.onFailure),
                        onSuccess: asCont(current.onSuccess),
                    });
                    this.current = current.first;
                    break;
                }

                case "FoldCause": {
                    this.stack.push({
                        _tag: "FoldCauseCont",
                        onCause: asCont(current.onCause),
                        onSuccess: asCont(current.onSuccess),
                    });
                    this.current = current.first;
                    break;
                }

                case "Sync": {
                    let a: unknown;
                    try {
                        a = current.thunk(this.env);
                    } catch (e) {
                        if (current.onThrow === "Die") this.onDie(e);
                        else this.onFailure(e);
                        break;
                    }
                    this.onSuccess(a);
                    break;
                }

                case "Async": {
                    // el callback puede llegar sincrónico (dentro de register) o más tarde
                    const sync: { exit: Exit<unknown, unknown> | null } = { exit: null };
                    let registering = true;
                    let done = false;

                    const cb = (exit: Exit<unknown, unknown>) => {
                        if (done) return;
                        done = true;

                        if (registering) {
                            sync.exit = exit;
                            return;
                        }

                        this.pendingCanceler = null;
                        if (this.result != null) return;

                        this.delivered = !(exit._tag === "Failure" && exit.cause._tag === "Interrupt");
                        this.resumeFrom(exit);
                        this.schedule("async-resume");
                    };

                    let canceler: void | Canceler;
                    try {
                        canceler = current.register(this.env, cb);
                    } catch (e) {
                        done = true;
                        registering = false;
                        this.onDie(e);
                        break;
                    }
                    registering = false;

                    if (sync.exit != null) {
                        this.resumeFrom(sync.exit);
                        break;
                    }

                    if (typeof canceler === "function") {
                        const cancel = canceler;
                        this.pendingCanceler = () => {
                            done = true;
                            cancel();
                        };
                    }
                    this.suspendedOn = current.label;
                    return STEP.SUSPEND;
                }

                case "Fork": {
                    const child = this.runtime.fork(current.effect);
                    this.onSuccess(child);
                    break;
                }
            }

            if (this.result != null) return STEP.DONE;
        }

        return STEP.CONTINUE;
    }
}

export function getCurrentFiber(): CurrentFiber | null {
    return _current;
}

export function withCurrentFiber<T>(fiber: CurrentFiber, f: () => T): T {
    const prev = _current;
    _current = fiber;
    try {
        return f();
    } finally {
        _current = prev;
    }
}
