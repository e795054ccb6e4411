import { noAnnotations, type FiberContext, type TraceContext } from "./context";
import type { RuntimeHooks } from "./events";
import { defaultTracer, readRuntimeEnv, type Tracer } from "./tracer";

type ForkServices = {
    tracer: Tracer;
    seed?: TraceContext;
    childName: (parentName?: string) => string | undefined;
};

/** Lo mínimo que la política necesita ver de un fiber. */
export interface ForkTarget {
    readonly id: number;
    fiberContext: FiberContext;
    name?: string;
    parentFiberId?: number;
}

export type ForkPolicy = {
    initChild(fiber: ForkTarget, parent: ForkTarget | null): void;
};

export function makeForkPolicy<R>(env: R, hooks: RuntimeHooks): ForkPolicy {
    const svc = resolveForkServices(env);

    return {
        initChild(fiber, parent) {
            const parentCtx: FiberContext | undefined = parent?.fiberContext;

            // 1) context (log + trace): el hijo hereda el log del padre y abre un span propio
            fiber.fiberContext = {
                log: parentCtx?.log ?? noAnnotations,
                trace: forkTrace(svc, parentCtx?.trace ?? null),
            };

            // 2) meta liviana
            fiber.parentFiberId = parent?.id;
            fiber.name = svc.childName(parent?.name);

            hooks.emit(
                {
                    type: "fiber.start",
                    fiberId: fiber.id,
                    parentFiberId: parent?.id,
                    name: fiber.name,
                },
                {
                    fiberId: fiber.id,
                    traceId: fiber.fiberContext.trace?.traceId,
                    spanId: fiber.fiberContext.trace?.spanId,
                }
            );
        },
    };
}

function resolveForkServices(env: unknown): ForkServices {
    const cfg = readRuntimeEnv(env);

    return {
        tracer: cfg.tracer ?? defaultTracer,
        seed: cfg.traceSeed,
        childName: cfg.childName ?? ((p?: string) => (p ? `${p}/child` : undefined)),
    };
}

function forkTrace(svc: ForkServices, parentTrace: TraceContext | null): TraceContext {
    if (parentTrace) {
        return {
            traceId: parentTrace.traceId,
            spanId: svc.tracer.newSpanId(),
            parentSpanId: parentTrace.spanId,
            sampled: parentTrace.sampled,
        };
    }
    if (svc.seed) return { ...svc.seed };
    return { traceId: svc.tracer.newTraceId(), spanId: svc.tracer.newSpanId(), sampled: true };
}
