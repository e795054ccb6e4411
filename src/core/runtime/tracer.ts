import { randomUUID } from "node:crypto";

export interface Tracer {
    newTraceId(): string;
    newSpanId(): string;
}

export const defaultTracer: Tracer = {
    newTraceId: () => randomUUID(),
    newSpanId: () => randomUUID(),
};

/**
 * Configuración del runtime que viaja dentro del environment, bajo la clave `runtime`.
 * Todo es opcional.
 */
export type RuntimeEnv = {
    runtime?: {
        tracer?: Tracer;
        /** Trace raíz para los fibers sin padre (p.ej. continuar un trace entrante). */
        traceSeed?: { traceId: string; spanId: string; sampled?: boolean };
        childName?: (parentName?: string) => string | undefined;
    };
};

type RuntimeSettings = NonNullable<RuntimeEnv["runtime"]>;

const isTracer = (u: unknown): u is Tracer =>
    typeof u === "object" &&
    u !== null &&
    "newTraceId" in u &&
    "newSpanId" in u &&
    typeof u.newTraceId === "function" &&
    typeof u.newSpanId === "function";

const isTraceSeed = (u: unknown): u is RuntimeSettings["traceSeed"] =>
    typeof u === "object" &&
    u !== null &&
    "traceId" in u &&
    "spanId" in u &&
    typeof u.traceId === "string" &&
    typeof u.spanId === "string";

const isChildName = (u: unknown): u is RuntimeSettings["childName"] => typeof u === "function";

/** Lee `env.runtime` de un environment cualquiera; lo que no tenga la forma esperada se ignora. */
export function readRuntimeEnv(env: unknown): RuntimeSettings {
    if (typeof env !== "object" || env === null || !("runtime" in env)) return {};
    const cfg: unknown = env.runtime;
    if (typeof cfg !== "object" || cfg === null) return {};

    return {
        tracer: "tracer" in cfg && isTracer(cfg.tracer) ? cfg.tracer : undefined,
        traceSeed: "traceSeed" in cfg && isTraceSeed(cfg.traceSeed) ? cfg.traceSeed : undefined,
        childName: "childName" in cfg && isChildName(cfg.childName) ? cfg.childName : undefined,
    };
}
