export type JSONValue = null | boolean | number | string | JSONValue[] | { [k: string]: JSONValue };

/** Campos que se agregan a cada log del fiber. Inmutable: los hijos comparten la referencia del padre. */
export type LogAnnotations = Readonly<Record<string, JSONValue>>;

export const noAnnotations: LogAnnotations = Object.freeze({});

/** Devuelve un nuevo juego de anotaciones; en claves repetidas gana `patch`. */
export const annotate = (base: LogAnnotations, patch: Record<string, JSONValue>): LogAnnotations =>
    Object.freeze({ ...base, ...patch });

export type TraceContext = {
    readonly traceId: string;
    readonly spanId: string;
    readonly parentSpanId?: string;
    readonly sampled?: boolean;
};

/** Lo que cada fiber lleva consigo y hereda al forkear. */
export type FiberContext = {
    readonly log: LogAnnotations;
    readonly trace: TraceContext | null;
};

export const rootFiberContext: FiberContext = { log: noAnnotations, trace: null };
