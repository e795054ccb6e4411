import type { LogLevel, RuntimeEventRecord } from "./events";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export type LoggerSinkOptions = {
    /** Por debajo de este nivel no se escribe nada (default "info"). */
    minLevel?: LogLevel;
    /** Dónde va cada línea; por default stdout, y stderr para "error". */
    write?: (line: string, level: LogLevel) => void;
};

const defaultWrite = (line: string, level: LogLevel): void => {
    if (level === "error") console.error(line);
    else console.log(line);
};

/** Sink para `EventBus.subscribe`: una línea JSON por cada evento `log`. */
export function consoleJsonLoggerSink(options: LoggerSinkOptions = {}) {
    const min = LEVEL_ORDER[options.minLevel ?? "info"];
    const write = options.write ?? defaultWrite;

    return (ev: RuntimeEventRecord): void => {
        if (ev.type !== "log") return;
        if (LEVEL_ORDER[ev.level] < min) return;

        const out = {
            level: ev.level,
            msg: ev.message,
            wallTs: ev.wallTs,
            fiberId: ev.fiberId,
            traceId: ev.traceId,
            spanId: ev.spanId,
            ...(ev.fields ?? {}),
        };

        write(JSON.stringify(out), ev.level);
    };
}
