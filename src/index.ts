// core types
export * from "./core/types/effect";
export * from "./core/types/asyncEffect";
export * from "./core/types/option";
export type { Canceler } from "./core/types/cancel";

// runtime
export * from "./core/runtime/runtime";
export {
    RuntimeFiber,
    getCurrentFiber,
    type Fiber,
    type FiberId,
    type FiberStatus,
    type RuntimeServices,
} from "./core/runtime/fiber";
export { Scheduler, globalScheduler, type SchedulerOptions } from "./core/runtime/scheduler";
export * from "./core/runtime/events";
export { EventBus, type EventHandler, type EventBusOptions } from "./core/runtime/eventBus";
export { consoleJsonLoggerSink, type LoggerSinkOptions } from "./core/runtime/loggerSink";
export { RuntimeRegistry, type FiberInfo } from "./core/runtime/registry";
export { dumpAllFibers } from "./core/runtime/dump";
export { defaultTracer, type Tracer, type RuntimeEnv } from "./core/runtime/tracer";
export type { TraceContext, FiberContext, JSONValue, LogAnnotations } from "./core/runtime/context";

// primitives
export * from "./core/sync/syncCell";
export * from "./core/sync/ref";
export * from "./core/sync/lookupCache";
export * from "./core/stream/queue";
