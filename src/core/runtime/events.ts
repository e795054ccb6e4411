export type LogLevel = "debug" | "info" | "warn" | "error";

export type RuntimeEvent =
  | {
      type: "fiber.start";
      fiberId: number;
      parentFiberId?: number;
      name?: string;
    }
  | {
      type: "fiber.end";
      fiberId: number;
      status: "success" | "failure" | "interrupted";
      error?: unknown;
    }
  | {
      type: "fiber.suspend";
      fiberId: number;
      reason?: string;
    }
  | {
      type: "fiber.resume";
      fiberId: number;
    }
  | {
      type: "cell.done";
      cellId: number;
      outcome: "success" | "failure" | "defect" | "interrupt" | "lazy";
      waiters: number;
    }
  | {
      type: "queue.shutdown";
      queueId: number;
      releasedTakers: number;
      releasedOfferers: number;
      discarded: number;
    }
  | {
      type: "log";
      level: LogLevel;
      message: string;
      fields?: Record<string, unknown>;
    };

export type RuntimeEmitContext = {
  fiberId?: number;
  traceId?: string;
  spanId?: string;
};

export interface RuntimeHooks {
  emit(ev: RuntimeEvent, ctx: RuntimeEmitContext): void;
}

export type RuntimeEventRecord = RuntimeEvent &
  RuntimeEmitContext & {
    seq: number;
    wallTs: number; // Date.now()
    ts: number; // performance.now(), monotónico
  };

export const noopHooks: RuntimeHooks = {
  emit() {},
};

/** Reparte cada evento a varios hooks (p.ej. EventBus + registry). */
export function combineHooks(...hooks: RuntimeHooks[]): RuntimeHooks {
  return {
    emit(ev, ctx) {
      for (const h of hooks) h.emit(ev, ctx);
    },
  };
}
