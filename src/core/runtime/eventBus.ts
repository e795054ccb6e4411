import { PushStatus, RingBuffer } from "./ringBuffer";
import type { RuntimeEmitContext, RuntimeEvent, RuntimeEventRecord, RuntimeHooks } from "./events";

export type EventHandler = (ev: RuntimeEventRecord) => void;

type Subscriber = {
  handler: EventHandler;
  // cola por subscriber (para aislar sinks lentos)
  q: RingBuffer<RuntimeEventRecord>;
  dropped: number;
};

export type EventBusOptions = {
  /** Un handler que tira no corta el flush; el error termina acá. */
  onHandlerError?: (error: unknown, ev: RuntimeEventRecord) => void;
  /** Drena con `queueMicrotask` (default) o solo a mano con `flush()`. */
  autoFlush?: boolean;
};

const now = (): number => (typeof performance !== "undefined" ? performance.now() : Date.now());

export class EventBus implements RuntimeHooks {
  private seq = 1;
  private subs: Subscriber[] = [];
  private flushScheduled = false;
  private readonly onHandlerError: (error: unknown, ev: RuntimeEventRecord) => void;
  private readonly autoFlush: boolean;

  constructor(options: EventBusOptions = {}) {
    this.onHandlerError =
      options.onHandlerError ?? ((error, ev) => console.error(`[eventbus] handler failed on ${ev.type}`, error));
    this.autoFlush = options.autoFlush ?? true;
  }

  emit(ev: RuntimeEvent, ctx: RuntimeEmitContext): void {
    const full: RuntimeEventRecord = {
      ...ev,
      ...ctx,
      seq: this.seq++,
      ts: now(),
      wallTs: Date.now(),
    };

    for (const s of this.subs) {
      const st = s.q.push(full);
      if (st & PushStatus.Dropped) s.dropped++;
    }

    // drenar asap (microtask) sin bloquear emit
    if (this.autoFlush && !this.flushScheduled) {
      this.flushScheduled = true;
      queueMicrotask(() => this.flush());
    }
  }

  subscribe(handler: EventHandler, perSubscriberCapacity = 2048): () => void {
    this.subs.push({
      handler,
      q: new RingBuffer<RuntimeEventRecord>(perSubscriberCapacity, perSubscriberCapacity),
      dropped: 0,
    });

    return () => {
      this.subs = this.subs.filter((s) => s.handler !== handler);
    };
  }

  flush(budget = 4096): void {
    this.flushScheduled = false;

    for (const s of this.subs) {
      let n = 0;

      if (s.dropped > 0) {
        // avisar el drop como un log más
        const dropEv: RuntimeEventRecord = {
          seq: 0,
          ts: now(),
          wallTs: Date.now(),
          type: "log",
          level: "warn",
          message: "eventbus.dropped",
          fields: { dropped: s.dropped },
        };

        this.deliver(s, dropEv);
        s.dropped = 0;
      }

      while (n++ < budget) {
        if (s.q.isEmpty()) break;
        this.deliver(s, s.q.shiftOne());
      }
    }
  }

  private deliver(s: Subscriber, ev: RuntimeEventRecord): void {
    try {
      s.handler(ev);
    } catch (e) {
      this.onHandlerError(e, ev);
    }
  }
}
