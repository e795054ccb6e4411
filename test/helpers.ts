import { Runtime } from "../src/core/runtime/runtime";
import { EventBus } from "../src/core/runtime/eventBus";
import type { RuntimeEventRecord } from "../src/core/runtime/events";

export const makeRuntime = (): Runtime<{}> => new Runtime({ env: {} });

/** Runtime con un EventBus que solo se drena a mano, y los eventos recolectados. */
export function makeObservedRuntime(): { rt: Runtime<{}>; bus: EventBus; events: RuntimeEventRecord[] } {
    const bus = new EventBus({ autoFlush: false });
    const events: RuntimeEventRecord[] = [];
    bus.subscribe((ev) => events.push(ev));
    return { rt: new Runtime({ env: {}, hooks: bus }), bus, events };
}

export const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));
