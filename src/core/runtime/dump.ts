import type { RuntimeRegistry } from "./registry";

/** Texto legible con el estado de los fibers y los últimos eventos. */
export function dumpAllFibers(reg: RuntimeRegistry, recent = 80): string {
    const fibers = Array.from(reg.fibers.values());
    fibers.sort((a, b) => (a.runState === b.runState ? a.fiberId - b.fiberId : a.runState.localeCompare(b.runState)));

    const lines: string[] = [];
    lines.push(`=== Fiber Dump (${fibers.length} fibers) ===`);
    for (const f of fibers) {
        lines.push(
            `fiber#${f.fiberId}${f.name ? ` ${f.name}` : ""} run=${f.runState} status=${f.status}` +
            ` parent=${f.parentFiberId ?? "-"} trace=${f.traceId ?? "-"}`
        );
        if (f.awaiting) lines.push(`  awaiting: ${f.awaiting}`);
    }

    lines.push(`=== Recent Events ===`);
    for (const ev of reg.getRecentEvents().slice(-recent)) {
        lines.push(`${ev.seq} ${ev.type} fiber=${ev.fiberId ?? "-"}`);
    }
    return lines.join("\n");
}
