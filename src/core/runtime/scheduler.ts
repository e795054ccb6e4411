export type Task = () => void;

type TaggedTask = {
    tag: string;
    task: Task;
};

export type SchedulerOptions = {
    /** Se llama cuando una tarea tira. El flush sigue con la próxima. */
    onError?: (error: unknown, tag: string) => void;
};

/**
 * Cola FIFO de tareas que se drena dentro de un microtask.
 * Todo lo que se encola mientras se drena corre en el mismo flush.
 */
export class Scheduler {
    private queue: TaggedTask[] = [];
    private head = 0;
    private flushing = false;
    private requested = false;
    private readonly onError: (error: unknown, tag: string) => void;

    constructor(options: SchedulerOptions = {}) {
        this.onError = options.onError ?? ((error, tag) => console.error(`[scheduler] task ${tag} threw`, error));
    }

    get pending(): number {
        return this.queue.length - this.head;
    }

    schedule(task: Task, tag: string = "anonymous"): void {
        this.queue.push({ tag, task });
        this.requestFlush();
    }

    private requestFlush(): void {
        if (this.flushing) return;
        if (this.requested) return;
        this.requested = true;

        queueMicrotask(() => this.flush());
    }

    private flush(): void {
        if (this.flushing) return;
        this.flushing = true;
        this.requested = false;

        try {
            while (this.head < this.queue.length) {
                const item = this.queue[this.head++];
                try {
                    item.task();
                } catch (e) {
                    this.onError(e, item.tag);
                }
            }
        } finally {
            this.queue = [];
            this.head = 0;
            this.flushing = false;
        }
    }
}

export const globalScheduler = new Scheduler();
