// ringBuffer.ts
export const PushStatus = {
    Ok: 0,
    Grew: 1 << 0,
    Dropped: 1 << 1,
} as const;

export type PushStatus = number;

/**
 * Buffer circular que crece en potencias de 2 hasta `maxCapacity`.
 * Lleno en el máximo, `push` no escribe y devuelve `Dropped`.
 */
export class RingBuffer<T> {
    private buf: (T | undefined)[];
    private head = 0;
    private tail = 0;
    private size_ = 0;

    private readonly maxCap: number;

    constructor(initialCapacity: number = 1024, maxCapacity: number = initialCapacity) {
        const init = Math.max(2, nextPow2(Math.min(initialCapacity, maxCapacity)));
        const max = Math.max(init, nextPow2(maxCapacity));
        this.buf = new Array<T | undefined>(init);
        this.maxCap = max;
    }

    get length(): number { return this.size_; }
    get capacity(): number { return this.buf.length; }
    isEmpty(): boolean { return this.size_ === 0; }

    push(value: T): PushStatus {
        let status: PushStatus = PushStatus.Ok;

        if (this.size_ === this.buf.length) {
            if (this.buf.length >= this.maxCap) {
                return PushStatus.Dropped;
            }
            this.grow();
            status |= PushStatus.Grew;
        }

        this.buf[this.tail] = value;
        this.tail = (this.tail + 1) & (this.buf.length - 1);
        this.size_++;
        return status;
    }

    shift(): T | undefined {
        if (this.size_ === 0) return undefined;
        const value = this.buf[this.head];
        this.buf[this.head] = undefined;
        this.head = (this.head + 1) & (this.buf.length - 1);
        this.size_--;
        return value;
    }

    /** Como `shift`, cuando el caller ya sabe que `length > 0` (T puede incluir `undefined`). */
    shiftOne(): T {
        return this.shiftUpTo(1)[0];
    }

    /** Saca hasta `max` elementos del frente, en orden. */
    shiftUpTo(max: number): T[] {
        const n = Math.min(max, this.size_);
        const out = new Array<T>(n);
        for (let i = 0; i < n; i++) {
            // hay `n` elementos ocupados desde head
            out[i] = this.buf[this.head] as T;
            this.buf[this.head] = undefined;
            this.head = (this.head + 1) & (this.buf.length - 1);
        }
        this.size_ -= n;
        return out;
    }

    /** Copia en orden (del más viejo al más nuevo), sin consumir. */
    toArray(): T[] {
        const out: T[] = [];
        for (let i = 0; i < this.size_; i++) {
            out.push(this.buf[(this.head + i) & (this.buf.length - 1)] as T);
        }
        return out;
    }

    clear(): void {
        this.buf.fill(undefined);
        this.head = 0;
        this.tail = 0;
        this.size_ = 0;
    }

    private grow(): void {
        const old = this.buf;
        const nextLen = Math.min(old.length * 2, this.maxCap);
        const newBuf = new Array<T | undefined>(nextLen);

        for (let i = 0; i < this.size_; i++) {
            newBuf[i] = old[(this.head + i) & (old.length - 1)];
        }

        this.buf = newBuf;
        this.head = 0;
        this.tail = this.size_;
    }
}

function nextPow2(n: number): number {
    let x = 1;
    while (x < n) x *= 2;
    return x;
}
