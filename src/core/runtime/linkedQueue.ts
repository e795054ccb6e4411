// linkedQueue.ts
export type Node<T> = {
    value: T;
    prev: Node<T> | null;
    next: Node<T> | null;
    removed: boolean;
};

/**
 * FIFO doblemente enlazada. `push` devuelve el nodo para poder sacarlo
 * en O(1) desde un canceler (waiters que se interrumpen).
 */
export class LinkedQueue<T> {
    private head: Node<T> | null = null;
    private tail: Node<T> | null = null;
    private len = 0;

    get length(): number {
        return this.len;
    }

    push(value: T): Node<T> {
        const node: Node<T> = { value, prev: this.tail, next: null, removed: false };
        if (this.tail) this.tail.next = node;
        else this.head = node;
        this.tail = node;
        this.len++;
        return node;
    }

    shift(): T | undefined {
        const h = this.head;
        if (!h) return undefined;
        this.unlink(h);
        return h.value;
    }

    /** Idempotente: sacar un nodo ya sacado no hace nada. */
    remove(node: Node<T>): void {
        if (node.removed) return;
        this.unlink(node);
    }

    /** Vacía la cola y devuelve los valores en orden. */
    drain(): T[] {
        const out: T[] = [];
        let h = this.head;
        while (h) {
            this.unlink(h);
            out.push(h.value);
            h = this.head;
        }
        return out;
    }

    private unlink(node: Node<T>): void {
        if (node.prev) node.prev.next = node.next;
        else this.head = node.next;
        if (node.next) node.next.prev = node.prev;
        else this.tail = node.prev;
        node.prev = null;
        node.next = null;
        node.removed = true;
        this.len--;
    }
}
