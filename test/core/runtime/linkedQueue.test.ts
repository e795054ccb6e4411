import { describe, it, expect } from "vitest";
import { LinkedQueue } from "../../../src/core/runtime/linkedQueue";

describe("LinkedQueue", () => {
    it("is FIFO", () => {
        const q = new LinkedQueue<string>();
        q.push("a");
        q.push("b");

        expect(q.length).toBe(2);
        expect(q.shift()).toBe("a");
        expect(q.shift()).toBe("b");
        expect(q.shift()).toBeUndefined();
        expect(q.length).toBe(0);
    });

    it("removes a node from the middle, once", () => {
        const q = new LinkedQueue<number>();
        q.push(1);
        const two = q.push(2);
        q.push(3);

        q.remove(two);
        q.remove(two);

        expect(q.length).toBe(2);
        expect(q.drain()).toEqual([1, 3]);
        expect(q.length).toBe(0);
    });

    it("ignores removal of a node that was already shifted", () => {
        const q = new LinkedQueue<number>();
        const one = q.push(1);
        q.push(2);

        q.shift();
        q.remove(one);

        expect(q.length).toBe(1);
        expect(q.drain()).toEqual([2]);
    });
});
