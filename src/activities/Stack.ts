/** A last-in-first-out collection. */
export class Stack<T> {
    private items: T[] = [];

    get isEmpty(): boolean {
        return this.items.length === 0;
    }

    get size(): number {
        return this.items.length;
    }

    push(value: T): void {
        this.items.push(value);
    }

    /** Removes and returns the top value, or `undefined` when empty. */
    pop(): T | undefined {
        return this.items.pop();
    }

    peek(): T | undefined {
        return this.items[this.items.length - 1];
    }
}
