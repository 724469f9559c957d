import { Cloneable, EmplaceBack, Ordered, Releasable, Swappable } from "./Capabilities"
import { ContainerOptions, Sequence } from "./Sequence"

/** Contiguous, array-backed sequence. The default container of a stack. */
export class Vector<T, A extends unknown[] = never>
    extends Sequence<T, A>
    implements EmplaceBack<T, A>, Ordered<Vector<T, A>>, Swappable<Vector<T, A>>, Cloneable<Vector<T, A>>, Releasable<Vector<T, A>>
{
    private items: T[] = []

    constructor(options: ContainerOptions<T, A> = {}) {
        super(options)
    }

    static from<T>(values: Iterable<T>, options: ContainerOptions<T> = {}): Vector<T> {
        const vector = new Vector<T>(options)
        for (const value of values) {
            vector.pushBack(value)
        }
        return vector
    }

    pushBack(value: T): void {
        this.ensureRoomFor(1)
        this.items.push(value)
    }

    // no-op when empty
    popBack(): void {
        this.items.pop()
    }

    // undefined when empty
    back(): T {
        return this.items[this.items.length - 1]
    }

    at(index: number): T | undefined {
        return this.items.at(index)
    }

    size(): number {
        return this.items.length
    }

    clear(): void {
        this.items = []
    }

    validate(): boolean {
        return Array.isArray(this.items) && this.items.length <= this.maxSize
    }

    swap(other: Vector<T, A>): void {
        const items = this.items
        this.items = other.items
        other.items = items
        this.swapOptions(other)
    }

    clone(): Vector<T, A> {
        const copy = new Vector<T, A>(this.options)
        copy.items = this.items.map((value) => this.copyValue(value))
        return copy
    }

    release(): Vector<T, A> {
        const moved = new Vector<T, A>(this.options)
        moved.items = this.items
        this.items = []
        return moved
    }

    [Symbol.iterator](): Iterator<T> {
        return this.items[Symbol.iterator]()
    }
}
