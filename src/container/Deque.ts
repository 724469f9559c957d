import { Cloneable, EmplaceBack, Ordered, Releasable, Swappable } from "./Capabilities"
import { ContainerOptions, Sequence } from "./Sequence"
import { DEQUE_INITIAL_CAPACITY } from "../Constants"

/**
 * Double-ended ring buffer. Capacity is a power of two and doubles when full;
 * growth relocates elements, so positions are not stable across pushes.
 */
export class Deque<T, A extends unknown[] = never>
    extends Sequence<T, A>
    implements EmplaceBack<T, A>, Ordered<Deque<T, A>>, Swappable<Deque<T, A>>, Cloneable<Deque<T, A>>, Releasable<Deque<T, A>>
{
    private buffer: T[] = new Array<T>(DEQUE_INITIAL_CAPACITY)
    private head = 0
    private count = 0

    constructor(options: ContainerOptions<T, A> = {}) {
        super(options)
    }

    static from<T>(values: Iterable<T>, options: ContainerOptions<T> = {}): Deque<T> {
        const deque = new Deque<T>(options)
        for (const value of values) {
            deque.pushBack(value)
        }
        return deque
    }

    get capacity(): number {
        return this.buffer.length
    }

    pushBack(value: T): void {
        this.reserveOne()
        this.buffer[this.slot(this.count)] = value
        this.count++
    }

    pushFront(value: T): void {
        this.reserveOne()
        this.head = this.slot(-1)
        this.buffer[this.head] = value
        this.count++
    }

    // no-op when empty
    popBack(): void {
        if (this.count === 0) {
            return
        }
        delete this.buffer[this.slot(this.count - 1)]
        this.count--
    }

    // no-op when empty
    popFront(): void {
        if (this.count === 0) {
            return
        }
        delete this.buffer[this.head]
        this.head = this.slot(1)
        this.count--
    }

    // undefined when empty
    back(): T {
        return this.buffer[this.slot(this.count - 1)]
    }

    // undefined when empty
    front(): T {
        return this.buffer[this.head]
    }

    size(): number {
        return this.count
    }

    clear(): void {
        this.buffer = new Array<T>(DEQUE_INITIAL_CAPACITY)
        this.head = 0
        this.count = 0
    }

    validate(): boolean {
        const capacity = this.buffer.length
        const powerOfTwo = capacity > 0 && Number.isInteger(Math.log2(capacity))
        return powerOfTwo && this.head >= 0 && this.head < capacity && this.count <= capacity && this.count <= this.maxSize
    }

    swap(other: Deque<T, A>): void {
        const buffer = this.buffer
        const head = this.head
        const count = this.count
        this.buffer = other.buffer
        this.head = other.head
        this.count = other.count
        other.buffer = buffer
        other.head = head
        other.count = count
        this.swapOptions(other)
    }

    clone(): Deque<T, A> {
        const copy = new Deque<T, A>(this.options)
        copy.buffer = new Array<T>(this.buffer.length)
        let i = 0
        for (const value of this) {
            copy.buffer[i++] = this.copyValue(value)
        }
        copy.count = this.count
        return copy
    }

    release(): Deque<T, A> {
        const moved = new Deque<T, A>(this.options)
        moved.buffer = this.buffer
        moved.head = this.head
        moved.count = this.count
        this.clear()
        return moved
    }

    *[Symbol.iterator](): Iterator<T> {
        for (let i = 0; i < this.count; i++) {
            yield this.buffer[this.slot(i)]
        }
    }

    // physical index of the element `offset` places from the front
    private slot(offset: number): number {
        const capacity = this.buffer.length
        return (((this.head + offset) % capacity) + capacity) % capacity
    }

    private reserveOne(): void {
        this.ensureRoomFor(1)
        if (this.count < this.buffer.length) {
            return
        }
        const grown = new Array<T>(this.buffer.length * 2)
        for (let i = 0; i < this.count; i++) {
            grown[i] = this.buffer[this.slot(i)]
        }
        this.buffer = grown
        this.head = 0
    }
}
