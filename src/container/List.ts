import { Cloneable, EmplaceBack, Ordered, Releasable, Swappable } from "./Capabilities"
import { ContainerOptions, Sequence } from "./Sequence"

interface ListNode<T> {
    value: T
    prev: ListNode<T> | undefined
    next: ListNode<T> | undefined
}

/**
 * Doubly linked sequence. Element references survive any push or pop that
 * does not remove that element.
 *
 * Unlike Vector, `back()` and `popBack()` throw a RangeError on an empty list.
 */
export class List<T, A extends unknown[] = never>
    extends Sequence<T, A>
    implements EmplaceBack<T, A>, Ordered<List<T, A>>, Swappable<List<T, A>>, Cloneable<List<T, A>>, Releasable<List<T, A>>
{
    private head: ListNode<T> | undefined
    private tail: ListNode<T> | undefined
    private count = 0

    constructor(options: ContainerOptions<T, A> = {}) {
        super(options)
    }

    static from<T>(values: Iterable<T>, options: ContainerOptions<T> = {}): List<T> {
        const list = new List<T>(options)
        for (const value of values) {
            list.pushBack(value)
        }
        return list
    }

    pushBack(value: T): void {
        this.ensureRoomFor(1)
        const node: ListNode<T> = { value, prev: this.tail, next: undefined }
        if (this.tail === undefined) {
            this.head = node
        } else {
            this.tail.next = node
        }
        this.tail = node
        this.count++
    }

    popBack(): void {
        const last = this.tail
        if (last === undefined) {
            throw new RangeError("List.popBack: list is empty")
        }
        this.tail = last.prev
        if (this.tail === undefined) {
            this.head = undefined
        } else {
            this.tail.next = undefined
        }
        last.prev = undefined
        this.count--
    }

    back(): T {
        if (this.tail === undefined) {
            throw new RangeError("List.back: list is empty")
        }
        return this.tail.value
    }

    front(): T {
        if (this.head === undefined) {
            throw new RangeError("List.front: list is empty")
        }
        return this.head.value
    }

    size(): number {
        return this.count
    }

    clear(): void {
        this.head = undefined
        this.tail = undefined
        this.count = 0
    }

    // walks the links both ways and checks them against the stored count
    validate(): boolean {
        let forward = 0
        let prev: ListNode<T> | undefined
        for (let node = this.head; node !== undefined; node = node.next) {
            if (node.prev !== prev) {
                return false
            }
            prev = node
            forward++
            if (forward > this.count) {
                return false
            }
        }
        if (prev !== this.tail) {
            return false
        }
        let backward = 0
        for (let node = this.tail; node !== undefined; node = node.prev) {
            backward++
            if (backward > this.count) {
                return false
            }
        }
        return forward === this.count && backward === this.count && this.count <= this.maxSize
    }

    swap(other: List<T, A>): void {
        const head = this.head
        const tail = this.tail
        const count = this.count
        this.head = other.head
        this.tail = other.tail
        this.count = other.count
        other.head = head
        other.tail = tail
        other.count = count
        this.swapOptions(other)
    }

    clone(): List<T, A> {
        const copy = new List<T, A>(this.options)
        for (const value of this) {
            copy.pushBack(this.copyValue(value))
        }
        return copy
    }

    release(): List<T, A> {
        const moved = new List<T, A>(this.options)
        moved.head = this.head
        moved.tail = this.tail
        moved.count = this.count
        this.clear()
        return moved
    }

    *[Symbol.iterator](): Iterator<T> {
        for (let node = this.head; node !== undefined; node = node.next) {
            yield node.value
        }
    }
}
