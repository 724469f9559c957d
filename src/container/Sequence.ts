import { BackSequence, Validatable } from "./Capabilities"
import { CompareFn, defaultCompare, defaultEquals, EqualsFn, lexicographicCompare, sequenceEquals } from "./Algorithms"
import { DEFAULT_MAX_SIZE } from "../Constants"

export interface ContainerOptions<T, A extends unknown[] = never> {
    /** Growth past this many elements throws a RangeError. */
    maxSize?: number
    /** Builds an element from the arguments given to emplaceBack. */
    construct?: (...args: A) => T
    /** Used by clone(); elements are shared when absent. */
    copy?: (value: T) => T
    equals?: EqualsFn<T>
    compare?: CompareFn<T>
}

/**
 **  Shared housekeeping for the bundled containers: size limits, in-place
 **   construction, comparison and copying. Storage is left to subclasses.
 **/
export abstract class Sequence<T, A extends unknown[] = never> implements BackSequence<T>, Iterable<T>, Validatable {
    protected options: ContainerOptions<T, A>

    protected constructor(options: ContainerOptions<T, A>) {
        this.options = options
    }

    abstract pushBack(value: T): void

    abstract popBack(): void

    abstract back(): T

    abstract size(): number

    abstract clear(): void

    abstract validate(): boolean

    // front to back
    abstract [Symbol.iterator](): Iterator<T>

    get maxSize(): number {
        return this.options.maxSize ?? DEFAULT_MAX_SIZE
    }

    empty(): boolean {
        return this.size() === 0
    }

    emplaceBack(...args: A): T {
        const construct = this.options.construct
        if (construct === undefined) {
            throw new TypeError(`${this.constructor.name}.emplaceBack: no element constructor configured`)
        }
        this.pushBack(construct(...args))
        return this.back()
    }

    equals(other: this): boolean {
        if (this.size() !== other.size()) {
            return false
        }
        return sequenceEquals(this, other, this.options.equals ?? defaultEquals)
    }

    compare(other: this): number {
        return lexicographicCompare(this, other, this.options.compare ?? defaultCompare)
    }

    toArray(): T[] {
        return Array.from(this)
    }

    protected ensureRoomFor(count: number): void {
        if (this.size() + count > this.maxSize) {
            throw new RangeError(`${this.constructor.name}: cannot grow past maxSize ${this.maxSize}`)
        }
    }

    protected copyValue(value: T): T {
        return this.options.copy === undefined ? value : this.options.copy(value)
    }

    protected swapOptions(other: Sequence<T, A>): void {
        const options = this.options
        this.options = other.options
        other.options = options
    }
}
