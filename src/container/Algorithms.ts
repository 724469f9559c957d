import { gt, isEqual, lt } from "lodash"

export type EqualsFn<T> = (a: T, b: T) => boolean
export type CompareFn<T> = (a: T, b: T) => number

export function defaultEquals<T>(a: T, b: T): boolean {
    return isEqual(a, b)
}

/** Throws a TypeError for unequal values that have no natural order, such as two distinct objects. */
export function defaultCompare<T>(a: T, b: T): number {
    if (lt(a, b)) {
        return -1
    } else if (gt(a, b)) {
        return 1
    } else if (isEqual(a, b)) {
        return 0
    }
    throw new TypeError("defaultCompare: elements have no natural order, configure a compare function")
}

/** Element-wise, order-sensitive equality of two sequences. */
export function sequenceEquals<T>(a: Iterable<T>, b: Iterable<T>, equals: EqualsFn<T> = defaultEquals): boolean {
    const left = a[Symbol.iterator]()
    const right = b[Symbol.iterator]()
    for (;;) {
        const l = left.next()
        const r = right.next()
        if (l.done === true || r.done === true) {
            return l.done === true && r.done === true
        }
        if (!equals(l.value, r.value)) {
            return false
        }
    }
}

/**
 * Compares element by element; the first unequal pair decides.
 * A sequence that is a proper prefix of the other orders first.
 */
export function lexicographicCompare<T>(a: Iterable<T>, b: Iterable<T>, compare: CompareFn<T> = defaultCompare): number {
    const left = a[Symbol.iterator]()
    const right = b[Symbol.iterator]()
    for (;;) {
        const l = left.next()
        const r = right.next()
        if (l.done === true) {
            return r.done === true ? 0 : -1
        }
        if (r.done === true) {
            return 1
        }
        const order = compare(l.value, r.value)
        if (order !== 0) {
            return order < 0 ? -1 : 1
        }
    }
}
