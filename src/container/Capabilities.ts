/**
 * The operations a container must offer before a StackAdapter can wrap it.
 * Elements are ordered front to back; the back element is the top of the stack.
 */
export interface BackSequence<T> {
    pushBack(value: T): void
    popBack(): void
    back(): T
    size(): number
    empty(): boolean
}

// property syntax keeps the argument list checked strictly
export interface EmplaceBack<T, A extends unknown[]> {
    emplaceBack: (...args: A) => T
}

export interface Equatable<C> {
    equals(other: C): boolean
}

export interface Ordered<C> extends Equatable<C> {
    /** Lexicographic three-way comparison: negative, zero or positive. */
    compare(other: C): number
}

export interface Swappable<C> {
    swap(other: C): void
}

export interface Validatable {
    validate(): boolean
}

export interface Cloneable<C> {
    clone(): C
}

/** Hands the contents over to a new container and leaves this one empty. */
export interface Releasable<C> {
    release(): C
}

export function isSwappable<C extends object>(container: C): container is C & Swappable<C> {
    return "swap" in container && typeof container.swap === "function"
}
