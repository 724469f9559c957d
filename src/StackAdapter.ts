import { BackSequence, Cloneable, EmplaceBack, Equatable, isSwappable, Ordered, Releasable, Swappable, Validatable } from "./container/Capabilities"
import { Log } from "./Log"
import { StackContractError, StackOperation } from "./StackErrors"
import { StackProfile } from "./Constants"
import { Vector } from "./container/Vector"

const log = Log.getLogger("StackAdapter")

/** The non-mutating half of a stack. */
export interface ReadonlyStack<T> {
    readonly profile: StackProfile
    empty(): boolean
    size(): number
    top(): T
}

/**
 **  LIFO interface over any container with back insertion, removal and access.
 **   Every operation forwards to the owned container; the adapter never looks
 **   past the back element.
 **
 **  This class performs no precondition checks: `top` and `pop` on an empty
 **   stack do whatever the container's `back` and `popBack` do. Use
 **   CheckedStackAdapter (or StackFactory) for fail-fast behaviour.
 **
 **  Operations that need more than the basic capability set (emplace,
 **   comparisons, clone, validate) are only callable when the container type
 **   provides them.
 **/
export class StackAdapter<T, C extends BackSequence<T> = Vector<T>> implements ReadonlyStack<T> {
    protected store: C

    /** Takes ownership of `container`; the caller should not touch it afterwards except through container(). */
    constructor(container: C & BackSequence<T>) {
        this.store = container
    }

    get profile(): StackProfile {
        return StackProfile.UNCHECKED
    }

    empty(): boolean {
        return this.store.empty()
    }

    size(): number {
        return this.store.size()
    }

    top(): T {
        return this.store.back()
    }

    push(value: T): void {
        this.store.pushBack(value)
    }

    emplace<A extends unknown[], K extends C & EmplaceBack<T, A>>(this: StackAdapter<T, K>, ...args: A): T {
        return this.store.emplaceBack(...args)
    }

    pop(): void {
        this.store.popBack()
    }

    /** Direct access to the owned container, for operations the stack does not expose. */
    container(): C {
        return this.store
    }

    swap(other: StackAdapter<T, C>): void {
        if (other === this) {
            return
        }
        if (isSwappable(this.store)) {
            this.store.swap(other.store)
            return
        }
        const store = this.store
        this.store = other.store
        other.store = store
    }

    /**
     * Copy assignment: the owned container takes the contents of a deep copy of
     * `other`'s container, so handles from container() stay attached.
     */
    assign<K extends C & Cloneable<K> & Swappable<K>>(this: StackAdapter<T, K>, other: StackAdapter<T, K>): void {
        if (other !== this) {
            this.store.swap(other.store.clone())
        }
    }

    /** Move assignment: takes `other`'s contents into the owned container and leaves `other` empty. */
    moveAssign<K extends C & Releasable<K> & Swappable<K>>(this: StackAdapter<T, K>, other: StackAdapter<T, K>): void {
        if (other !== this) {
            this.store.swap(other.store.release())
        }
    }

    /** A new stack, with the same profile, over a deep copy of the container. */
    clone<K extends C & Cloneable<K>>(this: StackAdapter<T, K>): StackAdapter<T, K> {
        return this.rewrap(this.store.clone())
    }

    equals<K extends C & Equatable<K>>(this: StackAdapter<T, K>, other: StackAdapter<T, K>): boolean {
        return this.store.equals(other.store)
    }

    notEquals<K extends C & Equatable<K>>(this: StackAdapter<T, K>, other: StackAdapter<T, K>): boolean {
        return !this.store.equals(other.store)
    }

    compare<K extends C & Ordered<K>>(this: StackAdapter<T, K>, other: StackAdapter<T, K>): number {
        return this.store.compare(other.store)
    }

    lessThan<K extends C & Ordered<K>>(this: StackAdapter<T, K>, other: StackAdapter<T, K>): boolean {
        return this.store.compare(other.store) < 0
    }

    lessOrEqual<K extends C & Ordered<K>>(this: StackAdapter<T, K>, other: StackAdapter<T, K>): boolean {
        return !(other.store.compare(this.store) < 0)
    }

    greaterThan<K extends C & Ordered<K>>(this: StackAdapter<T, K>, other: StackAdapter<T, K>): boolean {
        return other.store.compare(this.store) < 0
    }

    greaterOrEqual<K extends C & Ordered<K>>(this: StackAdapter<T, K>, other: StackAdapter<T, K>): boolean {
        return !(this.store.compare(other.store) < 0)
    }

    /** Diagnostics only: the container's own consistency check. */
    validate<K extends C & Validatable>(this: StackAdapter<T, K>): boolean {
        const valid = this.store.validate()
        if (!valid) {
            log.jwarn({
                event: "ValidateFailed",
                params: { profile: this.profile, size: this.store.size() },
            })
        }
        return valid
    }

    protected rewrap<K extends BackSequence<T>>(container: K): StackAdapter<T, K> {
        return new StackAdapter<T, K>(container)
    }
}

/**
 * A stack that refuses `top` and `pop` while empty, throwing a
 * StackContractError naming the operation.
 */
export class CheckedStackAdapter<T, C extends BackSequence<T> = Vector<T>> extends StackAdapter<T, C> {
    get profile(): StackProfile {
        return StackProfile.CHECKED
    }

    top(): T {
        if (this.store.empty()) {
            this.fail("top")
        }
        return this.store.back()
    }

    pop(): void {
        if (this.store.empty()) {
            this.fail("pop")
        }
        this.store.popBack()
    }

    protected rewrap<K extends BackSequence<T>>(container: K): StackAdapter<T, K> {
        return new CheckedStackAdapter<T, K>(container)
    }

    private fail(operation: StackOperation): never {
        log.jerror({
            event: "ContractViolation",
            params: { operation, size: this.store.size() },
        })
        throw new StackContractError(operation)
    }
}

export function swapStacks<T, C extends BackSequence<T>>(a: StackAdapter<T, C>, b: StackAdapter<T, C>): void {
    a.swap(b)
}
