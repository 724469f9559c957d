import { BackSequence, Cloneable, Releasable } from "./container/Capabilities"
import { CheckedStackAdapter, StackAdapter } from "./StackAdapter"
import { Log } from "./Log"
import { StackProfile } from "./Constants"
import { stackProfile } from "./configs"
import { Vector } from "./container/Vector"

/**
 **  Static helpers that build a stack for a profile. The profile defaults to
 **   the one configured for the process (STACK_PROFILE).
 **/
export class StackFactory {
    private static readonly log = Log.getLogger(StackFactory.name)

    private constructor() {}

    /** An empty stack over a new Vector. */
    public static create<T>(profile: StackProfile = stackProfile): StackAdapter<T, Vector<T>> {
        return StackFactory.adopt(new Vector<T>(), profile)
    }

    /** Moves `container` into a new stack. */
    public static adopt<T, C extends BackSequence<T>>(container: C & BackSequence<T>, profile: StackProfile = stackProfile): StackAdapter<T, C> {
        if (StackFactory.log.isDebugEnabled()) {
            StackFactory.log.jdebug({
                event: "CreateStack",
                params: { profile, container: container.constructor.name, size: container.size() },
            })
        }
        if (profile == StackProfile.CHECKED) {
            return new CheckedStackAdapter<T, C>(container)
        }
        return new StackAdapter<T, C>(container)
    }

    /** A stack over a deep copy of `container`; the original is left as it was. */
    public static copyOf<T, C extends BackSequence<T> & Cloneable<C>>(container: C & BackSequence<T>, profile: StackProfile = stackProfile): StackAdapter<T, C> {
        return StackFactory.adopt<T, C>(container.clone(), profile)
    }

    /** Pushes `values` in order into a new Vector, so the last one ends up on top. */
    public static from<T>(values: Iterable<T>, profile: StackProfile = stackProfile): StackAdapter<T, Vector<T>> {
        return StackFactory.fromInto(values, new Vector<T>(), profile)
    }

    /** As from(), but pushing into the given container, which the stack then owns. */
    public static fromInto<T, C extends BackSequence<T>>(values: Iterable<T>, container: C & BackSequence<T>, profile: StackProfile = stackProfile): StackAdapter<T, C> {
        const stack = StackFactory.adopt<T, C>(container, profile)
        for (const value of values) {
            stack.push(value)
        }
        return stack
    }

    /** Takes the contents of `stack` into a new stack of the same profile, leaving `stack` empty. */
    public static moveOf<T, C extends BackSequence<T> & Releasable<C>>(stack: StackAdapter<T, C>): StackAdapter<T, C> {
        return StackFactory.adopt<T, C>(stack.container().release(), stack.profile)
    }
}
