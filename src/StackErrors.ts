export type StackOperation = "top" | "pop"

/**
 * Thrown by a checked stack when `top` or `pop` is called while it holds no elements.
 * This is a caller bug, not a condition to recover from.
 */
export class StackContractError extends Error {
    constructor(readonly operation: StackOperation) {
        super(`StackAdapter.${operation}() called on an empty stack`)
        this.name = "StackContractError"
    }
}
