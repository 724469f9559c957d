export enum StackProfile {
    CHECKED = "checked",
    UNCHECKED = "unchecked",
}

// largest length a JS array can hold
export const DEFAULT_MAX_SIZE = 2 ** 32 - 1

// must be a power of two
export const DEQUE_INITIAL_CAPACITY = 8
