import "./init"

export { StackAdapter, CheckedStackAdapter, swapStacks } from "./StackAdapter"
export type { ReadonlyStack } from "./StackAdapter"
export { StackFactory } from "./StackFactory"
export { StackContractError } from "./StackErrors"
export type { StackOperation } from "./StackErrors"
export { StackProfile, DEFAULT_MAX_SIZE, DEQUE_INITIAL_CAPACITY } from "./Constants"
export { stackProfile, parseStackProfile } from "./configs"
export { Log } from "./Log"
export type { LogEvent } from "./Log"
export * from "./container/Capabilities"
export * from "./container/Algorithms"
export { Sequence } from "./container/Sequence"
export type { ContainerOptions } from "./container/Sequence"
export { Vector } from "./container/Vector"
export { List } from "./container/List"
export { Deque } from "./container/Deque"
