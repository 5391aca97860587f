export { isFreed, isOwned } from './allocation'
export type { Cloneable } from './cloneable'
export type { Disposable } from './disposable'
export { ExclusiveOwner } from './exclusive_owner'
export { configure, currentConfig, makeConfig, resetConfig, withConfig } from './lib'
export type { AllocationTracker, Config } from './lib'
export { ReferenceCounter } from './reference_counter'
export { SharedOwner } from './shared_owner'
export type { Option } from './types'
export { WeakObserver } from './weak_observer'
