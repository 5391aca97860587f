import { type Disposable } from './disposable'
import { currentConfig } from './lib'
import { ReferenceCounter } from './reference_counter'

// Values currently owned by some ExclusiveOwner or SharedOwner.
const owned = new WeakSet<Disposable>()
const freed = new WeakSet<ReferenceCounter>()

export function allocateCounter() {
  const counter = new ReferenceCounter()
  currentConfig().tracker?.counterAllocated(counter)
  return counter
}

export function freeCounter(counter: ReferenceCounter) {
  // A value whose dispose() drops the last observer of its own counter frees
  // it before the owner does.
  if (freed.has(counter)) {
    return
  }
  console.assert(
    counter.get() === 0 && counter.getWeak() === 0,
    `freeing a control block still in use (strong ${counter.get()}, weak ${counter.getWeak()})`
  )
  freed.add(counter)
  currentConfig().tracker?.counterFreed(counter)
}

export function isFreed(counter: ReferenceCounter) {
  return freed.has(counter)
}

/**
 * Marks `value` as owned. Adopting a value that another handle still owns
 * means it will be disposed twice, so that is reported.
 */
export function adopt(value: Disposable) {
  if (owned.has(value) && currentConfig().warnOnMisuse) {
    console.warn(
      'Adopting a value that is already owned by another handle; it will be disposed more than once'
    )
  }
  owned.add(value)
}

export function relinquish(value: Disposable) {
  owned.delete(value)
}

export function isOwned(value: Disposable) {
  return owned.has(value)
}

export function destroyValue(value: Disposable) {
  owned.delete(value)
  currentConfig().tracker?.valueDisposed(value)
  value.dispose()
}
