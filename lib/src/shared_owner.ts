import { adopt, allocateCounter, destroyValue, freeCounter } from './allocation'
import { type Cloneable } from './cloneable'
import { type Disposable } from './disposable'
import { type ReferenceCounter } from './reference_counter'
import { type Option } from './types'
import { type WeakObserver } from './weak_observer'

// Module-internal access to an owner's control block, for WeakObserver only.
// Neither is re-exported from the package index.
let counterOf: <$Value extends Disposable>(
  owner: SharedOwner<$Value>
) => Option<ReferenceCounter>
let shareCounter: <$Value extends Disposable>(
  value: $Value,
  counter: ReferenceCounter
) => SharedOwner<$Value>

/**
 * Reference-counted owner of a disposable value. Every copy shares one
 * `ReferenceCounter`; the value is disposed when the last owner lets go, and
 * the counter is freed once no owner or observer refers to it.
 */
export class SharedOwner<$Value extends Disposable> implements Cloneable, Disposable {
  private value: Option<$Value> = undefined
  private counter: Option<ReferenceCounter> = undefined

  static {
    counterOf = owner => owner.counter
    shareCounter = (value, counter) => {
      const result = new SharedOwner<typeof value>()
      if (counter.get() === 0) {
        return result
      }
      result.value = value
      result.counter = counter
      counter.add()
      return result
    }
  }

  constructor(value?: $Value) {
    if (value === undefined) {
      return
    }
    adopt(value)
    this.value = value
    this.counter = allocateCounter()
    this.counter.add()
  }

  /**
   * Returns an empty owner when `observer` has expired.
   */
  static fromWeak<$Value extends Disposable>(observer: WeakObserver<$Value>) {
    return observer.lock()
  }

  /**
   * Copies `other` into an owner of a wider value type.
   */
  static from<$Value extends Disposable, $Derived extends $Value>(
    other: SharedOwner<$Derived>
  ): SharedOwner<$Value> {
    const result = new SharedOwner<$Value>()
    result.value = other.value
    result.counter = other.counter
    result.counter?.add()
    return result
  }

  clone(): this {
    const result = new SharedOwner<$Value>()
    result.value = this.value
    result.counter = this.counter
    result.counter?.add()
    return result as this
  }

  move(): SharedOwner<$Value> {
    const result = new SharedOwner<$Value>()
    result.value = this.value
    result.counter = this.counter
    this.value = undefined
    this.counter = undefined
    return result
  }

  copyFrom(other: SharedOwner<$Value>) {
    if (other === this) {
      return this
    }
    // Both handles may share one counter: count the incoming reference first.
    other.counter?.add()
    const value = other.value
    const counter = other.counter
    try {
      this.dropReference()
    } finally {
      this.value = value
      this.counter = counter
    }
    return this
  }

  moveFrom(other: SharedOwner<$Value>) {
    if (other === this) {
      return this
    }
    const value = other.value
    const counter = other.counter
    other.value = undefined
    other.counter = undefined
    try {
      this.dropReference()
    } finally {
      this.value = value
      this.counter = counter
    }
    return this
  }

  get() {
    return this.value
  }

  deref(): $Value {
    if (this.value === undefined) {
      throw new TypeError('Cannot dereference an empty SharedOwner')
    }
    return this.value
  }

  isEmpty() {
    return this.value === undefined
  }

  useCount() {
    return this.counter?.get() ?? 0
  }

  unique() {
    return this.useCount() === 1
  }

  reset<$Derived extends $Value>(value?: $Derived) {
    if (value !== undefined && value === this.value) {
      return
    }
    try {
      this.dropReference()
    } finally {
      if (value !== undefined) {
        adopt(value)
        this.value = value
        this.counter = allocateCounter()
        this.counter.add()
      }
    }
  }

  swap(other: SharedOwner<$Value>) {
    const value = other.value
    other.value = this.value
    this.value = value

    const counter = other.counter
    other.counter = this.counter
    this.counter = counter
  }

  dispose() {
    this.dropReference()
  }

  // The handle is empty before the value's own dispose() runs, and the counter
  // is freed even if that throws.
  private dropReference() {
    const value = this.value
    const counter = this.counter
    this.value = undefined
    this.counter = undefined
    if (counter === undefined || counter.remove() > 0) {
      return
    }
    try {
      if (value !== undefined) {
        destroyValue(value)
      }
    } finally {
      if (counter.getWeak() === 0) {
        freeCounter(counter)
      }
    }
  }
}

/**
 * The control block `owner` shares, if any.
 */
export function controlBlockOf<$Value extends Disposable>(owner: SharedOwner<$Value>) {
  return counterOf(owner)
}

/**
 * Adds a strong reference to `counter` for `value`. An owner whose counter
 * has no strong references left comes back empty.
 */
export function shareControlBlock<$Value extends Disposable>(
  value: $Value,
  counter: ReferenceCounter
) {
  return shareCounter(value, counter)
}
