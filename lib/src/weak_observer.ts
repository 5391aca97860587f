import { freeCounter } from './allocation'
import { type Cloneable } from './cloneable'
import { type Disposable } from './disposable'
import { type ReferenceCounter } from './reference_counter'
import { SharedOwner, controlBlockOf, shareControlBlock } from './shared_owner'
import { type Option } from './types'

/**
 * Non-owning view of a `SharedOwner`'s value. It keeps the control block
 * alive, never the value: use `lock()` to get an owner for as long as the
 * value is needed.
 */
export class WeakObserver<$Value extends Disposable> implements Cloneable, Disposable {
  private target: Option<WeakRef<$Value>> = undefined
  private counter: Option<ReferenceCounter> = undefined

  constructor(owner?: SharedOwner<$Value>) {
    if (owner !== undefined) {
      this.attach(owner)
    }
  }

  clone(): this {
    const result = new WeakObserver<$Value>()
    result.target = this.target
    result.counter = this.counter
    result.counter?.addWeak()
    return result as this
  }

  move(): WeakObserver<$Value> {
    const result = new WeakObserver<$Value>()
    result.target = this.target
    result.counter = this.counter
    this.target = undefined
    this.counter = undefined
    return result
  }

  copyFrom(other: WeakObserver<$Value>) {
    if (other === this) {
      return this
    }
    other.counter?.addWeak()
    const target = other.target
    const counter = other.counter
    this.dropReference()
    this.target = target
    this.counter = counter
    return this
  }

  moveFrom(other: WeakObserver<$Value>) {
    if (other === this) {
      return this
    }
    const target = other.target
    const counter = other.counter
    other.target = undefined
    other.counter = undefined
    this.dropReference()
    this.target = target
    this.counter = counter
    return this
  }

  /**
   * Starts observing `owner`'s value instead of the current one.
   */
  observe(owner: SharedOwner<$Value>) {
    if (controlBlockOf(owner) === this.counter) {
      return this
    }
    this.dropReference()
    this.attach(owner)
    return this
  }

  useCount() {
    return this.counter?.get() ?? 0
  }

  expired() {
    return this.useCount() === 0
  }

  lock(): SharedOwner<$Value> {
    if (this.expired()) {
      return new SharedOwner<$Value>()
    }
    const value = this.target?.deref()
    if (value === undefined || this.counter === undefined) {
      return new SharedOwner<$Value>()
    }
    return shareControlBlock(value, this.counter)
  }

  swap(other: WeakObserver<$Value>) {
    const target = other.target
    other.target = this.target
    this.target = target

    const counter = other.counter
    other.counter = this.counter
    this.counter = counter
  }

  reset() {
    this.dropReference()
  }

  dispose() {
    this.dropReference()
  }

  private attach(owner: SharedOwner<$Value>) {
    const value = owner.get()
    const counter = controlBlockOf(owner)
    if (value === undefined || counter === undefined) {
      return
    }
    this.target = new WeakRef(value)
    this.counter = counter
    counter.addWeak()
  }

  // The owning side frees the counter when it is the last to let go; here we
  // only free it once the value is already gone.
  private dropReference() {
    const counter = this.counter
    this.target = undefined
    this.counter = undefined
    if (counter === undefined) {
      return
    }
    const weak = counter.removeWeak()
    if (weak === 0 && counter.get() === 0) {
      freeCounter(counter)
    }
  }
}
