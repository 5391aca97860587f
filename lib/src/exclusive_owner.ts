import { adopt, destroyValue, relinquish } from './allocation'
import { type Disposable } from './disposable'
import { type Option } from './types'

/**
 * Sole owner of a disposable value. It can be moved but never copied: there
 * is no `clone()`, and every transfer empties the source handle.
 */
export class ExclusiveOwner<$Value extends Disposable> implements Disposable {
  private value: Option<$Value>

  constructor(value?: $Value) {
    if (value !== undefined) {
      adopt(value)
    }
    this.value = value
  }

  /**
   * Moves the value out of `other` into a handle of a wider value type.
   */
  static from<$Value extends Disposable, $Derived extends $Value>(
    other: ExclusiveOwner<$Derived>
  ): ExclusiveOwner<$Value> {
    const result = new ExclusiveOwner<$Value>()
    result.value = other.value
    other.value = undefined
    return result
  }

  move(): ExclusiveOwner<$Value> {
    const result = new ExclusiveOwner<$Value>()
    result.value = this.value
    this.value = undefined
    return result
  }

  moveFrom(other: ExclusiveOwner<$Value>) {
    if (other === this) {
      return this
    }
    const incoming = other.value
    other.value = undefined
    const current = this.value
    this.value = incoming
    if (current !== undefined) {
      destroyValue(current)
    }
    return this
  }

  get() {
    return this.value
  }

  deref(): $Value {
    if (this.value === undefined) {
      throw new TypeError('Cannot dereference an empty ExclusiveOwner')
    }
    return this.value
  }

  isEmpty() {
    return this.value === undefined
  }

  /**
   * Gives up ownership without disposing; the caller now owns the value.
   */
  release(): Option<$Value> {
    const value = this.value
    this.value = undefined
    if (value !== undefined) {
      relinquish(value)
    }
    return value
  }

  reset<$Derived extends $Value>(value?: $Derived) {
    const current = this.value
    if (value === current) {
      return
    }
    if (value !== undefined) {
      adopt(value)
    }
    this.value = value
    if (current !== undefined) {
      destroyValue(current)
    }
  }

  swap(other: ExclusiveOwner<$Value>) {
    const value = other.value
    other.value = this.value
    this.value = value
  }

  dispose() {
    this.reset()
  }
}
