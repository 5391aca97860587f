/**
 * Control block shared by every `SharedOwner` and `WeakObserver` of one value.
 *
 * Holds a strong count (owners) and a weak count (observers). It never frees
 * itself: the handles read the counts returned here and decide when the value
 * is disposed and when the block is released.
 */
export class ReferenceCounter {
  private count = 0
  private weak = 0

  add() {
    this.count++
  }

  remove(): number {
    console.assert(this.count > 0, 'strong count decremented below zero')
    if (this.count > 0) {
      this.count--
    }
    return this.count
  }

  get() {
    return this.count
  }

  addWeak() {
    this.weak++
  }

  removeWeak(): number {
    console.assert(this.weak > 0, 'weak count decremented below zero')
    if (this.weak > 0) {
      this.weak--
    }
    return this.weak
  }

  getWeak() {
    return this.weak
  }
}
