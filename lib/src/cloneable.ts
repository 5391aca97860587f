export interface Cloneable {
  clone(): this
}
