export type Option<T> = T | undefined
