import { type Disposable } from './disposable'
import { type ReferenceCounter } from './reference_counter'
import { type Option } from './types'

/**
 * Receives every control block allocation and free, and every value disposed
 * by an owning handle. Useful for leak accounting in tests and debug builds.
 */
export interface AllocationTracker {
  counterAllocated(counter: ReferenceCounter): void
  counterFreed(counter: ReferenceCounter): void
  valueDisposed(value: Disposable): void
}

export type Config = {
  tracker: Option<AllocationTracker>
  warnOnMisuse: boolean
}

export function makeConfig(config: Partial<Config> = {}): Config {
  return Object.assign(
    {
      tracker: undefined,
      warnOnMisuse: true
    },
    config
  )
}

// Process-wide: handles read whatever config is current when they allocate,
// free or dispose, not the one current when they were created.
let activeConfig = makeConfig()

export function currentConfig() {
  return activeConfig
}

/**
 * Installs a new process-wide config and returns the one it replaces, so
 * callers can put it back with `configure(previous)`.
 */
export function configure(config: Partial<Config> = {}): Config {
  const previous = activeConfig
  activeConfig = makeConfig(config)
  return previous
}

export function resetConfig() {
  activeConfig = makeConfig()
}

/**
 * Runs `body` with `config` installed and restores the previous config
 * afterwards, also when `body` throws.
 */
export function withConfig<$Result>(config: Partial<Config>, body: () => $Result): $Result {
  const previous = configure(config)
  try {
    return body()
  } finally {
    configure(previous)
  }
}
