import { makeLog } from '../log.js'

const log = makeLog('destruction')

/**
 * Marks an object as destroyed exactly once and runs the hooks registered
 * before that moment. A hook added after destruction runs immediately.
 */
export type Destruction = ReturnType<typeof Destruction['make']>

export namespace Destruction {
  export const make = () => {
    let destroyed = false
    const cleanup = Cleanup.make()
    return {
      addDestroyHook: (hook: () => unknown): void => {
        if (destroyed) {
          Cleanup.run(hook)
          return
        }
        cleanup.add(hook)
      },
      isDestroyed: (): boolean => destroyed,
      destroy: (): void => {
        if (!destroyed) {
          destroyed = true
          cleanup.clean()
        }
      },
    }
  }
}

/**
 * Collects functions that are called, in insertion order, when `clean` is
 * called. A throwing function is logged and does not stop the others.
 */
export type Cleanup = ReturnType<typeof Cleanup['make']>

export namespace Cleanup {
  export const run = (fn: () => unknown): void => {
    try {
      fn()
    } catch (error) {
      log.error('error while running a destroy hook:', error)
    }
  }

  export const make = () => {
    const fns = new Set<() => unknown>()
    return {
      add: (fn: () => unknown) => {
        fns.add(fn)
      },
      clean: (): void => {
        const pending = Array.from(fns)
        fns.clear()
        pending.forEach(run)
      },
    }
  }
}
