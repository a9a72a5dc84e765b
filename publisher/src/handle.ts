import { SubscriptionHandleReleasedError } from './errors.js'
import { Destruction } from './utils/destruction.js'

export type CallbackFn<Args extends unknown[]> = (...args: Args) => unknown

/**
 * A strong reference to a subscription. The wrapped callback stays callable
 * for as long as at least one strong reference to it has not been released.
 *
 * @example
 * const handle = SubscriptionHandle.make((a: number, b: string) => console.log(a, b))
 * publisher.subscribe(handle) // the publisher keeps only a weak observation
 *
 * handle.release() // the publisher skips and later forgets the subscription
 */
export type SubscriptionHandle<Args extends unknown[]> = {
  /**
   * Identity of the subscription, shared by every strong and weak reference to it.
   */
  readonly id: symbol

  /**
   * Calls the wrapped callback.
   * @throws SubscriptionHandleReleasedError if this reference was released.
   */
  invoke: (...args: Args) => void

  /**
   * @returns a new strong reference to the same subscription, which must be
   * released independently.
   * @throws SubscriptionHandleReleasedError if this reference was released.
   */
  share: () => SubscriptionHandle<Args>

  observe: () => WeakObservation<Args>

  /**
   * Gives up this strong reference. Releasing the last one expires the
   * subscription. Calling it more than once has no further effect.
   */
  release: () => void

  isReleased: () => boolean

  /**
   * @returns the number of unreleased strong references to the subscription.
   */
  useCount: () => number

  /**
   * Registers a hook run once when the subscription expires. If it already
   * has, the hook runs immediately.
   */
  addExpireHook: (hook: () => unknown) => void
}

/**
 * A non-owning reference to a subscription. It can be tested for liveness and
 * momentarily upgraded to a strong reference, but it never keeps the
 * subscription alive.
 */
export type WeakObservation<Args extends unknown[]> = {
  readonly id: symbol
  expired: () => boolean

  /**
   * @returns a new strong reference, which the caller must release, or null
   * if the subscription has expired.
   */
  lock: () => SubscriptionHandle<Args> | null

  observe: () => WeakObservation<Args>
}

/**
 * Anything a weak observation can be taken from: a strong handle or another
 * weak observation.
 */
export type Observable<Args extends unknown[]> = Pick<WeakObservation<Args>, 'observe'>

type ControlBlock<Args extends unknown[]> = {
  id: symbol
  callback: CallbackFn<Args> | null
  strongCount: number
  destruction: Destruction
}

export namespace SubscriptionHandle {
  /**
   * Wraps `callback` in a new subscription and returns its first strong
   * reference.
   */
  export const make = <Args extends unknown[]>(
    callback: CallbackFn<Args>,
    identifier = 'subscription',
  ): SubscriptionHandle<Args> =>
    makeStrong<Args>({
      id: Symbol(identifier),
      callback,
      strongCount: 0,
      destruction: Destruction.make(),
    })

  const makeStrong = <Args extends unknown[]>(
    block: ControlBlock<Args>,
  ): SubscriptionHandle<Args> => {
    let released = false
    block.strongCount += 1

    const assertUnreleased = (operation: string) => {
      if (released) {
        throw new SubscriptionHandleReleasedError(
          `cannot ${operation} ${block.id.toString()}: this reference was released`,
        )
      }
    }

    const self: SubscriptionHandle<Args> = {
      id: block.id,
      invoke: (...args) => {
        assertUnreleased('invoke')
        block.callback?.(...args)
      },
      share: () => {
        assertUnreleased('share')
        return makeStrong(block)
      },
      observe: () => makeWeak(block),
      release: () => {
        if (released) return
        released = true
        block.strongCount -= 1
        if (block.strongCount === 0) {
          block.callback = null
          block.destruction.destroy()
        }
      },
      isReleased: () => released,
      useCount: () => block.strongCount,
      addExpireHook: block.destruction.addDestroyHook,
    }
    return self
  }

  const makeWeak = <Args extends unknown[]>(block: ControlBlock<Args>): WeakObservation<Args> => {
    const self: WeakObservation<Args> = {
      id: block.id,
      expired: block.destruction.isDestroyed,
      lock: () => (block.destruction.isDestroyed() ? null : makeStrong(block)),
      observe: () => self,
    }
    return self
  }
}
