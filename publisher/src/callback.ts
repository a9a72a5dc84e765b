import { CallbackBindingError } from './errors.js'
import { CallbackFn, SubscriptionHandle } from './handle.js'

/**
 * Helpers that turn functions and methods into subscription handles owned by
 * the caller.
 *
 * @example
 * class Client {
 *   private readonly subscription = Callback.bind(this, this.handler)
 *
 *   constructor(source: IPublisher<[number, string]>) {
 *     source.subscribe(this.subscription)
 *   }
 *
 *   private handler(a: number, b: string) {
 *     this.subscription.release()
 *   }
 * }
 */
export namespace Callback {
  /**
   * Wraps a free function.
   */
  export const make = <Args extends unknown[]>(fn: CallbackFn<Args>): SubscriptionHandle<Args> => {
    if (typeof fn !== 'function') {
      throw new CallbackBindingError(`expected a function, received ${typeof fn}`)
    }
    return SubscriptionHandle.make(fn, fn.name || 'anonymous')
  }

  /**
   * Wraps `method` so that it is called with `receiver` as `this`. The
   * receiver must outlive the returned handle; owning the handle from the
   * receiver itself guarantees that.
   */
  export const bind = <Receiver extends object, Args extends unknown[]>(
    receiver: Receiver,
    method: (this: Receiver, ...args: Args) => unknown,
  ): SubscriptionHandle<Args> => {
    const target: unknown = receiver
    if (target === null || target === undefined) {
      throw new CallbackBindingError(`cannot bind a method to ${String(target)}`)
    }
    if (typeof method !== 'function') {
      throw new CallbackBindingError(`expected a method, received ${typeof method}`)
    }
    const identifier = `${receiver.constructor?.name || 'object'}.${method.name || 'anonymous'}`
    return SubscriptionHandle.make((...args: Args) => method.apply(receiver, args), identifier)
  }
}
