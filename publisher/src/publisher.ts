import { PublisherOptionsInput, parsePublisherOptions } from './config.js'
import { PublisherEmitter, makeEmitter } from './emitter.js'
import { PublisherCallbackFailure } from './errors.js'
import { Observable, WeakObservation } from './handle.js'
import { makeLog } from './log.js'

/**
 * The part of a publisher that any holder may use: registering interest.
 */
export type IPublisher<Args extends unknown[]> = {
  /**
   * Registers a weak observation of `target` for future publications.
   * Nothing is registered if the subscription has already expired.
   *
   * There is no unsubscribe: releasing the last strong reference to the
   * subscription is enough.
   *
   * Subscribing the same subscription twice makes it receive every
   * publication twice.
   */
  subscribe: (target: Observable<Args>) => void
}

export type Publisher<Args extends unknown[]> = IPublisher<Args> & {
  label: string
  events: PublisherEmitter

  /**
   * @returns the number of registered entries. Subscriptions that expired
   * since the last publication are still counted until the next one purges
   * them.
   */
  subscriberCount: () => number
}

/**
 * Delivers `args` to every live subscriber in registration order.
 */
export type PublishFn<Args extends unknown[]> = (...args: Args) => void

/**
 * The owner keeps `publish` to itself and hands out `publisher`.
 *
 * @example
 * class Primary implements IPublisher<[number, string]> {
 *   private readonly channel = Publisher.make<[number, string]>()
 *
 *   subscribe: IPublisher<[number, string]>['subscribe'] = (target) =>
 *     this.channel.publisher.subscribe(target)
 *
 *   doSomething(a: number, b: string) {
 *     this.channel.publish(a, b)
 *   }
 * }
 */
export type PublisherChannel<Args extends unknown[]> = {
  publisher: Publisher<Args>
  publish: PublishFn<Args>
}

/**
 * Text for any thrown value, including symbols and objects without a prototype.
 */
export const describeThrown = (error: unknown): string => {
  if (error instanceof Error) return error.message
  if (typeof error === 'symbol') return error.toString()
  try {
    return String(error)
  } catch (_) {
    return Object.prototype.toString.call(error)
  }
}

export namespace Publisher {
  export const make = <Args extends unknown[]>(
    options?: PublisherOptionsInput,
  ): PublisherChannel<Args> => {
    const { label, failurePolicy } = parsePublisherOptions(options)
    const log = makeLog(label)
    const events = makeEmitter()
    const entries: WeakObservation<Args>[] = []

    const subscribe: Publisher<Args>['subscribe'] = (target) => {
      const observation = target.observe()
      if (observation.expired()) {
        log.debug('ignoring expired subscription', observation.id)
        return
      }
      entries.push(observation)
    }

    const purge = () => {
      let removed = 0
      let index = 0
      while (index < entries.length) {
        if (entries[index].expired()) {
          entries.splice(index, 1)
          removed += 1
        } else {
          index += 1
        }
      }
      log.debug('purged', removed, 'expired subscriptions,', entries.length, 'remaining')
      events.emit('debug.purge', { removed, remaining: entries.length })
    }

    const reportFailure = (observation: WeakObservation<Args>, error: unknown) => {
      const failure = new PublisherCallbackFailure(
        `${label}: subscriber ${observation.id.toString()} threw: ${describeThrown(error)}`,
        observation.id,
        error,
      )
      if (events.listenerCount('failure') > 0) {
        events.emit('failure', failure)
      } else {
        log.warn(failure.message)
      }
    }

    const publish: PublishFn<Args> = (...args) => {
      purge()

      // Subscriptions added while dispatching only receive later publications.
      const snapshot = entries.slice()

      let delivered = 0
      let skipped = 0
      for (const observation of snapshot) {
        const handle = observation.lock()
        if (!handle) {
          skipped += 1
          continue
        }
        try {
          handle.invoke(...args)
          delivered += 1
        } catch (error) {
          if (failurePolicy === 'propagate') throw error
          reportFailure(observation, error)
        } finally {
          handle.release()
        }
      }

      log.debug('dispatched to', delivered, 'subscribers, skipped', skipped)
      events.emit('debug.dispatch', { delivered, skipped })
    }

    const publisher: Publisher<Args> = {
      label,
      events,
      subscribe,
      subscriberCount: () => entries.length,
    }

    return { publisher, publish }
  }
}
