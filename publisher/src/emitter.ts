import { EventEmitter } from 'events'
import type { EventMap } from 'typed-emitter'
import type { PublisherCallbackFailure } from './errors.js'
import { makeLog } from './log.js'

/**
 * Imported this way because it cannot be imported via normal import ... from
 * syntax https://github.com/andywer/typed-emitter/issues/39
 */
export type TypedEventEmitter<Events extends EventMap> = import('typed-emitter').default<Events>

export type PublisherEventMap = {
  failure: (_: PublisherCallbackFailure) => unknown
  'debug.purge': (_: { removed: number; remaining: number }) => unknown
  'debug.dispatch': (_: { delivered: number; skipped: number }) => unknown
}

export type PublisherEmitter = TypedEventEmitter<PublisherEventMap>

const log = makeLog('emitter')

/**
 * Diagnostic listeners must never interfere with a dispatch pass, so a
 * throwing listener is logged and the remaining listeners still run.
 */
class ThrowIgnoringEmitter extends EventEmitter {
  emit(eventName: string | symbol, ...args: unknown[]) {
    const listeners = this.rawListeners(eventName)

    listeners.forEach((listener) => {
      try {
        listener(...args)
      } catch (error) {
        log.error('diagnostic listener for', eventName, 'threw:', error)
      }
    })

    return listeners.length > 0
  }
}

export const makeEmitter = (): PublisherEmitter => {
  const emitter = new ThrowIgnoringEmitter() as PublisherEmitter
  emitter.setMaxListeners(20)
  return emitter
}
