import { describe, expect, it } from '@jest/globals'
import { Callback } from '../src/callback.js'
import { CallbackBindingError } from '../src/errors.js'
import { Publisher } from '../src/publisher.js'

class Counter {
  total = 0

  add(amount: number, label: string) {
    this.total += amount
    return label
  }
}

describe('Callback.make', () => {
  it('should wrap a free function', () => {
    const seen: string[] = []
    const logLine = (level: string, message: string) => {
      seen.push(`${level}: ${message}`)
    }
    const handle = Callback.make(logLine)

    handle.invoke('info', 'ready')

    expect(seen).toEqual(['info: ready'])
    expect(handle.id.description).toBe('logLine')
  })

  it('should reject something that is not a function', () => {
    const notAFunction: unknown = 'handler'
    expect(() => Callback.make(notAFunction as () => void)).toThrow(CallbackBindingError)
  })
})

describe('Callback.bind', () => {
  it('should call the method with the receiver as this', () => {
    const counter = new Counter()
    const handle = Callback.bind(counter, counter.add)

    handle.invoke(2, 'a')
    handle.invoke(3, 'b')

    expect(counter.total).toBe(5)
    expect(handle.id.description).toBe('Counter.add')
  })

  it('should bind methods that a publisher can dispatch to', () => {
    const counter = new Counter()
    const handle = Callback.bind(counter, counter.add)
    const { publisher, publish } = Publisher.make<[number, string]>()

    publisher.subscribe(handle)
    publish(7, 'seven')

    expect(counter.total).toBe(7)
  })

  it('should reject a missing receiver', () => {
    const receiver: unknown = null
    expect(() => Callback.bind(receiver as Counter, Counter.prototype.add)).toThrow(
      CallbackBindingError,
    )
  })

  it('should reject a missing method', () => {
    const counter = new Counter()
    const method: unknown = undefined
    expect(() => Callback.bind(counter, method as Counter['add'])).toThrow(CallbackBindingError)
  })
})
