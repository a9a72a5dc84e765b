import { describe, expect, it } from '@jest/globals'
import { Client, ClientRegistry, Primary, runExample } from '../example.js'

describe('example', () => {
  it('should let clients leave after their first publication', () => {
    const primary = new Primary()
    const registry = new ClientRegistry()
    const first = registry.spawn(primary)
    const second = registry.spawn(primary)

    primary.doSomething(1, 'one')

    expect(first.received).toEqual([[1, 'one']])
    expect(second.received).toEqual([[1, 'one']])
    expect(first.isDestroyed()).toBe(true)
    expect(registry.has(first)).toBe(false)
    expect(registry.size()).toBe(0)
    expect(primary.subscriberCount()).toBe(2)

    primary.doSomething(2, 'two')

    expect(first.received).toEqual([[1, 'one']])
    expect(primary.subscriberCount()).toBe(0)
  })

  it('should deliver to a client created after a publication', () => {
    const primary = new Primary()
    primary.doSomething(1, 'before')

    const client = new Client(primary)
    expect(client.isDestroyed()).toBe(false)
    primary.doSomething(2, 'after')

    expect(client.received).toEqual([[2, 'after']])
  })

  it('should report subscriber counts lagging by one publication', () => {
    expect(runExample(3)).toEqual({
      afterFirst: { clients: 0, subscribers: 3 },
      afterSecond: { clients: 0, subscribers: 0 },
    })
  })
})
