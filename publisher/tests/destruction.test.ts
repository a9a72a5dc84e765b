import { describe, expect, it } from '@jest/globals'
import { Cleanup, Destruction } from '../src/utils/destruction.js'

describe('Cleanup', () => {
  it('should call all registered functions in insertion order', () => {
    const order: number[] = []

    const cleanup = Cleanup.make()
    ;[0, 1, 2, 3].forEach((index) => {
      cleanup.add(() => {
        order.push(index)
      })
    })

    cleanup.clean()

    expect(order).toEqual([0, 1, 2, 3])
  })

  it('should call the remaining functions when one throws', () => {
    const called: string[] = []
    const cleanup = Cleanup.make()
    cleanup.add(() => {
      throw new Error('cleanup failure')
    })
    cleanup.add(() => {
      called.push('second')
    })

    expect(() => cleanup.clean()).not.toThrow()
    expect(called).toEqual(['second'])
  })
})

describe('Destruction', () => {
  it('should call all registered function on destroy once', () => {
    const numflags = new Array<number>(5).fill(0)

    const destruction = Destruction.make()
    numflags.forEach((_, index) => {
      destruction.addDestroyHook(() => {
        numflags[index] += 1
      })
    })
    destruction.destroy()

    expect(numflags).toEqual([1, 1, 1, 1, 1])

    destruction.destroy()

    // Second destroy should not call the destroy hook again
    expect(numflags).toEqual([1, 1, 1, 1, 1])
  })

  it('should flag the destroyed status correctly', () => {
    const destruction = Destruction.make()
    expect(destruction.isDestroyed()).toBe(false)
    destruction.destroy()
    expect(destruction.isDestroyed()).toBe(true)
    destruction.destroy()
    expect(destruction.isDestroyed()).toBe(true)
  })

  it('should run a hook added after destruction right away', () => {
    const destruction = Destruction.make()
    destruction.destroy()

    let called = 0
    destruction.addDestroyHook(() => {
      called += 1
    })

    expect(called).toBe(1)
  })
})
