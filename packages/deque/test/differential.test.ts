/**
 * Differential tests: the deque against a doubly linked list driven by the
 * same operations.
 */

import { describe, it, expect } from 'vitest'
import { createSeededRandom, ReferenceList, runDequeScript } from '@ringdeque/testing'
import { Deque } from '../src/deque.js'

const scripts = ['+*/-', '++-', '90', '123456789--', '8++-++-++0', '0', 'AB--/CDEF']

describe('scripted operations', () => {
  it.each(scripts)('should match the reference list for %j', script => {
    const { deque, reference, expectedLength, minCapacity } = runDequeScript(script)

    expect(deque.length).toBe(reference.length)
    expect(deque.length).toBe(expectedLength)
    expect(deque.capacity).toBeGreaterThanOrEqual(minCapacity)

    const expected = reference.toArray()
    expected.forEach((value, index) => {
      expect(deque.at(index)).toEqual({ found: true, value })
    })

    const items = deque.toArray()
    expect(items).toEqual(expected)
    expect(new Set(items).size).toBe(items.length)
  })

  it('should leave exact contents for known scripts', () => {
    expect(runDequeScript('+*/-').deque.toArray()).toEqual([])
    expect(runDequeScript('++-').deque.toArray()).toEqual([0])
    expect(runDequeScript('8++-++-++0').deque.toArray()).toEqual([8, 7, 4, 1])
    expect(runDequeScript('AB--/CDEF').deque.toArray()).toEqual([6, 7, 9, 10, 11, 13, 14, 15, 16])
  })

  it('should leave exact capacities for known scripts', () => {
    expect(runDequeScript('90').deque.capacity).toBe(0)
    expect(runDequeScript('123456789--').deque.capacity).toBe(16)
    expect(runDequeScript('8++-++-++0').deque.capacity).toBe(4)
    expect(runDequeScript('AB--/CDEF').deque.capacity).toBe(10)
  })
})

describe('random operations', () => {
  it.each([1, 2, 3, 42, 2024])('should agree with the reference list for seed %i', seed => {
    const random = createSeededRandom(seed)
    const deque = new Deque<number>()
    const reference = new ReferenceList<number>()
    let lastCapacity = 0

    for (let step = 0; step < 3000; step++) {
      const roll = random.next()
      if (roll < 0.3) {
        const value = random.nextInt(100)
        deque.pushFront(value)
        reference.pushFront(value)
      } else if (roll < 0.6) {
        const value = random.nextInt(100)
        deque.pushBack(value)
        reference.pushBack(value)
      } else if (roll < 0.8) {
        const peeked = deque.front()
        const removed = deque.removeFront()
        const expected = reference.removeFront()
        expect(removed).toEqual(peeked)
        expect(removed.value).toBe(expected)
        expect(removed.found).toBe(expected !== undefined)
      } else {
        const peeked = deque.back()
        const removed = deque.removeBack()
        const expected = reference.removeBack()
        expect(removed).toEqual(peeked)
        expect(removed.value).toBe(expected)
        expect(removed.found).toBe(expected !== undefined)
      }

      expect(deque.length).toBe(reference.length)
      expect(deque.length).toBeLessThanOrEqual(deque.capacity)
      expect(deque.capacity).toBeGreaterThanOrEqual(lastCapacity)
      lastCapacity = deque.capacity
    }

    expect(deque.toArray()).toEqual(reference.toArray())
    expect([...deque.reversed()].map(([, value]) => value)).toEqual(reference.toArray().reverse())
  })

  it('should survive growth without losing or duplicating elements', () => {
    const random = createSeededRandom(99)
    for (let round = 0; round < 50; round++) {
      const deque = new Deque<number>()
      const size = random.nextInt(40)
      for (let i = 0; i < size; i++) {
        if (random.next() < 0.5) {
          deque.pushFront(i)
        } else {
          deque.pushBack(i)
        }
      }
      const n = random.nextInt(20)
      const before = deque.toArray()

      deque.grow(n)
      const capacity = deque.capacity
      expect(deque.toArray()).toEqual(before)

      for (let i = 0; i < n; i++) {
        deque.pushBack(size + i)
      }
      expect(deque.capacity).toBe(capacity)
      expect(deque.toArray()).toEqual([...before, ...Array.from({ length: n }, (_, i) => size + i)])
    }
  })

  it('should round-trip through toArray', () => {
    const random = createSeededRandom(5)
    const deque = new Deque<number>()
    for (let i = 0; i < 100; i++) {
      if (random.next() < 0.5) {
        deque.pushFront(i)
      } else {
        deque.pushBack(i)
      }
      if (random.next() < 0.2) {
        deque.removeFront()
      }
    }

    const rebuilt = new Deque<number>()
    for (const value of deque.toArray()) {
      rebuilt.pushBack(value)
    }

    expect(rebuilt.toArray()).toEqual(deque.toArray())
  })
})
