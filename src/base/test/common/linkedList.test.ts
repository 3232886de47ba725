import { describe, expect, it } from 'vitest'
import { LinkedList } from '../../common/linkedList'

describe('LinkedList', () => {
  it('keeps insertion order', () => {
    const list = new LinkedList<string>()
    list.push('a')
    list.push('b')
    list.push('c')

    expect(Array.from(list)).toEqual(['a', 'b', 'c'])
    expect(list.size).toBe(3)
    expect(list.isEmpty()).toBe(false)
  })

  it('removes by the returned handle, from any position', () => {
    const list = new LinkedList<number>()
    const removeFirst = list.push(1)
    const removeMiddle = list.push(2)
    const removeLast = list.push(3)

    removeMiddle()
    expect(Array.from(list)).toEqual([1, 3])

    removeLast()
    expect(Array.from(list)).toEqual([1])

    removeFirst()
    expect(Array.from(list)).toEqual([])
    expect(list.isEmpty()).toBe(true)
    expect(list.size).toBe(0)
  })

  it('ignores a second call of the same remove handle', () => {
    const list = new LinkedList<number>()
    const remove = list.push(1)
    list.push(2)

    remove()
    remove()

    expect(Array.from(list)).toEqual([2])
    expect(list.size).toBe(1)
  })

  it('ignores remove handles of elements dropped by clear', () => {
    const list = new LinkedList<string>()
    const removeStale = list.push('stale')
    list.clear()
    list.push('fresh')

    removeStale()

    expect(Array.from(list)).toEqual(['fresh'])
    expect(list.size).toBe(1)
  })
})
