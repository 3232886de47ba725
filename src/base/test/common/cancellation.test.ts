import { describe, expect, it } from 'vitest'
import { CancellationToken, CancellationTokenSource } from '../../common/cancellation'
import { CancellationError, isCancellationError } from '../../common/errors'

describe('CancellationToken', () => {
  it('None is never cancelled', () => {
    expect(CancellationToken.None.isCancellationRequested).toBe(false)
  })

  it('a source cancelled before its token is read hands out a cancelled token', () => {
    const source = new CancellationTokenSource()
    source.cancel()
    expect(source.token.isCancellationRequested).toBe(true)
    expect(source.token).toBe(CancellationToken.Cancelled)
  })

  it('fires onCancellationRequested once', () => {
    const source = new CancellationTokenSource()
    let count = 0
    source.token.onCancellationRequested(() => count++)

    source.cancel()
    source.cancel()

    expect(count).toBe(1)
    expect(source.token.isCancellationRequested).toBe(true)
  })

  it('calls listeners added after cancellation on a later turn', async () => {
    const source = new CancellationTokenSource()
    const token = source.token
    source.cancel()

    const called = new Promise<void>(resolve => token.onCancellationRequested(() => resolve()))
    await expect(called).resolves.toBeUndefined()
  })

  it('follows its parent', () => {
    const parent = new CancellationTokenSource()
    const child = new CancellationTokenSource(parent.token)

    parent.cancel()

    expect(child.token.isCancellationRequested).toBe(true)
    child.dispose()
  })

  it('stops following its parent once disposed', () => {
    const parent = new CancellationTokenSource()
    const child = new CancellationTokenSource(parent.token)
    const token = child.token
    child.dispose()

    parent.cancel()

    expect(token.isCancellationRequested).toBe(false)
  })

  it('dispose(true) cancels', () => {
    const source = new CancellationTokenSource()
    const token = source.token
    source.dispose(true)
    expect(token.isCancellationRequested).toBe(true)
  })
})

describe('CancellationError', () => {
  it('is recognised by isCancellationError', () => {
    const error = new CancellationError()
    expect(error.name).toBe('Canceled')
    expect(error.message).toBe('Canceled')
    expect(isCancellationError(error)).toBe(true)
  })

  it('recognises look-alikes but not other errors', () => {
    const lookAlike = new Error('Canceled')
    lookAlike.name = 'Canceled'

    expect(isCancellationError(lookAlike)).toBe(true)
    expect(isCancellationError(new Error('Canceled'))).toBe(false)
    expect(isCancellationError('Canceled')).toBe(false)
  })
})
