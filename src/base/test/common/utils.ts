import { afterEach, beforeEach } from 'vitest'
import { DisposableStore, DisposableTracker, IDisposable, setDisposableTracker } from '../../common/lifecycle'

/**
 * Installs a {@link DisposableTracker} around every test of the enclosing suite
 * and fails the test if it leaves tracked disposables behind. Values passed to
 * the returned `add` are disposed after each test.
 */
export function ensureNoDisposablesAreLeakedInTestSuite(): Pick<DisposableStore, 'add'> {
  let tracker: DisposableTracker | undefined
  let store = new DisposableStore()

  beforeEach(() => {
    store = new DisposableStore()
    tracker = new DisposableTracker()
    setDisposableTracker(tracker)
  })

  afterEach(() => {
    store.dispose()
    setDisposableTracker(null)
    const leaked = tracker?.getTrackedDisposables() ?? []
    tracker = undefined
    if (leaked.length > 0) {
      throw new Error(`There are ${leaked.length} undisposed disposables!`)
    }
  })

  return {
    add<T extends IDisposable>(o: T): T {
      return store.add(o)
    }
  }
}

/** Lets pending promise jobs and one macrotask turn run. */
export function flushEventLoop(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve))
}
