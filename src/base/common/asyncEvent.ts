import { CancellationToken } from './cancellation'
import { BugIndicatingError, CancellationError, onUnexpectedError } from './errors'
import { createLeakageMonitor, LeakageMonitor } from './event'
import { IDisposable, markAsDisposed, trackDisposable } from './lifecycle'
import { LinkedList } from './linkedList'

export enum ListenerState {
  /** Created by `listen()`, not waited on yet. */
  Created,
  /** Waiting, and present in the waiter set of its event. */
  Registered,
  /** Reached by a `notifyAll()`; the awaiting code has not resumed yet. */
  Notified,
  /** The awaiting code resumed. The listener cannot be waited on again. */
  Consumed,
  /** Disposed, or its wait was cancelled. */
  Cancelled,
}

export interface AsyncEventOptions {
  /**
   * Number of registered waiters that are allowed before assuming a leak.
   * Defaults to the global threshold, see `setGlobalLeakWarningThreshold`.
   */
  leakWarningThreshold?: number

  /**
   * Called after a waiter joins an empty waiter set.
   */
  onDidAddFirstWaiter?(): void

  /**
   * Called when the waiter set becomes empty, whether by a notification,
   * a cancelled or disposed listener, or the disposal of the event. After a
   * notification it runs once every drained listener has been woken.
   */
  onDidRemoveLastWaiter?(): void
}

type WaiterHook = 'onDidAddFirstWaiter' | 'onDidRemoveLastWaiter'

/**
 * What the event keeps per registered listener: the handle that resumes the
 * awaiting code, not the listener itself.
 */
interface Waiter {
  notify(): void
  cancel(): void
}

class WakeHandle {
  readonly promise: Promise<void>
  private _settle: ((error?: Error) => void) | undefined

  constructor() {
    this.promise = new Promise<void>((resolve, reject) => {
      this._settle = error => error ? reject(error) : resolve()
    })
  }

  wake(): void {
    const settle = this._settle
    this._settle = undefined
    settle?.()
  }

  cancel(error: Error): void {
    const settle = this._settle
    this._settle = undefined
    settle?.(error)
  }
}

/**
 * A broadcast wakeup. {@link listen} hands out single-use listeners and
 * {@link notifyAll} wakes every listener created before it.
 *
 * A listener that was created but not yet waited on is not in the waiter set.
 * It remembers the generation it was created in instead: once `notifyAll` has
 * moved past that generation, waiting on it completes right away.
 *
 * ```
 * const event = new AsyncEvent()
 * const listener = event.listen()
 * setTimeout(() => event.notifyAll(), 10)
 * await listener
 * ```
 */
export class AsyncEvent implements IDisposable {
  private _generation = 0
  private readonly _waiters = new LinkedList<Waiter>()
  private readonly _leakageMon?: LeakageMonitor
  private _disposed = false

  constructor(private readonly _options?: AsyncEventOptions) {
    this._leakageMon = createLeakageMonitor(_options?.leakWarningThreshold)
  }

  /** Number of `notifyAll()` calls so far. */
  get generation(): number {
    return this._generation
  }

  /** Number of listeners currently waiting. */
  get size(): number {
    return this._waiters.size
  }

  get isDisposed(): boolean {
    return this._disposed
  }

  hasWaiters(): boolean {
    return !this._waiters.isEmpty()
  }

  /**
   * Creates a listener for the next notification after this call. Never waits.
   */
  listen(): EventListener {
    return new EventListener(this, this._generation)
  }

  /**
   * Shorthand for `listen().wait(token)`.
   */
  wait(token?: CancellationToken): Promise<void> {
    return this.listen().wait(token)
  }

  /**
   * Wakes every listener created before this call. Returns before any of the
   * woken code runs; that code continues in later microtasks.
   */
  notifyAll(): void {
    if (this._disposed) {
      return
    }
    this._generation++
    if (this._waiters.isEmpty()) {
      return
    }

    const waiters = Array.from(this._waiters)
    this._waiters.clear()
    for (const waiter of waiters) {
      waiter.notify()
    }
    this._runHook('onDidRemoveLastWaiter')
  }

  /**
   * Adds `waiter` to the waiter set and returns the function that takes it out
   * again. For use by {@link EventListener} only.
   */
  _register(waiter: Waiter): () => void {
    const firstWaiter = this._waiters.isEmpty()
    const removeMonitor = this._leakageMon?.check(this._waiters.size + 1)
    const removeWaiter = this._waiters.push(waiter)
    if (firstWaiter) {
      this._runHook('onDidAddFirstWaiter')
    }

    let didUnregister = false
    return () => {
      if (didUnregister) {
        return
      }
      didUnregister = true
      removeMonitor?.()
      const hadWaiters = !this._waiters.isEmpty()
      removeWaiter()
      if (hadWaiters && this._waiters.isEmpty()) {
        this._runHook('onDidRemoveLastWaiter')
      }
    }
  }

  /**
   * Cancels every waiting listener with a {@link CancellationError}. Listeners
   * created afterwards fail the same way unless a notification already reached them.
   */
  dispose(): void {
    if (this._disposed) {
      return
    }
    this._disposed = true

    const waiters = Array.from(this._waiters)
    this._waiters.clear()
    for (const waiter of waiters) {
      waiter.cancel()
    }
    if (waiters.length > 0) {
      this._runHook('onDidRemoveLastWaiter')
    }
    this._leakageMon?.dispose()
  }

  // hook errors must not strand a listener that is half registered or half woken
  private _runHook(hook: WaiterHook): void {
    try {
      this._options?.[hook]?.()
    } catch (e) {
      onUnexpectedError(e)
    }
  }
}

/**
 * A single-use handle for the next notification of an {@link AsyncEvent}.
 *
 * It can be waited on once, either with {@link wait} or by awaiting it directly,
 * which is why it must never be returned from an `async` function: the runtime
 * would await it on the caller's behalf.
 *
 * Disposing a listener that is still waiting takes it out of the waiter set and
 * rejects its wait with a {@link CancellationError}.
 */
export class EventListener implements PromiseLike<void>, IDisposable {
  private _state = ListenerState.Created
  private _promise: Promise<void> | undefined = undefined
  private _wake: WakeHandle | undefined = undefined
  private _unregister: (() => void) | undefined = undefined
  private _tokenListener: IDisposable | undefined = undefined

  constructor(
    private readonly _event: AsyncEvent,
    private readonly _generation: number,
  ) {
    trackDisposable(this)
  }

  get state(): ListenerState {
    if (this._state === ListenerState.Created && this._event.generation !== this._generation) {
      return ListenerState.Notified
    }
    return this._state
  }

  /**
   * Resolves on the first notification of the event after this listener was
   * created, or right away if that notification already happened.
   *
   * Waiting again while the first wait is pending returns the same promise;
   * the token of the first call stays in charge. Waiting after the wait
   * completed is a bug.
   */
  wait(token: CancellationToken = CancellationToken.None): Promise<void> {
    if (this._state === ListenerState.Consumed) {
      return Promise.reject(new BugIndicatingError('EventListener has already been awaited'))
    }
    if (this._promise) {
      return this._promise
    }
    if (this._state === ListenerState.Cancelled) {
      return Promise.reject(new CancellationError())
    }

    if (this._event.generation !== this._generation) {
      this._state = ListenerState.Notified
      this._promise = Promise.resolve().then(() => this._consume())
      return this._promise
    }
    if (this._event.isDisposed || token.isCancellationRequested) {
      this._release()
      return Promise.reject(new CancellationError())
    }

    const wake = new WakeHandle()
    this._wake = wake
    this._promise = wake.promise.then(() => this._consume())
    this._state = ListenerState.Registered
    this._unregister = this._event._register({
      notify: () => this._notify(),
      cancel: () => this._cancel(),
    })
    this._tokenListener = token.onCancellationRequested(() => this._cancel())
    return this._promise
  }

  then<TResult1 = void, TResult2 = never>(
    onfulfilled?: ((value: void) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
  ): Promise<TResult1 | TResult2> {
    return this.wait().then(onfulfilled, onrejected)
  }

  dispose(): void {
    switch (this._state) {
      case ListenerState.Created:
        this._release()
        break
      case ListenerState.Registered:
        this._cancel()
        break
    }
  }

  private _notify(): void {
    if (this._state !== ListenerState.Registered) {
      return
    }
    this._state = ListenerState.Notified
    this._detach()
    this._wake?.wake()
  }

  private _cancel(): void {
    if (this._state !== ListenerState.Registered) {
      return
    }
    this._detach()
    this._release()
    this._wake?.cancel(new CancellationError())
  }

  private _consume(): void {
    this._state = ListenerState.Consumed
    this._wake = undefined
    markAsDisposed(this)
  }

  private _release(): void {
    this._state = ListenerState.Cancelled
    markAsDisposed(this)
  }

  private _detach(): void {
    this._unregister?.()
    this._unregister = undefined
    this._tokenListener?.dispose()
    this._tokenListener = undefined
  }
}
