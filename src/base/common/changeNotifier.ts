import { AsyncEvent, AsyncEventOptions, EventListener } from './asyncEvent'
import { CancellationToken, CancellationTokenSource } from './cancellation'
import { BugIndicatingError, isCancellationError } from './errors'
import { Emitter, Event } from './event'
import { Disposable, RefCountDisposable, toDisposable } from './lifecycle'

/**
 * Write access to the payload of a {@link ChangeNotifier}, valid only while
 * the update function runs.
 */
export interface MutableRef<T> {
  value: T
}

export type ChangeNotifierOptions = AsyncEventOptions

class UpdateRef<T> implements MutableRef<T> {
  private _revoked = false

  constructor(
    private readonly _get: () => T,
    private readonly _set: (value: T) => void,
  ) { }

  get value(): T {
    this._assertLive()
    return this._get()
  }

  set value(value: T) {
    this._assertLive()
    this._set(value)
  }

  revoke(): void {
    this._revoked = true
  }

  private _assertLive(): void {
    if (this._revoked) {
      throw new BugIndicatingError('MutableRef used after its update returned')
    }
  }
}

/**
 * Wraps a value so that code can wait for it to change.
 *
 * All writes go through {@link update}, and every call to `update` wakes the
 * listeners handed out by {@link listen}, whether the value changed or not.
 * Listeners are not told the new value; they read {@link value} after waking.
 *
 * ```
 * const settings = new ChangeNotifier({ theme: 'dark' })
 * const listener = settings.listen()
 * settings.update(ref => { ref.value = { theme: 'light' } })
 * await listener
 * settings.value.theme // 'light'
 * ```
 */
export class ChangeNotifier<T> extends Disposable {
  private _value: T
  private readonly _eventRef: RefCountDisposable<AsyncEvent>
  private _updating = false
  private _isDisposed = false
  private readonly _lifetime = new CancellationTokenSource()

  private readonly _onDidUpdate = this._register(new Emitter<void>())
  /**
   * Fires synchronously at the end of every {@link update}, after the waiting
   * listeners have been woken.
   */
  readonly onDidUpdate: Event<void> = this._onDidUpdate.event

  /**
   * @param event options for a new event, or a reference to an event shared
   * with other notifiers. A shared reference must already be acquired for this
   * notifier; it is released on {@link dispose}.
   */
  constructor(value: T, event: ChangeNotifierOptions | RefCountDisposable<AsyncEvent> = {}) {
    super()
    this._value = value
    this._eventRef = event instanceof RefCountDisposable ? event : new RefCountDisposable(new AsyncEvent(event))
    this._register(toDisposable(() => this._eventRef.release()))
  }

  /**
   * The current payload. Reading it never waits. Mutating an object payload
   * through this getter bypasses the notification; use {@link update}.
   */
  get value(): Readonly<T> {
    return this._value
  }

  get isDisposed(): boolean {
    return this._isDisposed
  }

  /**
   * A listener for the next {@link update} after this call.
   */
  listen(): EventListener {
    this._assertNotDisposed()
    return this._eventRef.object.listen()
  }

  /**
   * Runs `fn` with write access to the payload, then wakes every listener and
   * returns what `fn` returned. If `fn` throws, nothing is notified and the
   * payload keeps whatever `fn` wrote before throwing.
   */
  update<R>(fn: (ref: MutableRef<T>) => R): R {
    this._assertNotDisposed()
    if (this._updating) {
      throw new BugIndicatingError('ChangeNotifier#update must not be called from inside an update')
    }

    const ref = new UpdateRef<T>(() => this._value, value => { this._value = value })
    this._updating = true
    let result: R
    try {
      result = fn(ref)
    } finally {
      ref.revoke()
      this._updating = false
    }

    this._eventRef.object.notifyAll()
    this._onDidUpdate.fire()
    return result
  }

  /**
   * A new notifier holding a copy of the payload and sharing this notifier's
   * event. An update on either one wakes the listeners of both, while each
   * keeps reading its own copy.
   *
   * @param cloneValue copies the payload, `structuredClone` by default. Class
   * instances lose their prototype under `structuredClone`; pass a function for them.
   */
  clone(cloneValue: (value: T) => T = structuredClone): ChangeNotifier<T> {
    this._assertNotDisposed()
    return new ChangeNotifier(cloneValue(this._value), this._eventRef.acquire())
  }

  /**
   * Yields the payload after every update. The listener for the next update is
   * created before a value is handed out, so updates made while the consumer is
   * busy fold into one step.
   *
   * Ends when `token` is cancelled, when this notifier is disposed, or when the
   * shared event is disposed. A wait in progress ends right away in each case.
   */
  async *changes(token: CancellationToken = CancellationToken.None): AsyncIterableIterator<Readonly<T>> {
    this._assertNotDisposed()
    if (token.isCancellationRequested) {
      return
    }
    const source = new CancellationTokenSource(token)
    const onDispose = this._lifetime.token.onCancellationRequested(() => source.cancel())
    let listener = this.listen()
    try {
      while (!source.token.isCancellationRequested) {
        try {
          await listener.wait(source.token)
        } catch (err) {
          if (isCancellationError(err)) {
            return
          }
          throw err
        }
        if (source.token.isCancellationRequested) {
          return
        }
        listener = this.listen()
        yield this._value
      }
    } finally {
      listener.dispose()
      onDispose.dispose()
      source.dispose()
    }
  }

  override dispose(): void {
    if (this._isDisposed) {
      return
    }
    this._isDisposed = true
    this._lifetime.dispose(true)
    super.dispose()
  }

  private _assertNotDisposed(): void {
    if (this._isDisposed) {
      throw new BugIndicatingError('ChangeNotifier has been disposed')
    }
  }
}
