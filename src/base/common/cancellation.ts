import { Emitter, Event } from './event'
import { IDisposable } from './lifecycle'

export interface CancellationToken {
  /**
   * A flag signalling is cancellation has been requested.
   */
  readonly isCancellationRequested: boolean

  /**
   * An event which fires when cancellation is requested. This event
   * only ever fires `once` as cancellation can only happen once. Listeners
   * that are registered after cancellation will be called (next event loop run),
   * but also only once.
   *
   * @event
   */
  readonly onCancellationRequested: Event<void>
}

const shortcutEvent: Event<void> = Object.freeze<Event<void>>(function (callback, context?): IDisposable {
  const handle = setTimeout(() => callback.call(context, undefined), 0)
  return { dispose() { clearTimeout(handle) } }
})

export namespace CancellationToken {
  export const None = Object.freeze<CancellationToken>({
    isCancellationRequested: false,
    onCancellationRequested: Event.None
  })

  export const Cancelled = Object.freeze<CancellationToken>({
    isCancellationRequested: true,
    onCancellationRequested: shortcutEvent
  })
}

class MutableToken implements CancellationToken {
  private _isCancelled = false
  private _emitter: Emitter<void> | null = null

  public cancel(): void {
    if (!this._isCancelled) {
      this._isCancelled = true

      if (this._emitter) {
        this._emitter.fire()
        this.dispose()
      }
    }
  }

  get isCancellationRequested(): boolean {
    return this._isCancelled
  }

  get onCancellationRequested(): Event<void> {
    if (this._isCancelled) {
      return shortcutEvent
    }
    if (!this._emitter) {
      this._emitter = new Emitter<void>()
    }
    return this._emitter.event
  }

  public dispose(): void {
    if (this._emitter) {
      this._emitter.dispose()
      this._emitter = null
    }
  }
}

export class CancellationTokenSource {
  private _token?: CancellationToken = undefined
  private readonly _parentListener?: IDisposable = undefined

  constructor(parent?: CancellationToken) {
    this._parentListener = parent && parent.onCancellationRequested(this.cancel, this)
  }

  get token(): CancellationToken {
    if (!this._token) {
      this._token = new MutableToken()
    }
    return this._token
  }

  cancel(): void {
    if (!this._token) {
      this._token = CancellationToken.Cancelled
    } else if (this._token instanceof MutableToken) {
      this._token.cancel()
    }
  }

  dispose(cancel: boolean = false): void {
    if (cancel) {
      this.cancel()
    }
    this._parentListener?.dispose()
    if (!this._token) {
      // ensure to initialize with an empty token if we had none
      this._token = CancellationToken.None
    } else if (this._token instanceof MutableToken) {
      // actually dispose
      this._token.dispose()
    }
  }
}
