import { onUnexpectedError } from './errors'
import { Disposable, DisposableStore, IDisposable, toDisposable } from './lifecycle'
import { LinkedList } from './linkedList'

/**
 * To an event a function with one or zero parameters
 * can be subscribed. The event is the subscriber function itself.
 */
export interface Event<T> {
  (listener: (e: T) => unknown, thisArgs?: unknown, disposables?: IDisposable[] | DisposableStore): IDisposable
}

let _globalLeakWarningThreshold = -1
export function setGlobalLeakWarningThreshold(n: number): IDisposable {
  const oldValue = _globalLeakWarningThreshold
  _globalLeakWarningThreshold = n
  return {
    dispose() {
      _globalLeakWarningThreshold = oldValue
    }
  }
}

export namespace Event {
  export const None: Event<never> = () => Disposable.None

  /**
   * Given an event, returns another event which is only fired once.
   * @param event The event source for the new event.
   */
  export function once<T>(event: Event<T>): Event<T> {
    return (listener, thisArgs = null, disposables?) => {
      // we need this, in case the event fires during the listener call
      let didFire = false
      let result: IDisposable | undefined = undefined
      result = event(e => {
        if (didFire) {
          return
        } else if (result) {
          result.dispose()
        } else {
          didFire = true
        }
        return listener.call(thisArgs, e)
      }, null, disposables)

      if (didFire) {
        result.dispose()
      }
      return result
    }
  }

  /**
   * Resolves with the next value of `event`.
   */
  export function toPromise<T>(event: Event<T>): Promise<T> {
    return new Promise(resolve => once(event)(resolve))
  }
}

export interface EmitterOptions {
  /**
   * Optional function that's called *before* the very first listener is added.
   */
  onWillAddFirstListener?(): void

  /**
   * Optional function that's called *after* the very first listener is added.
   */
  onDidAddFirstListener?(): void

  /**
   * Optional function that's called *after* remove the very last listener.
   */
  onDidRemoveLastListener?(): void

  /**
   * Number of listeners that are allowed before assuming a leak. Default to a
   * global configured value.
   */
  leakWarningThreshold?: number
}

class EmitterListener<T> {
  constructor(
    readonly callback: (e: T) => unknown,
    readonly callbackThis: unknown,
  ) { }

  invoke(e: T): void {
    this.callback.call(this.callbackThis, e)
  }
}

/**
 * The Emitter can be used to expose an Event to the public
 * to fire it from the insides.
 * Sample:
 * ```
 * class Document {
 *
 *   private readonly _onDidChange = new Emitter<(value:string)=>any>();
 *
 *   public onDidChange = this._onDidChange.event;
 *
 *   // getter-style
 *   // get onDidChange(): Event<(value:string)=>any> {
 *   //   return this._onDidChange.event;
 *   // }
 *
 *   private _doIt() {
 *     //...
 *     this._onDidChange.fire(value);
 *   }
 * }
 * ```
 */
export class Emitter<T> {
  private readonly _options?: EmitterOptions
  private readonly _leakageMon?: LeakageMonitor
  private _disposed = false
  private _event?: Event<T>
  private _listeners?: LinkedList<EmitterListener<T>>

  constructor(options?: EmitterOptions) {
    this._options = options
    this._leakageMon = createLeakageMonitor(options?.leakWarningThreshold)
  }

  dispose(): void {
    if (!this._disposed) {
      this._disposed = true

      if (this._listeners && !this._listeners.isEmpty()) {
        this._listeners.clear()
        this._options?.onDidRemoveLastListener?.()
      }
      this._leakageMon?.dispose()
    }
  }

  /**
   * For the public to allow to subscribe
   * to events from this Emitter
   */
  get event(): Event<T> {
    if (!this._event) {
      this._event = (callback: (e: T) => unknown, thisArgs?: unknown, disposables?: IDisposable[] | DisposableStore) => {
        if (this._disposed) {
          return Disposable.None
        }
        if (!this._listeners) {
          this._listeners = new LinkedList()
        }

        if (this._leakageMon && this._listeners.size > this._leakageMon.threshold * 3) {
          console.warn(`[${this._leakageMon.name}] REFUSES to accept new listeners because it exceeded its threshold by far`)
          return Disposable.None
        }

        const firstListener = this._listeners.isEmpty()
        if (firstListener) {
          this._options?.onWillAddFirstListener?.()
        }

        const removeMonitor = this._leakageMon?.check(this._listeners.size + 1)
        const removeListener = this._listeners.push(new EmitterListener(callback, thisArgs))

        if (firstListener) {
          this._options?.onDidAddFirstListener?.()
        }

        const result = toDisposable(() => {
          removeMonitor?.()
          if (!this._disposed) {
            removeListener()
            if (this._listeners?.isEmpty()) {
              this._options?.onDidRemoveLastListener?.()
            }
          }
        })

        if (disposables instanceof DisposableStore) {
          disposables.add(result)
        } else if (Array.isArray(disposables)) {
          disposables.push(result)
        }

        return result
      }
    }
    return this._event
  }

  /**
   * To be kept private to fire an event to
   * subscribers
   */
  fire(event: T): void {
    if (!this._listeners || this._listeners.isEmpty()) {
      return
    }
    // listeners added while delivering wait for the next fire
    for (const listener of Array.from(this._listeners)) {
      try {
        listener.invoke(event)
      } catch (e) {
        onUnexpectedError(e)
      }
    }
  }

  hasListeners(): boolean {
    return !!this._listeners && !this._listeners.isEmpty()
  }
}

class Stacktrace {
  static create(): Stacktrace {
    return new Stacktrace(new Error().stack ?? '')
  }

  constructor(readonly value: string) { }

  print(): void {
    console.warn(this.value.split('\n').slice(2).join('\n'))
  }
}

/**
 * Counts registrations per call site and warns, through `console.warn`, once
 * the number of live listeners passes a threshold.
 */
export class LeakageMonitor {
  private _stacks: Map<string, number> | undefined
  private _warnCountdown = 0

  constructor(
    readonly threshold: number,
    readonly name: string = Math.random().toString(18).slice(2, 5)
  ) { }

  dispose(): void {
    this._stacks?.clear()
  }

  /**
   * Records a registration that brings the count to `listenerCount`. Returns a
   * function to call when that registration goes away.
   */
  check(listenerCount: number): (() => void) | undefined {
    const threshold = this.threshold
    if (threshold <= 0 || listenerCount < Math.ceil(threshold * 0.2)) {
      return undefined
    }

    const stack = Stacktrace.create()
    const stacks = this._stacks ?? (this._stacks = new Map())
    stacks.set(stack.value, (stacks.get(stack.value) ?? 0) + 1)

    if (listenerCount >= threshold) {
      this._warnCountdown -= 1
      if (this._warnCountdown <= 0) {
        this._warnCountdown = threshold * 0.5

        let topStack: string | undefined
        let topCount = 0
        for (const [value, count] of stacks) {
          if (!topStack || topCount < count) {
            topStack = value
            topCount = count
          }
        }
        console.warn(`[${this.name}] potential listener LEAK detected, having ${listenerCount} listeners already. MOST frequent listener (${topCount}):`)
        new Stacktrace(topStack ?? '').print()
      }
    }

    return () => {
      const count = stacks.get(stack.value) ?? 0
      if (count <= 1) {
        stacks.delete(stack.value)
      } else {
        stacks.set(stack.value, count - 1)
      }
    }
  }
}

/**
 * A monitor for `threshold` listeners, falling back to the global threshold.
 * `undefined` when neither is set.
 */
export function createLeakageMonitor(threshold?: number): LeakageMonitor | undefined {
  const effective = threshold ?? _globalLeakWarningThreshold
  return effective > 0 ? new LeakageMonitor(effective) : undefined
}
