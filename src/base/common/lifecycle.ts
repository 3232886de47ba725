import { once } from './functional'
import { Iterable } from './iterator'

let disposableTracker: IDisposableTracker | null = null

export interface IDisposableTracker {
  /** Is called on construction of a disposable. */
  trackDisposable(disposable: IDisposable): void

  /**
   * Is called when a disposable is registered as child of another disposable (e.g. {@link DisposableStore})
   * If parent is `null`, the disposable is removed from its former parent.
   */
  setParent(child: IDisposable, parent: IDisposable | null): void

  /** Is called when a disposable is disposed. */
  markAsDisposed(disposable: IDisposable): void

  /** Indicates that the given object is a singleton which does not need to be disposed. */
  markAsSingleton(disposable: IDisposable): void
}

interface DisposableInfo {
  value: IDisposable
  source: string | null
  parent: IDisposable | null
  isSingleton: boolean
}

/**
 * Remembers every tracked disposable that has not been disposed yet, together with
 * the stack it was created on. Install it with {@link setDisposableTracker}.
 */
export class DisposableTracker implements IDisposableTracker {
  private readonly livingDisposables = new Map<IDisposable, DisposableInfo>()

  private getDisposableData(d: IDisposable): DisposableInfo {
    let val = this.livingDisposables.get(d)
    if (!val) {
      val = { parent: null, source: null, isSingleton: false, value: d }
      this.livingDisposables.set(d, val)
    }
    return val
  }

  trackDisposable(d: IDisposable): void {
    const data = this.getDisposableData(d)
    if (!data.source) {
      data.source = new Error().stack ?? ''
    }
  }

  setParent(child: IDisposable, parent: IDisposable | null): void {
    this.getDisposableData(child).parent = parent
  }

  markAsDisposed(x: IDisposable): void {
    this.livingDisposables.delete(x)
  }

  markAsSingleton(disposable: IDisposable): void {
    this.getDisposableData(disposable).isSingleton = true
  }

  private getRootParent(data: DisposableInfo, cache: Map<DisposableInfo, DisposableInfo>): DisposableInfo {
    const cached = cache.get(data)
    if (cached) {
      return cached
    }
    const result = data.parent ? this.getRootParent(this.getDisposableData(data.parent), cache) : data
    cache.set(data, result)
    return result
  }

  /**
   * Disposables that were created while the tracker was installed, are still
   * alive, and do not hang off a singleton.
   */
  getTrackedDisposables(): IDisposable[] {
    const rootParentCache = new Map<DisposableInfo, DisposableInfo>()
    return [...this.livingDisposables.values()]
      .filter(info => info.source !== null && !this.getRootParent(info, rootParentCache).isSingleton)
      .map(info => info.value)
  }
}

/**
 * An object that performs a cleanup operation when .dispose() is called.
 * Some examples of how disposables are used:
 * - A listener that leaves the waiter set of its event when .dispose() is called.
 * - A callback subscription that unregisters itself when .dispose() is called.
 * - A change notifier that releases its share of a common event.
 */
export interface IDisposable {
  dispose(): void
}

export function setDisposableTracker(tracker: IDisposableTracker | null): void {
  disposableTracker = tracker
}

export function trackDisposable<T extends IDisposable>(x: T): T {
  disposableTracker?.trackDisposable(x)
  return x
}

export function markAsDisposed(disposable: IDisposable): void {
  disposableTracker?.markAsDisposed(disposable)
}

function setParentOfDisposable(child: IDisposable, parent: IDisposable | null): void {
  disposableTracker?.setParent(child, parent)
}

export function markAsSingleton<T extends IDisposable>(singleton: T): T {
  disposableTracker?.markAsSingleton(singleton)
  return singleton
}

/** Disposes of the value(s) passed in. */
export function dispose<T extends IDisposable>(disposable: T): T
export function dispose<T extends IDisposable>(disposable: T | undefined): T | undefined
export function dispose<T extends IDisposable>(disposables: Iterable<T>): Iterable<T>
export function dispose<T extends IDisposable>(arg: T | Iterable<T> | undefined): T | Iterable<T> | undefined {
  if (Iterable.is<T>(arg)) {
    const errors: unknown[] = []
    for (const d of arg) {
      if (d) {
        try {
          d.dispose()
        } catch (e) {
          errors.push(e)
        }
      }
    }

    if (errors.length === 1) {
      throw errors[0]
    } else if (errors.length > 1) {
      throw new AggregateError(errors, 'Encountered errors while disposing of store')
    }

    return Array.isArray(arg) ? [] : arg
  } else if (arg) {
    arg.dispose()
    return arg
  }
  return undefined
}

export function toDisposable(fn: () => void): IDisposable {
  const self = trackDisposable({
    dispose: once(() => {
      markAsDisposed(self)
      fn()
    })
  })
  return self
}

/**
 * Manage a collection of disposable values.
 *
 * This is the preferred way to manage multiple disposables. A `DisposableStore` is safer to work with than an
 * `IDisposable[]` as it considers edge cases, such as registering the same value multiple times or adding an item to a
 * store that has already been disposed of.
 */
export class DisposableStore implements IDisposable {
  private readonly _toDispose = new Set<IDisposable>()
  private _isDisposed = false

  constructor() {
    trackDisposable(this)
  }

  get isDisposed(): boolean {
    return this._isDisposed
  }

  dispose(): void {
    if (this._isDisposed) {
      return
    }

    markAsDisposed(this)
    this._isDisposed = true
    this.clear()
  }

  clear(): void {
    if (this._toDispose.size === 0) {
      return
    }
    try {
      dispose(this._toDispose)
    } finally {
      this._toDispose.clear()
    }
  }

  add<T extends IDisposable>(o: T): T {
    if ((o as IDisposable) === this) {
      throw new Error('Cannot register a disposable on itself!')
    }
    setParentOfDisposable(o, this)
    if (this._isDisposed) {
      console.warn(new Error('Trying to add a disposable to a DisposableStore that has already been disposed of. The added object will be leaked!').stack)
    } else {
      this._toDispose.add(o)
    }
    return o
  }
}

/**
 * Abstract base class for a {@link IDisposable disposable} object.
 *
 * Subclasses can {@linkcode _register} disposables that will be automatically cleaned up when the object is disposed.
 */
export abstract class Disposable implements IDisposable {
  static readonly None = Object.freeze<IDisposable>({ dispose() { } })

  protected readonly _store = new DisposableStore()

  protected constructor() {
    trackDisposable(this)
    setParentOfDisposable(this._store, this)
  }

  public dispose(): void {
    markAsDisposed(this)
    this._store.dispose()
  }

  /**
   * Adds o to the collection of disposables managed by this object.
   */
  protected _register<T extends IDisposable>(o: T): T {
    if ((o as IDisposable) === this) {
      throw new Error('Cannot register a disposable on itself!')
    }
    return this._store.add(o)
  }
}

/**
 * Shares one disposable between several owners. The creator holds the
 * first reference, every {@link acquire} adds one, and the wrapped value
 * is disposed when the last reference is released.
 */
export class RefCountDisposable<T extends IDisposable = IDisposable> {
  private _counter = 1

  constructor(readonly object: T) { }

  get count(): number {
    return this._counter
  }

  acquire(): this {
    if (this._counter === 0) {
      throw new Error('Cannot acquire a reference to an already released disposable')
    }
    this._counter++
    return this
  }

  release(): this {
    if (this._counter > 0 && --this._counter === 0) {
      this.object.dispose()
    }
    return this
  }
}
