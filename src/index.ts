export { ChangeNotifier } from './base/common/changeNotifier'
export type { ChangeNotifierOptions, MutableRef } from './base/common/changeNotifier'
export { AsyncEvent, EventListener, ListenerState } from './base/common/asyncEvent'
export type { AsyncEventOptions } from './base/common/asyncEvent'
export { Emitter, Event, setGlobalLeakWarningThreshold } from './base/common/event'
export type { EmitterOptions } from './base/common/event'
export { CancellationToken, CancellationTokenSource } from './base/common/cancellation'
export {
  BugIndicatingError,
  CancellationError,
  isCancellationError,
  onUnexpectedError,
  setUnexpectedErrorHandler,
} from './base/common/errors'
export type { UnexpectedErrorHandler } from './base/common/errors'
export {
  Disposable,
  DisposableStore,
  DisposableTracker,
  RefCountDisposable,
  dispose,
  setDisposableTracker,
  toDisposable,
} from './base/common/lifecycle'
export type { IDisposable, IDisposableTracker } from './base/common/lifecycle'
