export type UnexpectedErrorHandler = (error: unknown) => void

// Rethrow on a fresh task so the error is reported as uncaught
// without unwinding the code that fired the event.
const defaultUnexpectedErrorHandler: UnexpectedErrorHandler = error => {
  setTimeout(() => {
    throw error
  }, 0)
}

export class ErrorHandler {
  private _unexpectedErrorHandler: UnexpectedErrorHandler = defaultUnexpectedErrorHandler

  setUnexpectedErrorHandler(handler: UnexpectedErrorHandler | null): void {
    this._unexpectedErrorHandler = handler ?? defaultUnexpectedErrorHandler
  }

  onUnexpectedError(error: unknown): void {
    this._unexpectedErrorHandler(error)
  }
}

export const errorHandler = new ErrorHandler()

/**
 * Replaces the handler that receives errors thrown by event callbacks.
 * Passing `null` restores the default, which rethrows asynchronously.
 */
export function setUnexpectedErrorHandler(handler: UnexpectedErrorHandler | null): void {
  errorHandler.setUnexpectedErrorHandler(handler)
}

/**
 * Reports an error nobody is awaiting. Cancellation errors are expected and are dropped.
 */
export function onUnexpectedError(error: unknown): void {
  if (!isCancellationError(error)) {
    errorHandler.onUnexpectedError(error)
  }
}

const canceledName = 'Canceled'

/**
 * Checks if the given error is a cancellation error, either an instance of
 * {@link CancellationError} or an error that looks like one.
 */
export function isCancellationError(error: unknown): boolean {
  if (error instanceof CancellationError) {
    return true
  }
  return error instanceof Error && error.name === canceledName && error.message === canceledName
}

/**
 * The error a wait rejects with when it is cancelled through a token,
 * by disposing its listener, or by disposing the event it waits on.
 */
export class CancellationError extends Error {
  constructor() {
    super(canceledName)
    this.name = this.message
  }
}

/**
 * Thrown on misuse of an API, e.g. awaiting a listener twice. It always
 * points at a bug in the calling code and is never meant to be caught.
 */
export class BugIndicatingError extends Error {
  constructor(message?: string) {
    super(message || 'An unexpected bug occurred.')
    this.name = 'BugIndicatingError'
  }
}
