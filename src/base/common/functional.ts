/**
 * Wraps `fn` so that only the first call runs it. Later calls are no-ops.
 */
export function once<TArgs extends unknown[]>(fn: (...args: TArgs) => void): (...args: TArgs) => void {
  let didCall = false
  return (...args: TArgs) => {
    if (didCall) {
      return
    }
    didCall = true
    fn(...args)
  }
}
