export namespace Iterable {
  export function is<T = unknown>(thing: unknown): thing is Iterable<T> {
    return !!thing && typeof thing === 'object' && Symbol.iterator in thing && typeof thing[Symbol.iterator] === 'function'
  }
}
