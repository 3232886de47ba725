class Node<E> {
  next: Node<E> | undefined = undefined
  prev: Node<E> | undefined = undefined
  linked = true

  constructor(readonly element: E) { }
}

/**
 * A doubly linked list. `push` hands back a function that removes exactly
 * the inserted element, in constant time.
 */
export class LinkedList<E> {
  private _first: Node<E> | undefined = undefined
  private _last: Node<E> | undefined = undefined
  private _size = 0

  get size(): number {
    return this._size
  }

  isEmpty(): boolean {
    return this._first === undefined
  }

  clear(): void {
    let node = this._first
    while (node) {
      const next = node.next
      node.prev = undefined
      node.next = undefined
      node.linked = false
      node = next
    }
    this._first = undefined
    this._last = undefined
    this._size = 0
  }

  push(element: E): () => void {
    const newNode = new Node(element)
    const last = this._last
    if (!last) {
      this._first = newNode
      this._last = newNode
    } else {
      newNode.prev = last
      last.next = newNode
      this._last = newNode
    }
    this._size += 1

    let didRemove = false
    return () => {
      if (!didRemove) {
        didRemove = true
        this._remove(newNode)
      }
    }
  }

  private _remove(node: Node<E>): void {
    // a node dropped by clear() must not touch the list again
    if (!node.linked) {
      return
    }
    const { prev, next } = node
    if (prev) {
      prev.next = next
    } else {
      this._first = next
    }
    if (next) {
      next.prev = prev
    } else {
      this._last = prev
    }
    node.prev = undefined
    node.next = undefined
    node.linked = false
    this._size -= 1
  }

  *[Symbol.iterator](): Iterator<E> {
    let node = this._first
    while (node) {
      yield node.element
      node = node.next
    }
  }
}
