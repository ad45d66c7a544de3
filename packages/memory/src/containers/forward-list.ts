/**
 * Forward List
 *
 * Singly linked edge storage. Its cursors only move forward, which makes it
 * the minimal positional edge backend.
 */

import { EndOfRangeError, type Cursor, type ForwardStorage, type SizedStorage } from "@graphdesc/descriptors"
import { END } from "./linked-list"

export class ForwardNode<T> {
  next: ForwardNode<T> = this

  constructor(readonly entry: T | typeof END) {}
}

export class ForwardCursor<T> implements Cursor<T> {
  constructor(private readonly node: ForwardNode<T>) {}

  /**
   * @throws EndOfRangeError at the end position
   */
  get(): T {
    const entry = this.node.entry
    if (entry === END) {
      throw new EndOfRangeError("ForwardList")
    }
    return entry
  }

  next(): ForwardCursor<T> {
    return new ForwardCursor(this.node.next)
  }

  equals(other: Cursor<T>): boolean {
    return other instanceof ForwardCursor && other.node === this.node
  }
}

/**
 * @example
 * ```typescript
 * const g = [new ForwardList([1, 2]), new ForwardList([2]), new ForwardList<number>()]
 * degree(g, new IndexedVertexDescriptor(0)) // 2
 * ```
 */
export class ForwardList<T> implements ForwardStorage<T>, SizedStorage, Iterable<T> {
  // Sits before the first element; `pushFront` links after it
  private readonly head = new ForwardNode<T>(END)
  // The end position; its `next` is itself
  private readonly tail = new ForwardNode<T>(END)
  private last: ForwardNode<T>
  private count = 0

  constructor(values?: Iterable<T>) {
    this.head.next = this.tail
    this.last = this.head
    if (values) {
      for (const value of values) this.pushBack(value)
    }
  }

  get size(): number {
    return this.count
  }

  pushFront(value: T): this {
    const node = new ForwardNode<T>(value)
    node.next = this.head.next
    this.head.next = node
    if (this.last === this.head) this.last = node
    this.count++
    return this
  }

  pushBack(value: T): this {
    const node = new ForwardNode<T>(value)
    node.next = this.tail
    this.last.next = node
    this.last = node
    this.count++
    return this
  }

  begin(): ForwardCursor<T> {
    return new ForwardCursor(this.head.next)
  }

  end(): ForwardCursor<T> {
    return new ForwardCursor(this.tail)
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let node = this.head.next; node !== this.tail; node = node.next) {
      const entry = node.entry
      if (entry !== END) yield entry
    }
  }
}
