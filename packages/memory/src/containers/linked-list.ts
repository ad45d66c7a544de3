/**
 * Doubly Linked Entry List
 *
 * Circular list with one sentinel node standing for the end position.
 * Cursors hold node handles, so they stay valid across inserts and across
 * removal of other nodes.
 */

import { EndOfRangeError, type BidirectionalCursor, type Cursor } from "@graphdesc/descriptors"

/** Marks the sentinel node, which holds no entry. */
export const END: unique symbol = Symbol("end")

export class LinkNode<T> {
  prev: LinkNode<T> = this
  next: LinkNode<T> = this

  constructor(public entry: T | typeof END) {}
}

/**
 * Bidirectional cursor over a linked list. `prev()` of the first position is
 * the end position, and `prev()` of the end position is the last one.
 */
export class ListCursor<T> implements BidirectionalCursor<T> {
  constructor(
    private readonly node: LinkNode<T>,
    private readonly owner: string,
  ) {}

  /**
   * @throws EndOfRangeError at the end position
   */
  get(): T {
    const entry = this.node.entry
    if (entry === END) {
      throw new EndOfRangeError(this.owner)
    }
    return entry
  }

  next(): ListCursor<T> {
    return new ListCursor(this.node.next, this.owner)
  }

  prev(): ListCursor<T> {
    return new ListCursor(this.node.prev, this.owner)
  }

  equals(other: Cursor<T>): boolean {
    return other instanceof ListCursor && other.node === this.node
  }
}

export class LinkedList<T> {
  readonly sentinel = new LinkNode<T>(END)
  private count = 0

  get size(): number {
    return this.count
  }

  /** Link a new node holding `entry` right before `position`. */
  insertBefore(position: LinkNode<T>, entry: T): LinkNode<T> {
    const node = new LinkNode<T>(entry)
    node.prev = position.prev
    node.next = position
    position.prev.next = node
    position.prev = node
    this.count++
    return node
  }

  append(entry: T): LinkNode<T> {
    return this.insertBefore(this.sentinel, entry)
  }

  unlink(node: LinkNode<T>): void {
    node.prev.next = node.next
    node.next.prev = node.prev
    this.count--
  }

  clear(): void {
    this.sentinel.prev = this.sentinel
    this.sentinel.next = this.sentinel
    this.count = 0
  }

  cursor(node: LinkNode<T>, owner: string): ListCursor<T> {
    return new ListCursor(node, owner)
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let node = this.sentinel.next; node !== this.sentinel; node = node.next) {
      const entry = node.entry
      if (entry !== END) yield entry
    }
  }
}
