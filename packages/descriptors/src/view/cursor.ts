/**
 * View Cursors
 *
 * A view cursor holds the current position and nothing else worth caching:
 * every `get()` builds a fresh descriptor from that position.
 */

import type { Cursor } from '../storage'

/**
 * How positions of one storage kind advance and compare.
 */
export interface PositionStep<Pos> {
  next(position: Pos): Pos
  equals(a: Pos, b: Pos): boolean
}

/** Anything that advances and compares itself, like storage cursors. */
export interface Steppable<C> {
  next(): C
  equals(other: C): boolean
}

/** Integer offsets. */
export const indexStep: PositionStep<number> = {
  next: (position) => position + 1,
  equals: (a, b) => a === b,
}

/** Storage cursors. */
export function cursorStep<C extends Steppable<C>>(): PositionStep<C> {
  return {
    next: (cursor) => cursor.next(),
    equals: (a, b) => a.equals(b),
  }
}

/**
 * Forward cursor over a view, yielding descriptors synthesized on demand.
 * Two view cursors are equal when their positions are.
 */
export class ViewCursor<Pos, D> implements Cursor<D> {
  constructor(
    private readonly position: Pos,
    private readonly step: PositionStep<Pos>,
    private readonly describe: (position: Pos) => D,
  ) {}

  /** Current raw position. */
  value(): Pos {
    return this.position
  }

  get(): D {
    return this.describe(this.position)
  }

  next(): ViewCursor<Pos, D> {
    return new ViewCursor(this.step.next(this.position), this.step, this.describe)
  }

  equals(other: Cursor<D>): boolean {
    return other instanceof ViewCursor && this.step.equals(this.position, other.position)
  }
}
