/**
 * Descriptor View Base
 */

import type { ForwardStorage, StorageKind } from '../storage'
import { ViewCursor, type PositionStep } from './cursor'

/**
 * Lazy, restartable, forward-only sequence of descriptors over the half-open
 * position range `[first, last)`. The view owns no container and no
 * descriptors; each traversal starts over from `begin()`.
 *
 * The range is not validated. An inverted range is a caller error.
 */
export abstract class DescriptorView<Pos, D> implements Iterable<D>, ForwardStorage<D> {
  abstract readonly kind: StorageKind

  protected constructor(
    protected readonly first: Pos,
    protected readonly last: Pos,
    private readonly step: PositionStep<Pos>,
  ) {}

  /** Descriptor for one position. */
  protected abstract describe(position: Pos): D

  begin(): ViewCursor<Pos, D> {
    return new ViewCursor(this.first, this.step, (position) => this.describe(position))
  }

  end(): ViewCursor<Pos, D> {
    return new ViewCursor(this.last, this.step, (position) => this.describe(position))
  }

  isEmpty(): boolean {
    return this.step.equals(this.first, this.last)
  }

  *[Symbol.iterator](): Iterator<D> {
    const end = this.end()
    for (let cursor = this.begin(); !cursor.equals(end); cursor = cursor.next()) {
      yield cursor.get()
    }
  }
}
