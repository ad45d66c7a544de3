/**
 * Payload Shape Tests
 *
 * Target id and inner value extraction for every payload shape.
 */

import { describe, it, expect, expectTypeOf } from 'vitest'
import { classifyPayload, shapes, type InnerValueOf, type TargetIdOf } from '../../src'

describe('Payload Shapes', () => {
  // ===========================================================================
  // CLASSIFICATION
  // ===========================================================================

  describe('classifyPayload', () => {
    it('classifies primitives as scalar', () => {
      expect(classifyPayload(5)).toBe('scalar')
      expect(classifyPayload('x')).toBe('scalar')
      expect(classifyPayload(5n)).toBe('scalar')
      expect(classifyPayload(true)).toBe('scalar')
    })

    it('prefers first/second over positional access', () => {
      expect(classifyPayload({ first: 1, second: 2 })).toBe('keyValue')
      expect(classifyPayload(Object.assign([0, 1], { first: 9 }))).toBe('keyValue')
    })

    it('classifies non-empty arrays as tuples', () => {
      expect(classifyPayload([7, 'x'])).toBe('tuple')
      expect(classifyPayload([4])).toBe('tuple')
    })

    it('falls back to the whole payload', () => {
      expect(classifyPayload([])).toBe('whole')
      expect(classifyPayload({ id: 1 })).toBe('whole')
      expect(classifyPayload(null)).toBe('whole')
      expect(classifyPayload(undefined)).toBe('whole')
    })
  })

  // ===========================================================================
  // INFERRED SHAPE
  // ===========================================================================

  describe('shapes.inferred', () => {
    const shape = shapes.inferred<unknown>()

    it('is tagged inferred', () => {
      expect(shape.kind).toBe('inferred')
    })

    it('extracts the target id by payload shape', () => {
      expect(shape.targetId(5)).toBe(5)
      expect(shape.targetId([7, 'x'])).toBe(7)
      expect(shape.targetId([9, 'a', 'b'])).toBe(9)
      expect(shape.targetId({ first: 3, second: 's' })).toBe(3)
    })

    it('uses the whole payload when it has no recognizable shape', () => {
      const payload = { id: 1 }
      expect(shape.targetId(payload)).toBe(payload)
      expect(shape.innerValue(payload)).toBe(payload)
    })

    it('strips the target id from the inner value', () => {
      expect(shape.innerValue(5)).toBe(5)
      expect(shape.innerValue([7, 'x'])).toBe('x')
      expect(shape.innerValue([9, 'a', 'b'])).toEqual(['a', 'b'])
      expect(shape.innerValue([4])).toEqual([])
      expect(shape.innerValue({ first: 3, second: 's' })).toBe('s')
    })

    it('keeps a first-only payload whole as its inner value', () => {
      const payload = { first: 3 }
      expect(shape.innerValue(payload)).toBe(payload)
    })
  })

  // ===========================================================================
  // EXPLICIT SHAPES
  // ===========================================================================

  describe('explicit shapes', () => {
    it('scalar: the payload is both target and data', () => {
      const shape = shapes.scalar<number>()
      expect(shape.kind).toBe('scalar')
      expect(shape.targetId(5)).toBe(5)
      expect(shape.innerValue(5)).toBe(5)
    })

    it('keyValue: first is the target, second the data', () => {
      const shape = shapes.keyValue<number, string>()
      expect(shape.kind).toBe('keyValue')
      expect(shape.targetId({ first: 7, second: 'x' })).toBe(7)
      expect(shape.innerValue({ first: 7, second: 'x' })).toBe('x')
    })

    it('pair: element 0 is the target, element 1 the data', () => {
      const shape = shapes.pair<number, string>()
      expect(shape.kind).toBe('tuple')
      expect(shape.targetId([7, 'x'])).toBe(7)
      expect(shape.innerValue([7, 'x'])).toBe('x')
    })

    it('tuple: element 0 is the target, the rest is the data', () => {
      const shape = shapes.tuple<readonly [number, string, string]>()
      expect(shape.targetId([9, 'a', 'b'])).toBe(9)
      expect(shape.innerValue([9, 'a', 'b'])).toEqual(['a', 'b'])
      expectTypeOf(shape.innerValue).returns.toEqualTypeOf<[string, string]>()
    })

    it('whole: the payload itself is the target', () => {
      const shape = shapes.whole<{ id: number }>()
      const payload = { id: 4 }
      expect(shape.kind).toBe('whole')
      expect(shape.targetId(payload)).toBe(payload)
    })
  })

  // ===========================================================================
  // TYPE-LEVEL EXTRACTION
  // ===========================================================================

  describe('TargetIdOf / InnerValueOf', () => {
    it('follow the same priority as the inferred shape', () => {
      expectTypeOf<TargetIdOf<number>>().toEqualTypeOf<number>()
      expectTypeOf<TargetIdOf<{ first: string; second: number }>>().toEqualTypeOf<string>()
      expectTypeOf<TargetIdOf<readonly [number, string]>>().toEqualTypeOf<number>()
      expectTypeOf<TargetIdOf<{ id: number }>>().toEqualTypeOf<{ id: number }>()

      expectTypeOf<InnerValueOf<number>>().toEqualTypeOf<number>()
      expectTypeOf<InnerValueOf<{ first: string; second: boolean }>>().toEqualTypeOf<boolean>()
      expectTypeOf<InnerValueOf<readonly [number, string]>>().toEqualTypeOf<string>()
      expectTypeOf<InnerValueOf<readonly [number, string, boolean]>>().toEqualTypeOf<[string, boolean]>()
    })
  })
})
