/**
 * Storage Classification Tests
 */

import { describe, it, expect, expectTypeOf } from 'vitest'
import {
  classifyEdgeStorage,
  classifyVertexStorage,
  DescriptorError,
  isBidirectionalStorage,
  isEdgeStorage,
  isForwardStorage,
  isIndexedStorage,
  isKeyedStorage,
  isPairLike,
  isVertexStorage,
  UnsupportedStorageError,
  type EdgeAccessKind,
  type ElementOf,
  type VertexAccessKind,
} from '../../src'
import { CursorList, ForwardOnlyList, KeyedCursorList } from './fixtures/cursor-storage'

describe('Storage Classification', () => {
  // ===========================================================================
  // RUNTIME GUARDS
  // ===========================================================================

  describe('isIndexedStorage', () => {
    it('accepts arrays, typed arrays and array-likes', () => {
      expect(isIndexedStorage([])).toBe(true)
      expect(isIndexedStorage(new Float64Array(2))).toBe(true)
      expect(isIndexedStorage({ length: 2, 0: 'a', 1: 'b' })).toBe(true)
    })

    it('rejects data views, primitives and cursor storage', () => {
      expect(isIndexedStorage(new DataView(new ArrayBuffer(4)))).toBe(false)
      expect(isIndexedStorage(42)).toBe(false)
      expect(isIndexedStorage(null)).toBe(false)
      expect(isIndexedStorage(new CursorList([1]))).toBe(false)
    })

    it('accepts strings and rejects functions', () => {
      expect(isIndexedStorage('abc')).toBe(true)
      expect(isIndexedStorage((a: number, b: number) => a + b)).toBe(false)
      expect(classifyEdgeStorage('bc')).toBe('indexed')
      expect(() => classifyEdgeStorage(() => 1)).toThrow(UnsupportedStorageError)
    })

    it('prefers indexed access when a container also has cursors', () => {
      const items: Array<readonly [number, string]> = [
        [1, 'a'],
        [2, 'b'],
      ]
      const list = new CursorList(items)
      const both = { length: 2, 0: items[0], 1: items[1], begin: () => list.begin(), end: () => list.end() }
      expectTypeOf<VertexAccessKind<typeof both>>().toEqualTypeOf<'indexed'>()
      expect(isIndexedStorage(both)).toBe(true)
      expect(classifyVertexStorage(both)).toBe('indexed')
      expect(classifyEdgeStorage(both)).toBe('indexed')
    })
  })

  describe('cursor storage guards', () => {
    it('detects forward and bidirectional storage', () => {
      expect(isForwardStorage(new ForwardOnlyList([1]))).toBe(true)
      expect(isBidirectionalStorage(new ForwardOnlyList([1]))).toBe(false)
      expect(isBidirectionalStorage(new CursorList([1]))).toBe(true)
      expect(isForwardStorage([1, 2])).toBe(false)
    })

    it('detects keyed storage', () => {
      expect(isKeyedStorage(new KeyedCursorList<number, string>([[1, 'a']]))).toBe(true)
      expect(isKeyedStorage(new CursorList([[1, 'a']]))).toBe(false)
    })
  })

  describe('isPairLike', () => {
    it('accepts arrays of two or more elements', () => {
      expect(isPairLike([7, 'x'])).toBe(true)
      expect(isPairLike([9, 'a', 'b'])).toBe(true)
      expect(isPairLike([1])).toBe(false)
    })

    it('accepts objects with first and second', () => {
      expect(isPairLike({ first: 1, second: 2 })).toBe(true)
      expect(isPairLike({ first: 1 })).toBe(false)
      expect(isPairLike('ab')).toBe(false)
    })
  })

  // ===========================================================================
  // CLASSIFICATION
  // ===========================================================================

  describe('classifyVertexStorage', () => {
    it('classifies array-likes as indexed', () => {
      expect(classifyVertexStorage([10, 20, 30])).toBe('indexed')
      expect(classifyVertexStorage(new Int32Array(3))).toBe('indexed')
    })

    it('classifies bidirectional storage of pairs as positional', () => {
      expect(classifyVertexStorage(new CursorList([[100, 'A']]))).toBe('positional')
      expect(classifyVertexStorage(new CursorList([{ first: 'a', second: 1 }]))).toBe('positional')
    })

    it('accepts empty positional storage without inspecting elements', () => {
      expect(classifyVertexStorage(new CursorList([]))).toBe('positional')
    })

    it('rejects forward-only storage', () => {
      expect(() => classifyVertexStorage(new ForwardOnlyList([[1, 'a']]))).toThrow(
        'Unsupported vertex storage: positional vertex storage needs bidirectional cursors',
      )
    })

    it('rejects positional storage of non-pairs', () => {
      expect(() => classifyVertexStorage(new CursorList([1, 2]))).toThrow(
        'Unsupported vertex storage: positional vertex elements must be pair-like (key, value)',
      )
    })

    it('rejects values with no access capability', () => {
      expect(() => classifyVertexStorage(42)).toThrow(UnsupportedStorageError)
      expect(() => classifyVertexStorage({})).toThrow(
        'Unsupported vertex storage: expected an array-like or a container with begin()/end() cursors',
      )
    })

    it('reports the role on the error', () => {
      try {
        classifyVertexStorage(undefined)
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(UnsupportedStorageError)
        if (error instanceof UnsupportedStorageError) {
          expect(error.role).toBe('vertex')
          expect(error.name).toBe('UnsupportedStorageError')
          expect(error).toBeInstanceOf(DescriptorError)
        }
      }
    })
  })

  describe('classifyEdgeStorage', () => {
    it('classifies array-likes as indexed', () => {
      expect(classifyEdgeStorage([5, 7])).toBe('indexed')
    })

    it('classifies forward-only storage as positional', () => {
      expect(classifyEdgeStorage(new ForwardOnlyList([1]))).toBe('positional')
      expect(classifyEdgeStorage(new CursorList([1]))).toBe('positional')
    })

    it('rejects values with no access capability', () => {
      expect(() => classifyEdgeStorage({ begin: 1 })).toThrow(
        'Unsupported edge storage: expected an array-like or a container with begin()/end() cursors',
      )
    })
  })

  describe('isVertexStorage / isEdgeStorage', () => {
    it('mirror the classifiers without throwing', () => {
      expect(isVertexStorage([1])).toBe(true)
      expect(isVertexStorage(new ForwardOnlyList([[1, 'a']]))).toBe(false)
      expect(isEdgeStorage(new ForwardOnlyList([1]))).toBe(true)
      expect(isEdgeStorage(5)).toBe(false)
    })
  })

  // ===========================================================================
  // TYPE-LEVEL CLASSIFICATION
  // ===========================================================================

  describe('type-level access kinds', () => {
    it('selects the vertex access kind from the storage type', () => {
      expectTypeOf<VertexAccessKind<number[]>>().toEqualTypeOf<'indexed'>()
      expectTypeOf<VertexAccessKind<Float64Array>>().toEqualTypeOf<'indexed'>()
      expectTypeOf<VertexAccessKind<CursorList<readonly [number, string]>>>().toEqualTypeOf<'positional'>()
      expectTypeOf<VertexAccessKind<CursorList<{ first: string; second: number }>>>().toEqualTypeOf<'positional'>()
    })

    it('rejects unsupported vertex storage as never', () => {
      expectTypeOf<VertexAccessKind<CursorList<number>>>().toBeNever()
      expectTypeOf<VertexAccessKind<ForwardOnlyList<readonly [number, string]>>>().toBeNever()
      expectTypeOf<VertexAccessKind<number>>().toBeNever()
    })

    it('selects the edge access kind from the storage type', () => {
      expectTypeOf<EdgeAccessKind<number[]>>().toEqualTypeOf<'indexed'>()
      expectTypeOf<EdgeAccessKind<ForwardOnlyList<number>>>().toEqualTypeOf<'positional'>()
      expectTypeOf<EdgeAccessKind<number>>().toBeNever()
      expectTypeOf<EdgeAccessKind<string>>().toEqualTypeOf<'indexed'>()
    })

    it('extracts element types', () => {
      expectTypeOf<ElementOf<number[]>>().toEqualTypeOf<number>()
      expectTypeOf<ElementOf<ForwardOnlyList<string>>>().toEqualTypeOf<string>()
    })
  })
})
