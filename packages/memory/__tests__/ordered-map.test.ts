import { describe, it, expect } from "vitest"
import {
  DescriptorError,
  EndOfRangeError,
  findVertex,
  vertices,
} from "@graphdesc/descriptors"
import { OrderedMap, naturalOrder } from "../src"

// =============================================================================
// TESTS
// =============================================================================

describe("OrderedMap", () => {
  let map: OrderedMap<number, string>

  function build(): OrderedMap<number, string> {
    return new OrderedMap<number, string>([
      [200, "B"],
      [100, "A"],
    ])
  }

  describe("Map operations", () => {
    it("keeps keys sorted", () => {
      map = build()
      expect([...map.keys()]).toEqual([100, 200])
      expect([...map.values()]).toEqual(["A", "B"])
      expect(map.size).toBe(2)
    })

    it("gets, sets and deletes", () => {
      map = build()
      expect(map.get(100)).toBe("A")
      expect(map.get(150)).toBeUndefined()
      map.set(150, "M")
      expect([...map.keys()]).toEqual([100, 150, 200])
      expect(map.delete(150)).toBe(true)
      expect(map.delete(150)).toBe(false)
      expect(map.has(150)).toBe(false)
    })

    it("updates an existing key in place", () => {
      map = build()
      map.set(100, "Z")
      expect([...map]).toEqual([
        [100, "Z"],
        [200, "B"],
      ])
      expect(map.size).toBe(2)
    })

    it("clears", () => {
      map = build()
      map.clear()
      expect(map.size).toBe(0)
      expect(map.has(100)).toBe(false)
      expect(map.begin().equals(map.end())).toBe(true)
      map.set(5, "again")
      expect([...map.keys()]).toEqual([5])
    })

    it("orders with a custom comparator", () => {
      const descending = new OrderedMap<number, string>(
        [
          [1, "a"],
          [2, "b"],
          [3, "c"],
        ],
        { compare: (a, b) => b - a },
      )
      expect([...descending.keys()]).toEqual([3, 2, 1])
    })

    it("orders strings naturally", () => {
      const words = new OrderedMap<string, number>([
        ["pear", 1],
        ["apple", 2],
      ])
      expect([...words.keys()]).toEqual(["apple", "pear"])
    })

    it("refuses to order mixed key types without a comparator", () => {
      expect(() => naturalOrder(1, "a")).toThrow("Cannot order number and string keys without a compare option")
      expect(
        () =>
          new OrderedMap<unknown, number>([
            [1, 1],
            ["a", 2],
          ]),
      ).toThrow(DescriptorError)
    })
  })

  describe("Cursors", () => {
    it("finds keys and returns end for absent ones", () => {
      map = build()
      expect(map.find(200).get()).toEqual([200, "B"])
      expect(map.find(300).equals(map.end())).toBe(true)
    })

    it("moves in both directions", () => {
      map = build()
      expect(map.begin().next().get()).toEqual([200, "B"])
      expect(map.end().prev().get()).toEqual([200, "B"])
      expect(map.begin().prev().equals(map.end())).toBe(true)
    })

    it("stay valid across inserts and deletes of other keys", () => {
      map = build()
      const cursor = map.find(200)
      map.set(150, "M")
      expect(cursor.get()).toEqual([200, "B"])
      expect(cursor.prev().get()).toEqual([150, "M"])
      map.delete(100)
      expect(cursor.get()).toEqual([200, "B"])
      map.set(200, "C")
      expect(cursor.get()).toEqual([200, "C"])
    })

    it("throws when the end position is dereferenced", () => {
      map = build()
      expect(() => map.end().get()).toThrow(EndOfRangeError)
      expect(() => map.end().get()).toThrow("Cannot dereference the end position of OrderedMap")
    })
  })

  describe("As vertex storage", () => {
    it("yields keyed vertex descriptors", () => {
      map = build()
      expect([...vertices(map)].map((u) => u.vertexId())).toEqual([100, 200])
      expect([...vertices(map)].map((u) => u.innerValue(map))).toEqual(["A", "B"])
    })

    it("finds vertices with its own lookup", () => {
      map = build()
      const u = findVertex(map, 200)
      expect(u?.vertexId()).toBe(200)
      expect(u?.innerValue()).toBe("B")
      expect(findVertex(map, 300)).toBeUndefined()
    })
  })
})
