import { describe, it, expect } from "vitest"
import { EndOfRangeError, PositionalVertexDescriptor, vertexView } from "@graphdesc/descriptors"
import { LinkedHashMap } from "../src"

describe("LinkedHashMap", () => {
  it("iterates in insertion order", () => {
    const map = new LinkedHashMap<string, number>([
      ["c", 3],
      ["a", 1],
      ["b", 2],
    ])
    expect([...map.keys()]).toEqual(["c", "a", "b"])
    expect(map.size).toBe(3)
  })

  it("keeps the original position when a key is set again", () => {
    const map = new LinkedHashMap<string, number>([
      ["c", 3],
      ["a", 1],
    ])
    map.set("c", 30)
    expect([...map]).toEqual([
      ["c", 30],
      ["a", 1],
    ])
  })

  it("matches keys like Map does", () => {
    const map = new LinkedHashMap<number, string>([[NaN, "nan"]])
    expect(map.get(NaN)).toBe("nan")
    expect(map.find(NaN).get()).toEqual([NaN, "nan"])
  })

  it("deletes and clears", () => {
    const map = new LinkedHashMap<string, number>([
      ["x", 1],
      ["y", 2],
    ])
    expect(map.delete("x")).toBe(true)
    expect([...map.keys()]).toEqual(["y"])
    map.clear()
    expect(map.size).toBe(0)
    expect(map.get("y")).toBeUndefined()
  })

  it("keeps cursors valid while other entries come and go", () => {
    const map = new LinkedHashMap<string, number>([
      ["x", 1],
      ["y", 2],
    ])
    const y = map.find("y")
    map.delete("x")
    map.set("z", 3)
    expect(y.get()).toEqual(["y", 2])
    expect(y.next().get()).toEqual(["z", 3])
    expect(y.prev().equals(map.end())).toBe(true)
  })

  it("throws when the end position is dereferenced", () => {
    const map = new LinkedHashMap<string, number>()
    expect(() => map.begin().get()).toThrow(EndOfRangeError)
    expect(() => map.end().get()).toThrow("Cannot dereference the end position of LinkedHashMap")
  })

  it("serves as positional vertex storage", () => {
    const map = new LinkedHashMap<string, { label: string }>([
      ["u", { label: "first" }],
      ["v", { label: "second" }],
    ])
    const view = vertexView(map)
    expect(view.kind).toBe("positional")
    expect([...view].map((u) => u.vertexId())).toEqual(["u", "v"])

    const v = new PositionalVertexDescriptor(map.find("v"))
    expect(v.innerValue(map)).toEqual({ label: "second" })
    expect(view.begin().next().get().equals(v)).toBe(true)
  })
})
