/**
 * Compressed Sparse Row Graph
 *
 * All edge payloads live in one array, grouped by source vertex. Vertex `u`
 * owns the slice `[offsets[u], offsets[u + 1])`, and its edge view covers
 * exactly that slice of the global storage.
 */

import {
  DescriptorError,
  IndexedEdgeView,
  IndexedVertexDescriptor,
  IndexedVertexView,
  shapes,
  type IndexedEdgeDescriptor,
  type InnerValueOf,
  type PayloadShape,
  type TargetIdOf,
  type VertexDescriptor,
} from "@graphdesc/descriptors"

export interface CompressedGraphOptions<P, Id, Inner> {
  /** How to read target ids and data out of payloads. Defaults to inferring it per payload. */
  shape?: PayloadShape<P, Id, Inner>
}

/** A vertex of a compressed graph; its element in `offsets` is its first edge. */
export type CompressedVertex = IndexedVertexDescriptor<number>

/**
 * @example
 * ```typescript
 * const g = CompressedGraph.fromEdges(3, [[0, [1, 0.5]], [0, [2, 1.5]], [1, [2, 2.0]]])
 * for (const uv of g.edges(g.vertex(0))) g.targetId(uv) // 1, 2
 * ```
 */
export class CompressedGraph<P, Id = TargetIdOf<P>, Inner = InnerValueOf<P>> {
  private constructor(
    /** Row boundaries, one per vertex plus a trailing total. */
    readonly offsets: readonly number[],
    /** Global edge storage, grouped by source. */
    readonly edgeStorage: readonly P[],
    private readonly shape: PayloadShape<P, Id, Inner>,
  ) {}

  /**
   * Build from `(source, payload)` pairs. Edges of one source keep their input order.
   * @throws DescriptorError if a source is not in `[0, numVertices)`
   */
  static fromEdges<P>(numVertices: number, edges: Iterable<readonly [number, P]>): CompressedGraph<P>
  static fromEdges<P, Id, Inner>(
    numVertices: number,
    edges: Iterable<readonly [number, P]>,
    options: CompressedGraphOptions<P, Id, Inner>,
  ): CompressedGraph<P, Id, Inner>
  static fromEdges<P>(
    numVertices: number,
    edges: Iterable<readonly [number, P]>,
    options: CompressedGraphOptions<P, unknown, unknown> = {},
  ): CompressedGraph<P, unknown, unknown> {
    const list = [...edges]
    const offsets = new Array<number>(numVertices + 1).fill(0)

    for (const [source] of list) {
      if (!Number.isInteger(source) || source < 0 || source >= numVertices) {
        throw new DescriptorError(`Edge source ${source} is not a vertex of a ${numVertices}-vertex graph`, {
          role: "edge",
        })
      }
      offsets[source + 1]++
    }
    for (let u = 0; u < numVertices; u++) {
      offsets[u + 1] += offsets[u]
    }

    // Counting sort into place, stable per source
    const fill = offsets.slice(0, numVertices)
    const storage = new Array<P>(list.length)
    for (const [source, payload] of list) {
      storage[fill[source]++] = payload
    }

    return new CompressedGraph(offsets, storage, options.shape ?? shapes.inferred<P>())
  }

  numVertices(): number {
    return this.offsets.length - 1
  }

  numEdges(): number {
    return this.edgeStorage.length
  }

  vertices(): IndexedVertexView<number> {
    return new IndexedVertexView<number>(0, this.numVertices())
  }

  /**
   * Descriptor for vertex `id`.
   * @throws DescriptorError if `id` is not a vertex
   */
  vertex(id: number): CompressedVertex {
    this.checkVertex(id)
    return new IndexedVertexDescriptor<number>(id)
  }

  /**
   * Out-edges of `u`: an explicit range over the global edge storage.
   * @throws DescriptorError if `u` is not a vertex
   */
  edges<VD extends VertexDescriptor<number>>(u: VD): IndexedEdgeView<P, VD, Id, Inner> {
    const id = u.vertexId()
    this.checkVertex(id)
    return new IndexedEdgeView(this.offsets[id], this.offsets[id + 1], u, this.shape)
  }

  degree(u: VertexDescriptor<number>): number {
    const id = u.vertexId()
    this.checkVertex(id)
    return this.offsets[id + 1] - this.offsets[id]
  }

  targetId<VD extends VertexDescriptor>(uv: IndexedEdgeDescriptor<P, VD, Id, Inner>): Id {
    return uv.targetId(this.edgeStorage)
  }

  /** Payload data of `uv` without its target id. */
  edgeValue<VD extends VertexDescriptor>(uv: IndexedEdgeDescriptor<P, VD, Id, Inner>): Inner {
    return uv.innerValue(this.edgeStorage)
  }

  private checkVertex(id: number): void {
    if (!Number.isInteger(id) || id < 0 || id >= this.numVertices()) {
      throw new DescriptorError(`${id} is not a vertex of a ${this.numVertices()}-vertex graph`, { role: "vertex" })
    }
  }
}
