/**
 * Adjacency Access
 *
 * An adjacency container is vertex storage whose inner values are the
 * per-vertex edge containers. These helpers pair a descriptor with the
 * container it came from and check that both agree on the storage kind.
 */

import {
  IndexedEdgeDescriptor,
  IndexedVertexDescriptor,
  PositionalEdgeDescriptor,
  PositionalVertexDescriptor,
  type EdgeDescriptor,
  type VertexDescriptor,
} from '../descriptor'
import { DescriptorError, StorageKindMismatchError, UnsupportedStorageError } from '../errors'
import { isEdgeStorage, isIndexedStorage, type EdgeStorage, type VertexStorage } from '../storage'

/**
 * Inner value of `u` inside `g`.
 * @throws StorageKindMismatchError if `u` was not built for a container of g's kind
 */
export function innerValueIn(g: VertexStorage, u: VertexDescriptor): unknown {
  if (u instanceof IndexedVertexDescriptor) {
    if (!isIndexedStorage(g)) throw new StorageKindMismatchError('indexed', 'positional')
    return u.innerValue(g)
  }
  if (u instanceof PositionalVertexDescriptor) {
    if (isIndexedStorage(g)) throw new StorageKindMismatchError('positional', 'indexed')
    return u.innerValue(g)
  }
  throw new DescriptorError(`Unsupported vertex descriptor: ${String(u)}`, { role: 'vertex' })
}

/**
 * Edge container of `u` inside `g`.
 * @throws UnsupportedStorageError if the row is not edge storage
 */
export function adjacencyOf(g: VertexStorage, u: VertexDescriptor): EdgeStorage {
  const row = innerValueIn(g, u)
  if (!isEdgeStorage(row)) {
    throw new UnsupportedStorageError('edge', `row of ${String(u)} is neither array-like nor cursor-based`)
  }
  return row
}

/**
 * Target id of `uv`, reading indexed payloads from the row of its source.
 */
export function targetIdIn(g: VertexStorage, uv: EdgeDescriptor): unknown {
  if (uv instanceof IndexedEdgeDescriptor) {
    const row = adjacencyOf(g, uv.source())
    if (!isIndexedStorage(row)) throw new StorageKindMismatchError('indexed', 'positional')
    return uv.targetId(row)
  }
  if (uv instanceof PositionalEdgeDescriptor) {
    return uv.targetId()
  }
  throw new DescriptorError(`Unsupported edge descriptor: ${String(uv)}`, { role: 'edge' })
}

/**
 * Payload data of `uv` without its target id.
 */
export function edgeValueIn(g: VertexStorage, uv: EdgeDescriptor): unknown {
  if (uv instanceof IndexedEdgeDescriptor) {
    const row = adjacencyOf(g, uv.source())
    if (!isIndexedStorage(row)) throw new StorageKindMismatchError('indexed', 'positional')
    return uv.innerValue(row)
  }
  if (uv instanceof PositionalEdgeDescriptor) {
    return uv.innerValue()
  }
  throw new DescriptorError(`Unsupported edge descriptor: ${String(uv)}`, { role: 'edge' })
}
