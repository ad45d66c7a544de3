/**
 * Test Suite Index
 *
 * ## Test Organization
 *
 * ```
 * __tests__/spec/
 * ├── fixtures/
 * │   └── cursor-storage.ts      # Array-backed cursor containers
 * ├── storage.spec.ts            # Capability classification
 * ├── payload-shape.spec.ts      # Target id / inner value extraction
 * ├── vertex-descriptor.spec.ts  # Indexed and positional vertex descriptors
 * ├── edge-descriptor.spec.ts    # Indexed and positional edge descriptors
 * ├── vertex-view.spec.ts        # Vertex views
 * ├── edge-view.spec.ts          # Edge views, explicit ranges
 * ├── collections.spec.ts        # DescriptorMap / DescriptorSet
 * ├── graph.spec.ts              # Graph accessor functions
 * ├── validation.spec.ts         # Zod payload validation
 * └── hash.spec.ts               # Hashing primitives
 * ```
 *
 * ## Coverage Summary
 *
 * - Round-trip identity for both storage kinds
 * - View completeness and restartability
 * - Edge source invariance
 * - Target extraction per payload shape
 * - Structural equality and hashing
 * - Empty-range termination
 */

export * from './fixtures/cursor-storage'
