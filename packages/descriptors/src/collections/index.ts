/**
 * Collections Module
 */

export { DescriptorMap } from './descriptor-map'
export { DescriptorSet } from './descriptor-set'
