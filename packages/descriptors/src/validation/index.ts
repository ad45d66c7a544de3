/**
 * Validation Module
 */

export { parseVertexValue, parseEdgeValue } from './payload'
