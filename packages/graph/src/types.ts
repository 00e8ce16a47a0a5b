/**
 * Structural properties a graph reports about itself.
 */
export interface GraphType {
  directed: boolean
  weighted: boolean
}

/**
 * Read-only view of a graph.
 *
 * Vertices and edges are opaque values used as lookup keys. Iteration order
 * of `vertexSet()` and `edgeSet()` must be stable for a given graph state.
 */
export interface Graph<V, E> {
  vertexSet: () => Iterable<V>
  edgeSet: () => Iterable<E>
  getType: () => GraphType
  getEdgeSource: (edge: E) => V
  getEdgeTarget: (edge: E) => V
  getEdgeWeight: (edge: E) => number
}

/**
 * Maps a graph element to the string token that identifies it in an
 * exported document.
 */
export type IdProvider<T> = (element: T) => string

/**
 * Value categories an attribute may carry
 */
export const AttributeType = {
  Null: 'null',
  Boolean: 'boolean',
  Int: 'int',
  Double: 'double',
  String: 'string',
} as const

export type AttributeType = (typeof AttributeType)[keyof typeof AttributeType]

/**
 * Named metadata attached to a vertex or an edge. The value is always kept
 * in its string form.
 */
export interface Attribute {
  type: AttributeType
  value: string
}

/**
 * Looks up one attribute of an element by key.
 */
export type AttributeLookup<T> = (element: T, key: string) => Attribute | undefined

/**
 * Like {@link IdProvider}, but an element may have no id at all.
 */
export type OptionalIdProvider<T> = (element: T) => string | undefined
