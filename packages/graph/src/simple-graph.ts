import type { Graph, GraphType } from './types'

export const DEFAULT_EDGE_WEIGHT = 1.0

interface EdgeRecord<V> {
  source: V
  target: V
  weight: number
}

/**
 * In-memory graph with insertion-ordered vertices and edges.
 *
 * Self-loops and parallel edges are accepted; each edge value must be unique.
 */
export class SimpleGraph<V, E> implements Graph<V, E> {
  private readonly vertices: Set<V> = new Set()
  private readonly edges: Map<E, EdgeRecord<V>> = new Map()
  private readonly type: GraphType

  constructor(type: Partial<GraphType> = {}) {
    this.type = {
      directed: type.directed ?? true,
      weighted: type.weighted ?? false,
    }
  }

  // ==================== Mutation ====================

  /**
   * @returns `false` when the vertex was already present
   */
  addVertex(vertex: V): boolean {
    if (this.vertices.has(vertex))
      return false
    this.vertices.add(vertex)
    return true
  }

  addEdge(source: V, target: V, edge: E, weight: number = DEFAULT_EDGE_WEIGHT): E {
    if (!this.vertices.has(source)) {
      throw new TypeError(`Unknown source vertex: ${String(source)}`)
    }
    if (!this.vertices.has(target)) {
      throw new TypeError(`Unknown target vertex: ${String(target)}`)
    }
    if (this.edges.has(edge)) {
      throw new TypeError(`Edge already present: ${String(edge)}`)
    }
    this.edges.set(edge, { source, target, weight })
    return edge
  }

  setEdgeWeight(edge: E, weight: number): void {
    if (!this.type.weighted) {
      throw new TypeError('Cannot set the weight of an edge in an unweighted graph')
    }
    this.record(edge).weight = weight
  }

  // ==================== Queries ====================

  vertexSet(): Iterable<V> {
    return this.vertices
  }

  edgeSet(): Iterable<E> {
    return this.edges.keys()
  }

  getType(): GraphType {
    return { ...this.type }
  }

  getEdgeSource(edge: E): V {
    return this.record(edge).source
  }

  getEdgeTarget(edge: E): V {
    return this.record(edge).target
  }

  // Unweighted graphs report the default weight for every edge
  getEdgeWeight(edge: E): number {
    const record = this.record(edge)
    return this.type.weighted ? record.weight : DEFAULT_EDGE_WEIGHT
  }

  get vertexCount(): number {
    return this.vertices.size
  }

  get edgeCount(): number {
    return this.edges.size
  }

  private record(edge: E): EdgeRecord<V> {
    const record = this.edges.get(edge)
    if (!record) {
      throw new TypeError(`Unknown edge: ${String(edge)}`)
    }
    return record
  }
}
