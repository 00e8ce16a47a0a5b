import type { IdProvider, OptionalIdProvider } from '@gmlkit/graph'

/**
 * Per-export identifier table.
 *
 * Ids are computed by the providers on first lookup and never recomputed, so
 * assignment order is the order of first lookup.
 */
export class IdentifierAssigner<V, E> {
  private readonly vertexIds = new Map<V, string>()
  private readonly edgeIds = new Map<E, string | undefined>()

  constructor(
    private readonly vertexIdProvider: IdProvider<V>,
    private readonly edgeIdProvider?: OptionalIdProvider<E>,
  ) {}

  getVertexId(vertex: V): string {
    let id = this.vertexIds.get(vertex)
    if (id === undefined) {
      id = this.vertexIdProvider(vertex)
      this.vertexIds.set(vertex, id)
    }
    return id
  }

  /**
   * @returns `undefined` when no edge id provider is configured or the
   *   provider has no id for this edge
   */
  getEdgeId(edge: E): string | undefined {
    if (!this.edgeIdProvider)
      return undefined
    if (this.edgeIds.has(edge))
      return this.edgeIds.get(edge)
    const id = this.edgeIdProvider(edge)
    this.edgeIds.set(edge, id)
    return id
  }

  get assignedVertexCount(): number {
    return this.vertexIds.size
  }
}
