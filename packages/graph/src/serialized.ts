import type { Attribute, AttributeLookup, OptionalIdProvider } from './types'
import { z } from 'zod/v4'
import { attributeLookupFromMap, createAttribute } from './attribute'
import { DefaultEdge } from './edge'
import { SimpleGraph } from './simple-graph'

const AttributeValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()])

export const SerializedVertexSchema = z.object({
  /** Vertex identity; also its display string */
  id: z.string(),
  attrs: z.record(z.string(), AttributeValueSchema).optional(),
})

export const SerializedEdgeSchema = z.object({
  /** Optional edge id, written as the GML edge `id` when edge ids are enabled */
  id: z.string().optional(),
  source: z.string(),
  target: z.string(),
  weight: z.number().optional(),
  attrs: z.record(z.string(), AttributeValueSchema).optional(),
})

/**
 * JSON interchange form of a graph
 */
export const SerializedGraphSchema = z.object({
  directed: z.boolean().default(true),
  weighted: z.boolean().default(false),
  vertices: z.array(SerializedVertexSchema),
  edges: z.array(SerializedEdgeSchema).default([]),
})

export type SerializedVertex = z.infer<typeof SerializedVertexSchema>
export type SerializedEdge = z.infer<typeof SerializedEdgeSchema>
export type SerializedGraph = z.infer<typeof SerializedGraphSchema>

export interface LoadedGraph {
  graph: SimpleGraph<string, DefaultEdge<string>>
  vertexAttributes: AttributeLookup<string>
  edgeAttributes: AttributeLookup<DefaultEdge<string>>
  /** Yields the `id` of edges that declared one */
  edgeIds: OptionalIdProvider<DefaultEdge<string>>
}

function toAttributes(
  attrs: Record<string, string | number | boolean | null> | undefined,
): Record<string, Attribute> {
  const out: Record<string, Attribute> = {}
  for (const [key, value] of Object.entries(attrs ?? {})) {
    out[key] = createAttribute(value)
  }
  return out
}

/**
 * Materialize a serialized graph. Vertex and edge order follow the arrays.
 *
 * @throws TypeError on duplicate vertex ids or edges that reference an
 *   unknown vertex
 */
export function graphFromSerialized(data: SerializedGraph): LoadedGraph {
  const graph = new SimpleGraph<string, DefaultEdge<string>>({
    directed: data.directed,
    weighted: data.weighted,
  })
  const vertexTable = new Map<string, Record<string, Attribute>>()
  const edgeTable = new Map<DefaultEdge<string>, Record<string, Attribute>>()
  const edgeIdTable = new Map<DefaultEdge<string>, string>()

  for (const vertex of data.vertices) {
    if (!graph.addVertex(vertex.id)) {
      throw new TypeError(`Duplicate vertex id: ${vertex.id}`)
    }
    vertexTable.set(vertex.id, toAttributes(vertex.attrs))
  }

  for (const entry of data.edges) {
    const edge = graph.addEdge(entry.source, entry.target, new DefaultEdge(entry.source, entry.target))
    if (entry.weight !== undefined && data.weighted) {
      graph.setEdgeWeight(edge, entry.weight)
    }
    edgeTable.set(edge, toAttributes(entry.attrs))
    if (entry.id !== undefined) {
      edgeIdTable.set(edge, entry.id)
    }
  }

  return {
    graph,
    vertexAttributes: attributeLookupFromMap(vertexTable),
    edgeAttributes: attributeLookupFromMap(edgeTable),
    edgeIds: edge => edgeIdTable.get(edge),
  }
}
