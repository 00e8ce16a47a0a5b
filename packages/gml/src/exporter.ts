import type { AttributeLookup, Graph, IdProvider, OptionalIdProvider } from '@gmlkit/graph'
import type { GmlSink } from './sink'
import { createIntegerIdProvider } from '@gmlkit/graph'
import { createLogger } from '@gmlkit/utils/logger'
import { sinkWriteFailedError } from './errors'
import { quote } from './escape'
import { IdentifierAssigner } from './identifiers'
import { GmlParameter, GmlParameters } from './parameters'
import { FileSink, StringSink } from './sink'
import { formatWeight } from './weight'

const log = createLogger('GML')

export const GML_CREATOR = 'JGraphT GML Exporter'
export const GML_VERSION = '1'

const DELIM = ' '
const TAB1 = '\t'
const TAB2 = '\t\t'

const LABEL_ATTRIBUTE_KEY = 'label'

/**
 * Exports a graph as a GML (Graph Modeling Language) document.
 *
 * Vertex labels, edge labels and edge weights are optional sections turned on
 * with {@link GmlExporter.setParameter}. Labels come from the "label"
 * attribute of each element and fall back to its display string.
 *
 * The exporter may be reused: parameters and providers persist between
 * exports, identifier assignment does not.
 *
 * @example
 * ```ts
 * const exporter = new GmlExporter<string, DefaultEdge<string>>()
 * exporter.setParameter(GmlParameter.EXPORT_VERTEX_LABELS, true)
 * const gml = exporter.exportToString(graph)
 * ```
 */
export class GmlExporter<V, E> {
  private readonly parameters = new GmlParameters()
  private vertexIdProvider: IdProvider<V>
  private edgeIdProvider: OptionalIdProvider<E> | undefined
  private vertexAttributeProvider: AttributeLookup<V> | undefined
  private edgeAttributeProvider: AttributeLookup<E> | undefined

  /**
   * @param vertexIdProvider defaults to consecutive integers from 0, kept per
   *   vertex across exports
   */
  constructor(vertexIdProvider?: IdProvider<V>) {
    this.vertexIdProvider = vertexIdProvider ?? createIntegerIdProvider<V>()
  }

  // ==================== Configuration ====================

  isParameter(p: GmlParameter): boolean {
    return this.parameters.isSet(p)
  }

  setParameter(p: GmlParameter, value: boolean): void {
    this.parameters.set(p, value)
  }

  getVertexIdProvider(): IdProvider<V> {
    return this.vertexIdProvider
  }

  setVertexIdProvider(provider: IdProvider<V>): void {
    this.vertexIdProvider = provider
  }

  getEdgeIdProvider(): OptionalIdProvider<E> | undefined {
    return this.edgeIdProvider
  }

  /** Without an edge id provider no edge gets an `id` field. */
  setEdgeIdProvider(provider: OptionalIdProvider<E> | undefined): void {
    this.edgeIdProvider = provider
  }

  getVertexAttributeProvider(): AttributeLookup<V> | undefined {
    return this.vertexAttributeProvider
  }

  setVertexAttributeProvider(provider: AttributeLookup<V> | undefined): void {
    this.vertexAttributeProvider = provider
  }

  getEdgeAttributeProvider(): AttributeLookup<E> | undefined {
    return this.edgeAttributeProvider
  }

  setEdgeAttributeProvider(provider: AttributeLookup<E> | undefined): void {
    this.edgeAttributeProvider = provider
  }

  // ==================== Export ====================

  /**
   * Write the whole document to `sink` and flush it.
   *
   * @throws GmlExportError with code `SINK_WRITE_FAILED` when the sink fails;
   *   the output is then truncated
   */
  exportGraph(graph: Graph<V, E>, sink: GmlSink): void {
    const ids = new IdentifierAssigner(this.vertexIdProvider, this.edgeIdProvider)
    const out = (line: string): void => {
      try {
        sink.write(`${line}\n`)
      }
      catch (err) {
        throw sinkWriteFailedError(err)
      }
    }

    // assign ids in vertex set iteration order
    for (const vertex of graph.vertexSet()) {
      ids.getVertexId(vertex)
    }

    const directed = graph.getType().directed
    out(`Creator${DELIM}${this.quoted(GML_CREATOR)}`)
    out(`Version${DELIM}${GML_VERSION}`)
    out('graph')
    out('[')
    out(`${TAB1}label${DELIM}${this.quoted('')}`)
    out(`${TAB1}directed${DELIM}${directed ? '1' : '0'}`)
    const vertexCount = this.exportVertices(graph, ids, out)
    const edgeCount = this.exportEdges(graph, ids, out)
    out(']')

    try {
      sink.flush()
    }
    catch (err) {
      throw sinkWriteFailedError(err)
    }

    log.debug(`Exported ${vertexCount} vertices and ${edgeCount} edges`)
  }

  exportToString(graph: Graph<V, E>): string {
    const sink = new StringSink()
    this.exportGraph(graph, sink)
    return sink.toString()
  }

  /**
   * Export into a file, replacing its contents.
   */
  exportToFile(graph: Graph<V, E>, path: string): void {
    const sink = new FileSink(path)
    try {
      this.exportGraph(graph, sink)
    }
    finally {
      sink.close()
    }
  }

  private quoted(value: string): string {
    return quote(value, this.parameters.isSet(GmlParameter.ESCAPE_STRINGS_AS_JAVA))
  }

  private exportVertices(
    graph: Graph<V, E>,
    ids: IdentifierAssigner<V, E>,
    out: (line: string) => void,
  ): number {
    const exportLabels = this.parameters.isSet(GmlParameter.EXPORT_VERTEX_LABELS)
    let count = 0

    for (const vertex of graph.vertexSet()) {
      out(`${TAB1}node`)
      out(`${TAB1}[`)
      out(`${TAB2}id${DELIM}${ids.getVertexId(vertex)}`)
      if (exportLabels) {
        const label = this.vertexAttributeProvider?.(vertex, LABEL_ATTRIBUTE_KEY)?.value ?? String(vertex)
        out(`${TAB2}label${DELIM}${this.quoted(label)}`)
      }
      out(`${TAB1}]`)
      count++
    }
    return count
  }

  private exportEdges(
    graph: Graph<V, E>,
    ids: IdentifierAssigner<V, E>,
    out: (line: string) => void,
  ): number {
    const exportLabels = this.parameters.isSet(GmlParameter.EXPORT_EDGE_LABELS)
    const exportWeights = this.parameters.isSet(GmlParameter.EXPORT_EDGE_WEIGHTS)
      && graph.getType().weighted
    let count = 0

    for (const edge of graph.edgeSet()) {
      out(`${TAB1}edge`)
      out(`${TAB1}[`)
      const edgeId = ids.getEdgeId(edge)
      if (edgeId !== undefined) {
        out(`${TAB2}id${DELIM}${edgeId}`)
      }
      out(`${TAB2}source${DELIM}${ids.getVertexId(graph.getEdgeSource(edge))}`)
      out(`${TAB2}target${DELIM}${ids.getVertexId(graph.getEdgeTarget(edge))}`)
      if (exportLabels) {
        const label = this.edgeAttributeProvider?.(edge, LABEL_ATTRIBUTE_KEY)?.value ?? String(edge)
        out(`${TAB2}label${DELIM}${this.quoted(label)}`)
      }
      if (exportWeights) {
        out(`${TAB2}weight${DELIM}${formatWeight(graph.getEdgeWeight(edge))}`)
      }
      out(`${TAB1}]`)
      count++
    }
    return count
  }
}
