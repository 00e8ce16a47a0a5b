import type { DefaultEdge, LoadedGraph } from '@gmlkit/graph'
import type { Command } from 'commander'
import type { ExportSettings, GmlkitConfig } from '../config'
import { readFile } from 'node:fs/promises'
import { GmlExporter, GmlParameter, invalidGraphError } from '@gmlkit/gml'
import { createToStringIdProvider, graphFromSerialized, SerializedGraphSchema } from '@gmlkit/graph'
import { createStderrLogger, LogLevels, parseLogLevel, setLogLevel } from '@gmlkit/utils/logger'
import { formatIssues, loadConfig, resolveExportSettings } from '../config'

const log = createStderrLogger('export')

export interface ExportCommandOptions {
  output?: string
  config?: string
  vertexLabels?: boolean
  edgeLabels?: boolean
  edgeWeights?: boolean
  escape?: boolean
  ids?: string
  edgeIds?: boolean
  logLevel?: string
  verbose?: boolean
}

/**
 * Read and validate a serialized graph file.
 */
export async function loadGraphFile(inputPath: string): Promise<LoadedGraph> {
  const raw = await readFile(inputPath, 'utf-8')

  let json: unknown
  try {
    json = JSON.parse(raw)
  }
  catch (err) {
    throw invalidGraphError(`${inputPath} is not valid JSON`, err)
  }

  const result = SerializedGraphSchema.safeParse(json)
  if (!result.success) {
    throw invalidGraphError(`${inputPath}: ${formatIssues(result.error)}`, result.error)
  }

  try {
    return graphFromSerialized(result.data)
  }
  catch (err) {
    throw invalidGraphError(`${inputPath}: ${err instanceof Error ? err.message : String(err)}`, err)
  }
}

/**
 * Configure an exporter for a loaded graph.
 */
export function createExporter(
  loaded: LoadedGraph,
  settings: ExportSettings,
): GmlExporter<string, DefaultEdge<string>> {
  const exporter = new GmlExporter<string, DefaultEdge<string>>(
    settings.ids === 'vertex' ? createToStringIdProvider() : undefined,
  )
  exporter.setVertexAttributeProvider(loaded.vertexAttributes)
  exporter.setEdgeAttributeProvider(loaded.edgeAttributes)
  if (settings.edgeIds) {
    exporter.setEdgeIdProvider(loaded.edgeIds)
  }
  exporter.setParameter(GmlParameter.EXPORT_VERTEX_LABELS, settings.vertexLabels)
  exporter.setParameter(GmlParameter.EXPORT_EDGE_LABELS, settings.edgeLabels)
  exporter.setParameter(GmlParameter.EXPORT_EDGE_WEIGHTS, settings.edgeWeights)
  exporter.setParameter(GmlParameter.ESCAPE_STRINGS_AS_JAVA, settings.escape)
  return exporter
}

function flagsFromOptions(options: ExportCommandOptions): GmlkitConfig {
  return {
    vertexLabels: options.vertexLabels,
    edgeLabels: options.edgeLabels,
    edgeWeights: options.edgeWeights,
    escape: options.escape,
    ids: options.ids === 'vertex' || options.ids === 'integer' ? options.ids : undefined,
    edgeIds: options.edgeIds,
  }
}

/**
 * Export a serialized graph file as GML.
 *
 * @returns the document when no output file is given, `undefined` after
 *   writing the output file
 */
export async function runExport(
  inputPath: string,
  options: ExportCommandOptions,
  cwd: string = process.cwd(),
): Promise<string | undefined> {
  const config = await loadConfig(options.config, cwd)
  const settings = resolveExportSettings(config, flagsFromOptions(options))
  log.debug(`Export settings: ${JSON.stringify(settings)}`)

  const loaded = await loadGraphFile(inputPath)
  const exporter = createExporter(loaded, settings)

  if (options.output) {
    exporter.exportToFile(loaded.graph, options.output)
    log.success(`Wrote ${loaded.graph.vertexCount} nodes and ${loaded.graph.edgeCount} edges to ${options.output}`)
    return undefined
  }
  return exporter.exportToString(loaded.graph)
}

export function registerExportCommand(program: Command): void {
  program
    .command('export')
    .description('Export a JSON graph file as GML')
    .argument('<input>', 'Serialized graph (JSON)')
    .option('-o, --output <file>', 'Output file (default: stdout)')
    .option('-c, --config <file>', 'Config file (default: ./gmlkit.config.json if present)')
    // Each toggle also has a --no-* form; absent flags fall back to the config file
    .option('--vertex-labels', 'Write vertex labels')
    .option('--no-vertex-labels', 'Do not write vertex labels')
    .option('--edge-labels', 'Write edge labels')
    .option('--no-edge-labels', 'Do not write edge labels')
    .option('--edge-weights', 'Write edge weights (weighted graphs only)')
    .option('--no-edge-weights', 'Do not write edge weights')
    .option('--escape', 'Escape labels as string literals')
    .option('--no-escape', 'Write labels verbatim')
    .option('--ids <mode>', 'Vertex ids: integer | vertex')
    .option('--edge-ids', 'Write edge ids declared in the input')
    .option('--no-edge-ids', 'Do not write edge ids')
    .option('--log-level <level>', 'silent | error | warn | info | debug | trace')
    .option('--verbose', 'Show detailed progress (same as --log-level debug)')
    .action(async (inputPath: string, options: ExportCommandOptions) => {
      if (options.logLevel !== undefined) {
        const level = parseLogLevel(options.logLevel)
        if (level === undefined) {
          log.error(`Unknown log level: ${options.logLevel}`)
          process.exit(1)
        }
        setLogLevel(level)
      }
      else if (options.verbose) {
        setLogLevel(LogLevels.debug)
      }
      if (options.ids !== undefined && options.ids !== 'integer' && options.ids !== 'vertex') {
        log.error(`Unknown id mode: ${options.ids} (expected integer or vertex)`)
        process.exit(1)
      }

      try {
        const document = await runExport(inputPath, options)
        if (document !== undefined) {
          process.stdout.write(document)
        }
      }
      catch (error) {
        log.error(`Export failed: ${error instanceof Error ? error.message : String(error)}`)
        process.exit(1)
      }
    })
}
