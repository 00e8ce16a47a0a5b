import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { invalidConfigError } from '@gmlkit/gml'
import { z } from 'zod/v4'

export const CONFIG_FILE_NAME = 'gmlkit.config.json'

export const GmlkitConfigSchema = z.strictObject({
  /** Write vertex labels */
  vertexLabels: z.boolean().optional(),
  /** Write edge labels */
  edgeLabels: z.boolean().optional(),
  /** Write edge weights of weighted graphs */
  edgeWeights: z.boolean().optional(),
  /** Escape labels as string literals */
  escape: z.boolean().optional(),
  /** `integer`: sequential ids; `vertex`: the vertex id from the input file */
  ids: z.enum(['integer', 'vertex']).optional(),
  /** Write the `id` of edges that declare one */
  edgeIds: z.boolean().optional(),
})

export type GmlkitConfig = z.infer<typeof GmlkitConfigSchema>

export type IdMode = NonNullable<GmlkitConfig['ids']>

export interface ExportSettings {
  vertexLabels: boolean
  edgeLabels: boolean
  edgeWeights: boolean
  escape: boolean
  ids: IdMode
  edgeIds: boolean
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

/**
 * Load the CLI config file.
 *
 * Without an explicit path, `gmlkit.config.json` in `cwd` is used when it
 * exists and an empty config otherwise. An explicit path must exist.
 */
export async function loadConfig(configPath?: string, cwd: string = process.cwd()): Promise<GmlkitConfig> {
  const file = path.resolve(cwd, configPath ?? CONFIG_FILE_NAME)

  let raw: string
  try {
    raw = await readFile(file, 'utf-8')
  }
  catch (err) {
    if (!configPath && err instanceof Error && (err as NodeJS.ErrnoException).code === 'ENOENT') {
      return {}
    }
    throw invalidConfigError(`cannot read ${file}`, err)
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  }
  catch (err) {
    throw invalidConfigError(`${file} is not valid JSON`, err)
  }

  const result = GmlkitConfigSchema.safeParse(json)
  if (!result.success) {
    throw invalidConfigError(`${file}: ${formatIssues(result.error)}`, result.error)
  }
  return result.data
}

/**
 * Merge config file values with command-line flags. Flags win when given.
 */
export function resolveExportSettings(config: GmlkitConfig, flags: GmlkitConfig): ExportSettings {
  return {
    vertexLabels: flags.vertexLabels ?? config.vertexLabels ?? false,
    edgeLabels: flags.edgeLabels ?? config.edgeLabels ?? false,
    edgeWeights: flags.edgeWeights ?? config.edgeWeights ?? false,
    escape: flags.escape ?? config.escape ?? false,
    ids: flags.ids ?? config.ids ?? 'integer',
    edgeIds: flags.edgeIds ?? config.edgeIds ?? false,
  }
}
