/**
 * Error codes for GML export operations
 */
export const GmlErrorCode = {
  SINK_WRITE_FAILED: 'SINK_WRITE_FAILED',
  INVALID_GRAPH: 'INVALID_GRAPH',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const

export type GmlErrorCode = (typeof GmlErrorCode)[keyof typeof GmlErrorCode]

export class GmlExportError extends Error {
  constructor(
    public code: GmlErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'GmlExportError'
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * The output sink rejected a write or flush. The document written so far is
 * truncated.
 */
export function sinkWriteFailedError(cause: unknown): GmlExportError {
  return new GmlExportError(
    GmlErrorCode.SINK_WRITE_FAILED,
    `Failed to write GML output: ${describe(cause)}`,
    { cause },
  )
}

export function invalidGraphError(reason: string, cause?: unknown): GmlExportError {
  return new GmlExportError(GmlErrorCode.INVALID_GRAPH, `Invalid graph: ${reason}`, { cause })
}

export function invalidConfigError(reason: string, cause?: unknown): GmlExportError {
  return new GmlExportError(GmlErrorCode.INVALID_CONFIG, `Invalid config: ${reason}`, { cause })
}
