// Exporter
export { GML_CREATOR, GML_VERSION, GmlExporter } from './exporter'

// Parameters
export { GmlParameter, GmlParameters } from './parameters'

// Identifier assignment
export { IdentifierAssigner } from './identifiers'

// Quoting and number formatting
export { escapeStringLiteral, quote } from './escape'
export { formatWeight } from './weight'

// Output sinks
export { FileSink, StringSink } from './sink'
export type { GmlSink } from './sink'

// Errors
export {
  GmlErrorCode,
  GmlExportError,
  invalidConfigError,
  invalidGraphError,
  sinkWriteFailedError,
} from './errors'
