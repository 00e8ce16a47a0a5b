// Graph model
export type {
  Attribute,
  AttributeLookup,
  Graph,
  GraphType,
  IdProvider,
  OptionalIdProvider,
} from './types'
export { AttributeType } from './types'

export { DEFAULT_EDGE_WEIGHT, SimpleGraph } from './simple-graph'
export { DefaultEdge } from './edge'

// Attributes
export { attributeLookupFromMap, createAttribute } from './attribute'

// Id providers
export { createIntegerIdProvider, createToStringIdProvider } from './id-provider'

// JSON interchange
export {
  graphFromSerialized,
  SerializedEdgeSchema,
  SerializedGraphSchema,
  SerializedVertexSchema,
} from './serialized'
export type { LoadedGraph, SerializedEdge, SerializedGraph, SerializedVertex } from './serialized'
