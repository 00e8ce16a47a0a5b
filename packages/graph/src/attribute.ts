import type { Attribute, AttributeLookup } from './types'
import { AttributeType } from './types'

/**
 * Create an attribute, inferring its type from the JavaScript value.
 */
export function createAttribute(value: string | number | boolean | null): Attribute {
  if (value === null) {
    return { type: AttributeType.Null, value: 'null' }
  }
  if (typeof value === 'boolean') {
    return { type: AttributeType.Boolean, value: String(value) }
  }
  if (typeof value === 'number') {
    return {
      type: Number.isInteger(value) ? AttributeType.Int : AttributeType.Double,
      value: String(value),
    }
  }
  return { type: AttributeType.String, value }
}

/**
 * Build an {@link AttributeLookup} over a per-element attribute table.
 */
export function attributeLookupFromMap<T>(
  table: ReadonlyMap<T, Readonly<Record<string, Attribute>>>,
): AttributeLookup<T> {
  return (element, key) => {
    const attrs = table.get(element)
    if (!attrs || !Object.hasOwn(attrs, key))
      return undefined
    return attrs[key]
  }
}
