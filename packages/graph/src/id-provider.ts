import type { IdProvider } from './types'

/**
 * Hands out consecutive integers in first-request order. Each element keeps
 * the id it was first given for the lifetime of the provider.
 */
export function createIntegerIdProvider<T>(start = 0): IdProvider<T> {
  const ids = new Map<T, string>()
  let next = start
  return (element) => {
    let id = ids.get(element)
    if (id === undefined) {
      id = String(next++)
      ids.set(element, id)
    }
    return id
  }
}

/**
 * Uses the element's own display string as its id.
 */
export function createToStringIdProvider<T>(): IdProvider<T> {
  return element => String(element)
}
