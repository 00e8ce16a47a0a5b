// Decimal notation is used for magnitudes in [1e-3, 1e7)
const PLAIN_MIN = 1e-3
const PLAIN_MAX = 1e7

/**
 * Format an edge weight as a GML real.
 *
 * Integral values keep one fractional digit (`1.0`), and magnitudes outside
 * [1e-3, 1e7) use `E` notation (`1.0E7`, `2.5E-4`). Digits are the shortest
 * that round-trip to the same double.
 */
export function formatWeight(weight: number): string {
  if (Number.isNaN(weight))
    return 'NaN'
  if (!Number.isFinite(weight))
    return weight > 0 ? 'Infinity' : '-Infinity'
  if (weight === 0)
    return Object.is(weight, -0) ? '-0.0' : '0.0'

  const magnitude = Math.abs(weight)
  if (magnitude >= PLAIN_MIN && magnitude < PLAIN_MAX) {
    const plain = String(weight)
    return plain.includes('.') ? plain : `${plain}.0`
  }

  const [mantissa = '', exponent = '0'] = weight.toExponential().split('e')
  const digits = mantissa.includes('.') ? mantissa : `${mantissa}.0`
  return `${digits}E${Number.parseInt(exponent, 10)}`
}
