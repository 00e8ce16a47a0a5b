/**
 * Edge value for graphs whose edges carry no payload of their own.
 *
 * Each instance is a distinct lookup key, so parallel edges between the same
 * endpoints stay distinguishable.
 */
export class DefaultEdge<V = unknown> {
  constructor(
    readonly source: V,
    readonly target: V,
  ) {}

  toString(): string {
    return `(${String(this.source)} : ${String(this.target)})`
  }
}
